// tests/combat-math.test.ts — Damage formulas, execution speed and the interaction table

import { describe, it, expect } from 'vitest';
import type { CharacterStats, WeaponData } from '../src/types/index.js';
import {
  baseDamage,
  blockerStunDuration,
  guardedDamage,
  knockdownDuration,
  reflectedDamage,
  stunDuration,
} from '../src/combat/damage.js';
import { compareSpeeds, executionSpeed } from '../src/pipeline/speed-resolver.js';
import {
  INTERACTION_MATRIX,
  guardedEffects,
  missEffects,
  unguardedEffects,
  type CombatantSnapshot,
} from '../src/pipeline/interaction-matrix.js';
import { getWeapon } from '../src/data/weapons.js';
import { chargeTimeMs, phaseTimeMs, skillReach } from '../src/data/skills.js';
import { FLAT_STATS } from './fixtures.js';

function weapon(id: string): Readonly<WeaponData> {
  const found = getWeapon(id);
  if (!found) throw new Error(`missing weapon ${id}`);
  return found;
}

function snapshot(overrides: Partial<CombatantSnapshot> = {}): CombatantSnapshot {
  return {
    id: 'x',
    team: 'x',
    revision: 0,
    health: 100,
    defeated: false,
    position: { x: 0, y: 0 },
    weapon: weapon('sword'),
    stats: FLAT_STATS,
    state: 'uncharged',
    skill: null,
    condition: 'none',
    defense: null,
    ...overrides,
  };
}

function stats(overrides: Partial<CharacterStats>): CharacterStats {
  return { ...FLAT_STATS, ...overrides };
}

describe('damage', () => {
  it('adds strength and subtracts defense, never below 1', () => {
    expect(baseDamage(weapon('sword'), stats({ strength: 5 }), stats({ physicalDefense: 3 }))).toBe(12);
    expect(baseDamage(weapon('dagger'), FLAT_STATS, stats({ physicalDefense: 50 }))).toBe(1);
  });

  it('a broken guard still absorbs most of the hit', () => {
    expect(guardedDamage(10, FLAT_STATS)).toBe(3);
    expect(guardedDamage(20, stats({ physicalDefense: 4 }))).toBe(2);
    expect(guardedDamage(30, stats({ physicalDefense: 20 }))).toBe(3);
    expect(guardedDamage(1, stats({ physicalDefense: 20 }))).toBe(1);
  });

  it('reflected damage uses the attacker against themselves', () => {
    expect(reflectedDamage(weapon('mace'), stats({ strength: 6, physicalDefense: 2 }))).toBe(18);
  });

  it('focus shortens stun and knockdown', () => {
    expect(stunDuration(weapon('sword'), FLAT_STATS)).toBe(1000);
    expect(stunDuration(weapon('sword'), stats({ focus: 15 }))).toBe(500);
    expect(stunDuration(weapon('sword'), stats({ focus: 45 }))).toBe(0);
    expect(blockerStunDuration(weapon('sword'), stats({ focus: 14 }))).toBe(267);
    expect(knockdownDuration(stats({ focus: 15 }))).toBe(1000);
  });
});

describe('timings', () => {
  it('weapon execution modifiers scale the phases', () => {
    expect(phaseTimeMs('light_attack', 'startup', weapon('dagger'))).toBe(160);
    expect(phaseTimeMs('heavy_attack', 'recovery', weapon('mace'))).toBe(960);
  });

  it('dexterity shortens charging', () => {
    expect(chargeTimeMs('heavy_attack', FLAT_STATS)).toBe(2000);
    expect(chargeTimeMs('heavy_attack', stats({ dexterity: 10 }))).toBe(1000);
  });

  it('reach depends on the skill', () => {
    expect(skillReach('sweep', weapon('sword'))).toBe(2.5);
    expect(skillReach('lunge', weapon('sword'))).toBe(4);
    expect(skillReach('ranged', weapon('bow'))).toBe(6);
    expect(skillReach('light_attack', weapon('spear'))).toBe(2);
  });
});

describe('execution speed', () => {
  it('combines weapon speed, dexterity and the skill bonus', () => {
    expect(executionSpeed('light_attack', weapon('sword'), FLAT_STATS)).toBe(1.2);
    expect(executionSpeed('light_attack', weapon('sword'), stats({ dexterity: 10 }))).toBeCloseTo(3.2);
    expect(executionSpeed('heavy_attack', weapon('spear'), FLAT_STATS)).toBeCloseTo(0.61);
  });

  it('treats speeds within the epsilon as a tie', () => {
    expect(compareSpeeds(1.2, 1.2 + 1e-7)).toBe('tie');
    expect(compareSpeeds(1.3, 1.2)).toBe('first');
    expect(compareSpeeds(1.2, 1.3)).toBe('second');
  });
});

describe('interaction table', () => {
  it('covers every offense against every defense', () => {
    expect(INTERACTION_MATRIX).toEqual({
      light_attack: { block: 'block_holds', counter: 'counter_reflect' },
      heavy_attack: { block: 'block_broken', counter: 'counter_reflect' },
      sweep: { block: 'clean_block', counter: 'counter_broken' },
      lunge: { block: 'block_holds', counter: 'counter_reflect' },
      ranged: { block: 'clean_block', counter: 'counter_ineffective' },
    });
  });

  it('block holds: the attacker is stunned by the blocker weapon', () => {
    const planned = guardedEffects(
      'block_holds',
      snapshot({ id: 'att' }),
      snapshot({ id: 'def', weapon: weapon('spear'), stats: stats({ focus: 14 }) }),
    );
    expect(planned.attacker).toEqual({
      damage: 0,
      status: { kind: 'stun', durationMs: 1100 },
      ccBuildup: 0,
      forced: { to: 'recovery', lockoutMs: 1100 },
      displacement: null,
    });
    expect(planned.defender).toEqual({
      damage: 0,
      status: { kind: 'stun', durationMs: 267 },
      ccBuildup: 0,
      forced: { to: 'recovery', lockoutMs: 0 },
      displacement: null,
    });
  });

  it('a sweep breaks a counter outright', () => {
    const planned = guardedEffects('counter_broken', snapshot({ id: 'att' }), snapshot({ id: 'def' }));
    expect(planned.defender).toEqual({
      damage: 10,
      status: { kind: 'knockdown', durationMs: 2000 },
      ccBuildup: 0,
      forced: { to: 'uncharged', reason: 'knocked_down' },
      displacement: null,
    });
    expect(planned.attacker.damage).toBe(0);
  });

  it('a counter cannot turn an arrow', () => {
    const planned = guardedEffects('counter_ineffective', snapshot({ weapon: weapon('bow') }), snapshot());
    expect(planned.defender).toEqual({
      damage: 8,
      status: { kind: 'stun', durationMs: 600 },
      ccBuildup: 25,
      forced: { to: 'recovery', lockoutMs: 600 },
      displacement: null,
    });
  });

  it('a clean block costs the defender only the defense', () => {
    const planned = guardedEffects('clean_block', snapshot(), snapshot());
    expect(planned.attacker).toEqual({ damage: 0, status: null, ccBuildup: 0, forced: null, displacement: null });
    expect(planned.defender.forced).toEqual({ to: 'recovery', lockoutMs: 0 });
  });

  it('an unguarded hit interrupts only startup and active', () => {
    const idle = unguardedEffects('light_attack', snapshot(), snapshot({ state: 'charging' }));
    expect(idle.defender.forced).toBeNull();

    const busy = unguardedEffects('light_attack', snapshot(), snapshot({ state: 'startup' }));
    expect(busy.defender.forced).toEqual({ to: 'recovery', lockoutMs: 1000 });
  });

  it('an unguarded heavy knocks down', () => {
    const planned = unguardedEffects('heavy_attack', snapshot(), snapshot());
    expect(planned.kind).toBe('knockdown_hit');
    expect(planned.defender.status).toEqual({ kind: 'knockdown', durationMs: 2000 });
  });

  it('pushes knocked-down and staggered victims away from the attacker', () => {
    const attacker = snapshot({ id: 'att', position: { x: 1, y: 1 } });
    const victim = snapshot({ id: 'def', position: { x: 4, y: 5 } });

    expect(unguardedEffects('heavy_attack', attacker, victim).defender.displacement).toEqual({
      direction: { x: 0.6, y: 0.8 },
      distance: 2,
    });
    expect(unguardedEffects('sweep', attacker, victim).defender.displacement?.distance).toBe(1.8);
    expect(unguardedEffects('light_attack', attacker, victim).defender.displacement?.distance).toBe(0);
    expect(guardedEffects('counter_reflect', attacker, victim).attacker.displacement).toEqual({
      direction: { x: -0.6, y: -0.8 },
      distance: 1.5,
    });
    expect(guardedEffects('block_holds', attacker, victim).attacker.displacement).toBeNull();
  });

  it('a miss still spends a defense it met', () => {
    expect(missEffects(true).defender.forced).toEqual({ to: 'recovery', lockoutMs: 0 });
    expect(missEffects(false).defender).toEqual({ damage: 0, status: null, ccBuildup: 0, forced: null, displacement: null });
  });
});
