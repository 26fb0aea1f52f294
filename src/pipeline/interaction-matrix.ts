// pipeline/interaction-matrix.ts — Offense × defense table and outcome effects
//
// Pure functions over snapshots: nothing here touches a live combatant.

import type {
  CharacterStats,
  CombatantCondition,
  DefensiveSkill,
  Displacement,
  EntityId,
  GuardedInteraction,
  InteractionKind,
  OffensiveSkill,
  ParticipantEffect,
  Position,
  SkillKind,
  SkillStateKind,
  WeaponData,
} from '../types/index.js';
import { SKILLS } from '../data/skills.js';
import {
  baseDamage,
  blockerStunDuration,
  guardedDamage,
  knockdownDuration,
  reflectedDamage,
  stunDuration,
} from '../combat/damage.js';
import {
  CC_HIT_BUILDUP,
  COUNTER_REFLECT_DISPLACEMENT,
  HEAVY_KNOCKDOWN_DISPLACEMENT,
  SWEEP_KNOCKDOWN_DISPLACEMENT,
} from '../shared/constants.js';

/** Frozen view of a combatant taken before any outcome of the pass is applied. */
export interface CombatantSnapshot {
  readonly id: EntityId;
  readonly team: string;
  readonly revision: number;
  readonly health: number;
  readonly defeated: boolean;
  readonly position: Readonly<Position>;
  readonly weapon: Readonly<WeaponData>;
  readonly stats: Readonly<CharacterStats>;
  readonly state: SkillStateKind;
  readonly skill: SkillKind | null;
  readonly condition: CombatantCondition;
  readonly defense: DefensiveSkill | null;
}

export const INTERACTION_MATRIX: Readonly<Record<OffensiveSkill, Readonly<Record<DefensiveSkill, GuardedInteraction>>>> = {
  light_attack: { block: 'block_holds', counter: 'counter_reflect' },
  heavy_attack: { block: 'block_broken', counter: 'counter_reflect' },
  sweep: { block: 'clean_block', counter: 'counter_broken' },
  lunge: { block: 'block_holds', counter: 'counter_reflect' },
  ranged: { block: 'clean_block', counter: 'counter_ineffective' },
};

/** How far an unguarded knockdown hit throws its victim. */
const KNOCKDOWN_HIT_DISPLACEMENT: Readonly<Partial<Record<OffensiveSkill, number>>> = {
  heavy_attack: HEAVY_KNOCKDOWN_DISPLACEMENT,
  sweep: SWEEP_KNOCKDOWN_DISPLACEMENT,
};

export interface PlannedEffects {
  kind: InteractionKind;
  attacker: ParticipantEffect;
  defender: ParticipantEffect;
}

export function noEffect(): ParticipantEffect {
  return { damage: 0, status: null, ccBuildup: 0, forced: null, displacement: null };
}

/** Pushes `subject` directly away from `source`. */
export function pushAway(
  subject: CombatantSnapshot,
  source: CombatantSnapshot,
  distance: number,
): Displacement | null {
  const dx = subject.position.x - source.position.x;
  const dy = subject.position.y - source.position.y;
  const length = Math.hypot(dx, dy);
  if (length === 0) return null;
  return { direction: { x: dx / length, y: dy / length }, distance };
}

function consumed(): ParticipantEffect {
  return { ...noEffect(), forced: { to: 'recovery', lockoutMs: 0 } };
}

function knockedDown(damage: number, victim: CombatantSnapshot, displacement: Displacement | null): ParticipantEffect {
  return {
    damage,
    status: { kind: 'knockdown', durationMs: knockdownDuration(victim.stats) },
    ccBuildup: 0,
    forced: { to: 'uncharged', reason: 'knocked_down' },
    displacement,
  };
}

function stunned(
  damage: number,
  stunMs: number,
  ccBuildup: number,
  lockout: boolean,
  displacement: Displacement | null = null,
): ParticipantEffect {
  return {
    damage,
    status: stunMs > 0 ? { kind: 'stun', durationMs: stunMs } : null,
    ccBuildup,
    forced: lockout ? { to: 'recovery', lockoutMs: stunMs } : null,
    displacement,
  };
}

export function guardedEffects(
  kind: GuardedInteraction,
  attacker: CombatantSnapshot,
  defender: CombatantSnapshot,
): PlannedEffects {
  const hit = baseDamage(attacker.weapon, attacker.stats, defender.stats);

  switch (kind) {
    case 'block_holds':
      return {
        kind,
        attacker: stunned(0, stunDuration(defender.weapon, attacker.stats), 0, true),
        defender: {
          ...consumed(),
          status: stunOrNull(blockerStunDuration(attacker.weapon, defender.stats)),
        },
      };
    case 'block_broken':
      return {
        kind,
        attacker: noEffect(),
        defender: {
          ...knockedDown(
            guardedDamage(hit, defender.stats),
            defender,
            pushAway(defender, attacker, HEAVY_KNOCKDOWN_DISPLACEMENT),
          ),
          ccBuildup: CC_HIT_BUILDUP,
        },
      };
    case 'clean_block':
      return { kind, attacker: noEffect(), defender: consumed() };
    case 'counter_reflect':
      return {
        kind,
        attacker: knockedDown(
          reflectedDamage(attacker.weapon, attacker.stats),
          attacker,
          pushAway(attacker, defender, COUNTER_REFLECT_DISPLACEMENT),
        ),
        defender: consumed(),
      };
    case 'counter_broken':
      return {
        kind,
        attacker: noEffect(),
        defender: knockedDown(hit, defender, pushAway(defender, attacker, SWEEP_KNOCKDOWN_DISPLACEMENT)),
      };
    case 'counter_ineffective': {
      const stunMs = stunDuration(attacker.weapon, defender.stats);
      return {
        kind,
        attacker: noEffect(),
        defender: {
          ...stunned(hit, stunMs, CC_HIT_BUILDUP, false, pushAway(defender, attacker, 0)),
          forced: { to: 'recovery', lockoutMs: stunMs },
        },
      };
    }
  }
}

function stunOrNull(durationMs: number): ParticipantEffect['status'] {
  return durationMs > 0 ? { kind: 'stun', durationMs } : null;
}

/** A hit that meets no defense. */
export function unguardedEffects(
  offense: OffensiveSkill,
  attacker: CombatantSnapshot,
  victim: CombatantSnapshot,
): PlannedEffects {
  const damage = baseDamage(attacker.weapon, attacker.stats, victim.stats);

  if (SKILLS[offense].unguarded === 'knockdown') {
    const distance = KNOCKDOWN_HIT_DISPLACEMENT[offense] ?? 0;
    return {
      kind: 'knockdown_hit',
      attacker: noEffect(),
      defender: knockedDown(damage, victim, pushAway(victim, attacker, distance)),
    };
  }

  const interruptible = victim.state === 'startup' || victim.state === 'active';
  return {
    kind: 'unguarded_hit',
    attacker: noEffect(),
    defender: stunned(
      damage,
      stunDuration(attacker.weapon, victim.stats),
      CC_HIT_BUILDUP,
      interruptible,
      pushAway(victim, attacker, 0),
    ),
  };
}

/** A ranged shot that missed; any defense it met is spent anyway. */
export function missEffects(guarded: boolean): PlannedEffects {
  return {
    kind: 'ranged_miss',
    attacker: noEffect(),
    defender: guarded ? consumed() : noEffect(),
  };
}
