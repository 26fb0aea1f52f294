// data/skills.ts — Skill definitions and derived timings

import type {
  CharacterStats,
  DefensiveSkill,
  OffensiveSkill,
  SkillKind,
  WeaponData,
} from '../types/index.js';
import {
  DEXTERITY_CHARGE_DIVISOR,
  LUNGE_MAX_RANGE,
  MOVEMENT_MODIFIER,
  SWEEP_RADIUS,
} from '../shared/constants.js';

export type SkillCategory = 'offensive' | 'defensive';
export type Preparation = 'instant' | 'charge' | 'aim';
export type Targeting = 'single' | 'area' | 'none';
/** What an unguarded hit from this skill does to its victim. */
export type UnguardedEffect = 'stagger' | 'knockdown';

export interface SkillDefinition {
  kind: SkillKind;
  category: SkillCategory;
  preparation: Preparation;
  chargeMs: number;
  startupMs: number;
  activeMs: number;
  recoveryMs: number;
  staminaCost: number;
  waitingDrainPerSecond: number;
  targeting: Targeting;
  prepareMovement: number;
  speedBonus: number;
  unguarded: UnguardedEffect;
}

export const SKILLS: Readonly<Record<SkillKind, Readonly<SkillDefinition>>> = Object.freeze({
  light_attack: {
    kind: 'light_attack', category: 'offensive', preparation: 'instant',
    chargeMs: 0, startupMs: 200, activeMs: 200, recoveryMs: 300,
    staminaCost: 2, waitingDrainPerSecond: 0, targeting: 'single',
    prepareMovement: MOVEMENT_MODIFIER.idle, speedBonus: 0.2, unguarded: 'stagger',
  },
  heavy_attack: {
    kind: 'heavy_attack', category: 'offensive', preparation: 'charge',
    chargeMs: 2000, startupMs: 500, activeMs: 300, recoveryMs: 800,
    staminaCost: 5, waitingDrainPerSecond: 0, targeting: 'single',
    prepareMovement: MOVEMENT_MODIFIER.offensiveCharge, speedBonus: -0.2, unguarded: 'knockdown',
  },
  sweep: {
    kind: 'sweep', category: 'offensive', preparation: 'charge',
    chargeMs: 800, startupMs: 300, activeMs: 400, recoveryMs: 500,
    staminaCost: 4, waitingDrainPerSecond: 0, targeting: 'area',
    prepareMovement: MOVEMENT_MODIFIER.idle, speedBonus: 0, unguarded: 'knockdown',
  },
  lunge: {
    kind: 'lunge', category: 'offensive', preparation: 'charge',
    chargeMs: 1500, startupMs: 100, activeMs: 150, recoveryMs: 200,
    staminaCost: 4, waitingDrainPerSecond: 0, targeting: 'single',
    prepareMovement: MOVEMENT_MODIFIER.offensiveCharge, speedBonus: 0.1, unguarded: 'stagger',
  },
  ranged: {
    kind: 'ranged', category: 'offensive', preparation: 'aim',
    chargeMs: 0, startupMs: 100, activeMs: 100, recoveryMs: 300,
    staminaCost: 3, waitingDrainPerSecond: 0, targeting: 'single',
    prepareMovement: MOVEMENT_MODIFIER.offensiveCharge, speedBonus: 0, unguarded: 'stagger',
  },
  block: {
    kind: 'block', category: 'defensive', preparation: 'charge',
    chargeMs: 1000, startupMs: 100, activeMs: 0, recoveryMs: 200,
    staminaCost: 2, waitingDrainPerSecond: 1, targeting: 'none',
    prepareMovement: MOVEMENT_MODIFIER.defensiveCharge, speedBonus: 0, unguarded: 'stagger',
  },
  counter: {
    kind: 'counter', category: 'defensive', preparation: 'charge',
    chargeMs: 1000, startupMs: 100, activeMs: 0, recoveryMs: 400,
    staminaCost: 3, waitingDrainPerSecond: 1, targeting: 'none',
    prepareMovement: MOVEMENT_MODIFIER.defensiveCharge, speedBonus: 0, unguarded: 'stagger',
  },
});

export const SKILL_KINDS: readonly SkillKind[] = [
  'light_attack', 'heavy_attack', 'sweep', 'lunge', 'ranged', 'block', 'counter',
];

export function isOffensive(skill: SkillKind): skill is OffensiveSkill {
  return SKILLS[skill].category === 'offensive';
}

export function isDefensive(skill: SkillKind): skill is DefensiveSkill {
  return SKILLS[skill].category === 'defensive';
}

export function chargeTimeMs(skill: SkillKind, stats: Readonly<CharacterStats>): number {
  return Math.round(SKILLS[skill].chargeMs / (1 + stats.dexterity / DEXTERITY_CHARGE_DIVISOR));
}

export type ExecutionPhase = 'startup' | 'active' | 'recovery';

export function phaseTimeMs(skill: SkillKind, phase: ExecutionPhase, weapon: Readonly<WeaponData>): number {
  const def = SKILLS[skill];
  const base = phase === 'startup' ? def.startupMs : phase === 'active' ? def.activeMs : def.recoveryMs;
  return Math.round(base * (1 + weapon.executionSpeedModifier));
}

/** Furthest distance at which the skill can still connect when it goes Active. */
export function skillReach(skill: SkillKind, weapon: Readonly<WeaponData>): number {
  switch (skill) {
    case 'sweep':
      return SWEEP_RADIUS;
    case 'lunge':
      return LUNGE_MAX_RANGE;
    case 'ranged':
      return weapon.rangedRange;
    case 'light_attack':
    case 'heavy_attack':
    case 'block':
    case 'counter':
      return weapon.range;
  }
}
