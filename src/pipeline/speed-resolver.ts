// pipeline/speed-resolver.ts — Execution speed and simultaneous-offense tie-break

import type { CharacterStats, SkillKind, WeaponData } from '../types/index.js';
import { SKILLS } from '../data/skills.js';
import { DEXTERITY_SPEED_DIVISOR, SPEED_TIE_EPSILON } from '../shared/constants.js';
import { approximately } from '../shared/utils.js';

export type SpeedVerdict = 'first' | 'second' | 'tie';

export function executionSpeed(
  skill: SkillKind,
  weapon: Readonly<WeaponData>,
  stats: Readonly<CharacterStats>,
): number {
  const base = weapon.speed + stats.dexterity / DEXTERITY_SPEED_DIVISOR;
  return base * (1 + weapon.speedResolutionModifier) + SKILLS[skill].speedBonus;
}

/** Strictly faster wins; speeds within the epsilon are a tie and both land. */
export function compareSpeeds(first: number, second: number): SpeedVerdict {
  if (approximately(first, second, SPEED_TIE_EPSILON)) return 'tie';
  return first > second ? 'first' : 'second';
}
