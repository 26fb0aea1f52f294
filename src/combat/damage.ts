// combat/damage.ts — Damage, stun and knockdown formulas

import type { CharacterStats, WeaponData } from '../types/index.js';
import {
  MINIMUM_DAMAGE,
  HEAVY_VS_BLOCK_REDUCTION,
  MAX_DAMAGE_REDUCTION,
  DEFENSE_REDUCTION_DIVISOR,
  FOCUS_STATUS_RESISTANCE_DIVISOR,
  KNOCKDOWN_DURATION_MS,
  BLOCKER_STUN_RATIO,
} from '../shared/constants.js';

type Stats = Readonly<CharacterStats>;
type Weapon = Readonly<WeaponData>;

export function baseDamage(weapon: Weapon, attacker: Stats, defender: Stats): number {
  return Math.max(MINIMUM_DAMAGE, weapon.baseDamage + attacker.strength - defender.physicalDefense);
}

/** Damage that gets through a block broken by a heavy attack. */
export function guardedDamage(base: number, defender: Stats): number {
  const reduction = Math.min(
    MAX_DAMAGE_REDUCTION,
    HEAVY_VS_BLOCK_REDUCTION * (1 + defender.physicalDefense / DEFENSE_REDUCTION_DIVISOR),
  );
  return Math.max(MINIMUM_DAMAGE, Math.round(base * (1 - reduction)));
}

/** A counter turns the attacker's own force back on them. */
export function reflectedDamage(weapon: Weapon, attacker: Stats): number {
  return Math.max(MINIMUM_DAMAGE, weapon.baseDamage + attacker.strength - attacker.physicalDefense);
}

function focusResistance(victim: Stats): number {
  return Math.max(0, 1 - victim.focus / FOCUS_STATUS_RESISTANCE_DIVISOR);
}

export function stunDuration(weapon: Weapon, victim: Stats): number {
  return Math.round(weapon.stunMs * focusResistance(victim));
}

export function blockerStunDuration(weapon: Weapon, blocker: Stats): number {
  return Math.round(stunDuration(weapon, blocker) * BLOCKER_STUN_RATIO);
}

export function knockdownDuration(victim: Stats): number {
  return Math.round(KNOCKDOWN_DURATION_MS * focusResistance(victim));
}
