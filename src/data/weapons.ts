// data/weapons.ts — Weapon definitions (read-only equipment data)

import type { WeaponData } from '../types/index.js';
import { STANDARD_MELEE_RANGE } from '../shared/constants.js';

// --- Melee ---
const melee: WeaponData[] = [
  {
    id: 'sword', name: 'Sword', kind: 'sword', range: STANDARD_MELEE_RANGE, rangedRange: 0,
    baseDamage: 10, speed: 1.0, stunMs: 1000, executionSpeedModifier: 0, speedResolutionModifier: 0,
  },
  {
    id: 'spear', name: 'Spear', kind: 'spear', range: 2.0, rangedRange: 0,
    baseDamage: 12, speed: 0.9, stunMs: 1100, executionSpeedModifier: 0.1, speedResolutionModifier: -0.1,
  },
  {
    id: 'dagger', name: 'Dagger', kind: 'dagger', range: 1.2, rangedRange: 0,
    baseDamage: 7, speed: 1.4, stunMs: 700, executionSpeedModifier: -0.2, speedResolutionModifier: 0.2,
  },
  {
    id: 'mace', name: 'Mace', kind: 'mace', range: STANDARD_MELEE_RANGE, rangedRange: 0,
    baseDamage: 14, speed: 0.8, stunMs: 1300, executionSpeedModifier: 0.2, speedResolutionModifier: -0.2,
  },
];

// --- Ranged ---
const ranged: WeaponData[] = [
  {
    id: 'bow', name: 'Bow', kind: 'bow', range: 1.0, rangedRange: 6,
    baseDamage: 8, speed: 1.0, stunMs: 600, executionSpeedModifier: 0, speedResolutionModifier: 0,
  },
];

const registry = new Map<string, Readonly<WeaponData>>();
for (const list of [melee, ranged]) {
  for (const weapon of list) {
    registry.set(weapon.id, Object.freeze(weapon));
  }
}

export const WEAPONS: ReadonlyMap<string, Readonly<WeaponData>> = registry;

export function getWeapon(id: string): Readonly<WeaponData> | undefined {
  return WEAPONS.get(id);
}
