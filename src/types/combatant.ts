// types/combatant.ts — Loadout, stats and status vocabulary

import type { EntityId } from './core.js';

export type WeaponKind = 'sword' | 'spear' | 'dagger' | 'mace' | 'bow';

export interface WeaponData {
  id: string;
  name: string;
  kind: WeaponKind;
  range: number;
  /** 0 when the weapon cannot shoot. */
  rangedRange: number;
  baseDamage: number;
  speed: number;
  stunMs: number;
  executionSpeedModifier: number;
  speedResolutionModifier: number;
}

export interface CharacterStats {
  strength: number;
  dexterity: number;
  focus: number;
  physicalDefense: number;
  vitality: number;
}

export interface Loadout {
  weapon: WeaponData;
  stats: CharacterStats;
}

export type Archetype = 'soldier' | 'berserker' | 'assassin' | 'guardian' | 'archer';

export type Controller = 'player' | 'pattern';

export type StatusKind = 'stun' | 'knockback' | 'knockdown';

/** Highest-severity condition a combatant is under, as seen by patterns and presentation. */
export type CombatantCondition = 'knocked_down' | 'knocked_back' | 'stunned' | 'resting' | 'none';

export interface CombatantSpec {
  id: EntityId;
  team: string;
  archetype: Archetype;
  controller: Controller;
  position: { x: number; y: number };
  loadout: Loadout;
  targetId?: EntityId | null;
  /** Overrides the seed derived from the encounter seed and id. */
  seed?: number;
}
