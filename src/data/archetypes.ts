// data/archetypes.ts — Archetype stat presets and default weapons

import type { Archetype, CharacterStats } from '../types/index.js';

export interface ArchetypePreset {
  stats: Readonly<CharacterStats>;
  weaponId: string;
}

export const ARCHETYPES: Readonly<Record<Archetype, Readonly<ArchetypePreset>>> = Object.freeze({
  soldier: {
    stats: { strength: 10, dexterity: 10, focus: 10, physicalDefense: 5, vitality: 10 },
    weaponId: 'sword',
  },
  berserker: {
    stats: { strength: 15, dexterity: 8, focus: 5, physicalDefense: 3, vitality: 12 },
    weaponId: 'mace',
  },
  assassin: {
    stats: { strength: 8, dexterity: 16, focus: 8, physicalDefense: 2, vitality: 7 },
    weaponId: 'dagger',
  },
  guardian: {
    stats: { strength: 9, dexterity: 6, focus: 14, physicalDefense: 10, vitality: 15 },
    weaponId: 'spear',
  },
  archer: {
    stats: { strength: 7, dexterity: 12, focus: 12, physicalDefense: 3, vitality: 8 },
    weaponId: 'bow',
  },
});
