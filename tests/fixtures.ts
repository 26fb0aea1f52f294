// tests/fixtures.ts — Shared builders for combat tests

import type { Archetype, CharacterStats, CombatantSpec, CombatEvent, CombatEventType } from '../src/types/index.js';
import { Encounter } from '../src/server/encounter.js';
import type { Combatant } from '../src/combat/combatant.js';
import { ARCHETYPES } from '../src/data/archetypes.js';
import { getWeapon } from '../src/data/weapons.js';
import { loadConfig, type CombatConfig } from '../src/shared/config.js';

/** Plain stats with no focus/dexterity so timings and durations stay at their base values. */
export const FLAT_STATS: CharacterStats = {
  strength: 0,
  dexterity: 0,
  focus: 0,
  physicalDefense: 0,
  vitality: 0,
};

export function testConfig(overrides: Partial<CombatConfig> = {}): CombatConfig {
  return loadConfig(overrides, {});
}

export function createEncounter(overrides: Partial<CombatConfig> = {}): Encounter {
  return new Encounter(testConfig(overrides));
}

export interface FighterOptions {
  id: string;
  team?: string;
  archetype?: Archetype;
  weaponId?: string;
  stats?: Partial<CharacterStats>;
  x?: number;
  y?: number;
  targetId?: string | null;
  controller?: CombatantSpec['controller'];
  seed?: number;
}

export function fighterSpec(options: FighterOptions): CombatantSpec {
  const archetype = options.archetype ?? 'soldier';
  const weaponId = options.weaponId ?? ARCHETYPES[archetype].weaponId;
  const weapon = getWeapon(weaponId);
  if (!weapon) throw new Error(`unknown weapon ${weaponId}`);

  return {
    id: options.id,
    team: options.team ?? options.id,
    archetype,
    controller: options.controller ?? 'player',
    position: { x: options.x ?? 0, y: options.y ?? 0 },
    loadout: { weapon, stats: { ...FLAT_STATS, ...options.stats } },
    targetId: options.targetId ?? null,
    seed: options.seed,
  };
}

export function addFighter(encounter: Encounter, options: FighterOptions): Combatant {
  return encounter.addCombatant(fighterSpec(options));
}

/** Steps every combatant the way the tick loop's update phase does, then resolves. */
export function step(encounter: Encounter, times = 1): void {
  for (let i = 0; i < times; i++) {
    const tick = encounter.advance(encounter.config.tickRateMs);
    for (const combatant of encounter.all()) {
      combatant.update(encounter.config.tickRateMs);
    }
    encounter.resolver.resolve(tick);
  }
}

export function eventsOfType<T extends CombatEventType>(
  events: readonly CombatEvent[],
  type: T,
): Extract<CombatEvent, { type: T }>[] {
  return events.filter((event): event is Extract<CombatEvent, { type: T }> => event.type === type);
}
