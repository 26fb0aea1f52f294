// server/scenario.ts — Scenario assets: who fights, with which patterns, and any scripted inputs
// Deterministic: same scenario + same seed = same fight

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type {
  CombatantSpec,
  CombatantView,
  CompiledPattern,
  RawInput,
  TickResult,
} from '../types/index.js';
import { ARCHETYPES } from '../data/archetypes.js';
import { getWeapon } from '../data/weapons.js';
import type { CombatConfig } from '../shared/config.js';
import { ScenarioError } from '../shared/errors.js';
import { Encounter } from './encounter.js';
import { TickLoop } from './tick-loop.js';
import { InputQueue } from '../pipeline/input-queue.js';
import { DecisionProcessor } from '../pipeline/decision-processor.js';

const StatsOverrideSchema = z.object({
  strength: z.number().min(0),
  dexterity: z.number().min(0),
  focus: z.number().min(0),
  physicalDefense: z.number().min(0),
  vitality: z.number().min(0),
}).partial();

const CombatantEntrySchema = z.object({
  id: z.string().min(1),
  team: z.string().min(1),
  archetype: z.enum(['soldier', 'berserker', 'assassin', 'guardian', 'archer']),
  controller: z.enum(['player', 'pattern']).default('pattern'),
  pattern: z.string().min(1).optional(),
  position: z.object({ x: z.number(), y: z.number() }),
  weaponId: z.string().min(1).optional(),
  stats: StatsOverrideSchema.optional(),
  targetId: z.string().min(1).optional(),
  seed: z.number().int().min(0).optional(),
});

const ScriptedInputSchema = z.object({
  tick: z.number().int().positive(),
  combatantId: z.string().min(1),
  action: z.string().min(1),
  skill: z.string().optional(),
  targetId: z.string().nullable().optional(),
});

export const ScenarioSchema = z.object({
  name: z.string().min(1),
  seed: z.number().int().min(0).optional(),
  maxTicks: z.number().int().positive().default(600),
  stopWhenDecided: z.boolean().default(true),
  combatants: z.array(CombatantEntrySchema).min(1),
  inputs: z.array(ScriptedInputSchema).default([]),
});

export type Scenario = z.infer<typeof ScenarioSchema>;
export type ScenarioCombatant = z.infer<typeof CombatantEntrySchema>;
export type ScriptedInput = z.infer<typeof ScriptedInputSchema>;

export interface BuiltEncounter {
  encounter: Encounter;
  inputs: InputQueue;
  decisions: DecisionProcessor;
  loop: TickLoop;
}

export interface ScenarioSummary {
  name: string;
  ticks: number;
  timeMs: number;
  /** The only team left standing, or null when the fight was not decided. */
  winner: string | null;
  interactions: number;
  combatants: CombatantView[];
}

export function parseScenario(raw: unknown, source = 'scenario'): Scenario {
  const result = ScenarioSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ScenarioError(`${source} is invalid: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export async function loadScenarioFile(path: string): Promise<Scenario> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ScenarioError(`${path} is not valid JSON: ${message}`);
  }
  return parseScenario(raw, path);
}

export function toCombatantSpec(entry: ScenarioCombatant): CombatantSpec {
  const preset = ARCHETYPES[entry.archetype];
  const weaponId = entry.weaponId ?? preset.weaponId;
  const weapon = getWeapon(weaponId);
  if (!weapon) {
    throw new ScenarioError(`combatant "${entry.id}" uses unknown weapon "${weaponId}"`, { weaponId });
  }

  return {
    id: entry.id,
    team: entry.team,
    archetype: entry.archetype,
    controller: entry.controller,
    position: { x: entry.position.x, y: entry.position.y },
    loadout: { weapon, stats: { ...preset.stats, ...entry.stats } },
    targetId: entry.targetId ?? null,
    seed: entry.seed,
  };
}

export function buildEncounter(
  scenario: Scenario,
  patterns: ReadonlyMap<string, CompiledPattern>,
  config: CombatConfig,
): BuiltEncounter {
  const encounter = new Encounter(scenario.seed === undefined ? config : { ...config, seed: scenario.seed });
  const inputs = new InputQueue();
  const decisions = new DecisionProcessor(encounter);
  const loop = new TickLoop(encounter, inputs);
  loop.setDecisionProcessor(decisions);

  for (const entry of scenario.combatants) {
    encounter.addCombatant(toCombatantSpec(entry));
  }

  for (const entry of scenario.combatants) {
    if (entry.targetId !== undefined && !encounter.get(entry.targetId)) {
      throw new ScenarioError(`combatant "${entry.id}" targets unknown combatant "${entry.targetId}"`);
    }
    if (entry.controller !== 'pattern') continue;
    if (entry.pattern === undefined) {
      throw new ScenarioError(`pattern-controlled combatant "${entry.id}" names no pattern`);
    }
    const pattern = patterns.get(entry.pattern);
    if (!pattern) {
      throw new ScenarioError(`combatant "${entry.id}" uses unknown pattern "${entry.pattern}"`, {
        known: Array.from(patterns.keys()).sort(),
      });
    }
    decisions.attach(entry.id, pattern);
  }

  for (const input of scenario.inputs) {
    if (!encounter.get(input.combatantId)) {
      throw new ScenarioError(`scripted input at tick ${input.tick} names unknown combatant "${input.combatantId}"`);
    }
  }

  return { encounter, inputs, decisions, loop };
}

function toRawInput(input: ScriptedInput): RawInput {
  return { action: input.action, skill: input.skill, targetId: input.targetId };
}

/** Steps the loop by hand, feeding scripted inputs on their tick. */
export function runScenario(
  scenario: Scenario,
  built: BuiltEncounter,
  onTick?: (result: TickResult) => void,
): ScenarioSummary {
  const { encounter, inputs, loop } = built;
  let interactions = 0;

  while (encounter.tick < scenario.maxTicks) {
    const nextTick = encounter.tick + 1;
    for (const input of scenario.inputs) {
      if (input.tick === nextTick) inputs.enqueue(input.combatantId, toRawInput(input), encounter.tick);
    }

    const result = loop.processTick();
    interactions += result.outcomes.length;
    onTick?.(result);

    if (scenario.stopWhenDecided && encounter.standingTeams().length <= 1) break;
  }

  const standing = encounter.standingTeams();
  return {
    name: scenario.name,
    ticks: encounter.tick,
    timeMs: encounter.nowMs,
    winner: standing.length === 1 ? (standing[0] ?? null) : null,
    interactions,
    combatants: encounter.views(),
  };
}
