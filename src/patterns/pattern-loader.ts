// patterns/pattern-loader.ts — Pattern asset parsing, validation and compilation
//
// Assets are JSON authored by designers. Everything that can be wrong with
// one is reported at load time as an InvalidPatternDefinitionError listing
// every problem found; a compiled pattern is frozen and never re-checked.

import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type {
  CompiledNode,
  CompiledPattern,
  CompiledTransition,
  PatternCondition,
} from '../types/index.js';
import {
  DEFAULT_FORMATION_DISTANCE,
  DEFAULT_MIN_ACCURACY,
  TELEGRAPH_DURATION_MS,
  TELEGRAPH_LEAD_MS,
} from '../shared/constants.js';
import { InvalidPatternDefinitionError } from '../shared/errors.js';
import { compareIds } from '../shared/utils.js';

const SkillKindSchema = z.enum(['light_attack', 'heavy_attack', 'sweep', 'lunge', 'ranged', 'block', 'counter']);
const ConditionStatusSchema = z.enum(['knocked_down', 'knocked_back', 'stunned', 'resting', 'none']);
const Percent = z.number().min(0).max(100);
const Count = z.number().int().min(0);
const Distance = z.number().min(0);

export const ConditionSchema: z.ZodType<PatternCondition> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('health_above'), percent: Percent }),
  z.object({ type: z.literal('health_below'), percent: Percent }),
  z.object({ type: z.literal('hits_taken_at_least'), count: Count }),
  z.object({ type: z.literal('hits_dealt_at_least'), count: Count }),
  z.object({ type: z.literal('opponent_charging'), charging: z.boolean() }),
  z.object({ type: z.literal('opponent_skill'), skill: SkillKindSchema }),
  z.object({ type: z.literal('opponent_status'), status: ConditionStatusSchema }),
  z.object({ type: z.literal('opponent_within'), distance: Distance }),
  z.object({ type: z.literal('opponent_beyond'), distance: Distance }),
  z.object({ type: z.literal('weapon_in_range') }),
  z.object({ type: z.literal('stamina_above'), value: z.number().min(0) }),
  z.object({ type: z.literal('stamina_below'), value: z.number().min(0) }),
  z.object({ type: z.literal('skill_ready'), skill: SkillKindSchema }),
  z.object({ type: z.literal('time_in_node_at_least'), ms: Count }),
  z.object({ type: z.literal('cooldown_ready'), id: z.string().min(1) }),
  z.object({ type: z.literal('random_chance'), probability: z.number().min(0).max(1) }),
  z.object({ type: z.literal('self_status'), status: ConditionStatusSchema }),
  z.object({ type: z.literal('attack_permission'), granted: z.boolean() }),
]);

const TransitionSchema = z.object({
  target: z.string(),
  priority: z.number().int().default(0),
  conditions: z.array(ConditionSchema).default([]),
  resetHitCounters: z.boolean().default(false),
  cooldown: z.object({
    id: z.string().min(1),
    durationMs: z.number().int().positive(),
  }).optional(),
});

const NodeSchema = z.object({
  name: z.string(),
  skill: SkillKindSchema,
  conditions: z.array(ConditionSchema).default([]),
  transitions: z.array(TransitionSchema).default([]),
  fallback: z.object({
    target: z.string(),
    afterMs: Count,
  }).optional(),
  telegraph: z.object({
    cue: z.string().min(1),
    leadMs: z.number().int().optional(),
    durationMs: z.number().int().positive().default(TELEGRAPH_DURATION_MS),
  }).optional(),
  autoActivate: z.boolean().default(true),
  minAccuracy: Percent.default(DEFAULT_MIN_ACCURACY),
  repeat: z.boolean().default(false),
  cancelSkillOnExit: z.boolean().default(true),
  minDwellMs: Count.default(0),
  movement: z.enum(['hold', 'approach', 'formation']).default('hold'),
  formationDistance: z.number().positive().default(DEFAULT_FORMATION_DISTANCE),
});

export const PatternAssetSchema = z.object({
  name: z.string().min(1),
  archetype: z.enum(['soldier', 'berserker', 'assassin', 'guardian', 'archer']),
  startNode: z.string(),
  idleNode: z.string().optional(),
  nodes: z.array(NodeSchema),
});

export type PatternAsset = z.infer<typeof PatternAssetSchema>;

export interface CompileOptions {
  /** Lead time for telegraphs that do not set their own. */
  telegraphLeadMs?: number;
}

function nameOf(raw: unknown, fallback: string): string {
  if (raw && typeof raw === 'object' && 'name' in raw && typeof raw.name === 'string' && raw.name !== '') {
    return raw.name;
  }
  return fallback;
}

export function parsePatternAsset(raw: unknown, source = 'pattern'): PatternAsset {
  const result = PatternAssetSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidPatternDefinitionError(nameOf(raw, source), problems);
  }
  return result.data;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function reachableFrom(roots: number[], edges: number[][]): Set<number> {
  const seen = new Set<number>(roots);
  const stack = [...roots];
  while (stack.length > 0) {
    const index = stack.pop();
    if (index === undefined) break;
    for (const next of edges[index] ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        stack.push(next);
      }
    }
  }
  return seen;
}

export function compilePattern(asset: PatternAsset, options: CompileOptions = {}): CompiledPattern {
  const problems: string[] = [];
  const defaultLead = options.telegraphLeadMs ?? TELEGRAPH_LEAD_MS;

  if (asset.nodes.length === 0) {
    throw new InvalidPatternDefinitionError(asset.name, ['pattern has no nodes']);
  }

  const indexByName = new Map<string, number>();
  asset.nodes.forEach((node, index) => {
    if (node.name.trim() === '') {
      problems.push(`node #${index} has an empty name`);
      return;
    }
    if (indexByName.has(node.name)) {
      problems.push(`duplicate node name "${node.name}"`);
      return;
    }
    indexByName.set(node.name, index);
  });

  const resolve = (name: string, where: string): number => {
    const index = indexByName.get(name);
    if (index === undefined) {
      problems.push(`${where} refers to unknown node "${name}"`);
      return -1;
    }
    return index;
  };

  const startIndex = resolve(asset.startNode, 'startNode');
  const idleIndex = asset.idleNode === undefined ? startIndex : resolve(asset.idleNode, 'idleNode');

  const edges: number[][] = [];
  const nodes: CompiledNode[] = asset.nodes.map((node, index) => {
    const where = `node "${node.name}"`;

    // Stable sort: declaration order breaks priority ties.
    const ordered = node.transitions
      .map((transition, declared) => ({ transition, declared }))
      .sort((a, b) => b.transition.priority - a.transition.priority || a.declared - b.declared);

    const transitions: CompiledTransition[] = [];
    let shadowedBy: string | null = null;
    for (const { transition } of ordered) {
      if (shadowedBy !== null) {
        problems.push(`${where}: transition to "${transition.target}" can never fire, shadowed by the unconditional transition to "${shadowedBy}"`);
      }
      const targetIndex = resolve(transition.target, `${where} transition`);
      transitions.push({
        targetIndex,
        priority: transition.priority,
        conditions: transition.conditions,
        resetHitCounters: transition.resetHitCounters,
        cooldown: transition.cooldown ?? null,
      });
      if (shadowedBy === null && transition.conditions.length === 0 && !transition.cooldown) {
        shadowedBy = transition.target;
      }
    }

    const fallback = node.fallback
      ? { targetIndex: resolve(node.fallback.target, `${where} fallback`), afterMs: node.fallback.afterMs }
      : null;

    let telegraph: CompiledNode['telegraph'] = null;
    if (node.telegraph) {
      const leadMs = node.telegraph.leadMs ?? defaultLead;
      if (leadMs <= 0) {
        problems.push(`${where}: telegraph lead must be positive (got ${leadMs})`);
      }
      telegraph = { cue: node.telegraph.cue, leadMs, durationMs: node.telegraph.durationMs };
    }

    edges[index] = [
      ...transitions.map((t) => t.targetIndex),
      ...(fallback ? [fallback.targetIndex] : []),
    ].filter((target) => target >= 0);

    return {
      index,
      name: node.name,
      skill: node.skill,
      conditions: node.conditions,
      transitions,
      fallback,
      telegraph,
      autoActivate: node.autoActivate,
      minAccuracy: node.minAccuracy,
      repeat: node.repeat,
      cancelSkillOnExit: node.cancelSkillOnExit,
      minDwellMs: node.minDwellMs,
      movement: node.movement,
      formationDistance: node.formationDistance,
    };
  });

  if (startIndex >= 0) {
    // The idle node is entered directly on target loss, so it counts as a root.
    const roots = idleIndex >= 0 ? [startIndex, idleIndex] : [startIndex];
    const reachable = reachableFrom(roots, edges);
    for (const node of nodes) {
      if (!reachable.has(node.index) && indexByName.get(node.name) === node.index) {
        problems.push(`node "${node.name}" is unreachable from "${asset.startNode}"`);
      }
    }
  }

  if (problems.length > 0) {
    throw new InvalidPatternDefinitionError(asset.name, problems);
  }

  return deepFreeze({
    name: asset.name,
    archetype: asset.archetype,
    nodes,
    startIndex,
    idleIndex,
  });
}

export function loadPattern(raw: unknown, options: CompileOptions = {}, source = 'pattern'): CompiledPattern {
  return compilePattern(parsePatternAsset(raw, source), options);
}

export async function loadPatternFile(path: string, options: CompileOptions = {}): Promise<CompiledPattern> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidPatternDefinitionError(path, [`not valid JSON: ${message}`]);
  }
  return loadPattern(raw, options, path);
}

/** Every *.json file in the directory, keyed by pattern name. */
export async function loadPatternDirectory(
  dir: string,
  options: CompileOptions = {},
): Promise<Map<string, CompiledPattern>> {
  const files = (await readdir(dir)).filter((file) => file.endsWith('.json')).sort(compareIds);
  const patterns = new Map<string, CompiledPattern>();
  for (const file of files) {
    const pattern = await loadPatternFile(join(dir, file), options);
    if (patterns.has(pattern.name)) {
      throw new InvalidPatternDefinitionError(pattern.name, [`defined twice (again in ${file})`]);
    }
    patterns.set(pattern.name, pattern);
  }
  return patterns;
}
