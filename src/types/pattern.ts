// types/pattern.ts — Pattern graph vocabulary (conditions, compiled nodes, cursor)

import type { Archetype, CombatantCondition } from './combatant.js';
import type { SkillKind } from './skill.js';

export type PatternCondition =
  | { type: 'health_above'; percent: number }
  | { type: 'health_below'; percent: number }
  | { type: 'hits_taken_at_least'; count: number }
  | { type: 'hits_dealt_at_least'; count: number }
  | { type: 'opponent_charging'; charging: boolean }
  | { type: 'opponent_skill'; skill: SkillKind }
  | { type: 'opponent_status'; status: CombatantCondition }
  | { type: 'opponent_within'; distance: number }
  | { type: 'opponent_beyond'; distance: number }
  | { type: 'weapon_in_range' }
  | { type: 'stamina_above'; value: number }
  | { type: 'stamina_below'; value: number }
  | { type: 'skill_ready'; skill: SkillKind }
  | { type: 'time_in_node_at_least'; ms: number }
  | { type: 'cooldown_ready'; id: string }
  | { type: 'random_chance'; probability: number }
  | { type: 'self_status'; status: CombatantCondition }
  | { type: 'attack_permission'; granted: boolean };

export type MovementIntent = 'hold' | 'approach' | 'formation';

export interface TelegraphSpec {
  readonly cue: string;
  readonly leadMs: number;
  readonly durationMs: number;
}

export interface CooldownSpec {
  readonly id: string;
  readonly durationMs: number;
}

export interface CompiledTransition {
  readonly targetIndex: number;
  readonly priority: number;
  readonly conditions: readonly PatternCondition[];
  readonly resetHitCounters: boolean;
  readonly cooldown: CooldownSpec | null;
}

export interface CompiledNode {
  readonly index: number;
  readonly name: string;
  readonly skill: SkillKind;
  readonly conditions: readonly PatternCondition[];
  /** Sorted by priority, highest first; declaration order breaks ties. */
  readonly transitions: readonly CompiledTransition[];
  readonly fallback: { readonly targetIndex: number; readonly afterMs: number } | null;
  readonly telegraph: TelegraphSpec | null;
  readonly autoActivate: boolean;
  readonly minAccuracy: number;
  readonly repeat: boolean;
  readonly cancelSkillOnExit: boolean;
  readonly minDwellMs: number;
  readonly movement: MovementIntent;
  readonly formationDistance: number;
}

/** Immutable arena shared by every combatant running the pattern. */
export interface CompiledPattern {
  readonly name: string;
  readonly archetype: Archetype;
  readonly nodes: readonly CompiledNode[];
  readonly startIndex: number;
  readonly idleIndex: number;
}

export type NodeEntryReason = 'start' | 'transition' | 'fallback' | 'idle';
