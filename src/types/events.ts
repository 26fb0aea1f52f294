// types/events.ts — Core → presentation events

import type { EntityId } from './core.js';
import type { CombatantCondition, StatusKind } from './combatant.js';
import type { InteractionOutcome } from './interaction.js';
import type { NodeEntryReason } from './pattern.js';
import type { CancelReason, SkillKind, SkillStateKind } from './skill.js';

export type CombatEvent =
  | { type: 'skill_charging_begun'; combatantId: EntityId; skill: SkillKind; mode: 'charge' | 'aim' }
  | { type: 'skill_charged'; combatantId: EntityId; skill: SkillKind }
  | { type: 'skill_activated'; combatantId: EntityId; skill: SkillKind; targetIds: EntityId[]; whiff: boolean }
  | {
      type: 'skill_state_changed';
      combatantId: EntityId;
      skill: SkillKind | null;
      from: SkillStateKind;
      to: SkillStateKind;
    }
  | { type: 'skill_cancelled'; combatantId: EntityId; skill: SkillKind; reason: CancelReason; refunded: number }
  | { type: 'skill_completed'; combatantId: EntityId; skill: SkillKind | null }
  | { type: 'defense_exhausted'; combatantId: EntityId; skill: SkillKind }
  | { type: 'defense_expired'; combatantId: EntityId; skill: SkillKind }
  | { type: 'interaction_resolved'; outcome: InteractionOutcome }
  | { type: 'status_threshold_crossed'; combatantId: EntityId; threshold: 'knockback' | 'knockdown' }
  | { type: 'status_applied'; combatantId: EntityId; status: StatusKind; durationMs: number }
  | { type: 'status_expired'; combatantId: EntityId; status: StatusKind }
  | { type: 'resting_changed'; combatantId: EntityId; resting: boolean }
  | {
      type: 'telegraph_started';
      combatantId: EntityId;
      cue: string;
      skill: SkillKind;
      leadMs: number;
      durationMs: number;
    }
  | { type: 'telegraph_cancelled'; combatantId: EntityId; cue: string; skill: SkillKind }
  | {
      type: 'pattern_node_entered';
      combatantId: EntityId;
      pattern: string;
      node: string;
      from: string | null;
      reason: NodeEntryReason;
    }
  | { type: 'combatant_defeated'; combatantId: EntityId; defeatedBy: EntityId | null }
  | { type: 'target_lost'; combatantId: EntityId; targetId: EntityId | null }
  | { type: 'invariant_violation'; combatantId: EntityId; message: string };

export type CombatEventType = CombatEvent['type'];

export interface CombatEventSink {
  emit(event: CombatEvent): void;
}

/** Public read-only view of one combatant, used by the event feed and the CLI. */
export interface CombatantView {
  id: EntityId;
  team: string;
  health: number;
  maxHealth: number;
  stamina: number;
  maxStamina: number;
  ccMeter: number;
  state: SkillStateKind;
  skill: SkillKind | null;
  condition: CombatantCondition;
  position: { x: number; y: number };
  targetId: EntityId | null;
}
