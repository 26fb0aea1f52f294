// types/tick.ts — Tick input/output types

import type { EntityId, Millis, Position, Tick } from './core.js';
import type { CombatEvent } from './events.js';
import type { InteractionOutcome } from './interaction.js';
import type { SkillKind, SkillRequestResult } from './skill.js';

export type InputType = 'request_skill' | 'activate' | 'cancel' | 'rest' | 'stand' | 'set_target';

/** Untrusted input as it arrives from a player driver. */
export interface RawInput {
  action: string;
  skill?: unknown;
  targetId?: unknown;
}

export type PlayerInput =
  | { type: 'request_skill'; skill: SkillKind }
  | { type: 'activate' }
  | { type: 'cancel' }
  | { type: 'rest' }
  | { type: 'stand' }
  | { type: 'set_target'; targetId: EntityId | null };

export interface QueuedInput {
  combatantId: EntityId;
  input: PlayerInput;
  receivedTick: Tick;
}

export interface InputResult {
  combatantId: EntityId;
  input: PlayerInput;
  result: SkillRequestResult;
}

export interface Decision {
  combatantId: EntityId;
  node: string;
  requested: SkillKind | null;
  desiredPosition: Position | null;
}

export interface InvariantViolationRecord {
  combatantId: EntityId;
  phase: 'input' | 'decision' | 'update';
  message: string;
}

export interface TickResult {
  tick: Tick;
  timeMs: Millis;
  inputs: InputResult[];
  decisions: Decision[];
  outcomes: InteractionOutcome[];
  events: CombatEvent[];
  violations: InvariantViolationRecord[];
}
