// skills/context.ts — What a skill state machine may reach outside its own combatant

import type {
  CombatEventSink,
  EntityId,
  Millis,
  SkillExecution,
  Tick,
} from '../types/index.js';
import type { Combatant } from '../combat/combatant.js';

export type ExecutionInit = Omit<SkillExecution, 'id'>;

/** Implemented by the interaction resolver. */
export interface ExecutionRegistry {
  submitOffense(init: ExecutionInit): void;
  raiseDefense(init: ExecutionInit): void;
  lowerDefense(combatantId: EntityId): void;
}

export interface CombatantDirectory {
  get(id: EntityId): Combatant | undefined;
  /** Every combatant, ordered by id. */
  all(): Combatant[];
}

export interface Clock {
  now(): Millis;
  tick(): Tick;
}

export interface SkillContext {
  events: CombatEventSink;
  registry: ExecutionRegistry;
  directory: CombatantDirectory;
  clock: Clock;
  refundStaminaOnCancel: boolean;
}
