// types/index.ts — Barrel export

export type { EntityId, Tick, Millis, Position } from './core.js';
export { distance, stepToward } from './core.js';

export type {
  WeaponKind,
  WeaponData,
  CharacterStats,
  Loadout,
  Archetype,
  Controller,
  StatusKind,
  CombatantCondition,
  CombatantSpec,
} from './combatant.js';

export type {
  OffensiveSkill,
  DefensiveSkill,
  SkillKind,
  SkillStateKind,
  SkillRequestFailure,
  SkillRequestResult,
  CancelReason,
  ForcedTransition,
  SkillExecution,
} from './skill.js';

export type {
  InteractionKind,
  GuardedInteraction,
  StatusApplication,
  ParticipantEffect,
  Displacement,
  InteractionOutcome,
} from './interaction.js';

export type {
  PatternCondition,
  MovementIntent,
  TelegraphSpec,
  CooldownSpec,
  CompiledTransition,
  CompiledNode,
  CompiledPattern,
  NodeEntryReason,
} from './pattern.js';

export type {
  CombatEvent,
  CombatEventType,
  CombatEventSink,
  CombatantView,
} from './events.js';

export type {
  InputType,
  RawInput,
  PlayerInput,
  QueuedInput,
  InputResult,
  Decision,
  InvariantViolationRecord,
  TickResult,
} from './tick.js';

export type { FeedMessage, FeedClientMessage } from './protocol.js';
