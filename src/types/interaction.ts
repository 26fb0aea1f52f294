// types/interaction.ts — Resolver outcome records

import type { EntityId, Position, Tick } from './core.js';
import type { DefensiveSkill, ForcedTransition, OffensiveSkill } from './skill.js';

export type InteractionKind =
  | 'unguarded_hit'
  | 'knockdown_hit'
  | 'block_holds'
  | 'block_broken'
  | 'clean_block'
  | 'counter_reflect'
  | 'counter_broken'
  | 'counter_ineffective'
  | 'ranged_miss'
  | 'speed_clash';

/** Outcome kinds produced by an offense meeting a raised defense. */
export type GuardedInteraction = Extract<
  InteractionKind,
  'block_holds' | 'block_broken' | 'clean_block' | 'counter_reflect' | 'counter_broken' | 'counter_ineffective'
>;

export interface StatusApplication {
  kind: 'stun' | 'knockdown';
  durationMs: number;
}

/** A shove away from the other participant, worked out from the snapshot positions. */
export interface Displacement {
  /** Unit vector. */
  direction: Position;
  /** Moved at once when applied; meter thresholds push further along the same direction. */
  distance: number;
}

export interface ParticipantEffect {
  damage: number;
  status: StatusApplication | null;
  ccBuildup: number;
  forced: ForcedTransition | null;
  /** Null when nothing pushes this participant or the two share a spot. */
  displacement: Displacement | null;
}

export interface InteractionOutcome {
  seq: number;
  tick: Tick;
  kind: InteractionKind;
  attackerId: EntityId;
  defenderId: EntityId;
  offense: OffensiveSkill;
  defense: DefensiveSkill | null;
  attacker: ParticipantEffect;
  defender: ParticipantEffect;
}
