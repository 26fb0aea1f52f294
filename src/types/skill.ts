// types/skill.ts — Skill kinds, lifecycle states and request results

import type { EntityId, Millis, Tick } from './core.js';

export type OffensiveSkill = 'light_attack' | 'heavy_attack' | 'sweep' | 'lunge' | 'ranged';
export type DefensiveSkill = 'block' | 'counter';
export type SkillKind = OffensiveSkill | DefensiveSkill;

export type SkillStateKind =
  | 'uncharged'
  | 'charging'
  | 'charged'
  | 'aiming'
  | 'startup'
  | 'active'
  | 'recovery'
  | 'waiting';

export type SkillRequestFailure =
  | 'invalid_transition'
  | 'insufficient_resource'
  | 'disabled'
  | 'out_of_range'
  | 'target_lost'
  | 'unknown_combatant';

export type SkillRequestResult =
  | { ok: true; state: SkillStateKind }
  | { ok: false; reason: SkillRequestFailure; message: string };

export type CancelReason =
  | 'manual'
  | 'target_lost'
  | 'out_of_range'
  | 'knocked_down'
  | 'defeated'
  | 'removed'
  | 'node_exit';

export type ForcedTransition =
  | { to: 'recovery'; lockoutMs: number }
  | { to: 'uncharged'; reason: CancelReason };

/**
 * One activation of a skill, handed to the interaction resolver when the
 * owning state machine enters Active. Instances are pooled; nothing may hold
 * on to one after it is released.
 */
export interface SkillExecution {
  id: number;
  combatantId: EntityId;
  skill: SkillKind;
  targetIds: EntityId[];
  chargeStartedAt: Millis;
  activatedAt: Millis;
  tick: Tick;
  speed: number;
  /** Ranged accuracy roll; always true for other skills. */
  hit: boolean;
}
