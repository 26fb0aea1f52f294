// coordination/attack-coordinator.ts — Limits how many agents press one target at a time
//
// Advisory only: agents ask before committing to an attack. The coordinator
// owns nothing but its own slot bookkeeping.

import type { EntityId, Millis } from '../types/index.js';
import {
  ATTACK_SLOT_DURATION_MS,
  MAX_SIMULTANEOUS_ATTACKERS,
  MIN_TIME_BETWEEN_ATTACKS_MS,
} from '../shared/constants.js';
import { compareIds } from '../shared/utils.js';

export interface AttackCoordinatorOptions {
  maxSimultaneousAttackers: number;
  minTimeBetweenAttacksMs: number;
  attackSlotDurationMs: number;
}

interface AgentRecord {
  priority: number;
  ready: boolean;
  targetId: EntityId | null;
}

interface AttackSlot {
  agentId: EntityId;
  grantedAt: Millis;
}

export class AttackCoordinator {
  private agents: Map<EntityId, AgentRecord> = new Map();
  private slots: Map<EntityId, AttackSlot[]> = new Map();
  private lastGrantAt: Map<EntityId, Millis> = new Map();
  private readonly options: AttackCoordinatorOptions;

  constructor(options: Partial<AttackCoordinatorOptions> = {}) {
    this.options = {
      maxSimultaneousAttackers: options.maxSimultaneousAttackers ?? MAX_SIMULTANEOUS_ATTACKERS,
      minTimeBetweenAttacksMs: options.minTimeBetweenAttacksMs ?? MIN_TIME_BETWEEN_ATTACKS_MS,
      attackSlotDurationMs: options.attackSlotDurationMs ?? ATTACK_SLOT_DURATION_MS,
    };
  }

  register(agentId: EntityId, priority: number): void {
    this.agents.set(agentId, { priority, ready: false, targetId: null });
  }

  /** Also forgets the agent as a target. */
  unregister(agentId: EntityId): void {
    this.release(agentId);
    this.agents.delete(agentId);
    this.slots.delete(agentId);
    this.lastGrantAt.delete(agentId);
  }

  /**
   * Declares whether the agent wants to attack `targetId` this tick. All
   * readiness is declared before any agent asks for permission.
   */
  setReady(agentId: EntityId, targetId: EntityId | null, ready: boolean): void {
    const agent = this.agents.get(agentId);
    if (!agent) return;
    agent.ready = ready && targetId !== null;
    agent.targetId = targetId;
  }

  requestAttackPermission(agentId: EntityId, targetId: EntityId, now: Millis): boolean {
    const agent = this.agents.get(agentId);
    if (!agent) return false;

    this.expire(targetId, now);
    if (this.hasPermission(agentId, targetId)) return true;

    const slots = this.slots.get(targetId) ?? [];
    if (slots.length >= this.options.maxSimultaneousAttackers) return false;

    const last = this.lastGrantAt.get(targetId);
    if (last !== undefined && now - last < this.options.minTimeBetweenAttacksMs) return false;

    for (const [otherId, other] of this.agents) {
      if (otherId === agentId || !other.ready || other.targetId !== targetId) continue;
      if (other.priority > agent.priority && !this.holdsSlot(otherId)) return false;
    }

    slots.push({ agentId, grantedAt: now });
    this.slots.set(targetId, slots);
    this.lastGrantAt.set(targetId, now);
    return true;
  }

  hasPermission(agentId: EntityId, targetId: EntityId): boolean {
    return (this.slots.get(targetId) ?? []).some((slot) => slot.agentId === agentId);
  }

  /** Frees every slot the agent holds, or only the one on `targetId`. */
  release(agentId: EntityId, targetId?: EntityId): boolean {
    let released = false;
    for (const [target, slots] of this.slots) {
      if (targetId !== undefined && target !== targetId) continue;
      const kept = slots.filter((slot) => slot.agentId !== agentId);
      if (kept.length !== slots.length) released = true;
      if (kept.length === 0) {
        this.slots.delete(target);
      } else {
        this.slots.set(target, kept);
      }
    }
    return released;
  }

  activeAttackers(targetId: EntityId): EntityId[] {
    return (this.slots.get(targetId) ?? []).map((slot) => slot.agentId).sort(compareIds);
  }

  /** Number of targets with live slots or a grant still inside the minimum interval. */
  get trackedTargetCount(): number {
    const targets = new Set([...this.slots.keys(), ...this.lastGrantAt.keys()]);
    return targets.size;
  }

  /** Drops expired slots, then grant times that no longer hold anyone back. */
  cleanup(now: Millis): void {
    for (const targetId of Array.from(this.slots.keys())) {
      this.expire(targetId, now);
    }
    for (const [targetId, last] of Array.from(this.lastGrantAt)) {
      if (this.slots.has(targetId)) continue;
      if (now - last >= this.options.minTimeBetweenAttacksMs) this.lastGrantAt.delete(targetId);
    }
  }

  private expire(targetId: EntityId, now: Millis): void {
    const slots = this.slots.get(targetId);
    if (!slots) return;
    const live = slots.filter((slot) => now - slot.grantedAt < this.options.attackSlotDurationMs);
    if (live.length === 0) {
      this.slots.delete(targetId);
    } else {
      this.slots.set(targetId, live);
    }
  }

  private holdsSlot(agentId: EntityId): boolean {
    for (const slots of this.slots.values()) {
      if (slots.some((slot) => slot.agentId === agentId)) return true;
    }
    return false;
  }
}
