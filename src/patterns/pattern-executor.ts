// patterns/pattern-executor.ts — Walks one combatant through its compiled pattern graph
//
// The executor only decides. It talks to the skill state machine through the
// same request/activate/cancel surface a player uses and never reaches into
// its states.

import type {
  CombatEventSink,
  CompiledNode,
  CompiledPattern,
  CompiledTransition,
  Decision,
  InteractionOutcome,
  Millis,
  NodeEntryReason,
  Position,
  SkillKind,
} from '../types/index.js';
import { distance, stepToward } from '../types/index.js';
import type { Combatant } from '../combat/combatant.js';
import type { AttackCoordinator } from '../coordination/attack-coordinator.js';
import type { FormationManager } from '../coordination/formation-manager.js';
import { isOffensive, skillReach } from '../data/skills.js';
import { allConditionsHold, type PatternContext } from './conditions.js';
import { TelegraphTimer } from './telegraph.js';
import { APPROACH_STOP_RATIO } from '../shared/constants.js';

export interface ExecutorServices {
  events: CombatEventSink;
  coordinator: AttackCoordinator | null;
  formations: FormationManager | null;
}

function nodeAt(pattern: CompiledPattern, index: number): CompiledNode {
  const node = pattern.nodes[index];
  if (!node) {
    throw new RangeError(`pattern "${pattern.name}" has no node #${index}`);
  }
  return node;
}

export class PatternExecutor {
  readonly pattern: CompiledPattern;
  private readonly self: Combatant;
  private readonly services: ExecutorServices;

  private nodeIndex: number;
  private started = false;
  private timeInNodeMs = 0;
  private hitsTaken = 0;
  private hitsDealt = 0;
  private randomValue = 0;
  private issued = false;
  private telegraph: TelegraphTimer | null = null;
  private cooldowns: Map<string, Millis> = new Map();

  private slotTargetId: string | null = null;
  /** The slot was handed to a running skill and is freed when that skill ends. */
  private slotReserved = false;

  constructor(pattern: CompiledPattern, self: Combatant, services: ExecutorServices) {
    this.pattern = pattern;
    this.self = self;
    this.services = services;
    this.nodeIndex = pattern.startIndex;
  }

  get node(): CompiledNode {
    return nodeAt(this.pattern, this.nodeIndex);
  }

  get timeInNode(): number {
    return this.timeInNodeMs;
  }

  get hitCounters(): { taken: number; dealt: number } {
    return { taken: this.hitsTaken, dealt: this.hitsDealt };
  }

  get pendingTelegraph(): TelegraphTimer | null {
    return this.telegraph;
  }

  start(now: Millis): void {
    if (this.started) return;
    this.enterNode(this.pattern.startIndex, 'start', now, null);
  }

  /** True while the current node is waiting on nothing but an attack slot. */
  wantsAttack(now: Millis): boolean {
    const node = this.node;
    const target = this.self.target();
    if (!this.started || this.self.defeated || !target) return false;
    if (!isOffensive(node.skill) || this.issued || this.telegraph) return false;
    if (this.self.skills.state !== 'uncharged') return false;

    const asksPermission = node.conditions.some((c) => c.type === 'attack_permission' && c.granted);
    if (!asksPermission) return false;

    const ctx = this.context(now, target);
    return allConditionsHold(node.conditions.filter((c) => c.type !== 'attack_permission'), ctx);
  }

  evaluate(dtMs: number, now: Millis): Decision {
    if (!this.started) this.start(now);
    this.timeInNodeMs += dtMs;

    const decision: Decision = {
      combatantId: this.self.id,
      node: this.node.name,
      requested: null,
      desiredPosition: null,
    };
    if (this.self.defeated) {
      this.releaseSlot();
      return decision;
    }

    const target = this.acquireTarget(now);
    if (!target) {
      decision.node = this.node.name;
      return decision;
    }

    // Transitions
    if (!this.self.skills.isCommitted && this.timeInNodeMs >= this.node.minDwellMs) {
      const ctx = this.context(now, target);
      const taken = this.node.transitions.find((t) => this.canTake(t, now) && allConditionsHold(t.conditions, ctx));
      if (taken) {
        this.enterNode(taken.targetIndex, 'transition', now, taken);
      } else if (this.node.fallback && this.timeInNodeMs >= this.node.fallback.afterMs) {
        this.enterNode(this.node.fallback.targetIndex, 'fallback', now, null);
      }
    }

    const node = this.node;
    decision.node = node.name;

    // Node action
    if (node.repeat && this.issued && !this.telegraph && this.self.skills.state === 'uncharged') {
      this.issued = false;
    }
    if (this.telegraph) {
      if (this.telegraph.isDue(now)) {
        const pending = this.telegraph;
        this.telegraph = null;
        decision.requested = this.issue(pending.skill, now, pending);
      }
    } else if (!this.issued && this.self.skills.state === 'uncharged') {
      if (allConditionsHold(node.conditions, this.context(now, target))) {
        if (node.telegraph) {
          this.telegraph = new TelegraphTimer(node.telegraph, node.skill, now);
          this.services.events.emit({
            type: 'telegraph_started',
            combatantId: this.self.id,
            cue: node.telegraph.cue,
            skill: node.skill,
            leadMs: node.telegraph.leadMs,
            durationMs: node.telegraph.durationMs,
          });
        } else {
          decision.requested = this.issue(node.skill, now, null);
        }
      }
    }

    this.autoActivate(this.node, target);
    decision.node = this.node.name;
    decision.desiredPosition = this.movement(this.node, target, now);
    return decision;
  }

  /** Hit counters from this tick's resolved interactions. */
  observe(outcomes: readonly InteractionOutcome[]): void {
    const id = this.self.id;
    for (const outcome of outcomes) {
      if (outcome.defenderId === id) {
        if (outcome.defender.damage > 0) this.hitsTaken++;
        if (outcome.attacker.damage > 0) this.hitsDealt++;
      } else if (outcome.attackerId === id) {
        if (outcome.attacker.damage > 0) this.hitsTaken++;
        if (outcome.defender.damage > 0) this.hitsDealt++;
      }
    }
  }

  /** Leaves the graph for good: drops the telegraph and any coordination claims. */
  dispose(now: Millis): void {
    this.dropTelegraph();
    this.slotReserved = false;
    this.releaseSlot();
    this.services.formations?.release(this.self.id, now);
  }

  // --- Internals ---

  private context(now: Millis, target: Combatant | undefined): PatternContext {
    return {
      self: this.self,
      target,
      timeInNodeMs: this.timeInNodeMs,
      hitsTaken: this.hitsTaken,
      hitsDealt: this.hitsDealt,
      randomValue: this.randomValue,
      isCooldownReady: (id) => this.isCooldownReady(id, now),
      hasAttackPermission: () => this.claimAttackSlot(target, now),
    };
  }

  private isCooldownReady(id: string, now: Millis): boolean {
    const readyAt = this.cooldowns.get(id);
    return readyAt === undefined || now >= readyAt;
  }

  private canTake(transition: CompiledTransition, now: Millis): boolean {
    return transition.cooldown === null || this.isCooldownReady(transition.cooldown.id, now);
  }

  private claimAttackSlot(target: Combatant | undefined, now: Millis): boolean {
    if (!target) return false;
    const coordinator = this.services.coordinator;
    if (!coordinator) return true;

    if (coordinator.requestAttackPermission(this.self.id, target.id, now)) {
      this.slotTargetId = target.id;
      return true;
    }
    return false;
  }

  private releaseSlot(): void {
    if (this.slotTargetId === null || this.slotReserved) return;
    this.services.coordinator?.release(this.self.id, this.slotTargetId);
    this.slotTargetId = null;
  }

  /**
   * Keeps a live target, or falls back to the idle node and picks the
   * nearest hostile. Losing a target is an ordinary outcome.
   */
  private acquireTarget(now: Millis): Combatant | undefined {
    const current = this.self.target();
    if (current) return current;

    const lostId = this.self.targetId;
    if (lostId !== null) {
      this.services.events.emit({ type: 'target_lost', combatantId: this.self.id, targetId: lostId });
      if (this.self.skills.isCancellable) this.self.skills.cancel('target_lost');
      this.dropTelegraph();
      this.slotReserved = false;
      this.releaseSlot();
      if (this.nodeIndex !== this.pattern.idleIndex) {
        this.enterNode(this.pattern.idleIndex, 'idle', now, null);
      }
    }

    const next = this.self.nearestHostile();
    this.self.targetId = next ? next.id : null;
    this.self.touch();
    return next;
  }

  private enterNode(
    index: number,
    reason: NodeEntryReason,
    now: Millis,
    via: CompiledTransition | null,
  ): void {
    const from = this.started ? this.node : null;
    this.dropTelegraph();

    if (from) {
      if (from.cancelSkillOnExit && this.self.skills.isCancellable) {
        this.self.skills.cancel('node_exit');
      }
      this.releaseSlot();
      if (from.movement === 'formation') {
        this.services.formations?.release(this.self.id, now);
      }
    }

    this.started = true;
    this.nodeIndex = index;
    this.timeInNodeMs = 0;
    this.issued = false;
    this.randomValue = this.self.rng.next();

    if (via?.resetHitCounters) {
      this.hitsTaken = 0;
      this.hitsDealt = 0;
    }
    if (via?.cooldown) {
      this.cooldowns.set(via.cooldown.id, now + via.cooldown.durationMs);
    }

    this.services.events.emit({
      type: 'pattern_node_entered',
      combatantId: this.self.id,
      pattern: this.pattern.name,
      node: this.node.name,
      from: from ? from.name : null,
      reason,
    });
  }

  private dropTelegraph(): void {
    if (!this.telegraph) return;
    const pending = this.telegraph;
    this.telegraph = null;
    this.services.events.emit({
      type: 'telegraph_cancelled',
      combatantId: this.self.id,
      cue: pending.cue,
      skill: pending.skill,
    });
  }

  private issue(skill: SkillKind, now: Millis, telegraph: TelegraphTimer | null): SkillKind | null {
    const result = this.self.skills.requestSkill(skill);
    if (result.ok) {
      this.issued = true;
      if (this.slotTargetId !== null && !this.slotReserved) {
        this.slotReserved = true;
        this.self.skills.holdReservation(() => {
          this.slotReserved = false;
          this.releaseSlot();
        });
      }
      return skill;
    }

    if (telegraph) {
      this.services.events.emit({
        type: 'telegraph_cancelled',
        combatantId: this.self.id,
        cue: telegraph.cue,
        skill,
      });
    }
    if (result.reason === 'insufficient_resource' && this.nodeIndex !== this.pattern.idleIndex) {
      this.enterNode(this.pattern.idleIndex, 'idle', now, null);
    }
    return null;
  }

  private autoActivate(node: CompiledNode, target: Combatant): void {
    if (!node.autoActivate) return;
    const machine = this.self.skills;
    const skill = machine.skill;
    if (skill === null) return;

    if (machine.state === 'charged' && isOffensive(skill)) {
      const gap = distance(this.self.position, target.position);
      if (gap <= skillReach(skill, this.self.loadout.weapon)) machine.activate();
      return;
    }
    if (machine.state === 'aiming' && this.self.accuracy.current >= node.minAccuracy) {
      machine.activate();
    }
  }

  private movement(node: CompiledNode, target: Combatant, now: Millis): Position | null {
    switch (node.movement) {
      case 'hold':
        return null;
      case 'approach': {
        const gap = distance(this.self.position, target.position);
        const stopAt = skillReach(node.skill, this.self.loadout.weapon) * APPROACH_STOP_RATIO;
        if (gap <= stopAt) return null;
        return stepToward(this.self.position, target.position, gap - stopAt);
      }
      case 'formation': {
        const formations = this.services.formations;
        if (!formations) return { x: target.position.x, y: target.position.y };
        return formations.requestSlot(
          this.self.id,
          target.id,
          this.self.position,
          target.position,
          node.formationDistance,
          now,
        );
      }
    }
  }
}
