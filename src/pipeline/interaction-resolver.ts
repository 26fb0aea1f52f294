// pipeline/interaction-resolver.ts — Offense vs defense resolution per tick
//
// Two phases. Collect reads a snapshot taken before anything is applied and
// produces every outcome of the pass; apply then mutates combatants in
// outcome order. No outcome is computed from another outcome's effects.

import type {
  CombatEventSink,
  EntityId,
  InteractionOutcome,
  OffensiveSkill,
  ParticipantEffect,
  Position,
  SkillExecution,
  Tick,
} from '../types/index.js';
import { distance } from '../types/index.js';
import type { Combatant } from '../combat/combatant.js';
import type { CombatantDirectory, ExecutionInit, ExecutionRegistry } from '../skills/context.js';
import { ExecutionPool } from './execution-pool.js';
import {
  INTERACTION_MATRIX,
  guardedEffects,
  missEffects,
  noEffect,
  unguardedEffects,
  type CombatantSnapshot,
  type PlannedEffects,
} from './interaction-matrix.js';
import { compareSpeeds } from './speed-resolver.js';
import { isDefensive, isOffensive } from '../data/skills.js';
import { knockdownDuration } from '../combat/damage.js';
import {
  CC_KNOCKDOWN_DISPLACEMENT,
  KNOCKBACK_DISPLACEMENT,
  KNOCKBACK_DURATION_MS,
} from '../shared/constants.js';
import { StateInvariantViolationError } from '../shared/errors.js';
import { compareIds } from '../shared/utils.js';

type ResolverPhase = 'idle' | 'collecting' | 'applying';

interface LostTarget {
  attackerId: EntityId;
  targetId: EntityId;
}

interface Collected {
  outcomes: InteractionOutcome[];
  lost: LostTarget[];
}

function compareExecutions(a: SkillExecution, b: SkillExecution): number {
  if (a.activatedAt !== b.activatedAt) return a.activatedAt - b.activatedAt;
  const byId = compareIds(a.combatantId, b.combatantId);
  if (byId !== 0) return byId;
  return a.id - b.id;
}

function displace(combatant: Combatant, direction: Position, distance: number): void {
  combatant.moveTo({
    x: combatant.position.x + direction.x * distance,
    y: combatant.position.y + direction.y * distance,
  });
}

function offensiveSkill(execution: SkillExecution): OffensiveSkill | null {
  return isOffensive(execution.skill) ? execution.skill : null;
}

export class InteractionResolver implements ExecutionRegistry {
  private pending: SkillExecution[] = [];
  private defenses: Map<EntityId, SkillExecution> = new Map();
  private seq = 0;
  private phase: ResolverPhase = 'idle';

  constructor(
    private readonly directory: CombatantDirectory,
    private readonly events: CombatEventSink,
    readonly pool: ExecutionPool = new ExecutionPool(),
  ) {}

  // --- ExecutionRegistry ---

  submitOffense(init: ExecutionInit): void {
    this.pending.push(this.pool.acquire(init));
  }

  raiseDefense(init: ExecutionInit): void {
    this.lowerDefense(init.combatantId);
    this.defenses.set(init.combatantId, this.pool.acquire(init));
  }

  lowerDefense(combatantId: EntityId): void {
    const execution = this.defenses.get(combatantId);
    if (!execution) return;
    this.defenses.delete(combatantId);
    this.pool.release(execution);
  }

  hasDefense(combatantId: EntityId): boolean {
    return this.defenses.has(combatantId);
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get currentPhase(): ResolverPhase {
    return this.phase;
  }

  /** Drops queued offenses from a combatant that left the encounter mid-tick. */
  discardFrom(combatantId: EntityId): void {
    const kept: SkillExecution[] = [];
    for (const execution of this.pending) {
      if (execution.combatantId === combatantId) {
        this.pool.release(execution);
      } else {
        kept.push(execution);
      }
    }
    this.pending = kept;
    this.lowerDefense(combatantId);
  }

  resolve(tick: Tick): InteractionOutcome[] {
    if (this.pending.length === 0) return [];

    const executions = this.pending.splice(0).sort(compareExecutions);
    try {
      this.phase = 'collecting';
      const snapshot = this.takeSnapshot(executions);
      const collected = this.collect(executions, snapshot, tick);
      this.verifySnapshot(snapshot);

      this.phase = 'applying';
      for (const { attackerId, targetId } of collected.lost) {
        this.events.emit({ type: 'target_lost', combatantId: attackerId, targetId });
      }
      for (const outcome of collected.outcomes) {
        this.apply(outcome);
      }
      return collected.outcomes;
    } finally {
      this.phase = 'idle';
      for (const execution of executions) {
        this.pool.release(execution);
      }
    }
  }

  // --- Collect ---

  private takeSnapshot(executions: SkillExecution[]): Map<EntityId, CombatantSnapshot> {
    const ids = new Set<EntityId>();
    for (const execution of executions) {
      ids.add(execution.combatantId);
      for (const targetId of execution.targetIds) ids.add(targetId);
    }

    const snapshot = new Map<EntityId, CombatantSnapshot>();
    for (const id of ids) {
      const combatant = this.directory.get(id);
      if (!combatant) continue;
      snapshot.set(id, this.snapshotOf(combatant));
    }
    return snapshot;
  }

  private snapshotOf(combatant: Combatant): CombatantSnapshot {
    const defense = this.defenses.get(combatant.id);
    return Object.freeze({
      id: combatant.id,
      team: combatant.team,
      revision: combatant.revision,
      health: combatant.health,
      defeated: combatant.defeated,
      position: Object.freeze({ x: combatant.position.x, y: combatant.position.y }),
      weapon: combatant.loadout.weapon,
      stats: combatant.loadout.stats,
      state: combatant.skills.state,
      skill: combatant.skills.skill,
      condition: combatant.condition,
      defense: defense && isDefensive(defense.skill) ? defense.skill : null,
    });
  }

  private collect(
    executions: SkillExecution[],
    snapshot: Map<EntityId, CombatantSnapshot>,
    tick: Tick,
  ): Collected {
    const outcomes: InteractionOutcome[] = [];
    const lost: LostTarget[] = [];
    const cancelled = this.resolveSpeedContests(executions, outcomes, tick);
    const defenseSpent = new Set<EntityId>();

    for (const execution of executions) {
      if (cancelled.has(execution.id)) continue;
      const offense = offensiveSkill(execution);
      const attacker = snapshot.get(execution.combatantId);
      if (!offense || !attacker || attacker.defeated) continue;

      for (const victimId of execution.targetIds) {
        const victim = snapshot.get(victimId);
        if (!victim || victim.defeated) {
          lost.push({ attackerId: attacker.id, targetId: victimId });
          continue;
        }

        // One-shot: a raised defense answers only the first hit of the pass.
        const defense = victim.defense !== null && !defenseSpent.has(victimId) && this.canDefend(offense, attacker, victim)
          ? victim.defense
          : null;
        if (defense !== null) defenseSpent.add(victimId);

        let planned: PlannedEffects;
        if (!execution.hit) {
          planned = missEffects(defense !== null);
        } else if (defense !== null) {
          planned = guardedEffects(INTERACTION_MATRIX[offense][defense], attacker, victim);
        } else {
          planned = unguardedEffects(offense, attacker, victim);
        }

        outcomes.push({
          seq: ++this.seq,
          tick,
          kind: planned.kind,
          attackerId: attacker.id,
          defenderId: victim.id,
          offense,
          defense,
          attacker: planned.attacker,
          defender: planned.defender,
        });
      }
    }

    return { outcomes, lost };
  }

  /**
   * Mutual offenses in the same pass race on speed. The strictly faster one
   * cancels the slower execution entirely; a tie lets both land. Verdicts
   * come from the snapshot, so chains of contests do not depend on order.
   */
  private resolveSpeedContests(
    executions: SkillExecution[],
    outcomes: InteractionOutcome[],
    tick: Tick,
  ): Set<number> {
    const byCombatant = new Map<EntityId, SkillExecution>();
    for (const execution of executions) byCombatant.set(execution.combatantId, execution);

    const cancelled = new Set<number>();
    for (const execution of executions) {
      const offense = offensiveSkill(execution);
      if (!offense) continue;

      for (const victimId of execution.targetIds) {
        const rival = byCombatant.get(victimId);
        const rivalOffense = rival ? offensiveSkill(rival) : null;
        if (!rival || !rivalOffense || !rival.targetIds.includes(execution.combatantId)) continue;
        // Each pair once, from the side that sorts first.
        if (compareExecutions(execution, rival) >= 0) continue;
        // A shot that missed cannot win the race.
        if (!execution.hit || !rival.hit) continue;

        const verdict = compareSpeeds(execution.speed, rival.speed);
        if (verdict === 'tie') continue;

        const winner = verdict === 'first' ? execution : rival;
        const loser = verdict === 'first' ? rival : execution;
        const winnerOffense = verdict === 'first' ? offense : rivalOffense;
        cancelled.add(loser.id);

        outcomes.push({
          seq: ++this.seq,
          tick,
          kind: 'speed_clash',
          attackerId: winner.combatantId,
          defenderId: loser.combatantId,
          offense: winnerOffense,
          defense: null,
          attacker: noEffect(),
          defender: noEffect(),
        });
      }
    }
    return cancelled;
  }

  private canDefend(offense: OffensiveSkill, attacker: CombatantSnapshot, victim: CombatantSnapshot): boolean {
    if (offense === 'ranged') return true;
    return distance(attacker.position, victim.position) <= victim.weapon.range;
  }

  private verifySnapshot(snapshot: Map<EntityId, CombatantSnapshot>): void {
    for (const [id, snap] of snapshot) {
      const combatant = this.directory.get(id);
      if (combatant && combatant.revision !== snap.revision) {
        throw new StateInvariantViolationError(id, `${id} changed while interactions were being collected`, {
          snapshotRevision: snap.revision,
          liveRevision: combatant.revision,
        });
      }
    }
  }

  // --- Apply ---

  private apply(outcome: InteractionOutcome): void {
    this.events.emit({ type: 'interaction_resolved', outcome });
    this.applyEffect(outcome.defenderId, outcome.defender, outcome.attackerId);
    this.applyEffect(outcome.attackerId, outcome.attacker, outcome.defenderId);
  }

  private applyEffect(combatantId: EntityId, effect: ParticipantEffect, sourceId: EntityId): void {
    const combatant = this.directory.get(combatantId);
    if (!combatant || combatant.defeated) return;

    if (effect.damage > 0) {
      combatant.takeDamage(effect.damage);
      if (combatant.defeated) {
        combatant.status.clearAll();
        combatant.skills.forceTransition({ to: 'uncharged', reason: 'defeated' });
        this.events.emit({ type: 'combatant_defeated', combatantId, defeatedBy: sourceId });
        return;
      }
    }

    if (effect.status) {
      combatant.applyStatus(effect.status.kind, effect.status.durationMs);
    }

    if (effect.forced) {
      combatant.skills.forceTransition(effect.forced);
    }

    // Thresholds crossed below push along the same line as the hit.
    const push = effect.displacement;
    const direction = push ? push.direction : null;
    if (push && push.distance > 0) {
      displace(combatant, push.direction, push.distance);
    }

    if (effect.ccBuildup > 0) {
      for (const threshold of combatant.cc.add(effect.ccBuildup)) {
        this.events.emit({ type: 'status_threshold_crossed', combatantId, threshold });
        if (threshold === 'knockback') {
          combatant.applyStatus('knockback', KNOCKBACK_DURATION_MS);
          if (direction) displace(combatant, direction, KNOCKBACK_DISPLACEMENT);
        } else {
          combatant.applyStatus('knockdown', knockdownDuration(combatant.loadout.stats));
          combatant.skills.forceTransition({ to: 'uncharged', reason: 'knocked_down' });
          if (direction) displace(combatant, direction, CC_KNOCKDOWN_DISPLACEMENT);
        }
      }
      combatant.touch();
    }

    if (effect.damage > 0 || effect.status || effect.forced || effect.ccBuildup > 0) {
      combatant.stopResting();
    }
  }
}
