// pipeline/decision-processor.ts — Runs pattern executors for every pattern-controlled combatant

import type {
  CompiledPattern,
  Decision,
  EntityId,
  InteractionOutcome,
  Millis,
} from '../types/index.js';
import type { Encounter } from '../server/encounter.js';
import { PatternExecutor } from '../patterns/pattern-executor.js';
import { AttackCoordinator } from '../coordination/attack-coordinator.js';
import { FormationManager } from '../coordination/formation-manager.js';
import { ARCHETYPE_ATTACK_PRIORITY } from '../shared/constants.js';
import { ScenarioError } from '../shared/errors.js';
import { compareIds } from '../shared/utils.js';

export class DecisionProcessor {
  readonly coordinator: AttackCoordinator;
  readonly formations: FormationManager;
  private executors: Map<EntityId, PatternExecutor> = new Map();
  private encounter: Encounter;

  constructor(encounter: Encounter, coordinator?: AttackCoordinator, formations?: FormationManager) {
    this.encounter = encounter;
    const config = encounter.config;
    this.coordinator = coordinator ?? new AttackCoordinator({
      maxSimultaneousAttackers: config.maxSimultaneousAttackers,
      minTimeBetweenAttacksMs: config.minTimeBetweenAttacksMs,
      attackSlotDurationMs: config.attackSlotDurationMs,
    });
    this.formations = formations ?? new FormationManager(config.formationReassignCooldownMs);

    encounter.onRemove((id) => this.detach(id));
  }

  attach(combatantId: EntityId, pattern: CompiledPattern): PatternExecutor {
    const combatant = this.encounter.get(combatantId);
    if (!combatant) {
      throw new ScenarioError(`cannot attach pattern "${pattern.name}" to unknown combatant "${combatantId}"`);
    }
    if (this.executors.has(combatantId)) {
      throw new ScenarioError(`combatant "${combatantId}" already runs a pattern`);
    }

    const executor = new PatternExecutor(pattern, combatant, {
      events: this.encounter,
      coordinator: this.coordinator,
      formations: this.formations,
    });
    this.executors.set(combatantId, executor);
    this.coordinator.register(combatantId, ARCHETYPE_ATTACK_PRIORITY[combatant.archetype]);
    executor.start(this.encounter.nowMs);
    return executor;
  }

  detach(combatantId: EntityId): void {
    const executor = this.executors.get(combatantId);
    if (!executor) return;
    executor.dispose(this.encounter.nowMs);
    this.coordinator.unregister(combatantId);
    this.executors.delete(combatantId);
  }

  executorFor(combatantId: EntityId): PatternExecutor | undefined {
    return this.executors.get(combatantId);
  }

  combatantIds(): EntityId[] {
    return Array.from(this.executors.keys()).sort(compareIds);
  }

  /** First pass: every agent declares readiness before anyone asks for a slot. */
  prepare(now: Millis): void {
    this.coordinator.cleanup(now);
    for (const id of this.combatantIds()) {
      const executor = this.executors.get(id);
      const combatant = this.encounter.get(id);
      if (!executor || !combatant) continue;
      this.coordinator.setReady(id, combatant.targetId, executor.wantsAttack(now));
    }
  }

  decide(combatantId: EntityId, dtMs: number, now: Millis): Decision | null {
    const executor = this.executors.get(combatantId);
    if (!executor) return null;
    return executor.evaluate(dtMs, now);
  }

  observe(outcomes: readonly InteractionOutcome[]): void {
    if (outcomes.length === 0) return;
    for (const id of this.combatantIds()) {
      this.executors.get(id)?.observe(outcomes);
    }
  }

  cleanup(now: Millis): void {
    this.coordinator.cleanup(now);
    for (const id of this.combatantIds()) {
      const combatant = this.encounter.get(id);
      if (combatant?.defeated) {
        this.executors.get(id)?.dispose(now);
        this.coordinator.unregister(id);
        this.executors.delete(id);
      }
    }
  }
}
