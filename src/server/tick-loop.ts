// server/tick-loop.ts — The heartbeat: fixed-step combat tick cycle

import type {
  Decision,
  EntityId,
  InputResult,
  InteractionOutcome,
  InvariantViolationRecord,
  TickResult,
} from '../types/index.js';
import type { Encounter } from './encounter.js';
import type { InputQueue } from '../pipeline/input-queue.js';
import type { DecisionProcessor } from '../pipeline/decision-processor.js';
import type { CombatEventFeed } from './event-feed.js';
import { SLOW_TICK_WARN_MS } from '../shared/constants.js';
import { StateInvariantViolationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export class TickLoop {
  private encounter: Encounter;
  private inputQueue: InputQueue;
  private decisionProcessor: DecisionProcessor | null = null;
  private eventFeed: CombatEventFeed | null = null;

  private tickInterval: ReturnType<typeof setInterval> | null = null;

  constructor(encounter: Encounter, inputQueue: InputQueue) {
    this.encounter = encounter;
    this.inputQueue = inputQueue;
  }

  setDecisionProcessor(decisionProcessor: DecisionProcessor): void {
    this.decisionProcessor = decisionProcessor;
  }

  setEventFeed(eventFeed: CombatEventFeed): void {
    this.eventFeed = eventFeed;
  }

  get running(): boolean {
    return this.tickInterval !== null;
  }

  start(): void {
    if (this.tickInterval) return;
    this.tickInterval = setInterval(() => this.processTick(), this.encounter.config.tickRateMs);
  }

  stop(): void {
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }
  }

  processTick(): TickResult {
    const startTime = performance.now();
    const encounter = this.encounter;
    const dtMs = encounter.config.tickRateMs;
    const violations: InvariantViolationRecord[] = [];

    // 1. Advance the clock
    const tick = encounter.advance(dtMs);
    const now = encounter.nowMs;

    // 2. Apply player inputs (last write per combatant wins)
    const inputs: InputResult[] = [];
    for (const queued of this.inputQueue.drainAll()) {
      this.guard(queued.combatantId, 'input', violations, () => {
        inputs.push(encounter.applyInput(queued));
      });
    }

    // 3. Decisions for pattern-controlled combatants
    const decisions: Decision[] = [];
    const dp = this.decisionProcessor;
    if (dp) {
      dp.prepare(now);
      for (const id of dp.combatantIds()) {
        this.guard(id, 'decision', violations, () => {
          const decision = dp.decide(id, dtMs, now);
          if (decision) decisions.push(decision);
        });
      }
    }

    // 3b. Move pattern combatants toward their chosen positions
    for (const decision of decisions) {
      encounter.steer(decision.combatantId, decision.desiredPosition, dtMs);
    }

    // 4. Advance every state machine; offenses register with the resolver here
    for (const combatant of encounter.all()) {
      this.guard(combatant.id, 'update', violations, () => {
        combatant.update(dtMs);
        combatant.skills.assertInvariant();
      });
    }

    // 5. Resolve this tick's interactions (a violation here aborts the tick)
    let outcomes: InteractionOutcome[];
    try {
      outcomes = encounter.resolver.resolve(tick);
    } catch (err) {
      // Events of an aborted tick must not leak into the next one.
      encounter.tickEvents = [];
      throw err;
    }

    // 6. Feed outcomes back to the patterns
    if (dp) {
      dp.observe(outcomes);
      dp.cleanup(now);
    }

    // 7. Build tick result
    const tickResult: TickResult = {
      tick,
      timeMs: now,
      inputs,
      decisions,
      outcomes,
      events: [...encounter.tickEvents],
      violations,
    };

    // 8. Publish to presentation clients
    if (this.eventFeed) {
      this.eventFeed.publish(tickResult);
    }

    // 9. Clear tick-scoped data
    encounter.tickEvents = [];

    // 10. Log tick performance
    const elapsed = performance.now() - startTime;
    if (elapsed > SLOW_TICK_WARN_MS) {
      logger.warn('slow tick', { tick, elapsedMs: Number(elapsed.toFixed(1)), budgetMs: dtMs });
    }

    return tickResult;
  }

  /**
   * A broken state-machine invariant stops only the offending combatant's
   * work for this tick. Anything else propagates.
   */
  private guard(
    combatantId: EntityId,
    phase: InvariantViolationRecord['phase'],
    violations: InvariantViolationRecord[],
    work: () => void,
  ): void {
    try {
      work();
    } catch (err) {
      if (!(err instanceof StateInvariantViolationError)) throw err;
      logger.error('state invariant violated', { combatantId, phase, message: err.message, details: err.details });
      this.encounter.emit({ type: 'invariant_violation', combatantId, message: err.message });
      violations.push({ combatantId, phase, message: err.message });
    }
  }
}
