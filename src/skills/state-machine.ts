// skills/state-machine.ts — Per-combatant skill lifecycle
//
// Exactly one state is current at any time. Every change of state, whether
// requested, timed or forced from outside, runs the outgoing state's exit
// hook and then the incoming state's enter hook; nothing observes the gap.

import type {
  CancelReason,
  CombatEvent,
  ForcedTransition,
  Millis,
  SkillKind,
  SkillRequestFailure,
  SkillRequestResult,
  SkillStateKind,
} from '../types/index.js';
import { distance } from '../types/index.js';
import type { Combatant } from '../combat/combatant.js';
import type { SkillContext } from './context.js';
import {
  AimingState,
  ChargingState,
  RecoveryState,
  type SkillState,
  StartupState,
  UnchargedState,
} from './states.js';
import { SKILLS, isOffensive } from '../data/skills.js';
import { StateInvariantViolationError } from '../shared/errors.js';
import {
  LUNGE_MAX_RANGE,
  LUNGE_MIN_RANGE,
  MAX_CHAINED_TRANSITIONS,
} from '../shared/constants.js';

function fail(reason: SkillRequestFailure, message: string): SkillRequestResult {
  return { ok: false, reason, message };
}

export class SkillStateMachine {
  readonly owner: Combatant;
  readonly context: SkillContext;

  private current: SkillState;
  private transitioning = false;
  private reservations: Array<() => void> = [];
  private skillStartedAt: Millis = 0;

  constructor(owner: Combatant, context: SkillContext) {
    this.owner = owner;
    this.context = context;
    this.current = new UnchargedState(this, null);
  }

  get state(): SkillStateKind {
    return this.current.kind;
  }

  get skill(): SkillKind | null {
    return this.current.skill;
  }

  /** When the current skill was requested. */
  get startedAt(): Millis {
    return this.skillStartedAt;
  }

  /** Startup, Active and Recovery cannot be cancelled or left voluntarily. */
  get isCommitted(): boolean {
    const state = this.current.kind;
    return state === 'startup' || state === 'active' || state === 'recovery';
  }

  get isCancellable(): boolean {
    const state = this.current.kind;
    return state === 'charging' || state === 'charged' || state === 'aiming' || state === 'waiting';
  }

  get chargeProgress(): number {
    if (this.current instanceof ChargingState) return this.current.progress;
    return this.current.kind === 'charged' ? 1 : 0;
  }

  requestSkill(kind: SkillKind): SkillRequestResult {
    const owner = this.owner;
    const def = SKILLS[kind];

    if (owner.defeated) {
      return fail('disabled', `${owner.id} is defeated`);
    }
    if (this.current.kind !== 'uncharged') {
      return fail('invalid_transition', `cannot start ${kind} while ${this.current.kind}`);
    }
    if (owner.fullyDisabled) {
      return fail('disabled', `${owner.id} is ${owner.condition}`);
    }

    if (def.targeting === 'single') {
      const target = owner.target();
      if (!target) {
        return fail('target_lost', `${kind} needs a live target`);
      }
      const gap = distance(owner.position, target.position);
      if (kind === 'lunge' && (gap < LUNGE_MIN_RANGE || gap > LUNGE_MAX_RANGE)) {
        return fail('out_of_range', `lunge needs ${LUNGE_MIN_RANGE}-${LUNGE_MAX_RANGE} to the target (at ${gap.toFixed(2)})`);
      }
      if (kind === 'ranged') {
        const reach = owner.loadout.weapon.rangedRange;
        if (reach <= 0) {
          return fail('out_of_range', `${owner.loadout.weapon.name} cannot shoot`);
        }
        if (gap > reach) {
          return fail('out_of_range', `target at ${gap.toFixed(2)} is beyond ranged reach ${reach}`);
        }
      }
    }

    if (!owner.stamina.spend(def.staminaCost)) {
      return fail(
        'insufficient_resource',
        `${kind} costs ${def.staminaCost} stamina, ${owner.id} has ${owner.stamina.current}`,
      );
    }

    if (owner.resting) owner.stopResting();
    this.skillStartedAt = this.context.clock.now();

    switch (def.preparation) {
      case 'instant':
        this.transitionTo(new StartupState(this, kind));
        break;
      case 'aim':
        this.transitionTo(new AimingState(this, kind));
        break;
      case 'charge':
        this.transitionTo(new ChargingState(this, kind));
        break;
    }

    return { ok: true, state: this.current.kind };
  }

  /** Fires a charged offensive skill or releases an aimed shot. */
  activate(): SkillRequestResult {
    const owner = this.owner;
    const skill = this.current.skill;
    const state = this.current.kind;

    const ready = skill !== null && (state === 'aiming' || (state === 'charged' && isOffensive(skill)));
    if (!ready || skill === null) {
      return fail('invalid_transition', `nothing to activate while ${state}`);
    }
    if (owner.defeated || owner.fullyDisabled || owner.status.has('stun')) {
      return fail('disabled', `${owner.id} is ${owner.defeated ? 'defeated' : owner.condition}`);
    }

    this.transitionTo(new StartupState(this, skill));
    return { ok: true, state: this.current.kind };
  }

  cancel(reason: CancelReason = 'manual'): SkillRequestResult {
    const state = this.current.kind;

    if (state === 'charging' || state === 'charged' || state === 'aiming') {
      this.transitionTo(new UnchargedState(this, reason));
      return { ok: true, state: this.current.kind };
    }
    if (state === 'waiting') {
      this.transitionTo(new RecoveryState(this, this.current.skill, 0));
      return { ok: true, state: this.current.kind };
    }
    return fail('invalid_transition', `cannot cancel while ${state}`);
  }

  /** Advances the current state; returns whether at least one transition happened. */
  update(dtMs: number): boolean {
    let next = this.current.update(dtMs);
    if (!next) return false;

    let hops = 0;
    while (next) {
      hops++;
      if (hops > MAX_CHAINED_TRANSITIONS) {
        throw new StateInvariantViolationError(
          this.owner.id,
          `more than ${MAX_CHAINED_TRANSITIONS} chained transitions in one update (stuck at ${this.current.kind})`,
        );
      }
      this.transitionTo(next);
      // Zero-duration successors resolve in the same update.
      next = this.current.update(0);
    }
    return true;
  }

  forceTransition(forced: ForcedTransition): void {
    if (forced.to === 'uncharged') {
      this.transitionTo(new UnchargedState(this, forced.reason));
    } else {
      this.transitionTo(new RecoveryState(this, this.current.skill, forced.lockoutMs));
    }
  }

  /** Registers cleanup to run the next time the machine returns to Uncharged. */
  holdReservation(release: () => void): void {
    this.reservations.push(release);
  }

  get reservationCount(): number {
    return this.reservations.length;
  }

  releaseReservations(): void {
    const pending = this.reservations;
    this.reservations = [];
    for (const release of pending) release();
  }

  assertInvariant(): void {
    if (this.transitioning) {
      throw new StateInvariantViolationError(this.owner.id, `transition still in progress from ${this.current.kind}`);
    }
    if (this.current.kind !== 'uncharged' && this.current.skill === null && this.current.kind !== 'recovery') {
      throw new StateInvariantViolationError(this.owner.id, `${this.current.kind} state has no skill`);
    }
  }

  emit(event: CombatEvent): void {
    this.context.events.emit(event);
  }

  private transitionTo(next: SkillState): void {
    if (this.transitioning) {
      throw new StateInvariantViolationError(
        this.owner.id,
        `re-entrant transition to ${next.kind} while leaving ${this.current.kind}`,
      );
    }

    const previous = this.current;
    this.transitioning = true;
    try {
      previous.onExit(next);
      this.current = next;
      this.emit({
        type: 'skill_state_changed',
        combatantId: this.owner.id,
        skill: next.skill ?? previous.skill,
        from: previous.kind,
        to: next.kind,
      });
      next.onEnter();
    } finally {
      this.transitioning = false;
    }
    this.owner.touch();
  }
}
