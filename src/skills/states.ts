// skills/states.ts — The eight skill lifecycle states
//
// A state never transitions itself: update() returns the successor and the
// machine performs the exit/enter pair.

import type {
  CancelReason,
  CombatEvent,
  EntityId,
  SkillKind,
  SkillStateKind,
} from '../types/index.js';
import { distance, stepToward } from '../types/index.js';
import type { Combatant } from '../combat/combatant.js';
import type { SkillStateMachine } from './state-machine.js';
import {
  SKILLS,
  chargeTimeMs,
  phaseTimeMs,
  type SkillDefinition,
} from '../data/skills.js';
import { executionSpeed } from '../pipeline/speed-resolver.js';
import {
  DEFENSIVE_WAIT_TIMEOUT_MS,
  LUNGE_DASH_DISTANCE,
  LUNGE_MAX_RANGE,
  MOVEMENT_MODIFIER,
  SWEEP_RADIUS,
} from '../shared/constants.js';

export abstract class SkillState {
  abstract readonly kind: SkillStateKind;
  protected elapsedMs = 0;

  constructor(
    protected readonly machine: SkillStateMachine,
    readonly skill: SkillKind | null,
  ) {}

  protected get owner(): Combatant {
    return this.machine.owner;
  }

  protected emit(event: CombatEvent): void {
    this.machine.context.events.emit(event);
  }

  onEnter(): void {}

  /** Always runs, whichever way the state is left. */
  onExit(next: SkillState): void {
    this.owner.movementModifier = MOVEMENT_MODIFIER.idle;

    if (!(next instanceof UnchargedState)) return;

    this.machine.releaseReservations();
    if (this.skill === null) return;

    if (next.reason === null) {
      this.emit({ type: 'skill_completed', combatantId: this.owner.id, skill: this.skill });
    } else {
      const refunded = this.refund();
      this.emit({
        type: 'skill_cancelled',
        combatantId: this.owner.id,
        skill: this.skill,
        reason: next.reason,
        refunded,
      });
    }
  }

  /** Stamina handed back when the skill is abandoned from this state. */
  protected refund(): number {
    return 0;
  }

  abstract update(dtMs: number): SkillState | null;
}

export class UnchargedState extends SkillState {
  readonly kind = 'uncharged';

  constructor(
    machine: SkillStateMachine,
    /** Why the previous skill was abandoned; null after a normal completion. */
    readonly reason: CancelReason | null,
  ) {
    super(machine, null);
  }

  update(): SkillState | null {
    return null;
  }
}

abstract class BoundState extends SkillState {
  protected readonly def: Readonly<SkillDefinition>;

  constructor(
    machine: SkillStateMachine,
    protected readonly boundSkill: SkillKind,
  ) {
    super(machine, boundSkill);
    this.def = SKILLS[boundSkill];
  }
}

/** Charging, Charged and Aiming: the skill is paid for but has not fired. */
abstract class PreparingState extends BoundState {
  protected refund(): number {
    if (!this.machine.context.refundStaminaOnCancel) return 0;
    this.owner.stamina.restore(this.def.staminaCost);
    return this.def.staminaCost;
  }

  protected interruption(): UnchargedState | null {
    if (this.owner.status.has('knockdown')) {
      return new UnchargedState(this.machine, 'knocked_down');
    }
    if (this.def.targeting === 'single' && !this.owner.target()) {
      return new UnchargedState(this.machine, 'target_lost');
    }
    return null;
  }
}

export class ChargingState extends PreparingState {
  readonly kind = 'charging';
  private readonly requiredMs: number;

  constructor(machine: SkillStateMachine, skill: SkillKind) {
    super(machine, skill);
    this.requiredMs = chargeTimeMs(skill, this.owner.loadout.stats);
  }

  get progress(): number {
    if (this.requiredMs === 0) return 1;
    return Math.min(1, this.elapsedMs / this.requiredMs);
  }

  onEnter(): void {
    this.owner.movementModifier = this.def.prepareMovement;
    this.emit({
      type: 'skill_charging_begun',
      combatantId: this.owner.id,
      skill: this.boundSkill,
      mode: 'charge',
    });
  }

  update(dtMs: number): SkillState | null {
    const stop = this.interruption();
    if (stop) return stop;

    // Stun freezes the charge; it does not reset it.
    if (!this.owner.status.has('stun')) {
      this.elapsedMs += dtMs;
    }

    if (this.elapsedMs >= this.requiredMs) {
      return new ChargedState(this.machine, this.boundSkill);
    }
    return null;
  }

  onExit(next: SkillState): void {
    super.onExit(next);
    if (next.kind === 'charged') {
      this.emit({ type: 'skill_charged', combatantId: this.owner.id, skill: this.boundSkill });
    }
  }
}

export class ChargedState extends PreparingState {
  readonly kind = 'charged';

  onEnter(): void {
    this.owner.movementModifier = this.def.prepareMovement;
  }

  update(): SkillState | null {
    const stop = this.interruption();
    if (stop) return stop;

    // Defensive skills raise themselves; offensive ones wait for activate().
    if (this.def.category === 'defensive' && !this.owner.status.has('stun')) {
      return new StartupState(this.machine, this.boundSkill);
    }
    return null;
  }
}

export class AimingState extends PreparingState {
  readonly kind = 'aiming';

  onEnter(): void {
    this.owner.accuracy.reset();
    this.owner.movementModifier = this.def.prepareMovement;
    this.emit({
      type: 'skill_charging_begun',
      combatantId: this.owner.id,
      skill: this.boundSkill,
      mode: 'aim',
    });
  }

  update(dtMs: number): SkillState | null {
    const stop = this.interruption();
    if (stop) return stop;

    const target = this.owner.target();
    if (!target) return new UnchargedState(this.machine, 'target_lost');
    if (distance(this.owner.position, target.position) > this.owner.loadout.weapon.rangedRange) {
      return new UnchargedState(this.machine, 'out_of_range');
    }

    if (!this.owner.status.has('stun')) {
      this.owner.accuracy.update(dtMs, this.owner.moving, this.owner.loadout.stats.focus);
    }
    return null;
  }
}

export class StartupState extends BoundState {
  readonly kind = 'startup';
  private readonly durationMs: number;

  constructor(machine: SkillStateMachine, skill: SkillKind) {
    super(machine, skill);
    this.durationMs = phaseTimeMs(skill, 'startup', this.owner.loadout.weapon);
  }

  onEnter(): void {
    this.owner.movementModifier = MOVEMENT_MODIFIER.committed;
  }

  update(dtMs: number): SkillState | null {
    this.elapsedMs += dtMs;
    if (this.elapsedMs >= this.durationMs) {
      return new ActiveState(this.machine, this.boundSkill);
    }
    return null;
  }
}

export class ActiveState extends BoundState {
  readonly kind = 'active';
  private readonly durationMs: number;

  constructor(machine: SkillStateMachine, skill: SkillKind) {
    super(machine, skill);
    this.durationMs = phaseTimeMs(skill, 'active', this.owner.loadout.weapon);
  }

  onEnter(): void {
    this.owner.movementModifier = MOVEMENT_MODIFIER.committed;

    if (this.def.category === 'defensive') {
      this.emitActivated([], false);
      return;
    }

    const targetIds = this.resolveTargets();
    if (targetIds.length === 0) {
      this.emitActivated([], true);
      return;
    }

    const { weapon, stats } = this.owner.loadout;
    const clock = this.machine.context.clock;
    const hit = this.boundSkill === 'ranged'
      ? this.owner.rng.next() * 100 < this.owner.accuracy.current
      : true;

    this.machine.context.registry.submitOffense({
      combatantId: this.owner.id,
      skill: this.boundSkill,
      targetIds,
      chargeStartedAt: this.machine.startedAt,
      activatedAt: clock.now(),
      tick: clock.tick(),
      speed: executionSpeed(this.boundSkill, weapon, stats),
      hit,
    });
    this.emitActivated(targetIds, false);
  }

  update(dtMs: number): SkillState | null {
    if (this.def.category === 'defensive') {
      return new WaitingState(this.machine, this.boundSkill);
    }

    this.elapsedMs += dtMs;
    if (this.elapsedMs >= this.durationMs) {
      return new RecoveryState(this.machine, this.boundSkill, 0);
    }
    return null;
  }

  private emitActivated(targetIds: EntityId[], whiff: boolean): void {
    this.emit({
      type: 'skill_activated',
      combatantId: this.owner.id,
      skill: this.boundSkill,
      targetIds,
      whiff,
    });
  }

  private resolveTargets(): EntityId[] {
    const owner = this.owner;

    if (this.def.targeting === 'area') {
      return this.machine.context.directory
        .all()
        .filter((other) =>
          other.id !== owner.id &&
          !other.defeated &&
          other.team !== owner.team &&
          distance(owner.position, other.position) <= SWEEP_RADIUS,
        )
        .map((other) => other.id);
    }

    const target = owner.target();
    if (!target) return [];
    const gap = distance(owner.position, target.position);
    const weapon = owner.loadout.weapon;

    switch (this.boundSkill) {
      case 'lunge': {
        if (gap > LUNGE_MAX_RANGE) return [];
        const dash = Math.min(LUNGE_DASH_DISTANCE, Math.max(0, gap - weapon.range));
        owner.moveTo(stepToward(owner.position, target.position, dash));
        return [target.id];
      }
      case 'ranged':
        return gap <= weapon.rangedRange ? [target.id] : [];
      default:
        return gap <= weapon.range ? [target.id] : [];
    }
  }
}

export class WaitingState extends BoundState {
  readonly kind = 'waiting';

  onEnter(): void {
    this.owner.movementModifier = MOVEMENT_MODIFIER.committed;
    const clock = this.machine.context.clock;
    this.machine.context.registry.raiseDefense({
      combatantId: this.owner.id,
      skill: this.boundSkill,
      targetIds: [],
      chargeStartedAt: this.machine.startedAt,
      activatedAt: clock.now(),
      tick: clock.tick(),
      speed: 0,
      hit: true,
    });
  }

  update(dtMs: number): SkillState | null {
    this.owner.stamina.drain(this.def.waitingDrainPerSecond, dtMs);
    if (this.owner.stamina.depleted) {
      this.emit({ type: 'defense_exhausted', combatantId: this.owner.id, skill: this.boundSkill });
      return new RecoveryState(this.machine, this.boundSkill, 0);
    }

    this.elapsedMs += dtMs;
    if (this.elapsedMs >= DEFENSIVE_WAIT_TIMEOUT_MS) {
      this.emit({ type: 'defense_expired', combatantId: this.owner.id, skill: this.boundSkill });
      return new RecoveryState(this.machine, this.boundSkill, 0);
    }
    return null;
  }

  onExit(next: SkillState): void {
    super.onExit(next);
    this.machine.context.registry.lowerDefense(this.owner.id);
  }
}

export class RecoveryState extends SkillState {
  readonly kind = 'recovery';
  private readonly durationMs: number;

  constructor(machine: SkillStateMachine, skill: SkillKind | null, lockoutMs: number) {
    super(machine, skill);
    const base = skill === null ? 0 : phaseTimeMs(skill, 'recovery', this.owner.loadout.weapon);
    this.durationMs = base + Math.max(0, lockoutMs);
  }

  get totalMs(): number {
    return this.durationMs;
  }

  onEnter(): void {
    this.owner.movementModifier = MOVEMENT_MODIFIER.recovery;
  }

  update(dtMs: number): SkillState | null {
    this.elapsedMs += dtMs;
    if (this.elapsedMs >= this.durationMs) {
      return new UnchargedState(this.machine, null);
    }
    return null;
  }
}
