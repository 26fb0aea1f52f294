// combat/combatant.ts — One fighter: pools, meters, statuses and its skill state machine

import type {
  Archetype,
  CombatantCondition,
  CombatantSpec,
  CombatantView,
  Controller,
  EntityId,
  Loadout,
  Position,
  SkillRequestResult,
  StatusKind,
} from '../types/index.js';
import { distance } from '../types/index.js';
import type { SkillContext } from '../skills/context.js';
import { SkillStateMachine } from '../skills/state-machine.js';
import { SeededRng } from '../server/rng.js';
import { StaminaMeter } from './stamina-meter.js';
import { CcMeter } from './cc-meter.js';
import { StatusEffects } from './status-effects.js';
import { AccuracyTracker } from './accuracy.js';
import {
  BASE_HEALTH,
  BASE_STAMINA,
  FOCUS_STAMINA_MULTIPLIER,
  MOVEMENT_MODIFIER,
  REST_STAMINA_PER_SECOND,
  VITALITY_HEALTH_MULTIPLIER,
} from '../shared/constants.js';
import { compareIds } from '../shared/utils.js';

function freezeLoadout(loadout: Loadout): Readonly<Loadout> {
  return Object.freeze({
    weapon: Object.freeze({ ...loadout.weapon }),
    stats: Object.freeze({ ...loadout.stats }),
  });
}

export class Combatant {
  readonly id: EntityId;
  readonly team: string;
  readonly archetype: Archetype;
  readonly controller: Controller;
  /** Equipment data owned outside the core; never written here. */
  readonly loadout: Readonly<Loadout>;
  readonly maxHealth: number;

  position: Position;
  targetId: EntityId | null;
  health: number;
  /** Written by state hooks, read by whatever moves the combatant. */
  movementModifier: number = MOVEMENT_MODIFIER.idle;
  /** Written by whatever moves the combatant; slows aim buildup. */
  moving = false;
  resting = false;

  readonly stamina: StaminaMeter;
  readonly cc: CcMeter = new CcMeter();
  readonly status: StatusEffects = new StatusEffects();
  readonly accuracy: AccuracyTracker = new AccuracyTracker();
  readonly rng: SeededRng;
  readonly skills: SkillStateMachine;

  /** Bumped on every mutation; the resolver uses it to prove snapshots stay untouched. */
  private revisionCounter = 0;
  private readonly context: SkillContext;

  constructor(spec: CombatantSpec, context: SkillContext, encounterSeed: number) {
    this.id = spec.id;
    this.team = spec.team;
    this.archetype = spec.archetype;
    this.controller = spec.controller;
    this.loadout = freezeLoadout(spec.loadout);
    this.position = { x: spec.position.x, y: spec.position.y };
    this.targetId = spec.targetId ?? null;
    this.context = context;

    const { vitality, focus } = this.loadout.stats;
    this.maxHealth = BASE_HEALTH + vitality * VITALITY_HEALTH_MULTIPLIER;
    this.health = this.maxHealth;
    this.stamina = new StaminaMeter(BASE_STAMINA + focus * FOCUS_STAMINA_MULTIPLIER);
    this.rng = new SeededRng(spec.seed ?? SeededRng.seedFor(encounterSeed, spec.id));
    this.skills = new SkillStateMachine(this, context);
  }

  get revision(): number {
    return this.revisionCounter;
  }

  touch(): void {
    this.revisionCounter++;
  }

  get defeated(): boolean {
    return this.health <= 0;
  }

  /** Knocked down or knocked back: no new skills, no activation. */
  get fullyDisabled(): boolean {
    return this.status.has('knockdown') || this.status.has('knockback');
  }

  get condition(): CombatantCondition {
    if (this.status.has('knockdown')) return 'knocked_down';
    if (this.status.has('knockback')) return 'knocked_back';
    if (this.status.has('stun')) return 'stunned';
    if (this.resting) return 'resting';
    return 'none';
  }

  /** The current target, if it still exists and is standing. */
  target(): Combatant | undefined {
    if (this.targetId === null) return undefined;
    const target = this.context.directory.get(this.targetId);
    if (!target || target.defeated) return undefined;
    return target;
  }

  nearestHostile(): Combatant | undefined {
    let best: Combatant | undefined;
    let bestDistance = Infinity;
    for (const other of this.context.directory.all()) {
      if (other.id === this.id || other.defeated || other.team === this.team) continue;
      const d = distance(this.position, other.position);
      if (d < bestDistance || (d === bestDistance && best && compareIds(other.id, best.id) < 0)) {
        best = other;
        bestDistance = d;
      }
    }
    return best;
  }

  moveTo(position: Position): void {
    this.position = { x: position.x, y: position.y };
    this.touch();
  }

  /** Returns the damage actually taken. */
  takeDamage(amount: number): number {
    const taken = Math.min(this.health, Math.max(0, amount));
    this.health -= taken;
    this.touch();
    return taken;
  }

  applyStatus(kind: StatusKind, durationMs: number): boolean {
    const applied = this.status.apply(kind, durationMs);
    if (applied) {
      this.touch();
      this.context.events.emit({ type: 'status_applied', combatantId: this.id, status: kind, durationMs });
    }
    return applied;
  }

  startResting(): SkillRequestResult {
    if (this.defeated || this.fullyDisabled) {
      return { ok: false, reason: 'disabled', message: `${this.id} cannot rest while ${this.defeated ? 'defeated' : this.condition}` };
    }
    if (this.skills.state !== 'uncharged') {
      return { ok: false, reason: 'invalid_transition', message: `cannot rest while ${this.skills.state}` };
    }
    if (!this.resting) {
      this.resting = true;
      this.touch();
      this.context.events.emit({ type: 'resting_changed', combatantId: this.id, resting: true });
    }
    return { ok: true, state: this.skills.state };
  }

  stopResting(): void {
    if (!this.resting) return;
    this.resting = false;
    this.touch();
    this.context.events.emit({ type: 'resting_changed', combatantId: this.id, resting: false });
  }

  /** Timers, meters and the skill state machine, in that order. */
  update(dtMs: number): void {
    if (this.defeated) return;

    for (const expired of this.status.update(dtMs)) {
      this.context.events.emit({ type: 'status_expired', combatantId: this.id, status: expired });
    }

    if (!this.fullyDisabled) {
      this.cc.decay(dtMs);
    }

    if (this.resting) {
      this.stamina.regenerate(REST_STAMINA_PER_SECOND, dtMs);
    }

    this.skills.update(dtMs);
    this.touch();
  }

  view(): CombatantView {
    return {
      id: this.id,
      team: this.team,
      health: this.health,
      maxHealth: this.maxHealth,
      stamina: this.stamina.current,
      maxStamina: this.stamina.max,
      ccMeter: this.cc.current,
      state: this.skills.state,
      skill: this.skills.skill,
      condition: this.condition,
      position: { x: this.position.x, y: this.position.y },
      targetId: this.targetId,
    };
  }
}
