// server/encounter.ts — In-memory encounter state: combatants, clock, tick events

import type {
  CombatantSpec,
  CombatantView,
  CombatEvent,
  CombatEventSink,
  EntityId,
  InputResult,
  Millis,
  Position,
  QueuedInput,
  SkillKind,
  SkillRequestResult,
  Tick,
} from '../types/index.js';
import { distance, stepToward } from '../types/index.js';
import { Combatant } from '../combat/combatant.js';
import type { CombatantDirectory, SkillContext } from '../skills/context.js';
import { InteractionResolver } from '../pipeline/interaction-resolver.js';
import type { CombatConfig } from '../shared/config.js';
import { ScenarioError } from '../shared/errors.js';
import { MOVE_SPEED_PER_SECOND } from '../shared/constants.js';
import { compareIds } from '../shared/utils.js';

type RemoveListener = (combatantId: EntityId) => void;

function unknownCombatant(id: EntityId): SkillRequestResult {
  return { ok: false, reason: 'unknown_combatant', message: `no combatant with id "${id}"` };
}

export class Encounter implements CombatantDirectory, CombatEventSink {
  tick: Tick = 0;
  nowMs: Millis = 0;
  readonly seed: number;
  readonly config: CombatConfig;

  combatants: Map<EntityId, Combatant> = new Map();
  tickEvents: CombatEvent[] = [];

  readonly resolver: InteractionResolver;
  readonly context: SkillContext;

  private ordered: Combatant[] | null = null;
  private removeListeners: RemoveListener[] = [];

  constructor(config: CombatConfig) {
    this.config = config;
    this.seed = config.seed;
    this.resolver = new InteractionResolver(this, this);
    this.context = {
      events: this,
      registry: this.resolver,
      directory: this,
      clock: { now: () => this.nowMs, tick: () => this.tick },
      refundStaminaOnCancel: config.refundStaminaOnCancel,
    };
  }

  // --- Clock ---

  advance(dtMs: number): Tick {
    this.nowMs += dtMs;
    return ++this.tick;
  }

  // --- CombatEventSink ---

  emit(event: CombatEvent): void {
    this.tickEvents.push(event);
  }

  // --- CombatantDirectory ---

  get(id: EntityId): Combatant | undefined {
    return this.combatants.get(id);
  }

  all(): Combatant[] {
    if (!this.ordered) {
      this.ordered = Array.from(this.combatants.values()).sort((a, b) => compareIds(a.id, b.id));
    }
    return this.ordered;
  }

  // --- Membership ---

  addCombatant(spec: CombatantSpec): Combatant {
    if (this.combatants.has(spec.id)) {
      throw new ScenarioError(`duplicate combatant id "${spec.id}"`, { id: spec.id });
    }
    const combatant = new Combatant(spec, this.context, this.seed);
    this.combatants.set(combatant.id, combatant);
    this.ordered = null;
    return combatant;
  }

  removeCombatant(id: EntityId): boolean {
    const combatant = this.combatants.get(id);
    if (!combatant) return false;

    if (combatant.skills.state !== 'uncharged') {
      combatant.skills.forceTransition({ to: 'uncharged', reason: 'removed' });
    } else {
      combatant.skills.releaseReservations();
    }
    this.resolver.discardFrom(id);

    this.combatants.delete(id);
    this.ordered = null;
    for (const listener of this.removeListeners) listener(id);
    return true;
  }

  onRemove(listener: RemoveListener): void {
    this.removeListeners.push(listener);
  }

  /** Teams that still have at least one standing combatant, in id order. */
  standingTeams(): string[] {
    const teams = new Set<string>();
    for (const combatant of this.all()) {
      if (!combatant.defeated) teams.add(combatant.team);
    }
    return Array.from(teams).sort(compareIds);
  }

  /**
   * Walks a combatant toward `desired`, scaled by the movement modifier its
   * skill state imposes. Stunned and disabled combatants stay put.
   * Returns whether it moved.
   */
  steer(id: EntityId, desired: Position | null, dtMs: number): boolean {
    const combatant = this.combatants.get(id);
    if (!combatant || combatant.defeated) return false;

    const step = (MOVE_SPEED_PER_SECOND * combatant.movementModifier * dtMs) / 1000;
    const blocked = combatant.fullyDisabled || combatant.status.has('stun') || step <= 0;
    if (desired === null || blocked || distance(combatant.position, desired) === 0) {
      combatant.moving = false;
      return false;
    }

    combatant.moveTo(stepToward(combatant.position, desired, step));
    combatant.moving = true;
    if (combatant.resting) combatant.stopResting();
    return true;
  }

  // --- Player-facing operations ---

  requestSkill(id: EntityId, skill: SkillKind): SkillRequestResult {
    const combatant = this.combatants.get(id);
    if (!combatant) return unknownCombatant(id);
    return combatant.skills.requestSkill(skill);
  }

  activateSkill(id: EntityId): SkillRequestResult {
    const combatant = this.combatants.get(id);
    if (!combatant) return unknownCombatant(id);
    return combatant.skills.activate();
  }

  cancelCurrentSkill(id: EntityId): SkillRequestResult {
    const combatant = this.combatants.get(id);
    if (!combatant) return unknownCombatant(id);
    return combatant.skills.cancel('manual');
  }

  startResting(id: EntityId): SkillRequestResult {
    const combatant = this.combatants.get(id);
    if (!combatant) return unknownCombatant(id);
    return combatant.startResting();
  }

  stopResting(id: EntityId): SkillRequestResult {
    const combatant = this.combatants.get(id);
    if (!combatant) return unknownCombatant(id);
    combatant.stopResting();
    return { ok: true, state: combatant.skills.state };
  }

  setTarget(id: EntityId, targetId: EntityId | null): SkillRequestResult {
    const combatant = this.combatants.get(id);
    if (!combatant) return unknownCombatant(id);

    if (targetId !== null) {
      const target = this.combatants.get(targetId);
      if (!target || target.defeated || target.id === id) {
        return { ok: false, reason: 'target_lost', message: `"${targetId}" is not a valid target for ${id}` };
      }
    }
    combatant.targetId = targetId;
    combatant.touch();
    return { ok: true, state: combatant.skills.state };
  }

  applyInput(queued: QueuedInput): InputResult {
    const { combatantId, input } = queued;
    let result: SkillRequestResult;

    switch (input.type) {
      case 'request_skill':
        result = this.requestSkill(combatantId, input.skill);
        break;
      case 'activate':
        result = this.activateSkill(combatantId);
        break;
      case 'cancel':
        result = this.cancelCurrentSkill(combatantId);
        break;
      case 'rest':
        result = this.startResting(combatantId);
        break;
      case 'stand':
        result = this.stopResting(combatantId);
        break;
      case 'set_target':
        result = this.setTarget(combatantId, input.targetId);
        break;
    }

    return { combatantId, input, result };
  }

  views(): CombatantView[] {
    return this.all().map((combatant) => combatant.view());
  }
}
