// patterns/conditions.ts — Guard evaluation for pattern nodes and transitions

import type { PatternCondition } from '../types/index.js';
import { distance } from '../types/index.js';
import type { Combatant } from '../combat/combatant.js';
import { SKILLS } from '../data/skills.js';

/** Everything a guard may look at for one combatant on one tick. */
export interface PatternContext {
  self: Combatant;
  target: Combatant | undefined;
  timeInNodeMs: number;
  hitsTaken: number;
  hitsDealt: number;
  /** Rolled once per node entry. */
  randomValue: number;
  isCooldownReady(id: string): boolean;
  /** May claim an attack slot as a side effect; only called when reached. */
  hasAttackPermission(): boolean;
}

function healthPercent(combatant: Combatant): number {
  return (combatant.health / combatant.maxHealth) * 100;
}

function isPreparing(combatant: Combatant): boolean {
  const state = combatant.skills.state;
  return state === 'charging' || state === 'charged' || state === 'aiming';
}

function weaponReach(combatant: Combatant): number {
  const weapon = combatant.loadout.weapon;
  return weapon.rangedRange > 0 ? weapon.rangedRange : weapon.range;
}

export function evaluateCondition(condition: PatternCondition, ctx: PatternContext): boolean {
  const { self, target } = ctx;

  switch (condition.type) {
    case 'health_above':
      return healthPercent(self) > condition.percent;
    case 'health_below':
      return healthPercent(self) < condition.percent;
    case 'hits_taken_at_least':
      return ctx.hitsTaken >= condition.count;
    case 'hits_dealt_at_least':
      return ctx.hitsDealt >= condition.count;
    case 'opponent_charging':
      return target !== undefined && isPreparing(target) === condition.charging;
    case 'opponent_skill':
      return target !== undefined && target.skills.skill === condition.skill;
    case 'opponent_status':
      return target !== undefined && target.condition === condition.status;
    case 'opponent_within':
      return target !== undefined && distance(self.position, target.position) <= condition.distance;
    case 'opponent_beyond':
      return target !== undefined && distance(self.position, target.position) > condition.distance;
    case 'weapon_in_range':
      return target !== undefined && distance(self.position, target.position) <= weaponReach(self);
    case 'stamina_above':
      return self.stamina.current > condition.value;
    case 'stamina_below':
      return self.stamina.current < condition.value;
    case 'skill_ready':
      return (
        self.skills.state === 'uncharged' &&
        !self.fullyDisabled &&
        self.stamina.canAfford(SKILLS[condition.skill].staminaCost)
      );
    case 'time_in_node_at_least':
      return ctx.timeInNodeMs >= condition.ms;
    case 'cooldown_ready':
      return ctx.isCooldownReady(condition.id);
    case 'random_chance':
      return ctx.randomValue < condition.probability;
    case 'self_status':
      return self.condition === condition.status;
    case 'attack_permission':
      return ctx.hasAttackPermission() === condition.granted;
    default: {
      const unreachable: never = condition;
      return unreachable;
    }
  }
}

/** Short-circuits in declaration order, so an attack slot is only claimed once the earlier guards pass. */
export function allConditionsHold(conditions: readonly PatternCondition[], ctx: PatternContext): boolean {
  return conditions.every((condition) => evaluateCondition(condition, ctx));
}
