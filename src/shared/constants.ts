// shared/constants.ts — All combat constants

import type { Archetype } from '../types/index.js';

export const TICK_RATE_MS = 50;
export const SLOW_TICK_WARN_MS = 25;
export const DEFAULT_SEED = 42;

// --- Combatant pools ---

export const BASE_HEALTH = 100;
export const VITALITY_HEALTH_MULTIPLIER = 5;
export const BASE_STAMINA = 100;
export const FOCUS_STAMINA_MULTIPLIER = 3;

// --- Ranges & locomotion ---

export const STANDARD_MELEE_RANGE = 1.5;
export const SWEEP_RADIUS = 2.5;
export const LUNGE_MIN_RANGE = 2.0;
export const LUNGE_MAX_RANGE = 4.0;
export const LUNGE_DASH_DISTANCE = 2.0;
/** Walk speed at movement modifier 1. */
export const MOVE_SPEED_PER_SECOND = 4.0;
/** Approach stops this fraction inside the skill's reach. */
export const APPROACH_STOP_RATIO = 0.9;

// --- Crowd-control meter ---

export const CC_METER_MAX = 100;
export const CC_KNOCKBACK_THRESHOLD = 50;
export const CC_KNOCKDOWN_THRESHOLD = 100;
export const CC_HIT_BUILDUP = 25;
export const CC_DECAY_PER_SECOND = 5;
export const KNOCKBACK_DURATION_MS = 800;
export const KNOCKDOWN_DURATION_MS = 2000;

// --- Displacement ---

export const KNOCKBACK_DISPLACEMENT = 0.8;
export const CC_KNOCKDOWN_DISPLACEMENT = 1.2;
export const COUNTER_REFLECT_DISPLACEMENT = 1.5;
export const HEAVY_KNOCKDOWN_DISPLACEMENT = 2.0;
export const SWEEP_KNOCKDOWN_DISPLACEMENT = 1.8;

// --- Damage & status math ---

export const MINIMUM_DAMAGE = 1;
export const HEAVY_VS_BLOCK_REDUCTION = 0.75;
export const MAX_DAMAGE_REDUCTION = 0.9;
export const DEFENSE_REDUCTION_DIVISOR = 20;
export const FOCUS_STATUS_RESISTANCE_DIVISOR = 30;
export const BLOCKER_STUN_RATIO = 0.5;

// --- Speed ---

export const DEXTERITY_SPEED_DIVISOR = 5;
export const DEXTERITY_CHARGE_DIVISOR = 10;
export const SPEED_TIE_EPSILON = 1e-6;

// --- Stamina ---

export const REST_STAMINA_PER_SECOND = 25;
/** Stamina spent on a skill cancelled before it fires is kept spent unless configured otherwise. */
export const CHARGE_CANCEL_REFUNDS_STAMINA = false;
export const DEFENSIVE_WAIT_TIMEOUT_MS = 6000;

// --- Aiming ---

export const ACCURACY_MAX = 100;
export const ACCURACY_PER_SECOND_STATIONARY = 40;
export const ACCURACY_PER_SECOND_MOVING = 20;
export const FOCUS_ACCURACY_DIVISOR = 20;
export const DEFAULT_MIN_ACCURACY = 70;

// --- State machine ---

export const MAX_CHAINED_TRANSITIONS = 8;

export const MOVEMENT_MODIFIER = {
  idle: 1,
  offensiveCharge: 0.5,
  defensiveCharge: 0,
  committed: 0,
  recovery: 0.5,
} as const;

// --- Decision engine ---

export const TELEGRAPH_LEAD_MS = 300;
export const TELEGRAPH_DURATION_MS = 500;
export const DEFAULT_FORMATION_DISTANCE = 2.0;

// --- Coordination ---

export const MAX_SIMULTANEOUS_ATTACKERS = 1;
export const MIN_TIME_BETWEEN_ATTACKS_MS = 800;
export const ATTACK_SLOT_DURATION_MS = 3000;
export const FORMATION_SLOT_COUNT = 8;
export const FORMATION_SLOT_OFFSET = 0.3;
export const FORMATION_REASSIGN_COOLDOWN_MS = 2000;

export const ARCHETYPE_ATTACK_PRIORITY: Readonly<Record<Archetype, number>> = {
  berserker: 1.5,
  assassin: 1.2,
  soldier: 1.0,
  archer: 0.9,
  guardian: 0.7,
};

// --- Event feed ---

export const DEFAULT_FEED_PORT = 8090;
