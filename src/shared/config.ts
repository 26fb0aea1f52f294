// shared/config.ts — CombatConfig interface + defaults + env var loading

import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';
import {
  TICK_RATE_MS,
  DEFAULT_SEED,
  CHARGE_CANCEL_REFUNDS_STAMINA,
  TELEGRAPH_LEAD_MS,
  MAX_SIMULTANEOUS_ATTACKERS,
  MIN_TIME_BETWEEN_ATTACKS_MS,
  ATTACK_SLOT_DURATION_MS,
  FORMATION_REASSIGN_COOLDOWN_MS,
  DEFAULT_FEED_PORT,
} from './constants.js';

export interface CombatConfig {
  // Clock
  tickRateMs: number;
  seed: number;

  // Rules
  refundStaminaOnCancel: boolean;
  telegraphLeadMs: number;

  // Coordination
  maxSimultaneousAttackers: number;
  minTimeBetweenAttacksMs: number;
  attackSlotDurationMs: number;
  formationReassignCooldownMs: number;

  // Ambient
  logLevel: LogLevel;
  feedPort: number;
}

const DEFAULTS = {
  tickRateMs: TICK_RATE_MS,
  seed: DEFAULT_SEED,
  refundStaminaOnCancel: CHARGE_CANCEL_REFUNDS_STAMINA,
  telegraphLeadMs: TELEGRAPH_LEAD_MS,
  maxSimultaneousAttackers: MAX_SIMULTANEOUS_ATTACKERS,
  minTimeBetweenAttacksMs: MIN_TIME_BETWEEN_ATTACKS_MS,
  attackSlotDurationMs: ATTACK_SLOT_DURATION_MS,
  formationReassignCooldownMs: FORMATION_REASSIGN_COOLDOWN_MS,
  logLevel: 'info',
  feedPort: DEFAULT_FEED_PORT,
} as const satisfies CombatConfig;

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`, { name, raw });
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigError(`${name} must be a boolean (got "${raw}")`, { name, raw });
  }
}

function readLogLevel(env: Env, name: string, fallback: LogLevel): LogLevel {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const level = raw.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`${name} must be one of debug, info, warn, error (got "${raw}")`, { name, raw });
  }
  return level;
}

export function loadConfig(overrides: Partial<CombatConfig> = {}, env: Env = process.env): CombatConfig {
  const fromEnv: CombatConfig = {
    tickRateMs: readInt(env, 'SKIRMISH_TICK_MS', DEFAULTS.tickRateMs, 1),
    seed: readInt(env, 'SKIRMISH_SEED', DEFAULTS.seed, 0),
    refundStaminaOnCancel: readBool(env, 'SKIRMISH_REFUND_ON_CANCEL', DEFAULTS.refundStaminaOnCancel),
    telegraphLeadMs: readInt(env, 'SKIRMISH_TELEGRAPH_LEAD_MS', DEFAULTS.telegraphLeadMs, 1),
    maxSimultaneousAttackers: readInt(env, 'SKIRMISH_MAX_ATTACKERS', DEFAULTS.maxSimultaneousAttackers, 1),
    minTimeBetweenAttacksMs: DEFAULTS.minTimeBetweenAttacksMs,
    attackSlotDurationMs: DEFAULTS.attackSlotDurationMs,
    formationReassignCooldownMs: DEFAULTS.formationReassignCooldownMs,
    logLevel: readLogLevel(env, 'SKIRMISH_LOG_LEVEL', DEFAULTS.logLevel),
    feedPort: readInt(env, 'SKIRMISH_FEED_PORT', DEFAULTS.feedPort, 0),
  };

  const config: CombatConfig = { ...fromEnv, ...overrides };

  if (config.telegraphLeadMs <= 0) {
    throw new ConfigError('telegraphLeadMs must be positive', { telegraphLeadMs: config.telegraphLeadMs });
  }
  if (config.tickRateMs <= 0) {
    throw new ConfigError('tickRateMs must be positive', { tickRateMs: config.tickRateMs });
  }

  return config;
}
