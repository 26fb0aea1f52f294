// shared/errors.ts — Thrown error hierarchy
//
// Expected gameplay failures (a skill request that is not allowed right now)
// are returned as SkillRequestResult values instead. Only broken assets,
// broken configuration and broken state-machine invariants throw.

export class CombatError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CombatError';
  }
}

export class InvalidPatternDefinitionError extends CombatError {
  constructor(
    public readonly patternName: string,
    public readonly problems: string[],
  ) {
    super(
      'INVALID_PATTERN_DEFINITION',
      `Pattern "${patternName}" is invalid: ${problems.join('; ')}`,
      { problems },
    );
    this.name = 'InvalidPatternDefinitionError';
  }
}

export class StateInvariantViolationError extends CombatError {
  constructor(
    public readonly combatantId: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super('STATE_INVARIANT_VIOLATION', message, { combatantId, ...details });
    this.name = 'StateInvariantViolationError';
  }
}

export class ConfigError extends CombatError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, details);
    this.name = 'ConfigError';
  }
}

export class ScenarioError extends CombatError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SCENARIO_ERROR', message, details);
    this.name = 'ScenarioError';
  }
}
