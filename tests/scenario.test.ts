// tests/scenario.test.ts — Scenario parsing, building and deterministic runs

import { describe, it, expect, beforeAll } from 'vitest';
import { fileURLToPath } from 'node:url';
import type { CompiledPattern, TickResult } from '../src/types/index.js';
import { loadPatternDirectory } from '../src/patterns/pattern-loader.js';
import {
  buildEncounter,
  loadScenarioFile,
  parseScenario,
  runScenario,
  type Scenario,
} from '../src/server/scenario.js';
import { ScenarioError } from '../src/shared/errors.js';
import { testConfig } from './fixtures.js';

const PATTERN_DIR = fileURLToPath(new URL('../content/patterns', import.meta.url));
const DUEL = fileURLToPath(new URL('../content/scenarios/duel.json', import.meta.url));
const SKIRMISH = fileURLToPath(new URL('../content/scenarios/skirmish.json', import.meta.url));

const NO_PATTERNS: ReadonlyMap<string, CompiledPattern> = new Map();

function solo(overrides: Record<string, unknown> = {}): Scenario {
  return parseScenario({
    name: 'solo',
    combatants: [
      { id: 'p1', team: 'red', archetype: 'soldier', controller: 'player', position: { x: 0, y: 0 }, ...overrides },
      { id: 'p2', team: 'blue', archetype: 'guardian', controller: 'player', position: { x: 3, y: 0 } },
    ],
  });
}

describe('parseScenario', () => {
  it('fills in defaults', () => {
    const scenario = solo();
    expect(scenario.maxTicks).toBe(600);
    expect(scenario.stopWhenDecided).toBe(true);
    expect(scenario.inputs).toEqual([]);
    expect(scenario.seed).toBeUndefined();
  });

  it('reports every problem with its path', () => {
    expect(() => parseScenario({ name: 'empty', combatants: [] }, 'empty.json')).toThrow(
      'empty.json is invalid: combatants: Array must contain at least 1 element(s)',
    );
  });

  it('rejects unknown archetypes', () => {
    expect(() => solo({ archetype: 'wizard' })).toThrow(ScenarioError);
  });
});

describe('buildEncounter', () => {
  it('builds player-controlled combatants with preset stats', () => {
    const built = buildEncounter(solo(), NO_PATTERNS, testConfig());
    expect(built.encounter.all().map((c) => c.id)).toEqual(['p1', 'p2']);
    expect(built.decisions.combatantIds()).toEqual([]);
  });

  it('uses the scenario seed over the configured one', () => {
    const scenario = parseScenario({ ...solo(), seed: 99 });
    expect(buildEncounter(scenario, NO_PATTERNS, testConfig({ seed: 1 })).encounter.seed).toBe(99);
  });

  it('rejects dangling references', () => {
    expect(() => buildEncounter(solo({ targetId: 'nobody' }), NO_PATTERNS, testConfig())).toThrow(
      'combatant "p1" targets unknown combatant "nobody"',
    );
    expect(() => buildEncounter(solo({ controller: 'pattern' }), NO_PATTERNS, testConfig())).toThrow(
      'pattern-controlled combatant "p1" names no pattern',
    );
    expect(() =>
      buildEncounter(solo({ controller: 'pattern', pattern: 'nope' }), NO_PATTERNS, testConfig()),
    ).toThrow('combatant "p1" uses unknown pattern "nope"');
    expect(() => buildEncounter(solo({ weaponId: 'trebuchet' }), NO_PATTERNS, testConfig())).toThrow(
      'combatant "p1" uses unknown weapon "trebuchet"',
    );
  });

  it('rejects scripted inputs for combatants that do not exist', () => {
    const scenario = parseScenario({
      ...solo(),
      inputs: [{ tick: 3, combatantId: 'ghost', action: 'rest' }],
    });
    expect(() => buildEncounter(scenario, NO_PATTERNS, testConfig())).toThrow(
      'scripted input at tick 3 names unknown combatant "ghost"',
    );
  });
});

describe('runScenario', () => {
  let patterns: Map<string, CompiledPattern>;

  beforeAll(async () => {
    patterns = await loadPatternDirectory(PATTERN_DIR);
  });

  it('stops at maxTicks when nobody fights', () => {
    const scenario = parseScenario({ ...solo(), maxTicks: 10 });
    const summary = runScenario(scenario, buildEncounter(scenario, NO_PATTERNS, testConfig()));

    expect(summary).toMatchObject({ name: 'solo', ticks: 10, timeMs: 500, winner: null, interactions: 0 });
    expect(summary.combatants.map((c) => c.state)).toEqual(['uncharged', 'uncharged']);
  });

  it('replays a scenario identically', async () => {
    const scenario = await loadScenarioFile(DUEL);
    const run = () => {
      const ticks: TickResult[] = [];
      const summary = runScenario(scenario, buildEncounter(scenario, patterns, testConfig()), (r) => ticks.push(r));
      return { summary, ticks };
    };

    const first = run();
    const second = run();

    expect(second.summary).toEqual(first.summary);
    expect(second.ticks).toEqual(first.ticks);
    expect(first.summary.ticks).toBeLessThanOrEqual(1200);
    expect(first.summary.interactions).toBe(first.ticks.reduce((n, t) => n + t.outcomes.length, 0));
  });

  it('feeds scripted inputs on their tick', async () => {
    const scenario = await loadScenarioFile(SKIRMISH);
    const ticks: TickResult[] = [];
    runScenario(scenario, buildEncounter(scenario, patterns, testConfig()), (r) => ticks.push(r));

    expect(ticks[0]?.inputs).toEqual([
      { combatantId: 'hero', input: { type: 'set_target', targetId: 'guard-a' }, result: { ok: true, state: 'uncharged' } },
    ]);
    expect(ticks[1]?.inputs).toEqual([
      { combatantId: 'hero', input: { type: 'request_skill', skill: 'block' }, result: { ok: true, state: 'charging' } },
    ]);
    expect(ticks[2]?.inputs).toEqual([]);
  });
});
