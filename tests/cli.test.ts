// tests/cli.test.ts — CLI formatting and stdin parsing

import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import type { FeedClientMessage, InteractionOutcome, TickResult } from '../src/types/index.js';
import type { ScenarioSummary } from '../src/server/scenario.js';
import { formatEvent, formatSummary, formatTickLine } from '../cli/format.js';
import { parseInputLine, startInputReader } from '../cli/input-reader.js';

const NO_EFFECT = { damage: 0, status: null, ccBuildup: 0, forced: null, displacement: null };

function outcome(overrides: Partial<InteractionOutcome> = {}): InteractionOutcome {
  return {
    seq: 4,
    tick: 12,
    kind: 'block_broken',
    attackerId: 'orc',
    defenderId: 'hero',
    offense: 'heavy_attack',
    defense: 'block',
    attacker: NO_EFFECT,
    defender: { ...NO_EFFECT, damage: 3 },
    ...overrides,
  };
}

describe('formatEvent', () => {
  it('formats state changes', () => {
    expect(
      formatEvent({ type: 'skill_state_changed', combatantId: 'hero', skill: 'block', from: 'charging', to: 'charged' }),
    ).toBe('hero charging → charged');
  });

  it('formats interactions with the damage dealt', () => {
    expect(formatEvent({ type: 'interaction_resolved', outcome: outcome() })).toBe(
      '#4 orc heavy_attack vs hero block: block_broken (hero -3)',
    );
    expect(
      formatEvent({
        type: 'interaction_resolved',
        outcome: outcome({ kind: 'unguarded_hit', defense: null, defender: { ...NO_EFFECT, damage: 10 }, attacker: { ...NO_EFFECT, damage: 2 } }),
      }),
    ).toBe('#4 orc heavy_attack vs hero: unguarded_hit (hero -10, orc -2)');
    expect(
      formatEvent({ type: 'interaction_resolved', outcome: outcome({ kind: 'clean_block', defender: NO_EFFECT }) }),
    ).toBe('#4 orc heavy_attack vs hero block: clean_block');
  });

  it('formats cancellations with refunds', () => {
    expect(
      formatEvent({ type: 'skill_cancelled', combatantId: 'hero', skill: 'heavy_attack', reason: 'manual', refunded: 5 }),
    ).toBe('hero heavy_attack cancelled (manual, refunded 5)');
    expect(
      formatEvent({ type: 'skill_cancelled', combatantId: 'hero', skill: 'block', reason: 'knocked_down', refunded: 0 }),
    ).toBe('hero block cancelled (knocked_down)');
  });

  it('formats defeats and lost targets', () => {
    expect(formatEvent({ type: 'combatant_defeated', combatantId: 'orc', defeatedBy: 'hero' })).toBe('orc defeated by hero');
    expect(formatEvent({ type: 'combatant_defeated', combatantId: 'orc', defeatedBy: null })).toBe('orc defeated');
    expect(formatEvent({ type: 'target_lost', combatantId: 'orc', targetId: null })).toBe('orc lost target (none)');
  });

  it('formats pattern activity', () => {
    expect(
      formatEvent({ type: 'telegraph_started', combatantId: 'orc', cue: 'roar', skill: 'heavy_attack', leadMs: 300, durationMs: 500 }),
    ).toBe('orc telegraphs "roar" (heavy_attack in 300ms)');
    expect(
      formatEvent({ type: 'pattern_node_entered', combatantId: 'orc', pattern: 'brute', node: 'swing', from: null, reason: 'start' }),
    ).toBe('orc [brute] ∅ → swing (start)');
  });
});

describe('formatTickLine', () => {
  it('prefixes every event with the tick and time', () => {
    const result: TickResult = {
      tick: 3,
      timeMs: 150,
      inputs: [],
      decisions: [],
      outcomes: [],
      events: [
        { type: 'resting_changed', combatantId: 'hero', resting: true },
        { type: 'status_expired', combatantId: 'orc', status: 'stun' },
      ],
      violations: [],
    };
    expect(formatTickLine(result)).toBe('[t3 150ms] hero rests\n[t3 150ms] orc stun wore off');
  });

  it('is empty for a quiet tick', () => {
    expect(formatTickLine({ tick: 1, timeMs: 50, inputs: [], decisions: [], outcomes: [], events: [], violations: [] })).toBe('');
  });
});

describe('formatSummary', () => {
  const summary: ScenarioSummary = {
    name: 'duel',
    ticks: 240,
    timeMs: 12000,
    winner: 'red',
    interactions: 6,
    combatants: [
      {
        id: 'red-soldier',
        team: 'red',
        health: 80,
        maxHealth: 150,
        stamina: 90,
        maxStamina: 130,
        ccMeter: 12.4,
        state: 'charging',
        skill: 'block',
        condition: 'none',
        position: { x: 0, y: 0 },
        targetId: null,
      },
    ],
  };

  it('leads with the outcome', () => {
    const lines = formatSummary(summary).split('\n');
    expect(lines[0]).toBe('duel: winner: red after 240 ticks (12000ms), 6 interactions');
    expect(lines[1]).toBe('  red-soldier  red      hp 80/150  st 90/130  cc 12  charging:block  none');
  });

  it('says when nobody won', () => {
    expect(formatSummary({ ...summary, winner: null, combatants: [] })).toBe(
      'duel: undecided after 240 ticks (12000ms), 6 interactions',
    );
  });
});

describe('parseInputLine', () => {
  it('parses combatant inputs', () => {
    expect(parseInputLine('{"combatantId":"p1","action":"request_skill","skill":"block"}')).toEqual({
      type: 'input',
      combatantId: 'p1',
      action: 'request_skill',
      skill: 'block',
    });
    expect(parseInputLine(' {"combatantId":"p1","action":"set_target","targetId":null} ')).toEqual({
      type: 'input',
      combatantId: 'p1',
      action: 'set_target',
      targetId: null,
    });
  });

  it('parses pings', () => {
    expect(parseInputLine('{"type":"ping"}')).toEqual({ type: 'ping' });
  });

  it('returns null for anything else', () => {
    expect(parseInputLine('')).toBeNull();
    expect(parseInputLine('not json')).toBeNull();
    expect(parseInputLine('42')).toBeNull();
    expect(parseInputLine('{"combatantId":"p1"}')).toBeNull();
  });
});

describe('startInputReader', () => {
  it('forwards parsed lines', async () => {
    const input = new PassThrough();
    const received: FeedClientMessage[] = [];
    const rl = startInputReader((msg) => received.push(msg), input);

    const closed = new Promise<void>((resolve) => rl.once('close', () => resolve()));
    input.end('{"type":"ping"}\n{"combatantId":"p1","action":"cancel"}\n');
    await closed;

    expect(received).toEqual([
      { type: 'ping' },
      { type: 'input', combatantId: 'p1', action: 'cancel' },
    ]);
  });
});
