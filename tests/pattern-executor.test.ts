// tests/pattern-executor.test.ts — Node transitions, telegraphs, targeting and slot coordination

import { describe, it, expect } from 'vitest';
import type { InteractionOutcome, TickResult } from '../src/types/index.js';
import type { Encounter } from '../src/server/encounter.js';
import type { Combatant } from '../src/combat/combatant.js';
import type { PatternExecutor } from '../src/patterns/pattern-executor.js';
import { InputQueue } from '../src/pipeline/input-queue.js';
import { DecisionProcessor } from '../src/pipeline/decision-processor.js';
import { TickLoop } from '../src/server/tick-loop.js';
import { loadPattern } from '../src/patterns/pattern-loader.js';
import { addFighter, createEncounter, eventsOfType } from './fixtures.js';

const NEVER = [{ type: 'stamina_above', value: 1000 }];

function node(name: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { name, skill: 'block', conditions: NEVER, ...extra };
}

interface Harness {
  encounter: Encounter;
  enemy: Combatant;
  executor: PatternExecutor;
  decisions: DecisionProcessor;
  run(ticks: number): TickResult[];
}

function harness(nodes: unknown[], extra: Record<string, unknown> = {}, dummyX = 1): Harness {
  const encounter = createEncounter();
  const enemy = addFighter(encounter, { id: 'enemy', controller: 'pattern', targetId: 'dummy' });
  addFighter(encounter, { id: 'dummy', x: dummyX });

  const loop = new TickLoop(encounter, new InputQueue());
  const decisions = new DecisionProcessor(encounter);
  loop.setDecisionProcessor(decisions);
  const pattern = loadPattern({ name: 'drill', archetype: 'soldier', startNode: 'start', nodes, ...extra });
  const executor = decisions.attach('enemy', pattern);

  return {
    encounter,
    enemy,
    executor,
    decisions,
    run: (ticks) => Array.from({ length: ticks }, () => loop.processTick()),
  };
}

function nodeAfter(results: TickResult[], index: number): string | undefined {
  return results[index]?.decisions[0]?.node;
}

describe('PatternExecutor', () => {
  it('enters the start node on attach', () => {
    const { encounter, executor } = harness([node('start')]);
    expect(executor.node.name).toBe('start');
    expect(eventsOfType(encounter.tickEvents, 'pattern_node_entered')).toEqual([
      { type: 'pattern_node_entered', combatantId: 'enemy', pattern: 'drill', node: 'start', from: null, reason: 'start' },
    ]);
  });

  it('takes the highest-priority transition whose guards hold', () => {
    const always = [{ type: 'time_in_node_at_least', ms: 0 }];
    const { run } = harness([
      node('start', {
        transitions: [
          { target: 'low', priority: 1, conditions: always },
          { target: 'high', priority: 5, conditions: always },
        ],
      }),
      node('low'),
      node('high'),
    ]);

    const [first] = run(1);
    expect(first?.decisions[0]?.node).toBe('high');
    const entered = eventsOfType(first?.events ?? [], 'pattern_node_entered').at(-1);
    expect(entered).toMatchObject({ node: 'high', from: 'start', reason: 'transition' });
  });

  it('falls back once the node has waited long enough', () => {
    const { run } = harness([
      node('start', {
        transitions: [{ target: 'other', conditions: [{ type: 'hits_taken_at_least', count: 99 }] }],
        fallback: { target: 'other', afterMs: 200 },
      }),
      node('other'),
    ]);

    const results = run(4);
    expect(nodeAfter(results, 2)).toBe('start');
    expect(nodeAfter(results, 3)).toBe('other');
    expect(eventsOfType(results[3]?.events ?? [], 'pattern_node_entered')[0]?.reason).toBe('fallback');
  });

  it('a transition cooldown keeps it from firing again too soon', () => {
    const { run } = harness([
      node('start', {
        transitions: [{
          target: 'away',
          conditions: [{ type: 'time_in_node_at_least', ms: 0 }],
          cooldown: { id: 'leave', durationMs: 1000 },
        }],
      }),
      node('away', { fallback: { target: 'start', afterMs: 0 } }),
    ]);

    const results = run(21);
    expect(nodeAfter(results, 0)).toBe('away');
    expect(nodeAfter(results, 1)).toBe('start');
    expect(nodeAfter(results, 19)).toBe('start');
    expect(nodeAfter(results, 20)).toBe('away');
  });

  it('resets hit counters on a transition that asks for it', () => {
    const { executor, run } = harness([
      node('start', {
        transitions: [{
          target: 'hurt',
          conditions: [{ type: 'hits_taken_at_least', count: 1 }],
          resetHitCounters: true,
        }],
      }),
      node('hurt'),
    ]);

    run(1);
    const hit: InteractionOutcome = {
      seq: 1,
      tick: 1,
      kind: 'unguarded_hit',
      attackerId: 'dummy',
      defenderId: 'enemy',
      offense: 'light_attack',
      defense: null,
      attacker: { damage: 0, status: null, ccBuildup: 0, forced: null, displacement: null },
      defender: { damage: 5, status: null, ccBuildup: 25, forced: null, displacement: null },
    };
    executor.observe([hit]);
    expect(executor.hitCounters).toEqual({ taken: 1, dealt: 0 });

    const [next] = run(1);
    expect(next?.decisions[0]?.node).toBe('hurt');
    expect(executor.hitCounters).toEqual({ taken: 0, dealt: 0 });
  });

  it('shows the telegraph before the skill is requested', () => {
    const { run } = harness([
      { name: 'start', skill: 'light_attack', telegraph: { cue: 'wind_up', leadMs: 100 } },
    ]);

    const results = run(3);
    expect(eventsOfType(results[0]?.events ?? [], 'telegraph_started')).toEqual([
      { type: 'telegraph_started', combatantId: 'enemy', cue: 'wind_up', skill: 'light_attack', leadMs: 100, durationMs: 500 },
    ]);
    expect(results[0]?.decisions[0]?.requested).toBeNull();
    expect(results[1]?.decisions[0]?.requested).toBeNull();
    expect(results[2]?.decisions[0]?.requested).toBe('light_attack');
    expect(eventsOfType(results[1]?.events ?? [], 'skill_state_changed')).toEqual([]);
    expect(eventsOfType(results[2]?.events ?? [], 'skill_state_changed')[0]).toMatchObject({
      combatantId: 'enemy',
      from: 'uncharged',
      to: 'startup',
    });
  });

  it('auto-activates a charged attack once the target is in reach', () => {
    const { enemy, run } = harness([{ name: 'start', skill: 'heavy_attack' }]);

    run(40);
    expect(enemy.skills.state).toBe('charged');
    run(1);
    expect(enemy.skills.state).toBe('startup');
  });

  it('drops to the idle node when a skill cannot be paid for', () => {
    const { enemy, run } = harness(
      [{ name: 'start', skill: 'heavy_attack' }, node('rest')],
      { idleNode: 'rest' },
    );
    enemy.stamina.set(1);

    const [first] = run(1);
    expect(first?.decisions[0]).toMatchObject({ node: 'rest', requested: null });
  });

  it('reports a lost target, goes idle and picks the nearest hostile', () => {
    const { encounter, enemy, run } = harness(
      [{ name: 'start', skill: 'light_attack', conditions: NEVER }, node('calm')],
      { idleNode: 'calm' },
    );
    encounter.removeCombatant('dummy');
    addFighter(encounter, { id: 'other', x: 3 });

    const [first] = run(1);
    expect(eventsOfType(first?.events ?? [], 'target_lost')).toEqual([
      { type: 'target_lost', combatantId: 'enemy', targetId: 'dummy' },
    ]);
    expect(eventsOfType(first?.events ?? [], 'pattern_node_entered').at(-1)).toMatchObject({
      node: 'calm',
      from: 'start',
      reason: 'idle',
    });
    expect(enemy.targetId).toBe('other');
  });

  it('approaches until the skill can reach', () => {
    const { enemy, run } = harness(
      [{ name: 'start', skill: 'light_attack', conditions: [{ type: 'weapon_in_range' }], movement: 'approach' }],
      {},
      5,
    );

    const [first] = run(1);
    expect(first?.decisions[0]?.desiredPosition?.x).toBeCloseTo(3.65);
    expect(enemy.position.x).toBeCloseTo(0.2);
    expect(enemy.moving).toBe(true);
  });

  it('lets only one agent at a time attack a shared target', () => {
    const encounter = createEncounter();
    addFighter(encounter, { id: 'g1', team: 'guards', controller: 'pattern', targetId: 'dummy' });
    addFighter(encounter, { id: 'g2', team: 'guards', controller: 'pattern', x: 2, targetId: 'dummy' });
    addFighter(encounter, { id: 'dummy', x: 1 });

    const loop = new TickLoop(encounter, new InputQueue());
    const decisions = new DecisionProcessor(encounter);
    loop.setDecisionProcessor(decisions);
    const pattern = loadPattern({
      name: 'pack',
      archetype: 'soldier',
      startNode: 'strike',
      nodes: [{
        name: 'strike',
        skill: 'light_attack',
        conditions: [{ type: 'weapon_in_range' }, { type: 'attack_permission', granted: true }],
      }],
    });
    decisions.attach('g1', pattern);
    decisions.attach('g2', pattern);

    const result = loop.processTick();
    expect(result.decisions.map((d) => [d.combatantId, d.requested])).toEqual([
      ['g1', 'light_attack'],
      ['g2', null],
    ]);
    expect(decisions.coordinator.activeAttackers('dummy')).toEqual(['g1']);
  });

  it('stops deciding for a defeated combatant', () => {
    const { encounter, enemy, decisions, run } = harness([node('start')]);
    enemy.takeDamage(1000);
    run(1);
    expect(decisions.combatantIds()).toEqual([]);
    expect(encounter.get('enemy')?.defeated).toBe(true);
  });
});
