// pipeline/input-queue.ts — Per-combatant player input buffering between ticks

import type {
  EntityId,
  InputType,
  PlayerInput,
  QueuedInput,
  RawInput,
  SkillKind,
  Tick,
} from '../types/index.js';
import { SKILL_KINDS } from '../data/skills.js';
import { compareIds } from '../shared/utils.js';

const VALID_INPUT_TYPES: ReadonlySet<string> = new Set<InputType>([
  'request_skill', 'activate', 'cancel', 'rest', 'stand', 'set_target',
]);

function isSkillKind(value: unknown): value is SkillKind {
  return typeof value === 'string' && SKILL_KINDS.some((kind) => kind === value);
}

export class InputQueue {
  private queues: Map<EntityId, QueuedInput> = new Map();

  /** Returns false when the input is malformed and was dropped. */
  enqueue(combatantId: EntityId, raw: RawInput, receivedTick: Tick): boolean {
    const input = this.parseInput(raw);
    if (!input) return false;

    // 1 input per combatant per tick, last-write-wins
    this.queues.set(combatantId, { combatantId, input, receivedTick });
    return true;
  }

  get size(): number {
    return this.queues.size;
  }

  /** Drained in combatant id order so application never depends on arrival order. */
  drainAll(): QueuedInput[] {
    const all = Array.from(this.queues.values()).sort((a, b) => compareIds(a.combatantId, b.combatantId));
    this.queues.clear();
    return all;
  }

  private parseInput(raw: RawInput): PlayerInput | null {
    if (!raw || typeof raw.action !== 'string') return null;
    if (!VALID_INPUT_TYPES.has(raw.action)) return null;

    switch (raw.action) {
      case 'request_skill':
        return isSkillKind(raw.skill) ? { type: 'request_skill', skill: raw.skill } : null;
      case 'activate':
        return { type: 'activate' };
      case 'cancel':
        return { type: 'cancel' };
      case 'rest':
        return { type: 'rest' };
      case 'stand':
        return { type: 'stand' };
      case 'set_target':
        if (raw.targetId === null) return { type: 'set_target', targetId: null };
        if (typeof raw.targetId !== 'string' || raw.targetId === '') return null;
        return { type: 'set_target', targetId: raw.targetId };
      default:
        return null;
    }
  }
}
