// cli/input-reader.ts — stdin → feed input messages
//
// stdin format: one JSON object per line, either an input
//   { "combatantId": "p1", "action": "request_skill", "skill": "block" }
// or a raw client message such as { "type": "ping" }.

import { createInterface, type Interface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { FeedClientMessage } from '../src/types/index.js';

/** Turns one stdin line into a client message, or null when it is not one. */
export function parseInputLine(line: string): FeedClientMessage | null {
  const trimmed = line.trim();
  if (trimmed === '') return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;

  if ('type' in parsed && parsed.type === 'ping') {
    return { type: 'ping' };
  }

  if (
    'combatantId' in parsed && typeof parsed.combatantId === 'string' &&
    'action' in parsed && typeof parsed.action === 'string'
  ) {
    const msg: Extract<FeedClientMessage, { type: 'input' }> = { type: 'input', combatantId: parsed.combatantId, action: parsed.action };
    if ('skill' in parsed && typeof parsed.skill === 'string') msg.skill = parsed.skill;
    if ('targetId' in parsed && (typeof parsed.targetId === 'string' || parsed.targetId === null)) {
      msg.targetId = parsed.targetId;
    }
    return msg;
  }

  return null;
}

export function startInputReader(
  onMessage: (msg: FeedClientMessage) => void,
  input: Readable = process.stdin,
): Interface {
  const rl = createInterface({ input, terminal: false });

  rl.on('line', (line: string) => {
    const msg = parseInputLine(line);
    if (msg) {
      onMessage(msg);
    } else if (line.trim() !== '') {
      process.stderr.write(`Ignored input line: ${line.trim()}\n`);
    }
  });

  return rl;
}
