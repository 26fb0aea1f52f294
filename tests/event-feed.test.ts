// tests/event-feed.test.ts — WebSocket event feed and the CLI feed client

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import WebSocket from 'ws';
import type { FeedClientMessage, FeedMessage } from '../src/types/index.js';
import type { Encounter } from '../src/server/encounter.js';
import { CombatEventFeed } from '../src/server/event-feed.js';
import { InputQueue } from '../src/pipeline/input-queue.js';
import { TickLoop } from '../src/server/tick-loop.js';
import { FeedClient } from '../cli/client.js';
import { addFighter, createEncounter } from './fixtures.js';

let portCounter = 19200;
function nextPort(): number {
  return portCounter++;
}

/**
 * Buffers every message from the moment the socket is created, so nothing
 * sent before a listener is registered gets lost.
 */
class TestClient {
  readonly ws: WebSocket;
  private buffer: FeedMessage[] = [];
  private waiters: Array<(msg: FeedMessage) => void> = [];

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on('message', (data: Buffer | string) => {
      const msg: FeedMessage = JSON.parse(data.toString());
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(msg);
      } else {
        this.buffer.push(msg);
      }
    });
  }

  async open(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return;
    return new Promise((resolve, reject) => {
      this.ws.on('open', () => resolve());
      this.ws.on('error', reject);
    });
  }

  nextMessage(): Promise<FeedMessage> {
    const buffered = this.buffer.shift();
    if (buffered) return Promise.resolve(buffered);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  send(msg: FeedClientMessage): void {
    this.ws.send(JSON.stringify(msg));
  }

  sendRaw(text: string): void {
    this.ws.send(text);
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    return new Promise((resolve) => {
      this.ws.on('close', () => resolve());
      this.ws.close();
    });
  }
}

describe('CombatEventFeed', () => {
  let encounter: Encounter;
  let inputs: InputQueue;
  let feed: CombatEventFeed;
  let port: number;
  const clients: TestClient[] = [];

  async function connect(): Promise<TestClient> {
    const client = new TestClient(`ws://localhost:${port}`);
    clients.push(client);
    await client.open();
    return client;
  }

  beforeEach(async () => {
    encounter = createEncounter();
    addFighter(encounter, { id: 'a', targetId: 'b' });
    addFighter(encounter, { id: 'b', x: 1 });
    inputs = new InputQueue();
    port = nextPort();
    feed = new CombatEventFeed(port, encounter, inputs);
    await feed.ready();
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      await client.close();
    }
    await feed.close();
  });

  it('greets a new client with the roster', async () => {
    const client = await connect();
    const welcome = await client.nextMessage();

    expect(welcome.type).toBe('welcome');
    if (welcome.type !== 'welcome') return;
    expect(welcome.tick).toBe(0);
    expect(welcome.combatants.map((c) => c.id)).toEqual(['a', 'b']);
    expect(feed.clientCount).toBe(1);
  });

  it('rejects ready() when the port is already taken', async () => {
    const second = new CombatEventFeed(port, encounter, inputs);
    await expect(second.ready()).rejects.toMatchObject({ code: 'EADDRINUSE' });
    await second.close();

    const client = await connect();
    expect((await client.nextMessage()).type).toBe('welcome');
  });

  it('answers pings', async () => {
    const client = await connect();
    await client.nextMessage();

    client.send({ type: 'ping' });
    expect(await client.nextMessage()).toEqual({ type: 'pong', tick: 0 });
  });

  it('queues inputs for known combatants', async () => {
    const client = await connect();
    await client.nextMessage();

    client.send({ type: 'input', combatantId: 'a', action: 'request_skill', skill: 'block' });
    expect(await client.nextMessage()).toEqual({ type: 'input_ack', combatantId: 'a', accepted: true });
    expect(inputs.size).toBe(1);
  });

  it('refuses inputs for unknown combatants and malformed actions', async () => {
    const client = await connect();
    await client.nextMessage();

    client.send({ type: 'input', combatantId: 'nobody', action: 'activate' });
    expect(await client.nextMessage()).toEqual({ type: 'input_ack', combatantId: 'nobody', accepted: false });

    client.send({ type: 'input', combatantId: 'a', action: 'request_skill', skill: 'fireball' });
    expect(await client.nextMessage()).toEqual({ type: 'input_ack', combatantId: 'a', accepted: false });
    expect(inputs.size).toBe(0);
  });

  it('ignores malformed messages', async () => {
    const client = await connect();
    await client.nextMessage();

    client.sendRaw('not json');
    client.sendRaw(JSON.stringify({ type: 'teleport' }));
    client.send({ type: 'ping' });
    expect(await client.nextMessage()).toEqual({ type: 'pong', tick: 0 });
  });

  it('broadcasts each tick with its events and the roster', async () => {
    const client = await connect();
    await client.nextMessage();

    const loop = new TickLoop(encounter, inputs);
    loop.setEventFeed(feed);
    inputs.enqueue('a', { action: 'request_skill', skill: 'light_attack' }, 0);
    loop.processTick();

    const msg = await client.nextMessage();
    expect(msg.type).toBe('tick');
    if (msg.type !== 'tick') return;
    expect(msg.tick).toBe(1);
    expect(msg.timeMs).toBe(50);
    expect(msg.events[0]).toEqual({
      type: 'skill_state_changed',
      combatantId: 'a',
      skill: 'light_attack',
      from: 'uncharged',
      to: 'startup',
    });
    expect(msg.combatants.find((c) => c.id === 'a')?.state).toBe('startup');
  });
});

describe('FeedClient', () => {
  it('connects, prints the roster and answers in JSON mode', async () => {
    const encounter = createEncounter();
    addFighter(encounter, { id: 'hero' });
    const port = nextPort();
    const feed = new CombatEventFeed(port, encounter);
    await feed.ready();

    const pretty: string[] = [];
    const client = new FeedClient(`ws://localhost:${port}`, 'pretty', (line) => pretty.push(line));
    await client.connect();
    expect(pretty).toEqual(['[t0] watching hero']);
    client.close();

    const json: string[] = [];
    const jsonClient = new FeedClient(`ws://localhost:${port}`, 'json', (line) => json.push(line));
    await jsonClient.connect();
    expect(JSON.parse(json[0] ?? '{}')).toMatchObject({ type: 'welcome', tick: 0 });
    jsonClient.close();

    await feed.close();
  });
});
