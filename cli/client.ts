// cli/client.ts — WebSocket client for the combat event feed

import WebSocket from 'ws';
import type { FeedClientMessage, FeedMessage } from '../src/types/index.js';
import { formatTickLine } from './format.js';

const MAX_RECONNECT_DELAY_MS = 30_000;
const INITIAL_RECONNECT_DELAY_MS = 1_000;

export type FeedOutput = 'pretty' | 'json';

function isFeedMessage(value: unknown): value is FeedMessage {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;
  return value.type === 'welcome' || value.type === 'tick' || value.type === 'input_ack' || value.type === 'pong';
}

export class FeedClient {
  private ws: WebSocket | null = null;
  private reconnectDelay = INITIAL_RECONNECT_DELAY_MS;
  private shouldReconnect = true;

  constructor(
    private readonly serverUrl: string,
    private readonly output: FeedOutput = 'pretty',
    private readonly write: (line: string) => void = (line) => process.stdout.write(`${line}\n`),
  ) {}

  /** Resolves on the first welcome, rejects if the first attempt fails. */
  async connect(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.connectInternal(resolve, reject);
    });
  }

  private connectInternal(
    onFirstConnect?: () => void,
    onFirstError?: (err: Error) => void,
  ): void {
    const ws = new WebSocket(this.serverUrl);
    this.ws = ws;
    let firstConnection = true;

    ws.on('open', () => {
      this.reconnectDelay = INITIAL_RECONNECT_DELAY_MS;
      process.stderr.write(`Connected to ${this.serverUrl}\n`);
    });

    ws.on('message', (data: Buffer | string) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(data.toString());
      } catch {
        process.stderr.write('Dropped malformed message from server\n');
        return;
      }
      if (!isFeedMessage(parsed)) return;

      this.render(parsed);

      if (firstConnection && parsed.type === 'welcome') {
        firstConnection = false;
        onFirstConnect?.();
      }
    });

    ws.on('close', () => {
      process.stderr.write('Disconnected from feed\n');

      if (this.shouldReconnect) {
        process.stderr.write(`Reconnecting in ${this.reconnectDelay}ms...\n`);
        setTimeout(() => {
          this.reconnectDelay = Math.min(this.reconnectDelay * 2, MAX_RECONNECT_DELAY_MS);
          this.connectInternal();
        }, this.reconnectDelay);
      }
    });

    ws.on('error', (err: Error) => {
      process.stderr.write(`WebSocket error: ${err.message}\n`);
      if (firstConnection) {
        firstConnection = false;
        this.shouldReconnect = false;
        onFirstError?.(err);
      }
    });
  }

  private render(msg: FeedMessage): void {
    if (this.output === 'json') {
      this.write(JSON.stringify(msg));
      return;
    }

    switch (msg.type) {
      case 'welcome':
        this.write(`[t${msg.tick}] watching ${msg.combatants.map((c) => c.id).join(', ')}`);
        break;
      case 'tick':
        if (msg.events.length > 0) {
          this.write(formatTickLine({
            tick: msg.tick,
            timeMs: msg.timeMs,
            inputs: [],
            decisions: [],
            outcomes: [],
            events: msg.events,
            violations: [],
          }));
        }
        break;
      case 'input_ack':
        this.write(`input for ${msg.combatantId} ${msg.accepted ? 'queued' : 'refused'}`);
        break;
      case 'pong':
        this.write(`pong (tick ${msg.tick})`);
        break;
    }
  }

  send(msg: FeedClientMessage): void {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(msg));
    }
  }

  close(): void {
    this.shouldReconnect = false;
    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
  }
}
