// server/event-feed.ts — WebSocket feed of tick events for presentation clients

import { WebSocketServer, type WebSocket } from 'ws';
import { createServer, type Server as HttpServer } from 'node:http';
import { z } from 'zod';
import type { FeedClientMessage, FeedMessage, TickResult } from '../types/index.js';
import type { Encounter } from './encounter.js';
import type { InputQueue } from '../pipeline/input-queue.js';
import { logger } from '../shared/logger.js';

const FeedClientMessageSchema: z.ZodType<FeedClientMessage> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({
    type: z.literal('input'),
    combatantId: z.string().min(1),
    action: z.string().min(1),
    skill: z.string().optional(),
    targetId: z.string().nullable().optional(),
  }),
]);

export class CombatEventFeed {
  private wss: WebSocketServer;
  private httpServer: HttpServer;
  private ownsHttpServer: boolean;
  private clients: Set<WebSocket> = new Set();
  private encounter: Encounter;
  private inputQueue: InputQueue | null;

  /** Without an input queue the feed is spectate-only and input messages are refused. */
  constructor(portOrServer: number | HttpServer, encounter: Encounter, inputQueue: InputQueue | null = null) {
    this.encounter = encounter;
    this.inputQueue = inputQueue;

    if (typeof portOrServer === 'number') {
      this.httpServer = createServer();
      this.ownsHttpServer = true;
      this.wss = new WebSocketServer({ server: this.httpServer });
      this.httpServer.listen(portOrServer);
    } else {
      this.httpServer = portOrServer;
      this.ownsHttpServer = false;
      this.wss = new WebSocketServer({ server: this.httpServer });
    }

    this.wss.on('connection', (ws: WebSocket) => this.handleConnection(ws));
    // The ws server re-emits errors from the http server it is bound to.
    this.wss.on('error', (err: Error) => {
      logger.error('feed: server error', { message: err.message });
    });
  }

  /** Rejects when the http server fails to listen, e.g. on a busy port. */
  ready(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.httpServer.listening) {
        resolve();
        return;
      }
      const onListening = (): void => {
        this.httpServer.off('error', onError);
        resolve();
      };
      const onError = (err: Error): void => {
        this.httpServer.off('listening', onListening);
        reject(err);
      };
      this.httpServer.once('listening', onListening);
      this.httpServer.once('error', onError);
    });
  }

  get clientCount(): number {
    return this.clients.size;
  }

  publish(result: TickResult): void {
    if (this.clients.size === 0) return;
    this.broadcast({
      type: 'tick',
      tick: result.tick,
      timeMs: result.timeMs,
      events: result.events,
      combatants: this.encounter.views(),
    });
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      for (const ws of this.clients) {
        ws.close();
      }
      this.clients.clear();
      this.wss.close(() => {
        if (this.ownsHttpServer) {
          this.httpServer.close(() => resolve());
        } else {
          resolve();
        }
      });
    });
  }

  private handleConnection(ws: WebSocket): void {
    this.clients.add(ws);

    ws.on('message', (data: Buffer | string) => {
      let raw: unknown;
      try {
        raw = JSON.parse(data.toString());
      } catch {
        logger.debug('feed: dropped malformed JSON from client');
        return;
      }
      const parsed = FeedClientMessageSchema.safeParse(raw);
      if (!parsed.success) {
        logger.debug('feed: dropped unknown client message');
        return;
      }
      this.handleMessage(ws, parsed.data);
    });

    ws.on('close', () => this.clients.delete(ws));
    ws.on('error', () => this.clients.delete(ws));

    this.send(ws, { type: 'welcome', tick: this.encounter.tick, combatants: this.encounter.views() });
  }

  private handleMessage(ws: WebSocket, msg: FeedClientMessage): void {
    switch (msg.type) {
      case 'ping':
        this.send(ws, { type: 'pong', tick: this.encounter.tick });
        break;
      case 'input': {
        const known = this.encounter.get(msg.combatantId) !== undefined;
        const accepted = known && this.inputQueue !== null && this.inputQueue.enqueue(
          msg.combatantId,
          { action: msg.action, skill: msg.skill, targetId: msg.targetId },
          this.encounter.tick,
        );
        this.send(ws, { type: 'input_ack', combatantId: msg.combatantId, accepted });
        break;
      }
    }
  }

  private broadcast(message: FeedMessage): void {
    const payload = JSON.stringify(message);
    for (const ws of this.clients) {
      if (ws.readyState === 1) ws.send(payload);
    }
  }

  private send(ws: WebSocket, message: FeedMessage): void {
    ws.send(JSON.stringify(message));
  }
}
