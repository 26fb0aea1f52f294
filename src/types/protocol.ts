// types/protocol.ts — Event feed wire messages

import type { EntityId, Millis, Tick } from './core.js';
import type { CombatEvent, CombatantView } from './events.js';

// --- Server → client ---

export type FeedMessage =
  | { type: 'welcome'; tick: Tick; combatants: CombatantView[] }
  | { type: 'tick'; tick: Tick; timeMs: Millis; events: CombatEvent[]; combatants: CombatantView[] }
  | { type: 'input_ack'; combatantId: EntityId; accepted: boolean }
  | { type: 'pong'; tick: Tick };

// --- Client → server ---

export type FeedClientMessage =
  | { type: 'ping' }
  | {
      type: 'input';
      combatantId: EntityId;
      action: string;
      skill?: string;
      targetId?: EntityId | null;
    };
