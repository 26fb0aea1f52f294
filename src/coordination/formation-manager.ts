// coordination/formation-manager.ts — Ring slots around a target for agents waiting their turn

import type { EntityId, Millis, Position } from '../types/index.js';
import { distance } from '../types/index.js';
import {
  FORMATION_REASSIGN_COOLDOWN_MS,
  FORMATION_SLOT_COUNT,
  FORMATION_SLOT_OFFSET,
} from '../shared/constants.js';

interface Assignment {
  targetId: EntityId;
  slot: number;
}

interface FreedSlot {
  agentId: EntityId;
  at: Millis;
}

function slotKey(targetId: EntityId, slot: number): string {
  return `${targetId}#${slot}`;
}

export class FormationManager {
  private assignments: Map<EntityId, Assignment> = new Map();
  private freed: Map<string, FreedSlot> = new Map();

  constructor(private readonly reassignCooldownMs: number = FORMATION_REASSIGN_COOLDOWN_MS) {}

  /**
   * World position of slot `index` around `center`. Slots sit every 45°; the
   * small per-slot offset keeps neighbouring agents from lining up exactly.
   */
  static slotPosition(center: Position, index: number, distanceFromTarget: number): Position {
    const angle = (index * 2 * Math.PI) / FORMATION_SLOT_COUNT;
    return {
      x: center.x + Math.sin(angle) * distanceFromTarget + Math.sin(index * 1.23) * FORMATION_SLOT_OFFSET,
      y: center.y + Math.cos(angle) * distanceFromTarget + Math.cos(index * 2.34) * FORMATION_SLOT_OFFSET,
    };
  }

  requestSlot(
    agentId: EntityId,
    targetId: EntityId,
    agentPosition: Position,
    targetPosition: Position,
    distanceFromTarget: number,
    now: Millis,
  ): Position | null {
    const current = this.assignments.get(agentId);
    if (current && current.targetId === targetId) {
      return FormationManager.slotPosition(targetPosition, current.slot, distanceFromTarget);
    }
    if (current) this.release(agentId, now);

    const taken = new Set<number>();
    for (const [otherId, assignment] of this.assignments) {
      if (otherId !== agentId && assignment.targetId === targetId) taken.add(assignment.slot);
    }

    let best = -1;
    let bestDistance = Infinity;
    let bestPosition: Position | null = null;
    for (let slot = 0; slot < FORMATION_SLOT_COUNT; slot++) {
      if (taken.has(slot)) continue;
      const freed = this.freed.get(slotKey(targetId, slot));
      if (freed && freed.agentId !== agentId && now - freed.at < this.reassignCooldownMs) continue;

      const position = FormationManager.slotPosition(targetPosition, slot, distanceFromTarget);
      const d = distance(agentPosition, position);
      if (d < bestDistance) {
        best = slot;
        bestDistance = d;
        bestPosition = position;
      }
    }

    if (best < 0) return null;
    this.assignments.set(agentId, { targetId, slot: best });
    return bestPosition;
  }

  release(agentId: EntityId, now: Millis): void {
    const assignment = this.assignments.get(agentId);
    if (!assignment) return;
    this.assignments.delete(agentId);
    this.freed.set(slotKey(assignment.targetId, assignment.slot), { agentId, at: now });
  }

  slotOf(agentId: EntityId): number | null {
    return this.assignments.get(agentId)?.slot ?? null;
  }
}
