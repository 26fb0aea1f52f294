// combat/status-effects.ts — Timed stun / knockback / knockdown

import type { StatusKind } from '../types/index.js';

const EXPIRY_ORDER: readonly StatusKind[] = ['stun', 'knockback', 'knockdown'];

export class StatusEffects {
  private remaining: Map<StatusKind, number> = new Map();

  /**
   * Applies or refreshes an effect. Knockdown supersedes the lighter effects:
   * it clears an active stun, and neither stun nor knockback lands on a
   * knocked-down combatant. Returns whether the effect was applied.
   */
  apply(kind: StatusKind, durationMs: number): boolean {
    if (durationMs <= 0) return false;

    if (kind !== 'knockdown' && this.remaining.has('knockdown')) return false;

    if (kind === 'knockdown') {
      this.remaining.delete('stun');
    }

    this.remaining.set(kind, durationMs);
    return true;
  }

  has(kind: StatusKind): boolean {
    return this.remaining.has(kind);
  }

  remainingMs(kind: StatusKind): number {
    return this.remaining.get(kind) ?? 0;
  }

  clear(kind: StatusKind): void {
    this.remaining.delete(kind);
  }

  clearAll(): void {
    this.remaining.clear();
  }

  /** Advances every timer and returns the effects that ran out, in a fixed order. */
  update(dtMs: number): StatusKind[] {
    const expired: StatusKind[] = [];
    for (const kind of EXPIRY_ORDER) {
      const left = this.remaining.get(kind);
      if (left === undefined) continue;
      const next = left - dtMs;
      if (next <= 0) {
        this.remaining.delete(kind);
        expired.push(kind);
      } else {
        this.remaining.set(kind, next);
      }
    }
    return expired;
  }
}
