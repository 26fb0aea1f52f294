// combat/accuracy.ts — Aim accuracy buildup for ranged skills

import {
  ACCURACY_MAX,
  ACCURACY_PER_SECOND_MOVING,
  ACCURACY_PER_SECOND_STATIONARY,
  FOCUS_ACCURACY_DIVISOR,
} from '../shared/constants.js';

export class AccuracyTracker {
  private value = 0;

  get current(): number {
    return this.value;
  }

  reset(): void {
    this.value = 0;
  }

  update(dtMs: number, moving: boolean, focus: number): void {
    const base = moving ? ACCURACY_PER_SECOND_MOVING : ACCURACY_PER_SECOND_STATIONARY;
    const rate = base * (1 + focus / FOCUS_ACCURACY_DIVISOR);
    this.value = Math.min(ACCURACY_MAX, this.value + (rate * dtMs) / 1000);
  }
}
