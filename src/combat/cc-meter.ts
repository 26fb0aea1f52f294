// combat/cc-meter.ts — Crowd-control buildup meter with edge-triggered thresholds

import {
  CC_METER_MAX,
  CC_KNOCKBACK_THRESHOLD,
  CC_KNOCKDOWN_THRESHOLD,
  CC_DECAY_PER_SECOND,
} from '../shared/constants.js';
import { clamp } from '../shared/utils.js';

export type CcThreshold = 'knockback' | 'knockdown';

export class CcMeter {
  private value = 0;
  private knockbackArmed = true;

  get current(): number {
    return this.value;
  }

  get isKnockbackArmed(): boolean {
    return this.knockbackArmed;
  }

  /**
   * Adds buildup and reports the thresholds crossed by this call. Knockdown
   * resets the meter to 0 and re-arms knockback; knockback fires once per
   * crossing and re-arms only after the meter falls back below it.
   */
  add(amount: number): CcThreshold[] {
    this.value = clamp(this.value + amount, 0, CC_METER_MAX);

    if (this.value >= CC_KNOCKDOWN_THRESHOLD) {
      this.reset();
      return ['knockdown'];
    }

    if (this.knockbackArmed && this.value >= CC_KNOCKBACK_THRESHOLD) {
      this.knockbackArmed = false;
      return ['knockback'];
    }

    return [];
  }

  decay(dtMs: number): void {
    if (this.value <= 0) return;
    this.value = Math.max(0, this.value - (CC_DECAY_PER_SECOND * dtMs) / 1000);
    if (this.value < CC_KNOCKBACK_THRESHOLD) {
      this.knockbackArmed = true;
    }
  }

  reset(): void {
    this.value = 0;
    this.knockbackArmed = true;
  }
}
