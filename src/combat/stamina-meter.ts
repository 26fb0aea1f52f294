// combat/stamina-meter.ts — Stamina pool in fixed-point milli-units

const MILLI = 1000;

/**
 * Stamina is tracked in thousandths so per-tick drain and regeneration stay
 * exact integers. `current` is the whole-point value patterns and
 * presentation see.
 */
export class StaminaMeter {
  readonly max: number;
  private milli: number;

  constructor(max: number, initial: number = max) {
    this.max = max;
    this.milli = Math.round(Math.max(0, Math.min(max, initial)) * MILLI);
  }

  get current(): number {
    return Math.floor(this.milli / MILLI);
  }

  get exact(): number {
    return this.milli / MILLI;
  }

  get depleted(): boolean {
    return this.milli <= 0;
  }

  canAfford(cost: number): boolean {
    return this.milli >= cost * MILLI;
  }

  spend(cost: number): boolean {
    if (!this.canAfford(cost)) return false;
    this.milli -= cost * MILLI;
    return true;
  }

  restore(amount: number): void {
    this.milli = Math.min(this.max * MILLI, this.milli + Math.round(amount * MILLI));
  }

  /** Continuous drain; returns the amount removed, in whole points. */
  drain(perSecond: number, dtMs: number): number {
    const amount = Math.min(this.milli, Math.round(perSecond * dtMs));
    this.milli -= amount;
    return amount / MILLI;
  }

  regenerate(perSecond: number, dtMs: number): void {
    this.milli = Math.min(this.max * MILLI, this.milli + Math.round(perSecond * dtMs));
  }

  set(value: number): void {
    this.milli = Math.round(Math.max(0, Math.min(this.max, value)) * MILLI);
  }
}
