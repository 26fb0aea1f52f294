// server/rng.ts — Deterministic PRNG (mulberry32)

import { hashString } from '../shared/utils.js';

export class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  static seedFromString(value: string): number {
    return hashString(value);
  }

  /** Seed for a per-entity stream derived from an encounter seed and a stable key. */
  static seedFor(baseSeed: number, key: string): number {
    return (hashString(key) ^ Math.imul(baseSeed >>> 0, 0x9e3779b1)) >>> 0;
  }

  /** Float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max], inclusive. */
  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  /** Float in [min, max). */
  nextFloat(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }
}
