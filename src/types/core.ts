// types/core.ts — Fundamental types

export type EntityId = string;
export type Tick = number;
/** Encounter clock, integer milliseconds since the encounter started. */
export type Millis = number;

export interface Position {
  x: number;
  y: number;
}

export function distance(a: Position, b: Position): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2);
}

/** Point `step` units from `from` toward `to`, never past `to`. */
export function stepToward(from: Position, to: Position, step: number): Position {
  const d = distance(from, to);
  if (d === 0 || step >= d) return { x: to.x, y: to.y };
  const t = step / d;
  return { x: from.x + (to.x - from.x) * t, y: from.y + (to.y - from.y) * t };
}
