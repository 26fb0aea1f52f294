// shared/utils.ts — Small numeric and ordering helpers

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function approximately(a: number, b: number, epsilon: number): boolean {
  return Math.abs(a - b) <= epsilon;
}

/** Locale-independent string ordering, so iteration order never depends on the host. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** FNV-1a over the UTF-16 code units of `value`, as an unsigned 32-bit integer. */
export function hashString(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
