import type { IsOrdered } from "../../types.js";

/** Index of the first child that is not ordered after its parent, or -1. */
export function heapViolation<T>(items: T[], isOrdered: IsOrdered<T>): number {
  for (let i = 1; i < items.length; i++) {
    if (!isOrdered(items[(i - 1) >> 1]!, items[i]!)) return i;
  }
  return -1;
}

export function ascending(values: number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/** Seeded PRNG (mulberry32). */
export function mulberry32(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function* permutations(values: number[]): Generator<number[]> {
  if (values.length <= 1) {
    yield [...values];
    return;
  }
  for (let i = 0; i < values.length; i++) {
    const rest = [...values.slice(0, i), ...values.slice(i + 1)];
    for (const tail of permutations(rest)) yield [values[i]!, ...tail];
  }
}
