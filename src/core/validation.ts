/** Narrows `v` to a position inside `[0, count)`. */
export function asIndex(v: number, count: number): number | undefined {
  return Number.isInteger(v) && v >= 0 && v < count ? v : undefined;
}
