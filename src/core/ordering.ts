import type { Orderable } from "./types.js";

// Each overload pins one member of Orderable; `<=` across members (say 10 and "9") has no consistent order.

export function minComparator(a: number, b: number): boolean;
export function minComparator(a: bigint, b: bigint): boolean;
export function minComparator(a: string, b: string): boolean;
export function minComparator(a: Date, b: Date): boolean;
export function minComparator<T extends Orderable>(a: T, b: T): boolean {
  return lessOrEqual(a, b);
}

export function maxComparator(a: number, b: number): boolean;
export function maxComparator(a: bigint, b: bigint): boolean;
export function maxComparator(a: string, b: string): boolean;
export function maxComparator(a: Date, b: Date): boolean;
export function maxComparator<T extends Orderable>(a: T, b: T): boolean {
  return greaterOrEqual(a, b);
}

/** Generic form for callers whose own signature already pins one member type. */
export function lessOrEqual<T extends Orderable>(a: T, b: T): boolean {
  return a <= b;
}

export function greaterOrEqual<T extends Orderable>(a: T, b: T): boolean {
  return a >= b;
}
