import { greaterOrEqual, lessOrEqual } from "../ordering.js";
import type { Orderable } from "../types.js";
import { ArrayHeap } from "./arrayHeap.js";

/**
 * Builds a heap from variadic orderable items of a single kind.
 *
 * No generic signature: `minOrdering(1, "a")` is
 * rejected, and `minOrdering(1, 2)` is a heap of `number` rather than of the
 * literals `1 | 2`.
 */
export interface OrderedHeapFactory {
  (...items: number[]): ArrayHeap<number>;
  (...items: bigint[]): ArrayHeap<bigint>;
  (...items: string[]): ArrayHeap<string>;
  (...items: Date[]): ArrayHeap<Date>;
}

/** Same as {@link OrderedHeapFactory}, taking an existing collection. */
export interface OrderedHeapFromItems {
  (items: Iterable<number>): ArrayHeap<number>;
  (items: Iterable<bigint>): ArrayHeap<bigint>;
  (items: Iterable<string>): ArrayHeap<string>;
  (items: Iterable<Date>): ArrayHeap<Date>;
}

/** Smallest first. */
export const minOrdering: OrderedHeapFactory = <T extends Orderable>(...items: T[]) =>
  new ArrayHeap<T>(lessOrEqual, items);

/** Largest first. */
export const maxOrdering: OrderedHeapFactory = <T extends Orderable>(...items: T[]) =>
  new ArrayHeap<T>(greaterOrEqual, items);

/** Default construction for orderable items: min ordering. */
export const fromItems: OrderedHeapFromItems = <T extends Orderable>(items: Iterable<T>) =>
  new ArrayHeap<T>(lessOrEqual, items);
