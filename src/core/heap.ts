import type { Equals } from "./types.js";

/**
 * Binary-heap priority queue contract.
 *
 * The first element is the one every other element is ordered after.
 * Elements the predicate treats as equal come out in an unspecified order.
 */
export interface Heap<T> {
  count(): number;
  isEmpty(): boolean;
  peekFirst(): T | undefined;

  push(item: T): void;
  pop(): T | undefined;

  /** Removes the element at a backing-array position; undefined when out of range. */
  removeAt(index: number): T | undefined;
  /** removeAt(index) then push(value). Out of range leaves the heap untouched. */
  replaceAt(index: number, value: T): T | undefined;
  replaceFirst(value: T): T | undefined;

  removeAllElements(): void;

  /** Linear scan; heap order is not used. Defaults to `Array.prototype.includes`. */
  contains(value: T, equals?: Equals<T>): boolean;
  /** Backing-array position of `value`, or -1. Defaults to `Array.prototype.indexOf`. */
  indexOf(value: T, equals?: Equals<T>): number;

  /** Pops every element in order, handing each to `visit`. Leaves the heap empty. */
  drain(visit: (item: T) => void): void;

  /** Converts heap contents to array (internal order). */
  toArray(): T[];
}
