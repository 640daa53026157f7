/** Shared core types used by module contracts. */

/**
 * Ordering predicate: returns true when `a` should appear before `b`.
 * Use a non-strict relation (`<=`, `>=`) for the usual min/max queues.
 */
export type IsOrdered<T> = (a: T, b: T) => boolean;

/** Equality used by linear lookups (`contains`, `indexOf`). */
export type Equals<T> = (a: T, b: T) => boolean;

/** Element types with a built-in total order under `<=` / `>=`, one member at a time. */
export type Orderable = number | bigint | string | Date;
