export type { Heap } from "./heap.js";
export type { Equals, IsOrdered, Orderable } from "./types.js";
export { maxComparator, minComparator } from "./ordering.js";
export * from "./impl/index.js";
