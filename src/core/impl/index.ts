export { ArrayHeap } from "./arrayHeap.js";
export { fromItems, maxOrdering, minOrdering } from "./factories.js";
export type { OrderedHeapFactory, OrderedHeapFromItems } from "./factories.js";
