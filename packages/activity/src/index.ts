export * from "./monthly-activity.js";
export * from "./summary.js";
export { MinHeap } from "./min-heap.js";
