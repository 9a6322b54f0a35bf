/**
 * Frontier containers for the search engine.
 */

export { FastQueue } from "./fast-queue";
export { MinHeap, type MinHeapCompare } from "./min-heap";
