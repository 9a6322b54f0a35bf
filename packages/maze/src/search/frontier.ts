/**
 * Frontier implementations backing the four search strategies.
 */

import { FastQueue, MinHeap } from "../core/data-structures";
import type { Frontier } from "./types";

/**
 * FIFO frontier: level-by-level expansion.
 */
export class QueueFrontier implements Frontier {
  private readonly queue = new FastQueue<number>();

  get isEmpty(): boolean {
    return this.queue.isEmpty;
  }

  push(index: number, _priority: number): void {
    this.queue.enqueue(index);
  }

  pop(): number | undefined {
    return this.queue.dequeue();
  }
}

/**
 * LIFO frontier: the most recently discovered cell is expanded next.
 */
export class StackFrontier implements Frontier {
  private readonly stack: number[] = [];

  get isEmpty(): boolean {
    return this.stack.length === 0;
  }

  push(index: number, _priority: number): void {
    this.stack.push(index);
  }

  pop(): number | undefined {
    return this.stack.pop();
  }
}

interface PriorityEntry {
  readonly index: number;
  readonly priority: number;
  /** Insertion order; equal priorities pop first-in first-out */
  readonly seq: number;
}

function comparePriority(a: PriorityEntry, b: PriorityEntry): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return a.seq - b.seq;
}

/**
 * Lowest-priority-first frontier. A cell may be queued more than once; the
 * engine discards entries for cells already closed.
 */
export class PriorityFrontier implements Frontier {
  private readonly heap = new MinHeap<PriorityEntry>(comparePriority);
  private seq = 0;

  get isEmpty(): boolean {
    return this.heap.isEmpty;
  }

  push(index: number, priority: number): void {
    this.heap.push({ index, priority, seq: this.seq++ });
  }

  pop(): number | undefined {
    return this.heap.pop()?.index;
  }
}
