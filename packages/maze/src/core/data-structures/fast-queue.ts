/** Dequeued slots tolerated before the backing array is compacted */
const COMPACT_THRESHOLD = 1024;

/**
 * FIFO queue with O(1) amortized enqueue and dequeue.
 *
 * A moving head index avoids `Array.prototype.shift`; the consumed prefix is
 * sliced off once it dominates the backing array.
 *
 * @example
 * ```typescript
 * const queue = FastQueue.from([3, 1]);
 * queue.enqueue(2);
 * queue.dequeue(); // 3
 * ```
 */
export class FastQueue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head > COMPACT_THRESHOLD && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  peek(): T | undefined {
    return this.isEmpty ? undefined : this.items[this.head];
  }

  clear(): void {
    this.items = [];
    this.head = 0;
  }

  static from<T>(items: Iterable<T>): FastQueue<T> {
    const queue = new FastQueue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }
}
