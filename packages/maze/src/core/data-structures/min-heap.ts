/**
 * Binary min-heap ordered by a caller-supplied comparator.
 *
 * There is no decrease-key: callers push a fresh entry when a priority
 * improves and discard stale entries when they surface.
 */

export type MinHeapCompare<T> = (a: T, b: T) => number;

export class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: MinHeapCompare<T>) {}

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(value: T): void {
    this.items.push(value);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (top === undefined || last === undefined) return undefined;

    if (this.items.length > 0) {
      this.items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  clear(): void {
    this.items.length = 0;
  }

  private siftUp(start: number): void {
    const value = this.items[start];
    if (value === undefined) return;

    let index = start;
    while (index > 0) {
      const parent = (index - 1) >> 1;
      const parentValue = this.items[parent];
      if (parentValue === undefined || this.compare(parentValue, value) <= 0) break;
      this.items[index] = parentValue;
      index = parent;
    }
    this.items[index] = value;
  }

  private siftDown(start: number): void {
    const value = this.items[start];
    if (value === undefined) return;

    const length = this.items.length;
    let index = start;
    for (;;) {
      let child = index * 2 + 1;
      if (child >= length) break;

      let childValue = this.items[child];
      const rightValue = this.items[child + 1];
      if (
        rightValue !== undefined &&
        childValue !== undefined &&
        this.compare(rightValue, childValue) < 0
      ) {
        child++;
        childValue = rightValue;
      }
      if (childValue === undefined || this.compare(value, childValue) <= 0) break;

      this.items[index] = childValue;
      index = child;
    }
    this.items[index] = value;
  }
}
