import { describe, expect, it } from "vitest";
import { FastQueue } from "../src/core/data-structures";

describe("FastQueue", () => {
  it("dequeues in insertion order", () => {
    const queue = FastQueue.from([1, 2, 3]);
    queue.enqueue(4);

    expect(queue.length).toBe(4);
    expect(queue.peek()).toBe(1);
    expect([queue.dequeue(), queue.dequeue(), queue.dequeue(), queue.dequeue()]).toEqual([
      1, 2, 3, 4,
    ]);
    expect(queue.dequeue()).toBeUndefined();
    expect(queue.isEmpty).toBe(true);
  });

  it("keeps order across compaction", () => {
    const queue = new FastQueue<number>();
    for (let i = 0; i < 3000; i++) {
      queue.enqueue(i);
    }
    for (let i = 0; i < 2000; i++) {
      expect(queue.dequeue()).toBe(i);
    }
    queue.enqueue(3000);

    expect(queue.length).toBe(1001);
    expect(queue.peek()).toBe(2000);
  });

  it("clears", () => {
    const queue = FastQueue.from(["a", "b"]);
    queue.clear();
    expect(queue.length).toBe(0);
    expect(queue.peek()).toBeUndefined();
  });
});
