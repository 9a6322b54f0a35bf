import { describe, expect, it } from "vitest";
import { UnionFind } from "../src/core/algorithms";

describe("UnionFind", () => {
  it("starts with one component per element", () => {
    const uf = new UnionFind(5);
    expect(uf.componentCount).toBe(5);
    expect(uf.connected(0, 4)).toBe(false);
  });

  it("merges components and reports redundant unions", () => {
    const uf = new UnionFind(5);
    expect(uf.union(0, 1)).toBe(true);
    expect(uf.union(1, 2)).toBe(true);
    expect(uf.union(3, 4)).toBe(true);
    expect(uf.componentCount).toBe(2);

    expect(uf.union(0, 2)).toBe(false);
    expect(uf.componentCount).toBe(2);
    expect(uf.connected(2, 0)).toBe(true);
    expect(uf.connected(2, 3)).toBe(false);

    uf.union(2, 4);
    expect(uf.componentCount).toBe(1);
    expect(uf.find(3)).toBe(uf.find(0));
  });
});
