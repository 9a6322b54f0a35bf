/**
 * Property-Based Determinism Tests
 *
 * A seed alone must reproduce a maze's walls and every search over it.
 */

import { SEARCH_ALGORITHMS } from "@labyrinth/contracts";
import { describe, expect, it } from "vitest";
import { mazeChecksum } from "../../src/core/hash";
import { generateBacktrackerMaze } from "../../src/generation";
import { runSearch } from "../../src/search";
import { assertDeterministic } from "../../src/testing";

const SEED_COUNT = 200;

describe("property: determinism is absolute", () => {
  it("same seed always produces an identical wall layout", () => {
    const mismatches: number[] = [];

    for (let seed = 0; seed < SEED_COUNT; seed++) {
      const first = mazeChecksum(generateBacktrackerMaze(12, 9, seed).grid);
      const second = mazeChecksum(generateBacktrackerMaze(12, 9, seed).grid);
      if (first !== second) mismatches.push(seed);
    }

    expect(mismatches).toEqual([]);
  });

  it("a fixed seed on 5x5 reproduces identical walls", () => {
    const a = generateBacktrackerMaze(5, 5, 20240601).grid;
    const b = generateBacktrackerMaze(5, 5, 20240601).grid;
    expect(b.wallSnapshot()).toEqual(a.wallSnapshot());
    expect(() => assertDeterministic(5, 5, 20240601, 5)).not.toThrow();
  });

  it("different seeds explore different layouts", () => {
    const checksums = new Set<string>();
    for (let seed = 0; seed < 50; seed++) {
      checksums.add(mazeChecksum(generateBacktrackerMaze(10, 10, seed).grid));
    }
    expect(checksums.size).toBeGreaterThan(45);
  });

  it("every algorithm repeats its visit order on the same maze", () => {
    for (let seed = 0; seed < 20; seed++) {
      for (const algorithm of SEARCH_ALGORITHMS) {
        const orders = [0, 1].map(() => {
          const { grid } = generateBacktrackerMaze(9, 9, seed);
          const order: string[] = [];
          runSearch(grid, { row: 0, col: 0 }, { row: 8, col: 8 }, algorithm, {
            onVisit: (cell) => order.push(`${cell.row},${cell.col}`),
          });
          return order.join(" ");
        });
        expect(orders[1]).toBe(orders[0]);
      }
    }
  });
});
