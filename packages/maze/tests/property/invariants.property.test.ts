/**
 * Property-Based Invariant Tests
 *
 * Perfect-maze and search invariants checked over many seeds and shapes.
 */

import { type Coord, SEARCH_ALGORITHMS, SeededRandom } from "@labyrinth/contracts";
import { describe, expect, it } from "vitest";
import { DIRECTIONS, type MazeGrid } from "../../src/core/grid";
import { generateBacktrackerMaze } from "../../src/generation";
import { runSearch } from "../../src/search";
import { validateMaze } from "../../src/validation";

const SEED_COUNT = 60;

const TEST_SIZES = [
  { rows: 1, cols: 1 },
  { rows: 1, cols: 7 },
  { rows: 7, cols: 1 },
  { rows: 5, cols: 5 },
  { rows: 12, cols: 9 },
  { rows: 20, cols: 20 },
] as const;

function randomCell(rng: SeededRandom, grid: MazeGrid): Coord {
  return { row: rng.range(0, grid.rows - 1), col: rng.range(0, grid.cols - 1) };
}

/** Consecutive cells are adjacent with the shared wall removed, and no cell repeats */
function isOpenSimplePath(grid: MazeGrid, path: readonly Coord[]): boolean {
  const seen = new Set<number>();
  for (let i = 0; i < path.length; i++) {
    const cell = path[i];
    if (!cell) return false;
    const index = grid.indexOf(cell.row, cell.col);
    if (seen.has(index)) return false;
    seen.add(index);

    const prev = path[i - 1];
    if (!prev) continue;
    const step = DIRECTIONS.find(
      (dir) => prev.row + dir.dRow === cell.row && prev.col + dir.dCol === cell.col,
    );
    if (!step || grid.hasWall(prev.row, prev.col, step.side)) return false;
  }
  return true;
}

describe("property: generated mazes are perfect", () => {
  for (const { rows, cols } of TEST_SIZES) {
    it(`${rows}x${cols}: spanning tree over every cell`, () => {
      for (let seed = 0; seed < SEED_COUNT; seed++) {
        const { grid, stats } = generateBacktrackerMaze(rows, cols, seed);
        const validation = validateMaze(grid);

        expect(validation.violations).toEqual([]);
        expect(validation.passages).toBe(rows * cols - 1);
        expect(stats.passages).toBe(rows * cols - 1);
        expect(stats.maxDepth).toBeLessThanOrEqual(rows * cols);
      }
    });
  }
});

describe("property: searches agree on a perfect maze", () => {
  it("every algorithm finds the one simple path between two cells", () => {
    const rng = new SeededRandom(4242);

    for (let seed = 0; seed < SEED_COUNT; seed++) {
      const { grid } = generateBacktrackerMaze(12, 15, seed);
      const start = randomCell(rng, grid);
      const goal = randomCell(rng, grid);

      const paths = SEARCH_ALGORITHMS.map((algorithm) => {
        const result = runSearch(grid, start, goal, algorithm);
        if (!result.found) throw new Error(`${algorithm} missed a path on seed ${seed}`);
        expect(result.path[0]).toEqual(start);
        expect(result.path[result.path.length - 1]).toEqual(goal);
        expect(isOpenSimplePath(grid, result.path)).toBe(true);
        return result.path;
      });

      // A tree has exactly one simple path, so even DFS must match
      for (const path of paths) {
        expect(path).toEqual(paths[0]);
      }
    }
  });

  it("never expands more cells than the grid holds", () => {
    for (let seed = 0; seed < 20; seed++) {
      const { grid } = generateBacktrackerMaze(10, 10, seed);
      for (const algorithm of SEARCH_ALGORITHMS) {
        const result = runSearch(grid, { row: 0, col: 0 }, { row: 9, col: 9 }, algorithm);
        expect(result.visitedCount).toBeGreaterThan(0);
        expect(result.visitedCount).toBeLessThanOrEqual(grid.size);
      }
    }
  });

  it("A* expands no more cells than Dijkstra", () => {
    for (let seed = 0; seed < SEED_COUNT; seed++) {
      const { grid } = generateBacktrackerMaze(15, 15, seed);
      const from = { row: 0, col: 0 };
      const to = { row: 14, col: 14 };
      const astar = runSearch(grid, from, to, "astar");
      const dijkstra = runSearch(grid, from, to, "dijkstra");
      expect(astar.visitedCount).toBeLessThanOrEqual(dijkstra.visitedCount);
    }
  });
});
