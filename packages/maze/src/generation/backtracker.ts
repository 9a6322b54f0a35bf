/**
 * Randomized depth-first backtracker.
 *
 * Walks from `(0, 0)` with an explicit stack, knocking through to a random
 * unvisited neighbour until every cell is reached. The passages form a
 * spanning tree: exactly one route joins any two cells.
 */

import { choice, type RandomSource, SeededRandom } from "@labyrinth/contracts";
import { MazeGrid } from "../core/grid";
import { NoOpTraceCollector, type TraceCollector } from "../trace";

export interface GenerationOptions {
  readonly trace?: TraceCollector;
}

export interface GenerationStats {
  /** Passages carved; always `rows * cols - 1` */
  readonly passages: number;
  /** Deepest the stack grew, in cells */
  readonly maxDepth: number;
  /** Corridor ends: cells where carving stopped and backtracking began */
  readonly deadEnds: number;
  readonly durationMs: number;
}

export interface GeneratedMaze {
  readonly grid: MazeGrid;
  readonly seed: number;
  readonly stats: GenerationStats;
}

/**
 * Carve a perfect maze into a grid whose walls are all standing.
 *
 * Leaves every `visited` flag cleared on return.
 */
export function carveBacktracker(
  grid: MazeGrid,
  rng: RandomSource,
  options: GenerationOptions = {},
): GenerationStats {
  const trace = options.trace ?? new NoOpTraceCollector();
  const startedAt = performance.now();
  trace.start("generate", { rows: grid.rows, cols: grid.cols });

  const origin = grid.indexOf(0, 0);
  const stack: number[] = [origin];
  grid.markVisited(origin);

  let passages = 0;
  let deadEnds = 0;
  let maxDepth = 1;
  let advancing = false;

  while (stack.length > 0) {
    const current = stack[stack.length - 1];
    if (current === undefined) break;

    const here = grid.coordOf(current);
    const unvisited = grid
      .neighborsUnfiltered(here)
      .filter((n) => !grid.isVisited(grid.indexOf(n.row, n.col)));
    const next = choice(rng, unvisited);

    if (next === undefined) {
      stack.pop();
      if (advancing) deadEnds++;
      advancing = false;
      continue;
    }

    grid.removeWallBetween(here, next);
    trace.carve(here, next);
    passages++;
    advancing = true;

    const nextIndex = grid.indexOf(next.row, next.col);
    grid.markVisited(nextIndex);
    stack.push(nextIndex);
    if (stack.length > maxDepth) maxDepth = stack.length;
  }

  grid.resetVisited();

  const durationMs = performance.now() - startedAt;
  trace.end("generate", durationMs);

  return { passages, maxDepth, deadEnds, durationMs };
}

/**
 * Allocate a grid and carve it from a seed.
 *
 * @throws {MazeError} INVALID_DIMENSIONS for non-positive or fractional sizes
 */
export function generateBacktrackerMaze(
  rows: number,
  cols: number,
  seed: number,
  options: GenerationOptions = {},
): GeneratedMaze {
  const grid = new MazeGrid(rows, cols);
  const rng = new SeededRandom(seed);
  const stats = carveBacktracker(grid, rng.asSource(), options);
  return { grid, seed: rng.seed, stats };
}
