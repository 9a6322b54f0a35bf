/**
 * Test helpers for code built on the maze engine.
 *
 * Exported as `@labyrinth/maze/testing`, not from the main entry point.
 */

import { type Coord, MazeError } from "@labyrinth/contracts";
import { MazeGrid } from "./core/grid";
import { mazeChecksum } from "./core/hash";
import { generateBacktrackerMaze } from "./generation";

/**
 * Grid with every internal wall removed. The border stays sealed.
 */
export function createOpenGrid(rows: number, cols: number): MazeGrid {
  const grid = new MazeGrid(rows, cols);
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      if (col < cols - 1) grid.removeWallBetween({ row, col }, { row, col: col + 1 });
      if (row < rows - 1) grid.removeWallBetween({ row, col }, { row: row + 1, col });
    }
  }
  return grid;
}

/**
 * Grid with passages carved along each consecutive pair of `cells`.
 *
 * @throws {RangeError} when two consecutive cells are not adjacent
 */
export function carvePath(grid: MazeGrid, cells: readonly Coord[]): MazeGrid {
  for (let i = 1; i < cells.length; i++) {
    const from = cells[i - 1];
    const to = cells[i];
    if (from && to) grid.removeWallBetween(from, to);
  }
  return grid;
}

export class DeterminismViolationError extends Error {
  constructor(
    readonly checksums: readonly string[],
    readonly seed: number,
  ) {
    super(
      `Non-deterministic generation: seed ${seed} produced ${checksums.length} different wall layouts`,
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Generate the same maze `runs` times and require identical wall layouts.
 *
 * @throws {DeterminismViolationError} if any two runs differ
 *
 * @example
 * ```typescript
 * it("is reproducible", () => {
 *   assertDeterministic(5, 5, 12345);
 * });
 * ```
 */
export function assertDeterministic(
  rows: number,
  cols: number,
  seed: number,
  runs = 3,
): string {
  if (runs < 1) {
    throw MazeError.configInvalid("runs must be at least 1", { runs });
  }

  const checksums = new Set<string>();
  for (let i = 0; i < runs; i++) {
    checksums.add(mazeChecksum(generateBacktrackerMaze(rows, cols, seed).grid));
  }

  const unique = [...checksums];
  if (unique.length > 1) {
    throw new DeterminismViolationError(unique, seed);
  }
  return unique[0] ?? "";
}
