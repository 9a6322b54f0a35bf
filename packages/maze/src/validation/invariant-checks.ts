/**
 * Maze Validation Invariants
 *
 * Structural checks for a perfect maze: symmetric walls, a sealed border,
 * and open passages forming a spanning tree.
 */

import { UnionFind } from "../core/algorithms";
import type { ReadonlyMazeGrid } from "../core/grid";

export type ViolationType =
  | "invariant.symmetry"
  | "invariant.boundary"
  | "invariant.passages"
  | "invariant.cycle"
  | "invariant.connectivity";

export interface Violation {
  readonly type: ViolationType;
  readonly message: string;
  readonly severity: "error" | "warning";
}

export interface CheckResult {
  readonly success: boolean;
  readonly violations: Violation[];
}

/**
 * Every shared wall must read the same from both of its cells.
 */
export function checkWallSymmetry(grid: ReadonlyMazeGrid): CheckResult {
  const violations: Violation[] = [];

  for (let row = 0; row < grid.rows; row++) {
    for (let col = 0; col < grid.cols; col++) {
      if (
        col < grid.cols - 1 &&
        grid.hasWall(row, col, "right") !== grid.hasWall(row, col + 1, "left")
      ) {
        violations.push({
          type: "invariant.symmetry",
          message: `Wall between (${row}, ${col}) and (${row}, ${col + 1}) is one-sided`,
          severity: "error",
        });
      }
      if (
        row < grid.rows - 1 &&
        grid.hasWall(row, col, "bottom") !== grid.hasWall(row + 1, col, "top")
      ) {
        violations.push({
          type: "invariant.symmetry",
          message: `Wall between (${row}, ${col}) and (${row + 1}, ${col}) is one-sided`,
          severity: "error",
        });
      }
    }
  }

  return { success: violations.length === 0, violations };
}

/**
 * The outer border is never carved.
 */
export function checkBoundaryWalls(grid: ReadonlyMazeGrid): CheckResult {
  const violations: Violation[] = [];
  const breach = (row: number, col: number, side: string): void => {
    violations.push({
      type: "invariant.boundary",
      message: `Border wall ${side} of (${row}, ${col}) is open`,
      severity: "error",
    });
  };

  for (let col = 0; col < grid.cols; col++) {
    if (!grid.hasWall(0, col, "top")) breach(0, col, "top");
    if (!grid.hasWall(grid.rows - 1, col, "bottom")) breach(grid.rows - 1, col, "bottom");
  }
  for (let row = 0; row < grid.rows; row++) {
    if (!grid.hasWall(row, 0, "left")) breach(row, 0, "left");
    if (!grid.hasWall(row, grid.cols - 1, "right")) breach(row, grid.cols - 1, "right");
  }

  return { success: violations.length === 0, violations };
}

export interface SpanningTreeCheck extends CheckResult {
  readonly passages: number;
  readonly components: number;
}

/**
 * Union every open passage: a union of already-joined cells is a cycle, and
 * more than one remaining component means some cells are unreachable.
 */
export function checkSpanningTree(grid: ReadonlyMazeGrid): SpanningTreeCheck {
  const violations: Violation[] = [];
  const uf = new UnionFind(grid.size);
  let passages = 0;
  let cycles = 0;

  for (let row = 0; row < grid.rows; row++) {
    for (let col = 0; col < grid.cols; col++) {
      const index = row * grid.cols + col;
      if (col < grid.cols - 1 && !grid.hasWall(row, col, "right")) {
        passages++;
        if (!uf.union(index, index + 1)) cycles++;
      }
      if (row < grid.rows - 1 && !grid.hasWall(row, col, "bottom")) {
        passages++;
        if (!uf.union(index, index + grid.cols)) cycles++;
      }
    }
  }

  const expected = grid.size - 1;
  if (passages !== expected) {
    violations.push({
      type: "invariant.passages",
      message: `Expected ${expected} passages, found ${passages}`,
      severity: "error",
    });
  }
  if (cycles > 0) {
    violations.push({
      type: "invariant.cycle",
      message: `Passages close ${cycles} cycle(s)`,
      severity: "error",
    });
  }
  if (uf.componentCount > 1) {
    violations.push({
      type: "invariant.connectivity",
      message: `Maze splits into ${uf.componentCount} disconnected regions`,
      severity: "error",
    });
  }

  return {
    success: violations.length === 0,
    violations,
    passages,
    components: uf.componentCount,
  };
}
