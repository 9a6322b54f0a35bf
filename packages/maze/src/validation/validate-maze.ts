import type { ReadonlyMazeGrid } from "../core/grid";
import {
  checkBoundaryWalls,
  checkSpanningTree,
  checkWallSymmetry,
  type Violation,
} from "./invariant-checks";

/**
 * Outcome of validating a grid as a perfect maze.
 * Use `if (result.success)` to narrow.
 */
export type MazeValidationResult =
  | {
      readonly success: true;
      readonly passages: number;
      readonly components: 1;
      readonly violations: readonly [];
    }
  | {
      readonly success: false;
      readonly passages: number;
      readonly components: number;
      readonly violations: readonly Violation[];
    };

/**
 * Run every structural check against a grid.
 *
 * Generated mazes always pass; grids built or edited by hand may not.
 */
export function validateMaze(grid: ReadonlyMazeGrid): MazeValidationResult {
  const symmetry = checkWallSymmetry(grid);
  const boundary = checkBoundaryWalls(grid);
  const tree = checkSpanningTree(grid);

  const violations = [...symmetry.violations, ...boundary.violations, ...tree.violations];
  if (violations.length === 0) {
    return { success: true, passages: tree.passages, components: 1, violations: [] };
  }
  return {
    success: false,
    passages: tree.passages,
    components: tree.components,
    violations,
  };
}
