import type { Coord } from "@labyrinth/contracts";
import { type MazeGrid, NO_PARENT } from "../core/grid";

/**
 * Follow parent indices back from `goal` and return the cells in
 * start-to-goal order.
 *
 * The walk stops after `grid.size` steps so a corrupted parent chain cannot
 * loop forever.
 */
export function reconstructPath(grid: MazeGrid, goal: number): Coord[] {
  const reversed: Coord[] = [];
  let current = goal;

  while (current !== NO_PARENT && reversed.length < grid.size) {
    reversed.push(grid.coordOf(current));
    current = grid.parentIndex(current);
  }

  return reversed.reverse();
}
