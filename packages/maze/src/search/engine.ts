/**
 * Path search over a maze grid.
 *
 * Every algorithm runs through the same loop:
 *
 * 1. poll the abort signal
 * 2. pop a cell; for `on-expansion` strategies skip it if already closed
 * 3. report the visit, stop if it is the goal
 * 4. for each reachable, unclosed neighbour: relax and push
 *
 * Relaxation only replaces a neighbour's parent on a strictly shorter
 * distance, so the first route found wins among equals.
 */

import { type Coord, MazeError, type SearchAlgorithm } from "@labyrinth/contracts";
import { type MazeGrid, NO_PARENT } from "../core/grid";
import { NoOpTraceCollector } from "../trace";
import { reconstructPath } from "./reconstruct";
import { SEARCH_STRATEGIES } from "./strategies";
import type { SearchOptions, SearchResult } from "./types";

/** Cost of one step between adjacent open cells */
export const STEP_COST = 1;

/**
 * Search from `start` to `goal`, resetting the grid's search state first.
 *
 * An unreachable goal or an aborted signal is a normal `found: false`
 * result. Exceptions thrown by `onVisit` propagate to the caller.
 *
 * @throws {MazeError} OUT_OF_BOUNDS if either endpoint lies outside the grid
 */
export function runSearch(
  grid: MazeGrid,
  start: Coord,
  goal: Coord,
  algorithm: SearchAlgorithm,
  options: SearchOptions = {},
): SearchResult {
  for (const [label, point] of [["start", start], ["goal", goal]] as const) {
    if (!grid.contains(point)) {
      throw MazeError.outOfBounds(
        `Search ${label} (${point.row}, ${point.col}) lies outside a ${grid.rows}x${grid.cols} grid`,
        { row: point.row, col: point.col, rows: grid.rows, cols: grid.cols },
      );
    }
  }

  const strategy = SEARCH_STRATEGIES[algorithm];
  const trace = options.trace ?? new NoOpTraceCollector();
  const closeOnDiscovery = strategy.visitPolicy === "on-discovery";
  const startedAt = performance.now();

  grid.clearSearchState();
  trace.start("solve", { algorithm, start, goal });

  const startIndex = grid.indexOf(start.row, start.col);
  const goalIndex = grid.indexOf(goal.row, goal.col);
  const frontier = strategy.createFrontier();

  grid.relax(startIndex, 0, NO_PARENT);
  if (closeOnDiscovery) grid.markVisited(startIndex);
  frontier.push(startIndex, strategy.priority(0, start, goal));

  let visitedCount = 0;

  const finish = (path: Coord[] | null, cancelled: boolean): SearchResult => {
    const durationMs = performance.now() - startedAt;
    trace.end("solve", durationMs);
    const stats = { algorithm, visitedCount, durationMs };
    if (path) {
      return { ...stats, found: true, path, length: path.length, cancelled: false };
    }
    return { ...stats, found: false, path: null, cancelled };
  };

  while (!frontier.isEmpty) {
    if (options.signal?.aborted) {
      trace.warning("solve", `${algorithm} search cancelled after ${visitedCount} cells`);
      return finish(null, true);
    }

    const current = frontier.pop();
    if (current === undefined) break;

    if (!closeOnDiscovery) {
      // Stale heap entry for a cell closed through a cheaper route
      if (grid.isVisited(current)) continue;
      grid.markVisited(current);
    }

    visitedCount++;
    const cell = grid.coordOf(current);
    trace.visit(cell);
    options.onVisit?.(cell);

    if (current === goalIndex) {
      const path = reconstructPath(grid, goalIndex);
      grid.markPath(path.map((p) => grid.indexOf(p.row, p.col)));
      return finish(path, false);
    }

    const nextDistance = grid.distanceAt(current) + STEP_COST;
    grid.forEachReachable(current, (neighbor) => {
      if (grid.isVisited(neighbor)) return;

      if (closeOnDiscovery) {
        grid.markVisited(neighbor);
      } else if (nextDistance >= grid.distanceAt(neighbor)) {
        return;
      }

      grid.relax(neighbor, nextDistance, current);
      frontier.push(neighbor, strategy.priority(nextDistance, grid.coordOf(neighbor), goal));
    });
  }

  return finish(null, false);
}
