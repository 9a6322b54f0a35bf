/**
 * The four search strategies. They differ only in frontier order, when a
 * cell is closed, and the priority key; the engine loop is shared.
 */

import type { Coord, SearchAlgorithm } from "@labyrinth/contracts";
import { PriorityFrontier, QueueFrontier, StackFrontier } from "./frontier";
import type { SearchStrategy } from "./types";

/**
 * Manhattan distance. Admissible and consistent on a 4-connected grid with
 * unit step cost.
 */
export function manhattan(a: Coord, b: Coord): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

const unordered = (): number => 0;

export const BFS_STRATEGY: SearchStrategy = {
  algorithm: "bfs",
  visitPolicy: "on-discovery",
  optimal: true,
  createFrontier: () => new QueueFrontier(),
  priority: unordered,
};

export const DFS_STRATEGY: SearchStrategy = {
  algorithm: "dfs",
  visitPolicy: "on-discovery",
  optimal: false,
  createFrontier: () => new StackFrontier(),
  priority: unordered,
};

export const DIJKSTRA_STRATEGY: SearchStrategy = {
  algorithm: "dijkstra",
  visitPolicy: "on-expansion",
  optimal: true,
  createFrontier: () => new PriorityFrontier(),
  priority: (distance) => distance,
};

export const ASTAR_STRATEGY: SearchStrategy = {
  algorithm: "astar",
  visitPolicy: "on-expansion",
  optimal: true,
  createFrontier: () => new PriorityFrontier(),
  priority: (distance, cell, goal) => distance + manhattan(cell, goal),
};

export const SEARCH_STRATEGIES: Readonly<Record<SearchAlgorithm, SearchStrategy>> = {
  astar: ASTAR_STRATEGY,
  dijkstra: DIJKSTRA_STRATEGY,
  bfs: BFS_STRATEGY,
  dfs: DFS_STRATEGY,
};
