/**
 * Path Search Engine
 *
 * A*, Dijkstra, breadth-first and depth-first search over a maze grid.
 */

export { runSearch, STEP_COST } from "./engine";
export { PriorityFrontier, QueueFrontier, StackFrontier } from "./frontier";
export { reconstructPath } from "./reconstruct";
export {
  ASTAR_STRATEGY,
  BFS_STRATEGY,
  DFS_STRATEGY,
  DIJKSTRA_STRATEGY,
  manhattan,
  SEARCH_STRATEGIES,
} from "./strategies";
export type {
  Frontier,
  NoPathFound,
  PathFound,
  SearchOptions,
  SearchResult,
  SearchStrategy,
  VisitObserver,
  VisitPolicy,
} from "./types";
