/**
 * @labyrinth/maze
 *
 * Perfect-maze generation with a seeded depth-first backtracker, and four
 * interchangeable searches (A*, Dijkstra, BFS, DFS) behind a small façade.
 *
 * @example
 * ```typescript
 * import { MazeSession } from "@labyrinth/maze";
 *
 * const session = new MazeSession();
 * session.newMaze(15, 15, { seed: 42 });
 * session.setStart(0, 0);
 * session.setEnd(14, 14);
 *
 * const result = session.solve("astar");
 * if (result.isOk() && result.value.found) {
 *   console.log(`Path of ${result.value.length} cells`);
 * }
 * ```
 */

export { MAZE_CONFIG } from "./config";
export * from "./core";
export * from "./facade";
export * from "./generation";
export * from "./search";
export * from "./trace";
export * from "./validation";
