/**
 * Query Façade
 *
 * The operations a presentation layer calls. Caller mistakes come back as
 * `Err(MazeError)`; an unreachable end is an `Ok` result with `found: false`.
 */

import {
  type BuildMazeConfigInput,
  buildMazeConfig,
  type Coord,
  coordEquals,
  Err,
  isSearchAlgorithm,
  MazeError,
  Ok,
  randomUint32,
  type Result,
  type SearchAlgorithm,
  SearchAlgorithmSchema,
  SeedSchema,
} from "@labyrinth/contracts";
import { MAZE_CONFIG } from "../config";
import { generateBacktrackerMaze } from "../generation";
import { runSearch, type SearchOptions, type SearchResult } from "../search";
import type { TraceCollector } from "../trace";
import { type EndpointRole, Maze } from "./maze";

export interface CreateMazeOptions {
  /** Omit for a fresh random seed */
  readonly seed?: number;
  readonly allowSameStartEnd?: boolean;
  readonly trace?: TraceCollector;
}

/**
 * Allocate and carve a new maze.
 *
 * @example
 * ```typescript
 * const maze = createMaze(15, 15, { seed: 2024 }).getOrThrow();
 * setStart(maze, 0, 0);
 * setEnd(maze, 14, 14);
 * const result = solve(maze, "astar").getOrThrow();
 * ```
 */
export function createMaze(
  rows: number,
  cols: number,
  options: CreateMazeOptions = {},
): Result<Maze, MazeError> {
  if (!Number.isInteger(rows) || !Number.isInteger(cols)) {
    return Err(MazeError.invalidDimensions(rows, cols, "dimensions must be integers"));
  }
  if (rows < 1 || cols < 1) {
    return Err(MazeError.invalidDimensions(rows, cols, "dimensions must be at least 1"));
  }

  if (options.seed !== undefined && !SeedSchema.safeParse(options.seed).success) {
    return Err(
      MazeError.configInvalid("Seed must be an unsigned 32-bit integer", {
        seed: options.seed,
      }),
    );
  }

  const generated = generateBacktrackerMaze(
    rows,
    cols,
    options.seed ?? randomUint32(),
    options.trace ? { trace: options.trace } : {},
  );

  return Ok(
    new Maze(
      generated.grid,
      generated.seed,
      options.allowSameStartEnd ?? false,
      generated.stats,
    ),
  );
}

/**
 * Build a maze from a config input with presets and defaults (25x25).
 *
 * Unlike {@link createMaze}, this path caps each dimension at
 * `MAZE_CONFIG.LIMITS.MAX_DIMENSION`.
 */
export function createMazeFromConfig(
  input: BuildMazeConfigInput,
  trace?: TraceCollector,
): Result<Maze, MazeError> {
  return buildMazeConfig({
    maxDimension: MAZE_CONFIG.LIMITS.MAX_DIMENSION,
    ...input,
  }).flatMap((config) =>
    createMaze(config.rows, config.cols, {
      ...(config.seed !== undefined && { seed: config.seed }),
      allowSameStartEnd: config.allowSameStartEnd,
      ...(trace && { trace }),
    }),
  );
}

function assignEndpoint(
  maze: Maze,
  role: EndpointRole,
  row: number,
  col: number,
): Result<Coord, MazeError> {
  if (!maze.grid.isInBounds(row, col)) {
    return Err(
      MazeError.outOfBounds(
        `${role === "start" ? "Start" : "End"} (${row}, ${col}) lies outside a ${maze.rows}x${maze.cols} grid`,
        { role, row, col, rows: maze.rows, cols: maze.cols },
      ),
    );
  }

  const coord: Coord = { row, col };
  const other = maze.endpoint(role === "start" ? "end" : "start");
  if (other && coordEquals(other, coord) && !maze.allowSameStartEnd) {
    return Err(
      new MazeError(
        "START_END_COLLISION",
        `Start and end cannot both be (${row}, ${col})`,
        { role, row, col },
      ),
    );
  }

  maze._assignEndpoint(role, coord);
  // A stale path would no longer match the endpoints
  maze.grid.clearSearchState();
  return Ok(coord);
}

export function setStart(maze: Maze, row: number, col: number): Result<Coord, MazeError> {
  return assignEndpoint(maze, "start", row, col);
}

export function setEnd(maze: Maze, row: number, col: number): Result<Coord, MazeError> {
  return assignEndpoint(maze, "end", row, col);
}

/**
 * Reset visited, distance, parent and path flags on every cell. Walls and
 * endpoints are kept.
 */
export function clearSearchState(maze: Maze): void {
  maze.grid.clearSearchState();
}

const ALGORITHM_LABELS: Readonly<Record<string, SearchAlgorithm>> = {
  "a*": "astar",
  "a-star": "astar",
};

/**
 * Map a selector from outside the type system (a menu label, a query
 * string) to an algorithm. Accepts the canonical names and display labels
 * such as "A*" or "BFS", case-insensitively.
 */
export function parseAlgorithm(input: string): Result<SearchAlgorithm, MazeError> {
  const key = input.trim().toLowerCase();
  const parsed = SearchAlgorithmSchema.safeParse(ALGORITHM_LABELS[key] ?? key);
  if (!parsed.success) {
    return Err(
      new MazeError("UNKNOWN_ALGORITHM", `Unknown search algorithm: ${input}`, {
        input,
      }),
    );
  }
  return Ok(parsed.data);
}

/**
 * Find a path between the maze's endpoints.
 *
 * Search state is reset before the run, so repeated calls on an unchanged
 * maze return the same path.
 */
export function solve(
  maze: Maze,
  algorithm: SearchAlgorithm,
  options: SearchOptions = {},
): Result<SearchResult, MazeError> {
  if (!isSearchAlgorithm(algorithm)) {
    return Err(
      new MazeError("UNKNOWN_ALGORITHM", `Unknown search algorithm: ${String(algorithm)}`),
    );
  }

  const { start, end } = maze;
  if (!start || !end) {
    return Err(
      MazeError.preconditionNotMet("Both start and end must be set before solving", {
        hasStart: start !== null,
        hasEnd: end !== null,
      }),
    );
  }

  return Ok(runSearch(maze.grid, start, end, algorithm, options));
}
