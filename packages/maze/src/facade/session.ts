import {
  type BuildMazeConfigInput,
  type Coord,
  Err,
  MazeError,
  Ok,
  type Result,
  type SearchAlgorithm,
} from "@labyrinth/contracts";
import { MAZE_CONFIG } from "../config";
import type { SearchOptions, SearchResult } from "../search";
import { createTraceCollector, type TraceCollector } from "../trace";
import type { Maze } from "./maze";
import {
  clearSearchState,
  createMaze,
  createMazeFromConfig,
  setEnd,
  setStart,
  solve,
} from "./operations";

export interface MazeSessionOptions {
  /** Defaults to a collector enabled by `MAZE_TRACE=1` */
  readonly trace?: TraceCollector;
  readonly allowSameStartEnd?: boolean;
}

export type SessionSolveOptions = Omit<SearchOptions, "trace">;

/**
 * Owner of the single active maze.
 *
 * Regenerating replaces the maze wholesale, endpoints included, and empties
 * the trace so it only ever describes the current maze. The session
 * is the one writer: a solve or regeneration requested while a solve is
 * running (for instance from an `onVisit` observer) is rejected with
 * SOLVE_IN_PROGRESS rather than queued.
 *
 * @example
 * ```typescript
 * const session = new MazeSession();
 * session.newMaze(25, 25, { seed: 9 });
 * session.setStart(0, 0);
 * session.setEnd(24, 24);
 * const result = session.solve("bfs");
 * ```
 */
export class MazeSession {
  readonly trace: TraceCollector;
  private readonly allowSameStartEnd: boolean;
  private active: Maze | null = null;
  private solving = false;

  constructor(options: MazeSessionOptions = {}) {
    this.trace = options.trace ?? createTraceCollector(MAZE_CONFIG.TRACE.ENABLED);
    this.allowSameStartEnd = options.allowSameStartEnd ?? false;
  }

  get maze(): Maze | null {
    return this.active;
  }

  get isSolving(): boolean {
    return this.solving;
  }

  newMaze(
    rows: number = MAZE_CONFIG.DEFAULTS.ROWS,
    cols: number = MAZE_CONFIG.DEFAULTS.COLS,
    options: { readonly seed?: number } = {},
  ): Result<Maze, MazeError> {
    if (this.solving) return Err(this.busyError("regenerate"));

    this.trace.clear();
    return createMaze(rows, cols, {
      ...options,
      allowSameStartEnd: this.allowSameStartEnd,
      trace: this.trace,
    }).tap((maze) => {
      this.active = maze;
    });
  }

  newMazeFromConfig(input: BuildMazeConfigInput): Result<Maze, MazeError> {
    if (this.solving) return Err(this.busyError("regenerate"));

    this.trace.clear();
    return createMazeFromConfig(
      { allowSameStartEnd: this.allowSameStartEnd, ...input },
      this.trace,
    ).tap((maze) => {
      this.active = maze;
    });
  }

  setStart(row: number, col: number): Result<Coord, MazeError> {
    return this.withIdleMaze("set start", (maze) => setStart(maze, row, col));
  }

  setEnd(row: number, col: number): Result<Coord, MazeError> {
    return this.withIdleMaze("set end", (maze) => setEnd(maze, row, col));
  }

  /**
   * Drop the last search's visited cells and path, keeping endpoints.
   */
  clearPath(): Result<void, MazeError> {
    return this.withIdleMaze("clear path", (maze) => {
      clearSearchState(maze);
      return Ok<void, MazeError>(undefined);
    });
  }

  solve(
    algorithm: SearchAlgorithm = MAZE_CONFIG.DEFAULTS.ALGORITHM,
    options: SessionSolveOptions = {},
  ): Result<SearchResult, MazeError> {
    return this.withIdleMaze("solve", (maze) => {
      this.solving = true;
      try {
        return solve(maze, algorithm, { ...options, trace: this.trace });
      } finally {
        this.solving = false;
      }
    });
  }

  private withIdleMaze<T>(
    action: string,
    fn: (maze: Maze) => Result<T, MazeError>,
  ): Result<T, MazeError> {
    if (this.solving) return Err(this.busyError(action));
    if (!this.active) {
      return Err(new MazeError("NO_ACTIVE_MAZE", `Cannot ${action}: no maze has been generated`));
    }
    return fn(this.active);
  }

  private busyError(action: string): MazeError {
    return new MazeError("SOLVE_IN_PROGRESS", `Cannot ${action} while a solve is running`, {
      action,
    });
  }
}
