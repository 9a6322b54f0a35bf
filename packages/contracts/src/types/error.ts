/**
 * Error codes for maze generation and search operations.
 *
 * Every code marks caller misuse. An exhausted search is not an error and has
 * no code here: it is reported as a `found: false` search result.
 */
export type MazeErrorCode =
  | "INVALID_DIMENSIONS"
  | "OUT_OF_BOUNDS"
  | "START_END_COLLISION"
  | "PRECONDITION_NOT_MET"
  | "UNKNOWN_ALGORITHM"
  | "CONFIG_INVALID"
  | "NO_ACTIVE_MAZE"
  | "SOLVE_IN_PROGRESS";

/**
 * Unified error type for the maze engine.
 *
 * @example
 * ```typescript
 * const error = MazeError.outOfBounds(
 *   "Start (9, 2) lies outside a 5x5 grid",
 *   { row: 9, col: 2, rows: 5, cols: 5 },
 * );
 * ```
 */
export class MazeError extends Error {
  override readonly name = "MazeError";

  constructor(
    public readonly code: MazeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  static invalidDimensions(
    rows: number,
    cols: number,
    reason?: string,
  ): MazeError {
    const suffix = reason ? `: ${reason}` : "";
    return new MazeError(
      "INVALID_DIMENSIONS",
      `Invalid maze dimensions ${rows}x${cols}${suffix}`,
      { rows, cols },
    );
  }

  static outOfBounds(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("OUT_OF_BOUNDS", message, details);
  }

  static preconditionNotMet(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("PRECONDITION_NOT_MET", message, details);
  }

  static configInvalid(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("CONFIG_INVALID", message, details);
  }

  /**
   * Check if an unknown error is a MazeError.
   */
  static isMazeError(error: unknown): error is MazeError {
    return error instanceof MazeError;
  }

  toJSON(): {
    name: string;
    code: MazeErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
