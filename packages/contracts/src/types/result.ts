/**
 * A Result type for operations that fail for expected, caller-facing reasons.
 *
 * Façade operations return a Result instead of throwing so that invalid
 * dimensions or a missing endpoint can be handled without try/catch.
 *
 * @example
 * ```typescript
 * const path = createMaze(10, 10, { seed: 7 })
 *   .flatMap((maze) => setStart(maze, 0, 0).map(() => maze))
 *   .match(
 *     (maze) => `maze ${maze.rows}x${maze.cols}`,
 *     (error) => error.code,
 *   );
 * ```
 */
export class Result<T, E> {
  private constructor(
    private readonly _value: T | undefined,
    private readonly _error: E | undefined,
    private readonly _isOk: boolean,
  ) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>(value, undefined, true);
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>(undefined, error, false);
  }

  /**
   * Run a function that may throw, capturing a thrown error of the expected
   * kind. Anything `accept` does not recognise is rethrown.
   */
  static capture<T, E>(
    fn: () => T,
    accept: (e: unknown) => e is E,
  ): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      if (accept(e)) return Result.err(e);
      throw e;
    }
  }

  isOk(): boolean {
    return this._isOk;
  }

  isErr(): boolean {
    return !this._isOk;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    if (this._isOk) {
      return Result.ok(fn(this._value as T));
    }
    return Result.err(this._error as E);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    if (this._isOk) {
      return Result.ok(this._value as T);
    }
    return Result.err(fn(this._error as E));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    if (this._isOk) {
      return fn(this._value as T);
    }
    return Result.err(this._error as E);
  }

  getOrElse(defaultValue: T): T {
    return this._isOk ? (this._value as T) : defaultValue;
  }

  getOrThrow(): T {
    if (this._isOk) {
      return this._value as T;
    }
    throw this._error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    return this._isOk ? onOk(this._value as T) : onErr(this._error as E);
  }

  tap(fn: (value: T) => void): Result<T, E> {
    if (this._isOk) {
      fn(this._value as T);
    }
    return this;
  }

  toJSON(): { success: true; value: T } | { success: false; error: E } {
    if (this._isOk) {
      return { success: true, value: this._value as T };
    }
    return { success: false, error: this._error as E };
  }

  get success(): boolean {
    return this._isOk;
  }

  get value(): T {
    if (!this._isOk) {
      throw new Error("Cannot access value of Err Result");
    }
    return this._value as T;
  }

  get error(): E {
    if (this._isOk) {
      throw new Error("Cannot access error of Ok Result");
    }
    return this._error as E;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
