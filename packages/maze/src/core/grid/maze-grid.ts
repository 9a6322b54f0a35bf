/**
 * Maze grid with walls and per-search state in flat typed arrays.
 */

import { type Coord, MazeError, type WallSide } from "@labyrinth/contracts";
import {
  ALL_WALLS,
  type Cell,
  DIRECTION_BY_SIDE,
  DIRECTIONS,
  type Direction,
  type ReadonlyMazeGrid,
} from "./types";

/** Parent marker for search origins and untouched cells */
export const NO_PARENT = -1;

/**
 * A `rows × cols` grid of cells, all walls standing at construction.
 *
 * @remarks
 * The shape is fixed for the lifetime of the grid and walls only ever come
 * down. Search state (`visited`, `distance`, `parent`, `onPath`) lives beside
 * the walls and is reset through {@link MazeGrid.clearSearchState}; `parent`
 * holds a cell index, never a reference.
 */
export class MazeGrid implements ReadonlyMazeGrid {
  readonly rows: number;
  readonly cols: number;
  readonly size: number;

  private readonly walls: Uint8Array;
  private readonly visited: Uint8Array;
  private readonly onPath: Uint8Array;
  private readonly distances: Float64Array;
  private readonly parents: Int32Array;

  constructor(rows: number, cols: number) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols)) {
      throw MazeError.invalidDimensions(rows, cols, "dimensions must be integers");
    }
    if (rows < 1 || cols < 1) {
      throw MazeError.invalidDimensions(rows, cols, "dimensions must be at least 1");
    }

    this.rows = rows;
    this.cols = cols;
    this.size = rows * cols;
    this.walls = new Uint8Array(this.size).fill(ALL_WALLS);
    this.visited = new Uint8Array(this.size);
    this.onPath = new Uint8Array(this.size);
    this.distances = new Float64Array(this.size).fill(Infinity);
    this.parents = new Int32Array(this.size).fill(NO_PARENT);
  }

  // ===========================================================================
  // COORDINATES
  // ===========================================================================

  isInBounds(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      row < this.rows &&
      col >= 0 &&
      col < this.cols
    );
  }

  contains(coord: Coord): boolean {
    return this.isInBounds(coord.row, coord.col);
  }

  /**
   * Flat index of a cell. Callers guarantee bounds.
   */
  indexOf(row: number, col: number): number {
    return row * this.cols + col;
  }

  coordOf(index: number): Coord {
    return { row: Math.floor(index / this.cols), col: index % this.cols };
  }

  // ===========================================================================
  // CELLS & WALLS
  // ===========================================================================

  getCell(row: number, col: number): Cell | undefined {
    if (!this.isInBounds(row, col)) return undefined;
    const index = this.indexOf(row, col);
    const parent = this.parentIndex(index);

    return {
      row,
      col,
      walls: {
        top: this.wallStanding(index, DIRECTION_BY_SIDE.top),
        right: this.wallStanding(index, DIRECTION_BY_SIDE.right),
        bottom: this.wallStanding(index, DIRECTION_BY_SIDE.bottom),
        left: this.wallStanding(index, DIRECTION_BY_SIDE.left),
      },
      visited: this.isVisited(index),
      distance: this.distanceAt(index),
      parent: parent === NO_PARENT ? null : this.coordOf(parent),
      onPath: this.onPath[index] === 1,
    };
  }

  /**
   * Whether the wall on `side` of a cell stands. Out-of-bounds cells report
   * every wall as standing.
   */
  hasWall(row: number, col: number, side: WallSide): boolean {
    if (!this.isInBounds(row, col)) return true;
    return this.wallStanding(this.indexOf(row, col), DIRECTION_BY_SIDE[side]);
  }

  /**
   * Remove the wall shared by two adjacent cells, on both cells.
   *
   * @returns false if the wall was already down
   * @throws {RangeError} when the cells are out of bounds or not adjacent
   */
  removeWallBetween(a: Coord, b: Coord): boolean {
    if (!this.contains(a) || !this.contains(b)) {
      throw new RangeError(
        `Cannot remove wall between (${a.row}, ${a.col}) and (${b.row}, ${b.col}): out of bounds`,
      );
    }

    const direction = DIRECTIONS.find(
      (dir) => a.row + dir.dRow === b.row && a.col + dir.dCol === b.col,
    );
    if (!direction) {
      throw new RangeError(
        `Cells (${a.row}, ${a.col}) and (${b.row}, ${b.col}) are not adjacent`,
      );
    }

    const from = this.indexOf(a.row, a.col);
    const to = this.indexOf(b.row, b.col);
    if (!this.wallStanding(from, direction)) return false;

    this.walls[from] = (this.walls[from] ?? 0) & ~direction.bit;
    this.walls[to] = (this.walls[to] ?? 0) & ~direction.oppositeBit;
    return true;
  }

  /**
   * Number of removed internal walls, each shared wall counted once.
   */
  countPassages(): number {
    let passages = 0;
    for (let index = 0; index < this.size; index++) {
      const mask = this.walls[index] ?? ALL_WALLS;
      const col = index % this.cols;
      const row = Math.floor(index / this.cols);
      if (col < this.cols - 1 && (mask & DIRECTION_BY_SIDE.right.bit) === 0) passages++;
      if (row < this.rows - 1 && (mask & DIRECTION_BY_SIDE.bottom.bit) === 0) passages++;
    }
    return passages;
  }

  /**
   * Copy of the wall masks, one byte per cell in row-major order.
   */
  wallSnapshot(): Uint8Array {
    return new Uint8Array(this.walls);
  }

  // ===========================================================================
  // NEIGHBOURS
  // ===========================================================================

  /**
   * Grid-adjacent cells regardless of walls (top, right, bottom, left).
   */
  neighborsUnfiltered(coord: Coord): Coord[] {
    const neighbors: Coord[] = [];
    for (const dir of DIRECTIONS) {
      const row = coord.row + dir.dRow;
      const col = coord.col + dir.dCol;
      if (this.isInBounds(row, col)) {
        neighbors.push({ row, col });
      }
    }
    return neighbors;
  }

  /**
   * Grid-adjacent cells whose shared wall has been removed.
   */
  neighborsReachable(coord: Coord): Coord[] {
    if (!this.contains(coord)) return [];
    const neighbors: Coord[] = [];
    this.forEachReachable(this.indexOf(coord.row, coord.col), (index) => {
      neighbors.push(this.coordOf(index));
    });
    return neighbors;
  }

  /**
   * Index-based reachable neighbour iteration without allocation.
   */
  forEachReachable(index: number, callback: (neighbor: number) => void): void {
    const mask = this.walls[index] ?? ALL_WALLS;
    const row = Math.floor(index / this.cols);
    const col = index % this.cols;

    for (const dir of DIRECTIONS) {
      if ((mask & dir.bit) !== 0) continue;
      const nRow = row + dir.dRow;
      const nCol = col + dir.dCol;
      if (nRow >= 0 && nRow < this.rows && nCol >= 0 && nCol < this.cols) {
        callback(nRow * this.cols + nCol);
      }
    }
  }

  // ===========================================================================
  // TRANSIENT STATE
  // ===========================================================================

  isVisited(index: number): boolean {
    return this.visited[index] === 1;
  }

  markVisited(index: number): void {
    this.visited[index] = 1;
  }

  distanceAt(index: number): number {
    return this.distances[index] ?? Infinity;
  }

  parentIndex(index: number): number {
    return this.parents[index] ?? NO_PARENT;
  }

  /**
   * Record the best-known distance and predecessor of a cell.
   * Pass `-1` as parent for a search origin.
   */
  relax(index: number, distance: number, parent: number): void {
    this.distances[index] = distance;
    this.parents[index] = parent;
  }

  markPath(indices: Iterable<number>): void {
    for (const index of indices) {
      this.onPath[index] = 1;
    }
  }

  resetVisited(): void {
    this.visited.fill(0);
  }

  /**
   * Reset visited, distance, parent and path flags. Walls are untouched.
   */
  clearSearchState(): void {
    this.visited.fill(0);
    this.onPath.fill(0);
    this.distances.fill(Infinity);
    this.parents.fill(NO_PARENT);
  }

  private wallStanding(index: number, direction: Direction): boolean {
    return ((this.walls[index] ?? ALL_WALLS) & direction.bit) !== 0;
  }
}
