/**
 * Grid model types and the wall bitmask layout.
 */

import type { Coord, WallSide } from "@labyrinth/contracts";

/**
 * Wall bits stored per cell. A set bit means the wall is standing.
 */
export const WallBit = {
  TOP: 1,
  RIGHT: 2,
  BOTTOM: 4,
  LEFT: 8,
} as const;

export const ALL_WALLS = WallBit.TOP | WallBit.RIGHT | WallBit.BOTTOM | WallBit.LEFT;

export interface Direction {
  readonly side: WallSide;
  readonly dRow: number;
  readonly dCol: number;
  readonly bit: number;
  /** Bit of the same wall as seen from the neighbouring cell */
  readonly oppositeBit: number;
}

const TOP: Direction = { side: "top", dRow: -1, dCol: 0, bit: WallBit.TOP, oppositeBit: WallBit.BOTTOM };
const RIGHT: Direction = { side: "right", dRow: 0, dCol: 1, bit: WallBit.RIGHT, oppositeBit: WallBit.LEFT };
const BOTTOM: Direction = { side: "bottom", dRow: 1, dCol: 0, bit: WallBit.BOTTOM, oppositeBit: WallBit.TOP };
const LEFT: Direction = { side: "left", dRow: 0, dCol: -1, bit: WallBit.LEFT, oppositeBit: WallBit.RIGHT };

/**
 * Neighbour scan order: top, right, bottom, left.
 *
 * Generation, search expansion and tie order all follow this table, so it
 * fixes which of several equal-cost paths a search reports.
 */
export const DIRECTIONS: readonly Direction[] = [TOP, RIGHT, BOTTOM, LEFT];

export const DIRECTION_BY_SIDE: Readonly<Record<WallSide, Direction>> = {
  top: TOP,
  right: RIGHT,
  bottom: BOTTOM,
  left: LEFT,
};

export type Walls = Readonly<Record<WallSide, boolean>>;

/**
 * Read view of one cell. Built on demand; mutating it has no effect on the
 * grid.
 */
export interface Cell {
  readonly row: number;
  readonly col: number;
  readonly walls: Walls;
  readonly visited: boolean;
  readonly distance: number;
  readonly parent: Coord | null;
  readonly onPath: boolean;
}

/**
 * Read-only surface of a maze grid, for renderers and validators.
 */
export interface ReadonlyMazeGrid {
  readonly rows: number;
  readonly cols: number;
  readonly size: number;
  isInBounds(row: number, col: number): boolean;
  getCell(row: number, col: number): Cell | undefined;
  hasWall(row: number, col: number, side: WallSide): boolean;
  neighborsUnfiltered(coord: Coord): Coord[];
  neighborsReachable(coord: Coord): Coord[];
  countPassages(): number;
  wallSnapshot(): Uint8Array;
}
