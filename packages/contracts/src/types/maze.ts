/**
 * A cell position. Rows grow downward, columns grow to the right.
 */
export interface Coord {
  readonly row: number;
  readonly col: number;
}

/**
 * The four sides of a cell, in neighbour scan order.
 */
export type WallSide = "top" | "right" | "bottom" | "left";

export const SEARCH_ALGORITHMS = ["astar", "dijkstra", "bfs", "dfs"] as const;

export type SearchAlgorithm = (typeof SEARCH_ALGORITHMS)[number];

export const SIZE_PRESET_NAMES = ["small", "medium", "large", "huge"] as const;

export type SizePreset = (typeof SIZE_PRESET_NAMES)[number];

/** Square side length for each named preset */
export const SIZE_PRESETS: Readonly<Record<SizePreset, number>> = {
  small: 15,
  medium: 25,
  large: 35,
  huge: 45,
};

export interface MazeConfig {
  rows: number;
  cols: number;
  /** Generation seed; omitted means a fresh random seed per maze */
  seed?: number;
  /** Allow start and end to designate the same cell */
  allowSameStartEnd: boolean;
}

export function isSearchAlgorithm(value: unknown): value is SearchAlgorithm {
  return SEARCH_ALGORITHMS.some((algorithm) => algorithm === value);
}

export function coordEquals(a: Coord, b: Coord): boolean {
  return a.row === b.row && a.col === b.col;
}
