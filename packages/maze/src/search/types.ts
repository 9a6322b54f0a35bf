/**
 * Search engine contracts.
 */

import type { Coord, SearchAlgorithm } from "@labyrinth/contracts";
import type { TraceCollector } from "../trace";

/**
 * Called once per expanded cell, in expansion order. Advisory only: the
 * return value is ignored.
 */
export type VisitObserver = (cell: Coord) => void;

export interface SearchOptions {
  readonly onVisit?: VisitObserver;
  /** Polled before every expansion; an aborted signal ends the search */
  readonly signal?: AbortSignal;
  readonly trace?: TraceCollector;
}

interface SearchStats {
  readonly algorithm: SearchAlgorithm;
  /** Cells expanded, including the end cell when it was reached */
  readonly visitedCount: number;
  readonly durationMs: number;
}

export interface PathFound extends SearchStats {
  readonly found: true;
  /** Start to end inclusive */
  readonly path: readonly Coord[];
  /** Cells on the path; a start that equals the end gives 1 */
  readonly length: number;
  readonly cancelled: false;
}

export interface NoPathFound extends SearchStats {
  readonly found: false;
  readonly path: null;
  /** True when the search stopped on an aborted signal, not an empty frontier */
  readonly cancelled: boolean;
}

/**
 * Discriminated union - use `if (result.found)` to narrow.
 */
export type SearchResult = PathFound | NoPathFound;

/**
 * Discovered-but-not-finalised cells, by flat index.
 */
export interface Frontier {
  readonly isEmpty: boolean;
  push(index: number, priority: number): void;
  pop(): number | undefined;
}

/**
 * `on-discovery`: a cell is closed when first reached, so it enters the
 * frontier once. `on-expansion`: a cell is closed when popped, and stale
 * duplicates are skipped.
 */
export type VisitPolicy = "on-discovery" | "on-expansion";

export interface SearchStrategy {
  readonly algorithm: SearchAlgorithm;
  readonly visitPolicy: VisitPolicy;
  /** Whether the reported path is guaranteed shortest */
  readonly optimal: boolean;
  createFrontier(): Frontier;
  /** Frontier key for a cell reached at `distance`; ignored by unordered frontiers */
  priority(distance: number, cell: Coord, goal: Coord): number;
}
