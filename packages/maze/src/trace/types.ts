/**
 * Trace types for observing generation and search.
 */

import type { Coord } from "@labyrinth/contracts";

export type TraceEventType = "start" | "end" | "carve" | "visit" | "warning";

export type TracePhase = "generate" | "solve";

export interface TraceEvent {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  readonly phase: TracePhase;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

export interface CarveEvent extends TraceEvent {
  readonly eventType: "carve";
  readonly data: { readonly from: Coord; readonly to: Coord };
}

export interface VisitEvent extends TraceEvent {
  readonly eventType: "visit";
  readonly data: { readonly cell: Coord };
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(phase: TracePhase, data?: Record<string, unknown>): void;
  end(phase: TracePhase, durationMs: number): void;
  carve(from: Coord, to: Coord): void;
  visit(cell: Coord): void;
  warning(phase: TracePhase, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}
