/**
 * Trace collector implementation for debugging and observability.
 */

import type { Coord } from "@labyrinth/contracts";
import type {
  CarveEvent,
  TraceCollector,
  TraceEvent,
  TraceEventType,
  TracePhase,
  VisitEvent,
} from "./types";

/**
 * Records every event in memory with a timestamp relative to construction.
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled = true;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor() {
    this.startTime = performance.now();
  }

  private emit(phase: TracePhase, eventType: TraceEventType, data?: unknown): void {
    this.events.push({
      timestamp: performance.now() - this.startTime,
      phase,
      eventType,
      ...(data !== undefined && { data }),
    });
  }

  start(phase: TracePhase, data?: Record<string, unknown>): void {
    this.emit(phase, "start", data);
  }

  end(phase: TracePhase, durationMs: number): void {
    this.emit(phase, "end", { durationMs });
  }

  carve(from: Coord, to: Coord): void {
    this.emit("generate", "carve", { from, to });
  }

  visit(cell: Coord): void {
    this.emit("solve", "visit", { cell });
  }

  warning(phase: TracePhase, message: string): void {
    this.emit(phase, "warning", { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  /**
   * Visited cells in expansion order, as a renderer would replay them.
   */
  getVisitOrder(): Coord[] {
    return this.events.filter(isVisitEvent).map((event) => event.data.cell);
  }

  getCarveCount(): number {
    return this.events.filter(isCarveEvent).length;
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * No-op trace collector for production
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_phase: TracePhase, _data?: Record<string, unknown>): void {}
  end(_phase: TracePhase, _durationMs: number): void {}
  carve(_from: Coord, _to: Coord): void {}
  visit(_cell: Coord): void {}
  warning(_phase: TracePhase, _message: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  clear(): void {}
}

export function isVisitEvent(event: TraceEvent): event is VisitEvent {
  return event.eventType === "visit";
}

export function isCarveEvent(event: TraceEvent): event is CarveEvent {
  return event.eventType === "carve";
}

/**
 * Create a trace collector based on configuration
 */
export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector() : new NoOpTraceCollector();
}
