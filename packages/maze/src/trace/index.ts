export {
  createTraceCollector,
  DefaultTraceCollector,
  isCarveEvent,
  isVisitEvent,
  NoOpTraceCollector,
} from "./collector";
export type {
  CarveEvent,
  TraceCollector,
  TraceEvent,
  TraceEventType,
  TracePhase,
  VisitEvent,
} from "./types";
