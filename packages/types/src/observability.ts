import type { SpanId, Timestamp, TraceId } from "./foundational.js";

/**
 * Attached to every event. One trace per user turn, one span per step.
 */
export interface TraceContext {
  readonly traceId: TraceId;
  readonly spanId: SpanId;
  /** The span that caused this event. Absent for root spans. */
  readonly parentSpanId?: SpanId;
}

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Structured log entry emitted by any component. */
export interface LogEntry {
  readonly timestamp: Timestamp;
  readonly level: LogLevel;
  readonly message: string;
  readonly component: string;
  readonly data?: Record<string, unknown>;
}
