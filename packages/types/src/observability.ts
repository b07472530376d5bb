import type { SpanId, Timestamp, TraceId } from "./foundational.js";

/**
 * Attached to every bus event and turn. Ties a tool call back to the
 * model request that issued it.
 *
 * Compatible with OpenTelemetry W3C Trace Context.
 */
export interface TraceContext {
  /** Unique per top-level user request. All descendant spans share this. */
  readonly traceId: TraceId;
  /** Unique per event/operation. */
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
  /** Emitting component, e.g. "router" or "task.compact". */
  readonly component: string;
  readonly traceCtx?: TraceContext;
  readonly data?: Record<string, unknown>;
}

/** Tags attached to a counter emission. */
export type MetricTags = Readonly<Record<string, string>>;

/**
 * Counter sink handed to sessions. Implementations may throw;
 * callers treat emission as best-effort.
 */
export interface Telemetry {
  counter(name: string, delta: number, tags?: MetricTags): void;
}
