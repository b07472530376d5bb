import type { EventId, SessionId, Timestamp } from "./foundational.js";
import type { TraceContext } from "./observability.js";

/**
 * Every message crossing a session boundary is a `BusEvent`.
 *
 * @typeParam T - The topic-specific payload type.
 */
export interface BusEvent<T = unknown> {
  readonly id: EventId;
  readonly topic: EventTopic;
  readonly payload: T;
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
  /** Owning session. Absent for process-wide events. */
  readonly sessionId?: SessionId;
}

/**
 * Enumerated event topics.
 * Using a string union rather than a numeric enum for debuggability.
 */
export type EventTopic =
  // Turn lifecycle
  | "agent.turn"
  | "agent.complete"
  | "agent.error"
  // Session-visible protocol events (EventMsg payloads)
  | "session.event"
  // Dynamic tools answered by the client
  | "tool.request"
  | "tool.result"
  // System
  | "system.shutdown"
  | "system.health";

/**
 * Predicate for filtering which events a subscriber receives.
 */
export interface EventFilter {
  /** Match specific topics. If empty, matches all topics. */
  readonly topics?: EventTopic[];
  /** Only events belonging to this session. */
  readonly sessionId?: SessionId;
  /** Custom predicate for advanced filtering. */
  readonly predicate?: (event: BusEvent) => boolean;
}

/** Callback signature for event subscribers. */
export type EventHandler<T = unknown> = (event: BusEvent<T>) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

/**
 * The Event Bus interface.
 *
 * Sessions publish protocol events here; clients answer dynamic tool
 * requests through it.
 */
export interface EventBus {
  /** Publish an event to all matching subscribers. */
  publish<T>(event: BusEvent<T>): Promise<void>;

  /** Subscribe to events matching the filter. */
  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription;

  /** Publish and wait for a single response event matching the reply filter. */
  request<TReq, TRes>(
    event: BusEvent<TReq>,
    replyFilter: EventFilter,
    timeoutMs: number,
  ): Promise<BusEvent<TRes>>;
}
