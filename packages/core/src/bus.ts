import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  BusEvent,
  EventFilter,
  EventHandler,
  Subscription,
  EventTopic,
  TraceContext,
  EventId,
  SessionId,
  SpanId,
  TraceId,
} from "@switchyard/types";
import { createLogger, errorMessage, type Logger } from "./logger.js";

interface Subscriber {
  readonly id: string;
  readonly filter: EventFilter;
  readonly handler: EventHandler<unknown>;
}

/**
 * In-memory implementation of the event bus.
 *
 * A failing handler is logged and never surfaces to the publisher.
 */
export class InMemoryEventBus implements EventBus {
  private readonly subscribers = new Map<string, Subscriber>();
  private readonly log: Logger;

  constructor(log: Logger = createLogger("bus")) {
    this.log = log;
  }

  async publish<T>(event: BusEvent<T>): Promise<void> {
    const pending: Promise<void>[] = [];

    // Snapshot so handlers may unsubscribe while we iterate.
    for (const sub of [...this.subscribers.values()]) {
      if (!this.matches(event, sub.filter)) continue;
      try {
        const result = sub.handler(event);
        if (result instanceof Promise) {
          pending.push(result.catch((err: unknown) => this.reportHandlerError(event, err)));
        }
      } catch (err) {
        this.reportHandlerError(event, err);
      }
    }

    await Promise.all(pending);
  }

  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription {
    const id = uuidv7();
    // Handlers are stored untyped; the topic decides the payload shape.
    this.subscribers.set(id, { id, filter, handler: handler as EventHandler<unknown> });

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(id);
      },
    };
  }

  request<TReq, TRes>(
    event: BusEvent<TReq>,
    replyFilter: EventFilter,
    timeoutMs: number,
  ): Promise<BusEvent<TRes>> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        sub.unsubscribe();
        fn();
      };

      const sub = this.subscribe<TRes>(replyFilter, (reply) => {
        settle(() => resolve(reply));
      });
      const timeout = setTimeout(() => {
        settle(() => reject(new Error(`Timeout waiting for response to event ${event.id}`)));
      }, timeoutMs);

      this.publish(event).catch((err: unknown) => {
        settle(() => reject(err));
      });
    });
  }

  /** Number of live subscriptions. */
  get size(): number {
    return this.subscribers.size;
  }

  private reportHandlerError(event: BusEvent, err: unknown): void {
    this.log.error(
      "Event handler failed",
      { topic: event.topic, eventId: event.id, error: errorMessage(err) },
      event.traceCtx,
    );
  }

  private matches(event: BusEvent, filter: EventFilter): boolean {
    if (filter.topics && filter.topics.length > 0 && !filter.topics.includes(event.topic)) {
      return false;
    }
    if (filter.sessionId && event.sessionId !== filter.sessionId) {
      return false;
    }
    if (filter.predicate && !filter.predicate(event)) {
      return false;
    }
    return true;
  }
}

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<T>(
  topic: EventTopic,
  payload: T,
  traceCtx: TraceContext,
  sessionId?: SessionId,
): BusEvent<T> {
  return {
    id: uuidv7() as EventId,
    topic,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
    ...(sessionId ? { sessionId } : {}),
  };
}

/**
 * Helper to create a root trace context, or a child span of `parent`.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: uuidv7() as SpanId,
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: uuidv7() as TraceId,
    spanId: uuidv7() as SpanId,
  };
}
