import { describe, it, expect, vi } from "vitest";
import type { BusEvent, EventId, SessionId } from "@switchyard/types";
import { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
import { createLogger } from "./logger.js";

const quietLog = createLogger("bus", { sink: () => {} });

describe("InMemoryEventBus", () => {
  it("should deliver to matching subscribers and propagate trace context", async () => {
    const bus = new InMemoryEventBus(quietLog);
    const handler = vi.fn();
    const sub = bus.subscribe({ topics: ["system.health"] }, handler);

    const traceCtx = createTraceContext();
    const event: BusEvent<{ status: string }> = {
      id: "evt-1" as EventId,
      topic: "system.health",
      payload: { status: "ok" },
      traceCtx,
      timestamp: new Date().toISOString(),
    };

    await bus.publish(event);

    expect(handler).toHaveBeenCalledWith(event);
    expect(handler.mock.calls[0][0].traceCtx.traceId).toBe(traceCtx.traceId);

    sub.unsubscribe();
    expect(bus.size).toBe(0);
  });

  it("should filter by session id", async () => {
    const bus = new InMemoryEventBus(quietLog);
    const handler = vi.fn();
    bus.subscribe({ sessionId: "s-1" as SessionId }, handler);

    const trace = createTraceContext();
    await bus.publish(createEvent("session.event", { n: 1 }, trace, "s-2" as SessionId));
    await bus.publish(createEvent("session.event", { n: 2 }, trace, "s-1" as SessionId));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0].payload).toEqual({ n: 2 });
  });

  it("should log a failing handler without rejecting the publisher", async () => {
    const sink = vi.fn();
    const bus = new InMemoryEventBus(createLogger("bus", { sink }));
    const after = vi.fn();
    bus.subscribe({}, () => {
      throw new Error("sync boom");
    });
    bus.subscribe({}, async () => {
      throw new Error("async boom");
    });
    bus.subscribe({}, after);

    await expect(
      bus.publish(createEvent("system.health", {}, createTraceContext())),
    ).resolves.toBeUndefined();

    expect(after).toHaveBeenCalledTimes(1);
    const errors = sink.mock.calls.map(([entry]) => entry.data.error);
    expect(errors).toEqual(["sync boom", "async boom"]);
  });

  it("should resolve a request with the first matching reply", async () => {
    const bus = new InMemoryEventBus(quietLog);
    bus.subscribe<{ callId: string }>({ topics: ["tool.request"] }, async (event) => {
      await bus.publish(
        createEvent("tool.result", { callId: event.payload.callId, output: "pong" }, event.traceCtx),
      );
    });

    const reply = await bus.request<{ callId: string }, { callId: string; output: string }>(
      createEvent("tool.request", { callId: "c-1" }, createTraceContext()),
      { topics: ["tool.result"] },
      1000,
    );

    expect(reply.payload).toEqual({ callId: "c-1", output: "pong" });
    expect(bus.size).toBe(1);
  });

  it("should reject a request nobody answers", async () => {
    vi.useFakeTimers();
    try {
      const bus = new InMemoryEventBus(quietLog);
      const event = createEvent("tool.request", {}, createTraceContext());
      const pending = bus.request(event, { topics: ["tool.result"] }, 50);
      vi.advanceTimersByTime(50);
      await expect(pending).rejects.toThrow(`Timeout waiting for response to event ${event.id}`);
      expect(bus.size).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("createTraceContext", () => {
  it("should keep the trace id and link the parent span", () => {
    const root = createTraceContext();
    const child = createTraceContext(root);

    expect(root.parentSpanId).toBeUndefined();
    expect(child.traceId).toBe(root.traceId);
    expect(child.parentSpanId).toBe(root.spanId);
    expect(child.spanId).not.toBe(root.spanId);
  });
});
