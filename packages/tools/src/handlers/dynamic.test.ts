import { describe, it, expect } from "vitest";
import type {
  DynamicToolRequest,
  SessionId,
  SubmissionId,
  ToolInvocation,
  ToolPayload,
  ToolSession,
  TurnContext,
} from "@switchyard/types";
import {
  InMemoryEventBus,
  MetricsRecorder,
  createEvent,
  createLogger,
  createTraceContext,
} from "@switchyard/core";
import { TurnDiffTracker } from "../diff-tracker.js";
import { DynamicToolHandler } from "./dynamic.js";

const SESSION_ID = "session-9" as SessionId;

const turn: TurnContext = {
  subId: "sub-4" as SubmissionId,
  cwd: "/work",
  model: "mock",
  provider: { name: "local", wireApi: "chat" },
  sandboxPolicy: "workspace-write",
  traceCtx: createTraceContext(),
};

function setup(payload: ToolPayload) {
  const bus = new InMemoryEventBus(createLogger("bus", { sink: () => {} }));
  const tracker = new TurnDiffTracker();
  const session: ToolSession = {
    id: SESSION_ID,
    bus,
    mcp: { callTool: () => Promise.reject(new Error("unused")) },
    telemetry: new MetricsRecorder(),
    parseMcpToolName: async () => undefined,
    sendEvent: async () => {},
  };
  const invocation: ToolInvocation = {
    session,
    turn,
    tracker,
    callId: "call-11",
    toolName: "notes",
    payload,
  };
  return { bus, tracker, invocation };
}

/** Answer every request on the bus, like a client would. */
function answerWith(bus: InMemoryEventBus, reply: (req: DynamicToolRequest) => unknown) {
  const seen: DynamicToolRequest[] = [];
  bus.subscribe<DynamicToolRequest>({ topics: ["tool.request"] }, async (event) => {
    seen.push(event.payload);
    await bus.publish(createEvent("tool.result", reply(event.payload), event.traceCtx, SESSION_ID));
  });
  return seen;
}

describe("DynamicToolHandler", () => {
  it("should send parsed arguments and record reported changes", async () => {
    const { bus, tracker, invocation } = setup({ type: "function", arguments: '{"title":"todo"}' });
    const seen = answerWith(bus, (req) => ({
      callId: req.callId,
      success: true,
      output: "saved",
      changes: [{ path: "notes/todo.md", kind: "add" }],
    }));

    const output = await new DynamicToolHandler(1000).handle(invocation);

    expect(seen).toEqual([{ callId: "call-11", tool: "notes", subId: "sub-4", arguments: { title: "todo" } }]);
    expect(output).toEqual({
      type: "function_call_output",
      callId: "call-11",
      output: { body: { type: "text", text: "saved" }, success: true },
    });
    expect(tracker.changedPaths()).toEqual(["notes/todo.md"]);
  });

  it("should answer a freeform call in the custom channel", async () => {
    const { bus, invocation } = setup({ type: "custom", input: "buy milk" });
    const seen = answerWith(bus, (req) => ({ callId: req.callId, success: false, output: "read-only" }));

    const output = await new DynamicToolHandler(1000).handle(invocation);

    expect(seen[0].input).toBe("buy milk");
    expect(output).toEqual({ type: "custom_tool_call_output", callId: "call-11", output: "read-only" });
  });

  it("should ignore replies for other calls", async () => {
    const { bus, invocation } = setup({ type: "custom", input: "x" });
    answerWith(bus, () => ({ callId: "someone-else", success: true, output: "wrong" }));

    await expect(new DynamicToolHandler(20).handle(invocation)).rejects.toMatchObject({
      kind: "respond_to_model",
    });
  });

  it("should report unparseable arguments to the model", async () => {
    const { invocation } = setup({ type: "function", arguments: "{" });

    await expect(new DynamicToolHandler(20).handle(invocation)).rejects.toThrow(
      /^failed to parse function arguments: /,
    );
  });
});
