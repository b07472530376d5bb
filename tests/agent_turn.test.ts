import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import path from "node:path";
import { fileURLToPath } from "node:url";

import {
  InMemoryEventBus,
  MetricsRecorder,
  createEvent,
  createTraceContext,
  loadRuntimeConfig,
  setDefaultLogLevel,
  type RuntimeConfig,
} from "@switchyard/core";
import type { CommandRunner } from "@switchyard/tools";
import {
  AgentLoop,
  AgentSession,
  ScriptedModelAdapter,
  ToolRouter,
  parseResponseItem,
  toolSpecName,
} from "@switchyard/runtime";
import type { DynamicToolRequest, DynamicToolResponse, McpClient, TurnCompleted } from "@switchyard/types";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const CONFIG_PATH = path.join(__dirname, "fixtures", "runtime.yaml");

const mcpTools = new Map([
  ["mcp__docs__search", { name: "search", description: "Search the docs", inputSchema: { type: "object" } }],
]);

describe("Agent turn", () => {
  let config: RuntimeConfig;

  beforeAll(async () => {
    config = await loadRuntimeConfig(CONFIG_PATH);
    setDefaultLogLevel(config.logging.level);
  });

  afterAll(() => {
    setDefaultLogLevel("info");
  });

  /** Full stack from config: bus, session, router, loop, and a client answering tool requests. */
  function createAgentStack(steps: unknown[][], runner: CommandRunner) {
    const bus = new InMemoryEventBus();
    const callTool = vi.fn<McpClient["callTool"]>(async () => ({ content: [{ type: "text", text: "found 3" }] }));
    const model = new ScriptedModelAdapter(steps.map((step) => step.map(parseResponseItem)));
    const session = new AgentSession({
      bus,
      model,
      mcp: { callTool },
      mcpTools,
      telemetry: new MetricsRecorder({ enabled: config.telemetry.enabled }),
    });
    const router = ToolRouter.fromConfig(config.tools, mcpTools, config.dynamicTools, {
      commandRunner: runner,
      dynamicToolTimeoutMs: config.dynamicToolTimeoutMs,
    });
    const loop = new AgentLoop({
      session,
      router,
      defaults: { cwd: "/work/repo", model: config.model, provider: config.provider },
    });
    loop.start();

    const requests: DynamicToolRequest[] = [];
    bus.subscribe<DynamicToolRequest>({ topics: ["tool.request"], sessionId: session.id }, async (event) => {
      requests.push(event.payload);
      const reply: DynamicToolResponse = { callId: event.payload.callId, success: true, output: "team-a" };
      await bus.publish(createEvent("tool.result", reply, createTraceContext(event.traceCtx), session.id));
    });

    const completed: TurnCompleted[] = [];
    bus.subscribe<TurnCompleted>({ topics: ["agent.complete"] }, (event) => {
      completed.push(event.payload);
    });

    const ask = (subId: string, text: string) =>
      bus.publish(
        createEvent(
          "agent.turn",
          { subId, op: { type: "user_input", items: [{ type: "text", text }] } },
          createTraceContext(),
          session.id,
        ),
      );

    return { model, callTool, requests, completed, ask };
  }

  it("should load the fixture config", () => {
    expect(config.model).toBe("test-model");
    expect(config.tools).toEqual({ shellType: "default", webSearch: false, shellTimeoutMs: 1500 });
    expect(config.dynamicTools.map((t) => t.name)).toEqual(["lookup_owner"]);
  });

  it("should run shell, MCP and client tools before answering", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ stdout: "README.md", stderr: "", exitCode: 0, timedOut: false }));
    const { model, callTool, requests, completed, ask } = createAgentStack(
      [
        [
          { type: "function_call", name: "shell", arguments: '{"command":["ls"]}', call_id: "c1" },
          { type: "function_call", name: "mcp__docs__search", arguments: '{"q":"bus"}', call_id: "c2" },
        ],
        [{ type: "function_call", name: "lookup_owner", arguments: '{"path":"src/bus.ts"}', call_id: "c3" }],
        [{ type: "message", role: "assistant", content: [{ type: "output_text", text: "The bus belongs to team-a." }] }],
      ],
      runner,
    );

    await ask("sub-1", "Who owns the bus?");

    expect(completed).toEqual([{ subId: "sub-1", message: "The bus belongs to team-a." }]);
    expect(runner).toHaveBeenCalledWith(["ls"], { cwd: "/work/repo", timeoutMs: 1500 });
    expect(callTool).toHaveBeenCalledWith("docs", "search", { q: "bus" });
    expect(requests).toEqual([
      { callId: "c3", tool: "lookup_owner", subId: "sub-1", arguments: { path: "src/bus.ts" } },
    ]);

    expect(model.prompts).toHaveLength(3);
    expect(model.prompts[0].tools.map(toolSpecName)).toEqual(["shell", "mcp__docs__search", "lookup_owner"]);
    expect(model.prompts[1].input.slice(-2)).toEqual([
      {
        type: "function_call_output",
        callId: "c1",
        output: { body: { type: "text", text: "Exit code: 0\nOutput:\nREADME.md" }, success: true },
      },
      {
        type: "function_call_output",
        callId: "c2",
        output: { body: { type: "text", text: '[{"type":"text","text":"found 3"}]' }, success: true },
      },
    ]);
    expect(model.prompts[2].input.at(-1)).toEqual({
      type: "function_call_output",
      callId: "c3",
      output: { body: { type: "text", text: "team-a" }, success: true },
    });
  });

  it("should tell the model when a command cannot start", async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw new Error("spawn nosuchtool ENOENT");
    });
    const { model, completed, ask } = createAgentStack(
      [
        [{ type: "function_call", name: "shell", arguments: '{"command":["nosuchtool"]}', call_id: "c1" }],
        [{ type: "message", role: "assistant", content: [{ type: "output_text", text: "That tool is not installed." }] }],
      ],
      runner,
    );

    await ask("sub-2", "Run nosuchtool");

    expect(completed).toEqual([{ subId: "sub-2", message: "That tool is not installed." }]);
    expect(model.prompts[1].input.at(-1)).toEqual({
      type: "function_call_output",
      callId: "c1",
      output: { body: { type: "text", text: "failed to start nosuchtool: spawn nosuchtool ENOENT" }, success: false },
    });
  });
});
