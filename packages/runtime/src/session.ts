import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  EventMsg,
  McpClient,
  McpToolDefinition,
  McpToolRef,
  ModelProviderInfo,
  ResponseItem,
  SandboxPolicy,
  SessionId,
  SubmissionId,
  Telemetry,
  ToolSession,
  TraceContext,
  TurnContext,
} from "@switchyard/types";
import {
  MetricsRecorder,
  createEvent,
  createLogger,
  createTraceContext,
  type Logger,
} from "@switchyard/core";
import type { ModelAdapter } from "./model-adapter.js";
import { MCP_TOOL_NAME_DELIMITER } from "./tool-spec.js";

const noMcpServers: McpClient = {
  callTool: (server) => Promise.reject(new Error(`unknown MCP server '${server}'`)),
};

export interface AgentSessionOptions {
  bus: EventBus;
  model: ModelAdapter;
  id?: SessionId;
  mcp?: McpClient;
  /** Fully-qualified MCP tool names (`mcp__server__tool`) currently available. */
  mcpTools?: ReadonlyMap<string, McpToolDefinition>;
  telemetry?: Telemetry;
  log?: Logger;
}

/**
 * Split `mcp__<server>__<tool>`. The tool part may itself contain the
 * delimiter; the server part may not.
 */
export function splitMcpToolName(name: string): McpToolRef | undefined {
  const [prefix, server, ...rest] = name.split(MCP_TOOL_NAME_DELIMITER);
  if (prefix !== "mcp" || !server || rest.length === 0) return undefined;
  const tool = rest.join(MCP_TOOL_NAME_DELIMITER);
  return tool ? { server, tool } : undefined;
}

/**
 * A conversation with one model: its history, its MCP tool listing and
 * its channel to the client. Shared by every tool call and task in a turn.
 */
export class AgentSession implements ToolSession {
  readonly id: SessionId;
  readonly bus: EventBus;
  readonly mcp: McpClient;
  readonly telemetry: Telemetry;
  readonly model: ModelAdapter;
  readonly mcpTools: ReadonlyMap<string, McpToolDefinition>;
  readonly log: Logger;
  private history: ResponseItem[] = [];

  constructor(opts: AgentSessionOptions) {
    this.id = opts.id ?? (uuidv7() as SessionId);
    this.bus = opts.bus;
    this.model = opts.model;
    this.mcp = opts.mcp ?? noMcpServers;
    this.mcpTools = opts.mcpTools ?? new Map();
    this.telemetry = opts.telemetry ?? new MetricsRecorder();
    this.log = opts.log ?? createLogger("session");
  }

  async parseMcpToolName(name: string): Promise<McpToolRef | undefined> {
    if (!this.mcpTools.has(name)) return undefined;
    return splitMcpToolName(name);
  }

  async sendEvent(turn: TurnContext, msg: EventMsg): Promise<void> {
    if (msg.type === "error") {
      this.log.warn("Session error", { sessionId: this.id, message: msg.message }, turn.traceCtx);
    }
    await this.bus.publish(createEvent("session.event", msg, createTraceContext(turn.traceCtx), this.id));
  }

  historySnapshot(): ResponseItem[] {
    return [...this.history];
  }

  recordItems(items: readonly ResponseItem[]): void {
    this.history.push(...items);
  }

  replaceHistory(items: readonly ResponseItem[]): void {
    this.history = [...items];
  }
}

export interface TurnOptions {
  cwd: string;
  model: string;
  provider: ModelProviderInfo;
  sandboxPolicy?: SandboxPolicy;
  subId?: SubmissionId;
  traceCtx?: TraceContext;
}

export function createTurnContext(opts: TurnOptions): TurnContext {
  return {
    subId: opts.subId ?? (uuidv7() as SubmissionId),
    cwd: opts.cwd,
    model: opts.model,
    provider: opts.provider,
    sandboxPolicy: opts.sandboxPolicy ?? "workspace-write",
    traceCtx: opts.traceCtx ?? createTraceContext(),
  };
}
