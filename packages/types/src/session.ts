import type { SessionId, SubmissionId } from "./foundational.js";
import type { TraceContext, Telemetry } from "./observability.js";
import type { EventBus } from "./event-bus.js";
import type { EventMsg } from "./protocol.js";
import type { McpCallToolResult } from "./models.js";

/** Which API family a provider speaks. */
export type WireApi = "responses" | "chat";

export interface ModelProviderInfo {
  readonly name: string;
  readonly baseUrl?: string;
  readonly wireApi: WireApi;
  /** Provider exposes a server-side compaction endpoint. */
  readonly remoteCompaction?: boolean;
  /** Environment variable holding the provider's API key. */
  readonly apiKeyEnv?: string;
}

export type SandboxPolicy = "read-only" | "workspace-write" | "danger-full-access";

/**
 * Immutable per-turn settings shared by every tool call and task in the turn.
 */
export interface TurnContext {
  readonly subId: SubmissionId;
  readonly cwd: string;
  readonly model: string;
  readonly provider: ModelProviderInfo;
  readonly sandboxPolicy: SandboxPolicy;
  readonly traceCtx: TraceContext;
}

/** A resolved MCP tool reference. */
export interface McpToolRef {
  readonly server: string;
  readonly tool: string;
}

/** Connections to MCP servers, owned outside the runtime. */
export interface McpClient {
  callTool(server: string, tool: string, args: Record<string, unknown>): Promise<McpCallToolResult>;
}

/**
 * What the router and tool handlers may ask of a session. Shared by every
 * concurrent call in a turn; implementations must not need external locking.
 */
export interface ToolSession {
  readonly id: SessionId;
  readonly bus: EventBus;
  readonly mcp: McpClient;
  readonly telemetry: Telemetry;
  /** Resolve a fully-qualified tool name to its MCP server and tool. */
  parseMcpToolName(name: string): Promise<McpToolRef | undefined>;
  sendEvent(turn: TurnContext, msg: EventMsg): Promise<void>;
}
