import type { ResponseInputItem } from "./models.js";
import type { ToolSession, TurnContext } from "./session.js";

export type SandboxPermissions = "use_default" | "require_escalated";

/** Structured parameters for one shell execution. */
export interface ShellToolCallParams {
  readonly command: string[];
  readonly workdir?: string;
  readonly timeoutMs?: number;
  readonly sandboxPermissions?: SandboxPermissions;
  /** Command prefix the user may approve for the rest of the session. */
  readonly prefixRule?: string[];
  /** Why the model asked for escalated permissions. */
  readonly justification?: string;
}

/**
 * The shape of a tool call's arguments. Closed union: adding a shape means
 * adding a variant here and handling it at every `switch (payload.type)`.
 */
export type ToolPayload =
  | { readonly type: "function"; readonly arguments: string }
  | {
      readonly type: "mcp";
      readonly server: string;
      readonly tool: string;
      /** Unparsed JSON text. */
      readonly rawArguments: string;
    }
  | { readonly type: "custom"; readonly input: string }
  | { readonly type: "local_shell"; readonly params: ShellToolCallParams };

export type ToolPayloadType = ToolPayload["type"];

/**
 * A model-issued request to invoke one tool, normalized away from the
 * wire item it arrived in. Built once, dispatched once.
 */
export interface ToolCall {
  readonly toolName: string;
  /** Correlates the eventual output with this request. Never rewritten. */
  readonly callId: string;
  readonly payload: ToolPayload;
}

/** JSON schema fragment describing function-tool parameters. */
export type JsonSchema = Readonly<Record<string, unknown>>;

/** A tool as advertised to the model. */
export type ToolSpec =
  | {
      readonly type: "function";
      readonly name: string;
      readonly description: string;
      readonly strict: boolean;
      readonly parameters: JsonSchema;
    }
  | {
      readonly type: "freeform";
      readonly name: string;
      readonly description: string;
      readonly format: { readonly type: "text" } | { readonly type: "grammar"; readonly syntax: "lark" | "regex"; readonly definition: string };
    }
  | { readonly type: "local_shell" }
  | { readonly type: "web_search" };

export interface ConfiguredToolSpec {
  readonly spec: ToolSpec;
  readonly supportsParallelToolCalls: boolean;
}

/** How the shell capability is exposed to the model. */
export type ShellToolType = "default" | "local" | "shell_command" | "disabled";

export interface ToolsConfig {
  readonly shellType: ShellToolType;
  readonly webSearch: boolean;
  /** Default timeout for shell executions without their own. */
  readonly shellTimeoutMs: number;
}

/** A tool listed by an MCP server. */
export interface McpToolDefinition {
  readonly name: string;
  readonly description?: string;
  readonly inputSchema: JsonSchema;
}

/** A tool declared by the client at session start and answered over the bus. */
export interface DynamicToolSpec {
  readonly name: string;
  readonly description: string;
  readonly format: "function" | "freeform";
  /** Required when `format` is "function". */
  readonly inputSchema?: JsonSchema;
  readonly supportsParallel?: boolean;
}

export type FileChangeKind = "add" | "update" | "delete";

/**
 * Per-turn record of files touched by tools. The one mutable piece of
 * state threaded through dispatch; the tracker owns its own discipline.
 */
export interface DiffTracker {
  record(path: string, kind: FileChangeKind): void;
  changedPaths(): string[];
}

/** Everything a handler needs to execute one call. */
export interface ToolInvocation {
  readonly session: ToolSession;
  readonly turn: TurnContext;
  readonly tracker: DiffTracker;
  readonly callId: string;
  readonly toolName: string;
  readonly payload: ToolPayload;
}

export type ToolKind = "function" | "mcp";

export interface ToolHandler {
  readonly kind: ToolKind;
  /** Whether this handler can interpret the payload at all. */
  matchesKind(payload: ToolPayload): boolean;
  /** Resolve with the output item, or reject with a `FunctionCallError`. */
  handle(invocation: ToolInvocation): Promise<ResponseInputItem>;
}

/** Payload of a `tool.request` event for a client-implemented tool. */
export interface DynamicToolRequest {
  readonly callId: string;
  readonly tool: string;
  readonly subId: string;
  /** Parsed JSON arguments for function-format tools. */
  readonly arguments?: unknown;
  /** Freeform input for freeform tools. */
  readonly input?: string;
}

/** Payload of the matching `tool.result` event. */
export interface DynamicToolResponse {
  readonly callId: string;
  readonly success: boolean;
  readonly output: string;
  readonly changes?: ReadonlyArray<{ readonly path: string; readonly kind: FileChangeKind }>;
}
