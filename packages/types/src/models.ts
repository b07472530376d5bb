/**
 * Conversation items exchanged with the model.
 *
 * `ResponseItem` is what the model emits (and what history stores);
 * `ResponseInputItem` is what the runtime sends back after a tool ran.
 * Wire-level snake_case fields are camelCase here; the runtime's codec
 * converts between the two.
 */

export type Role = "system" | "developer" | "user" | "assistant";

export type ContentItem =
  | { readonly type: "input_text"; readonly text: string }
  | { readonly type: "input_image"; readonly imageUrl: string }
  | { readonly type: "output_text"; readonly text: string };

export type LocalShellStatus = "completed" | "in_progress" | "incomplete";

/** The only action the legacy local-shell tool can request. */
export interface LocalShellExecAction {
  readonly type: "exec";
  readonly command: string[];
  readonly timeoutMs?: number;
  readonly workingDirectory?: string;
  readonly env?: Readonly<Record<string, string>>;
  readonly user?: string;
}

export type LocalShellAction = LocalShellExecAction;

export type FunctionCallOutputBody =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "content_items"; readonly items: ContentItem[] };

export interface FunctionCallOutputPayload {
  readonly body: FunctionCallOutputBody;
  /** Explicit `false` marks a failed call; absent means "not reported". */
  readonly success?: boolean;
}

/** Result of a call to a tool hosted on an MCP server. */
export interface McpCallToolResult {
  readonly content: ReadonlyArray<{ readonly type: string; readonly text?: string }>;
  readonly isError?: boolean;
  readonly structuredContent?: unknown;
}

export type McpToolCallOutcome =
  | { readonly ok: true; readonly value: McpCallToolResult }
  | { readonly ok: false; readonly error: string };

export type ResponseItem =
  | {
      readonly type: "message";
      readonly id?: string;
      readonly role: Role;
      readonly content: ContentItem[];
    }
  | {
      readonly type: "reasoning";
      readonly id: string;
      readonly summary: string[];
    }
  | {
      readonly type: "function_call";
      readonly id?: string;
      readonly name: string;
      /** Raw JSON text exactly as the model produced it. */
      readonly arguments: string;
      readonly callId: string;
    }
  | {
      readonly type: "custom_tool_call";
      readonly id?: string;
      readonly name: string;
      readonly input: string;
      readonly callId: string;
    }
  | {
      readonly type: "local_shell_call";
      /** Legacy id, used when `callId` is missing. */
      readonly id?: string;
      readonly callId?: string;
      readonly status: LocalShellStatus;
      readonly action: LocalShellAction;
    }
  | {
      readonly type: "web_search_call";
      readonly id?: string;
      readonly status?: string;
    }
  | {
      readonly type: "function_call_output";
      readonly callId: string;
      readonly output: FunctionCallOutputPayload;
    }
  | {
      readonly type: "custom_tool_call_output";
      readonly callId: string;
      readonly output: string;
    }
  /** Anything the codec does not recognise. Never a tool call. */
  | { readonly type: "other" };

export type ResponseInputItem =
  | {
      readonly type: "message";
      readonly role: Role;
      readonly content: ContentItem[];
    }
  | {
      readonly type: "function_call_output";
      readonly callId: string;
      readonly output: FunctionCallOutputPayload;
    }
  | {
      readonly type: "custom_tool_call_output";
      readonly callId: string;
      readonly output: string;
    }
  | {
      readonly type: "mcp_tool_call_output";
      readonly callId: string;
      readonly result: McpToolCallOutcome;
    };

/** User-supplied input for a turn or task. */
export type UserInput =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "image"; readonly imageUrl: string };
