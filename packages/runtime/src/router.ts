import type {
  ConfiguredToolSpec,
  DiffTracker,
  DynamicToolSpec,
  McpToolDefinition,
  ResponseInputItem,
  ResponseItem,
  ShellToolCallParams,
  ToolCall,
  ToolSession,
  ToolSpec,
  ToolsConfig,
  TurnContext,
} from "@switchyard/types";
import { FunctionCallError, errorMessage, isFatal, isFunctionCallError } from "@switchyard/core";
import type { ToolRegistry } from "./registry.js";
import { SHELL_TOOL_ALIASES, buildSpecs, toolSpecName, type SpecBuilderDeps } from "./tool-spec.js";

/**
 * Turns model output into tool calls and tool calls into conversation items.
 *
 * Built once per configuration snapshot and never mutated, so concurrent
 * `buildToolCall` / `dispatchToolCall` calls need no coordination.
 */
export class ToolRouter {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly configuredSpecs: readonly ConfiguredToolSpec[],
  ) {}

  static fromConfig(
    config: ToolsConfig,
    mcpTools: ReadonlyMap<string, McpToolDefinition> | undefined,
    dynamicTools: readonly DynamicToolSpec[],
    deps: SpecBuilderDeps = {},
  ): ToolRouter {
    const { specs, registry } = buildSpecs(config, mcpTools, dynamicTools, deps).build();
    return new ToolRouter(registry, specs);
  }

  /** Advertised specs, in construction order. */
  specs(): ToolSpec[] {
    return this.configuredSpecs.map((c) => c.spec);
  }

  /**
   * Whether calls to `toolName` may run alongside other calls. Any shell
   * alias answers for the whole alias set.
   */
  toolSupportsParallel(toolName: string): boolean {
    if (this.configuredToolSupportsParallel(toolName)) {
      return true;
    }
    if (SHELL_TOOL_ALIASES.includes(toolName)) {
      return SHELL_TOOL_ALIASES.some((alias) => this.configuredToolSupportsParallel(alias));
    }
    return false;
  }

  private configuredToolSupportsParallel(toolName: string): boolean {
    return this.configuredSpecs.some(
      (c) => c.supportsParallelToolCalls && toolSpecName(c.spec) === toolName,
    );
  }

  /**
   * Classify a model output item. Resolves `undefined` for items that are
   * not tool calls; rejects only when a local shell call carries no id.
   */
  static async buildToolCall(session: ToolSession, item: ResponseItem): Promise<ToolCall | undefined> {
    switch (item.type) {
      case "function_call": {
        const mcp = await session.parseMcpToolName(item.name);
        if (mcp) {
          return {
            toolName: item.name,
            callId: item.callId,
            payload: {
              type: "mcp",
              server: mcp.server,
              tool: mcp.tool,
              rawArguments: item.arguments,
            },
          };
        }
        return {
          toolName: item.name,
          callId: item.callId,
          payload: { type: "function", arguments: item.arguments },
        };
      }
      case "custom_tool_call":
        return {
          toolName: item.name,
          callId: item.callId,
          payload: { type: "custom", input: item.input },
        };
      case "local_shell_call": {
        const callId = item.callId ?? item.id;
        if (callId === undefined) {
          throw FunctionCallError.missingLocalShellCallId();
        }
        const params: ShellToolCallParams = {
          command: item.action.command,
          workdir: item.action.workingDirectory,
          timeoutMs: item.action.timeoutMs,
          sandboxPermissions: "use_default",
          prefixRule: undefined,
          justification: undefined,
        };
        return { toolName: "local_shell", callId, payload: { type: "local_shell", params } };
      }
      case "message":
      case "reasoning":
      case "web_search_call":
      case "function_call_output":
      case "custom_tool_call_output":
      case "other":
        return undefined;
    }
  }

  /**
   * Run a call through the registry. Fatal errors reject; every other
   * failure resolves to an output item in the caller's channel.
   */
  async dispatchToolCall(
    session: ToolSession,
    turn: TurnContext,
    tracker: DiffTracker,
    call: ToolCall,
  ): Promise<ResponseInputItem> {
    const { toolName, callId, payload } = call;
    const payloadOutputsCustom = payload.type === "custom";

    try {
      return await this.registry.dispatch({ session, turn, tracker, callId, toolName, payload });
    } catch (err) {
      if (isFatal(err)) {
        throw err;
      }
      if (!isFunctionCallError(err)) {
        // The registry only rejects with FunctionCallError; anything else is a broken contract.
        throw FunctionCallError.fatal(`registry rejected ${toolName} with ${errorMessage(err)}`, err);
      }
      return ToolRouter.failureResponse(callId, payloadOutputsCustom, err);
    }
  }

  /** Render a recoverable error in the same channel the call came from. */
  static failureResponse(
    callId: string,
    payloadOutputsCustom: boolean,
    err: FunctionCallError,
  ): ResponseInputItem {
    const message = err.message;
    if (payloadOutputsCustom) {
      return { type: "custom_tool_call_output", callId, output: message };
    }
    return {
      type: "function_call_output",
      callId,
      output: { body: { type: "text", text: message }, success: false },
    };
  }
}
