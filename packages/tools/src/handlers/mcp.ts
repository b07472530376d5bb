import type { ResponseInputItem, ToolHandler, ToolInvocation, ToolPayload } from "@switchyard/types";
import { FunctionCallError, createLogger, errorMessage, type Logger } from "@switchyard/core";

/** Parse MCP arguments. Blank text means "no arguments". */
export function parseMcpArguments(raw: string): Record<string, unknown> {
  if (raw.trim() === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw FunctionCallError.respondToModel(`failed to parse MCP tool arguments: ${errorMessage(err)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw FunctionCallError.respondToModel("MCP tool arguments must be a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Forwards calls to the session's MCP client. A failing server call is
 * reported inside the output item, not as an error.
 */
export class McpHandler implements ToolHandler {
  readonly kind = "mcp" as const;
  private readonly log: Logger;

  constructor(log: Logger = createLogger("tools.mcp")) {
    this.log = log;
  }

  matchesKind(payload: ToolPayload): boolean {
    return payload.type === "mcp";
  }

  async handle(invocation: ToolInvocation): Promise<ResponseInputItem> {
    const { payload, callId, session, turn } = invocation;
    if (payload.type !== "mcp") {
      throw FunctionCallError.fatal("mcp handler received unsupported payload");
    }

    const args = parseMcpArguments(payload.rawArguments);
    const started = Date.now();
    try {
      const value = await session.mcp.callTool(payload.server, payload.tool, args);
      this.log.debug(
        "MCP call finished",
        { callId, server: payload.server, tool: payload.tool, durationMs: Date.now() - started },
        turn.traceCtx,
      );
      return { type: "mcp_tool_call_output", callId, result: { ok: true, value } };
    } catch (err) {
      const message = errorMessage(err);
      this.log.warn(
        "MCP call failed",
        { callId, server: payload.server, tool: payload.tool, error: message },
        turn.traceCtx,
      );
      return {
        type: "mcp_tool_call_output",
        callId,
        result: { ok: false, error: `tool call failed for \`${payload.server}/${payload.tool}\`: ${message}` },
      };
    }
  }
}
