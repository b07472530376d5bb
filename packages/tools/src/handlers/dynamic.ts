import { z } from "zod";
import type {
  DynamicToolRequest,
  DynamicToolResponse,
  ResponseInputItem,
  ToolHandler,
  ToolInvocation,
  ToolPayload,
} from "@switchyard/types";
import { FunctionCallError, createEvent, createTraceContext, errorMessage } from "@switchyard/core";

const DynamicToolResponseSchema = z.object({
  callId: z.string(),
  success: z.boolean(),
  output: z.string(),
  changes: z
    .array(z.object({ path: z.string(), kind: z.enum(["add", "update", "delete"]) }))
    .optional(),
});

/**
 * Tools declared by the client. Each call is published as `tool.request`
 * and answered by a `tool.result` carrying the same call id.
 */
export class DynamicToolHandler implements ToolHandler {
  readonly kind = "function" as const;

  constructor(private readonly timeoutMs = 60_000) {}

  matchesKind(payload: ToolPayload): boolean {
    return payload.type === "function" || payload.type === "custom";
  }

  async handle(invocation: ToolInvocation): Promise<ResponseInputItem> {
    const { payload, callId, session, turn, toolName } = invocation;
    const request = this.buildRequest(invocation);

    let reply: DynamicToolResponse;
    try {
      const event = await session.bus.request<DynamicToolRequest, unknown>(
        createEvent("tool.request", request, createTraceContext(turn.traceCtx), session.id),
        {
          topics: ["tool.result"],
          sessionId: session.id,
          predicate: (e) => {
            const parsed = DynamicToolResponseSchema.safeParse(e.payload);
            return parsed.success && parsed.data.callId === callId;
          },
        },
        this.timeoutMs,
      );
      reply = DynamicToolResponseSchema.parse(event.payload);
    } catch (err) {
      throw FunctionCallError.respondToModel(`dynamic tool ${toolName} did not respond: ${errorMessage(err)}`);
    }

    for (const change of reply.changes ?? []) {
      invocation.tracker.record(change.path, change.kind);
    }

    if (payload.type === "custom") {
      return { type: "custom_tool_call_output", callId, output: reply.output };
    }
    return {
      type: "function_call_output",
      callId,
      output: { body: { type: "text", text: reply.output }, success: reply.success },
    };
  }

  private buildRequest(invocation: ToolInvocation): DynamicToolRequest {
    const { payload, callId, toolName, turn } = invocation;
    switch (payload.type) {
      case "custom":
        return { callId, tool: toolName, subId: turn.subId, input: payload.input };
      case "function": {
        let args: unknown;
        try {
          args = payload.arguments.trim() === "" ? {} : JSON.parse(payload.arguments);
        } catch (err) {
          throw FunctionCallError.respondToModel(`failed to parse function arguments: ${errorMessage(err)}`);
        }
        return { callId, tool: toolName, subId: turn.subId, arguments: args };
      }
      case "mcp":
      case "local_shell":
        throw FunctionCallError.fatal(`dynamic tool ${toolName} received unsupported payload`);
    }
  }
}
