import type {
  ConfiguredToolSpec,
  ResponseInputItem,
  ToolHandler,
  ToolInvocation,
  ToolSpec,
} from "@switchyard/types";
import {
  FunctionCallError,
  createLogger,
  errorMessage,
  isFunctionCallError,
  type Logger,
} from "@switchyard/core";

/**
 * Maps tool names to handlers and runs invocations against them.
 * Every rejection is a `FunctionCallError`.
 */
export class ToolRegistry {
  constructor(
    private readonly handlers: ReadonlyMap<string, ToolHandler>,
    private readonly log: Logger = createLogger("registry"),
  ) {}

  handler(name: string): ToolHandler | undefined {
    return this.handlers.get(name);
  }

  async dispatch(invocation: ToolInvocation): Promise<ResponseInputItem> {
    const { toolName, callId, payload, turn } = invocation;
    const handler = this.handlers.get(toolName);
    if (!handler) {
      const message =
        payload.type === "custom"
          ? `unsupported custom tool call: ${toolName}`
          : `unsupported call: ${toolName}`;
      this.log.warn("No handler for tool", { toolName, callId }, turn.traceCtx);
      throw FunctionCallError.respondToModel(message);
    }

    if (!handler.matchesKind(payload)) {
      throw FunctionCallError.fatal(`tool ${toolName} invoked with incompatible payload`);
    }

    const started = Date.now();
    try {
      const output = await handler.handle(invocation);
      this.log.debug(
        "Tool call finished",
        { toolName, callId, durationMs: Date.now() - started },
        turn.traceCtx,
      );
      return output;
    } catch (err) {
      this.log.debug(
        "Tool call failed",
        { toolName, callId, durationMs: Date.now() - started, error: errorMessage(err) },
        turn.traceCtx,
      );
      if (isFunctionCallError(err)) throw err;
      throw FunctionCallError.respondToModel(errorMessage(err));
    }
  }
}

/**
 * Collects specs and handlers in registration order, then freezes them
 * into a `ToolRegistry`.
 */
export class ToolRegistryBuilder {
  private readonly handlers = new Map<string, ToolHandler>();
  private readonly specs: ConfiguredToolSpec[] = [];

  constructor(private readonly log: Logger = createLogger("registry")) {}

  pushSpec(spec: ToolSpec): this {
    return this.pushSpecWithParallelSupport(spec, false);
  }

  pushSpecWithParallelSupport(spec: ToolSpec, supportsParallelToolCalls: boolean): this {
    this.specs.push({ spec, supportsParallelToolCalls });
    return this;
  }

  registerHandler(name: string, handler: ToolHandler): this {
    if (this.handlers.has(name)) {
      this.log.warn("Ignoring duplicate handler for tool", { toolName: name });
      return this;
    }
    this.handlers.set(name, handler);
    return this;
  }

  hasHandler(name: string): boolean {
    return this.handlers.has(name);
  }

  build(): { specs: ConfiguredToolSpec[]; registry: ToolRegistry } {
    return {
      specs: [...this.specs],
      registry: new ToolRegistry(new Map(this.handlers), this.log),
    };
  }
}
