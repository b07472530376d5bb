import type {
  DynamicToolSpec,
  McpToolDefinition,
  ToolSpec,
  ToolsConfig,
} from "@switchyard/types";
import { createLogger, type Logger } from "@switchyard/core";
import {
  DynamicToolHandler,
  McpHandler,
  ShellHandler,
  shellCommandToolSpec,
  shellToolSpec,
  type CommandRunner,
} from "@switchyard/tools";
import { ToolRegistryBuilder } from "./registry.js";

/** Every name the shell capability is known by. */
export const SHELL_TOOL_ALIASES: readonly string[] = [
  "shell",
  "container.exec",
  "local_shell",
  "shell_command",
  "exec_command",
];

export const MCP_TOOL_NAME_DELIMITER = "__";

/** Name a spec is advertised and dispatched under. */
export function toolSpecName(spec: ToolSpec): string {
  switch (spec.type) {
    case "function":
    case "freeform":
      return spec.name;
    case "local_shell":
      return "local_shell";
    case "web_search":
      return "web_search";
  }
}

export function fullyQualifiedMcpToolName(server: string, tool: string): string {
  return ["mcp", server, tool].join(MCP_TOOL_NAME_DELIMITER);
}

function mcpToolSpec(name: string, tool: McpToolDefinition): ToolSpec {
  return {
    type: "function",
    name,
    description: tool.description ?? "",
    strict: false,
    parameters: tool.inputSchema,
  };
}

function dynamicToolSpec(tool: DynamicToolSpec): ToolSpec {
  if (tool.format === "freeform") {
    return { type: "freeform", name: tool.name, description: tool.description, format: { type: "text" } };
  }
  return {
    type: "function",
    name: tool.name,
    description: tool.description,
    strict: false,
    parameters: tool.inputSchema ?? { type: "object", properties: {} },
  };
}

export interface SpecBuilderDeps {
  /** Runs shell commands; defaults to `execFile`. */
  commandRunner?: CommandRunner;
  dynamicToolTimeoutMs?: number;
  log?: Logger;
}

/**
 * Build the advertised specs and their handlers from config plus the
 * current MCP and dynamic tool listings. Same inputs, same order.
 */
export function buildSpecs(
  config: ToolsConfig,
  mcpTools: ReadonlyMap<string, McpToolDefinition> | undefined,
  dynamicTools: readonly DynamicToolSpec[],
  deps: SpecBuilderDeps = {},
): ToolRegistryBuilder {
  const log = deps.log ?? createLogger("tools");
  const builder = new ToolRegistryBuilder(log.child("registry"));

  if (config.shellType !== "disabled") {
    const shell = new ShellHandler({
      defaultTimeoutMs: config.shellTimeoutMs,
      runner: deps.commandRunner,
      log: log.child("shell"),
    });
    switch (config.shellType) {
      case "default":
        builder.pushSpecWithParallelSupport(shellToolSpec(), true);
        break;
      case "local":
        builder.pushSpecWithParallelSupport({ type: "local_shell" }, true);
        break;
      case "shell_command":
        builder.pushSpecWithParallelSupport(shellCommandToolSpec(), true);
        break;
    }
    for (const alias of SHELL_TOOL_ALIASES) {
      builder.registerHandler(alias, shell);
    }
  }

  if (config.webSearch) {
    builder.pushSpec({ type: "web_search" });
  }

  if (mcpTools && mcpTools.size > 0) {
    const mcp = new McpHandler(log.child("mcp"));
    for (const name of [...mcpTools.keys()].sort()) {
      const tool = mcpTools.get(name);
      if (!tool) continue;
      builder.pushSpec(mcpToolSpec(name, tool));
      builder.registerHandler(name, mcp);
    }
  }

  if (dynamicTools.length > 0) {
    const dynamic = new DynamicToolHandler(deps.dynamicToolTimeoutMs);
    for (const tool of dynamicTools) {
      builder.pushSpecWithParallelSupport(dynamicToolSpec(tool), tool.supportsParallel ?? false);
      builder.registerHandler(tool.name, dynamic);
    }
  }

  return builder;
}
