export { TurnDiffTracker } from "./diff-tracker.js";
export { truncateOutput, MAX_OUTPUT_BYTES } from "./output.js";
export {
  ShellHandler,
  ShellArgsSchema,
  ShellCommandArgsSchema,
  shellToolSpec,
  shellCommandToolSpec,
  execFileRunner,
  parseShellArguments,
  formatExecOutput,
  isWithinDir,
  TIMEOUT_EXIT_CODE,
} from "./handlers/shell.js";
export type { CommandRunner, CommandResult, CommandRunOptions, ShellHandlerOptions } from "./handlers/shell.js";
export { McpHandler, parseMcpArguments } from "./handlers/mcp.js";
export { DynamicToolHandler } from "./handlers/dynamic.js";
