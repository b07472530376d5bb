export { AgentLoop } from "./agent-loop.js";
export type { AgentLoopOptions, TurnDefaults } from "./agent-loop.js";
export { runTurn, dispatchToolCalls, planBatches, MAX_TURN_ITERATIONS } from "./turn.js";
export { ToolRouter } from "./router.js";
export { ToolRegistry, ToolRegistryBuilder } from "./registry.js";
export {
  buildSpecs,
  toolSpecName,
  fullyQualifiedMcpToolName,
  SHELL_TOOL_ALIASES,
  MCP_TOOL_NAME_DELIMITER,
} from "./tool-spec.js";
export type { SpecBuilderDeps } from "./tool-spec.js";
export {
  parseResponseItem,
  responseItemToWire,
  responseInputItemToResponseItem,
  responseInputItemToWire,
  userInputToResponseItem,
  messageText,
  lastAssistantMessage,
} from "./response-items.js";
export { AgentSession, createTurnContext, splitMcpToolName } from "./session.js";
export type { AgentSessionOptions, TurnOptions } from "./session.js";
export { ScriptedModelAdapter } from "./model-adapter.js";
export type { ModelAdapter, ModelPrompt, GenerateOptions } from "./model-adapter.js";
export { SUMMARIZATION_PROMPT, SUMMARY_PREFIX, buildSummaryMessage, isSummaryMessage } from "./prompt-builder.js";
export {
  shouldUseRemoteCompactTask,
  createCompactionStrategies,
  runCompactTask,
  runRemoteCompactTask,
  buildCompactedHistory,
  collectUserMessages,
  selectRetainedMessages,
  HttpRemoteCompactClient,
} from "./compact/index.js";
export type { CompactionStrategies, RemoteCompactClient } from "./compact/index.js";
export { CompactTask, COMPACT_TASK_COUNTER } from "./tasks/compact.js";
export { RegularTask } from "./tasks/regular.js";
export { TaskRunner } from "./tasks/runner.js";
export type { TaskOutcome } from "./tasks/runner.js";
export type { SessionTask } from "./tasks/session-task.js";
