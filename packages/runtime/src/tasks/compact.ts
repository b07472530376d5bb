import type { TaskKind, TurnContext, UserInput } from "@switchyard/types";
import { errorMessage } from "@switchyard/core";
import type { AgentSession } from "../session.js";
import {
  createCompactionStrategies,
  shouldUseRemoteCompactTask,
  type CompactionStrategies,
} from "../compact/index.js";
import type { SessionTask } from "./session-task.js";

export const COMPACT_TASK_COUNTER = "switchyard.task.compact";

/**
 * Shrinks the conversation, remotely when the provider supports it and
 * locally otherwise. Failures become one error event.
 */
export class CompactTask implements SessionTask {
  constructor(private readonly strategies: CompactionStrategies = createCompactionStrategies()) {}

  kind(): TaskKind {
    return "compact";
  }

  async run(
    session: AgentSession,
    turn: TurnContext,
    input: readonly UserInput[],
    signal: AbortSignal,
  ): Promise<string | undefined> {
    if (signal.aborted) return undefined;

    const remote = shouldUseRemoteCompactTask(turn.provider);
    const type = remote ? "remote" : "local";
    try {
      session.telemetry.counter(COMPACT_TASK_COUNTER, 1, { type });
    } catch (err) {
      session.log.debug("Dropped compact counter", { type, error: errorMessage(err) }, turn.traceCtx);
    }

    try {
      return remote
        ? await this.strategies.runRemoteCompactTask(session, turn, signal)
        : await this.strategies.runCompactTask(session, turn, input, signal);
    } catch (err) {
      if (signal.aborted) {
        session.log.debug("Compact task cancelled", { type }, turn.traceCtx);
        return undefined;
      }
      await session.sendEvent(turn, {
        type: "error",
        message: `Error running ${type} compact task: ${errorMessage(err)}`,
      });
      return undefined;
    }
  }
}
