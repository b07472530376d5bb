import type { TaskKind, TurnContext, UserInput } from "@switchyard/types";
import { errorMessage } from "@switchyard/core";
import type { AgentSession } from "../session.js";
import type { ToolRouter } from "../router.js";
import { runTurn } from "../turn.js";
import type { SessionTask } from "./session-task.js";

/** A normal model turn: sample, run tools, repeat until the model answers. */
export class RegularTask implements SessionTask {
  constructor(private readonly router: ToolRouter) {}

  kind(): TaskKind {
    return "regular";
  }

  async run(
    session: AgentSession,
    turn: TurnContext,
    input: readonly UserInput[],
    signal: AbortSignal,
  ): Promise<string | undefined> {
    try {
      return await runTurn(session, this.router, turn, input, signal);
    } catch (err) {
      if (signal.aborted) return undefined;
      await session.sendEvent(turn, { type: "error", message: errorMessage(err) });
      return undefined;
    }
  }
}
