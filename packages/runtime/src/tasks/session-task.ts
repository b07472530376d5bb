import type { TaskKind, TurnContext, UserInput } from "@switchyard/types";
import type { AgentSession } from "../session.js";

/**
 * A cancellable unit of session work that is not a single tool call.
 *
 * `run` must watch `signal` at every suspension point, treats
 * cancellation as an early `undefined` return, and never rejects: failures
 * are reported as session events.
 */
export interface SessionTask {
  kind(): TaskKind;
  run(
    session: AgentSession,
    turn: TurnContext,
    input: readonly UserInput[],
    signal: AbortSignal,
  ): Promise<string | undefined>;
}
