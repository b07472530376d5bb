import type { DiffTracker, ResponseInputItem, ToolCall, TurnContext, UserInput } from "@switchyard/types";
import { TurnDiffTracker } from "@switchyard/tools";
import type { AgentSession } from "./session.js";
import { ToolRouter } from "./router.js";
import {
  lastAssistantMessage,
  responseInputItemToResponseItem,
  userInputToResponseItem,
} from "./response-items.js";

export const MAX_TURN_ITERATIONS = 10;

/**
 * Split calls into runs that may execute together: consecutive
 * parallel-eligible calls share a batch, anything else runs alone.
 */
export function planBatches(router: ToolRouter, calls: readonly ToolCall[]): ToolCall[][] {
  const batches: ToolCall[][] = [];
  let current: ToolCall[] = [];
  for (const call of calls) {
    if (router.toolSupportsParallel(call.toolName)) {
      current.push(call);
      continue;
    }
    if (current.length > 0) batches.push(current);
    batches.push([call]);
    current = [];
  }
  if (current.length > 0) batches.push(current);
  return batches;
}

/** Dispatch every call, honouring the parallel policy. Outputs keep call order. */
export async function dispatchToolCalls(
  router: ToolRouter,
  session: AgentSession,
  turn: TurnContext,
  tracker: DiffTracker,
  calls: readonly ToolCall[],
): Promise<ResponseInputItem[]> {
  const outputs: ResponseInputItem[] = [];
  for (const batch of planBatches(router, calls)) {
    const results = await Promise.all(
      batch.map((call) => router.dispatchToolCall(session, turn, tracker, call)),
    );
    outputs.push(...results);
  }
  return outputs;
}

/**
 * The think→tool→think cycle for one turn. Resolves with the model's
 * final message, or `undefined` if cancelled. Fatal tool errors reject.
 */
export async function runTurn(
  session: AgentSession,
  router: ToolRouter,
  turn: TurnContext,
  input: readonly UserInput[],
  signal: AbortSignal,
  tracker: DiffTracker = new TurnDiffTracker(),
): Promise<string | undefined> {
  const inputItem = userInputToResponseItem(input);
  if (inputItem) session.recordItems([inputItem]);

  for (let i = 0; i < MAX_TURN_ITERATIONS; i++) {
    if (signal.aborted) return undefined;

    const output = await session.model.generate(
      { input: session.historySnapshot(), tools: router.specs() },
      { signal },
    );
    if (signal.aborted) return undefined;
    session.recordItems(output);

    const calls: ToolCall[] = [];
    for (const item of output) {
      const call = await ToolRouter.buildToolCall(session, item);
      if (call) calls.push(call);
    }
    if (signal.aborted) return undefined;
    if (calls.length === 0) {
      const changed = tracker.changedPaths();
      if (changed.length > 0) {
        session.log.info("Turn changed files", { subId: turn.subId, paths: changed }, turn.traceCtx);
      }
      return lastAssistantMessage(output);
    }

    const results = await dispatchToolCalls(router, session, turn, tracker, calls);
    if (signal.aborted) return undefined;
    session.recordItems(results.map(responseInputItemToResponseItem));
  }

  throw new Error("Max iterations reached");
}
