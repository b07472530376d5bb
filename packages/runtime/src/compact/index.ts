import type { ModelProviderInfo, TurnContext, UserInput } from "@switchyard/types";
import type { AgentSession } from "../session.js";
import { runCompactTask } from "./local.js";
import { runRemoteCompactTask, type RemoteCompactClient } from "./remote.js";

/** Providers that expose server-side compaction on the Responses API. */
export function shouldUseRemoteCompactTask(provider: ModelProviderInfo): boolean {
  return provider.wireApi === "responses" && provider.remoteCompaction === true;
}

/**
 * The two ways to compact a conversation. Either may reject; the remote
 * one works on session-held history and takes no user input.
 */
export interface CompactionStrategies {
  runRemoteCompactTask(session: AgentSession, turn: TurnContext, signal: AbortSignal): Promise<string | undefined>;
  runCompactTask(
    session: AgentSession,
    turn: TurnContext,
    input: readonly UserInput[],
    signal: AbortSignal,
  ): Promise<string | undefined>;
}

export function createCompactionStrategies(remoteClient?: RemoteCompactClient): CompactionStrategies {
  return {
    runRemoteCompactTask: (session, turn, signal) => runRemoteCompactTask(session, turn, signal, remoteClient),
    runCompactTask,
  };
}

export { runCompactTask, buildCompactedHistory, collectUserMessages, selectRetainedMessages } from "./local.js";
export { runRemoteCompactTask, HttpRemoteCompactClient } from "./remote.js";
export type { RemoteCompactClient } from "./remote.js";
