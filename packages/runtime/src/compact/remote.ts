import { z } from "zod";
import type { ResponseItem, TurnContext } from "@switchyard/types";
import type { AgentSession } from "../session.js";
import { parseResponseItem, responseItemToWire } from "../response-items.js";

/** Server-side compaction: history in, replacement history out. */
export interface RemoteCompactClient {
  compact(history: readonly ResponseItem[], turn: TurnContext, signal: AbortSignal): Promise<ResponseItem[]>;
}

const CompactResponseSchema = z.object({
  output: z.array(z.unknown()),
});

/**
 * Calls the provider's `/responses/compact` endpoint directly over `fetch`.
 */
export class HttpRemoteCompactClient implements RemoteCompactClient {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async compact(
    history: readonly ResponseItem[],
    turn: TurnContext,
    signal: AbortSignal,
  ): Promise<ResponseItem[]> {
    const { provider } = turn;
    if (!provider.baseUrl) {
      throw new Error(`provider ${provider.name} has no baseUrl for remote compaction`);
    }

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    const apiKey = provider.apiKeyEnv ? this.env[provider.apiKeyEnv] : undefined;
    if (apiKey) {
      headers.Authorization = `Bearer ${apiKey}`;
    }

    const input = history.flatMap((item) => {
      const wire = responseItemToWire(item);
      return wire ? [wire] : [];
    });

    const response = await fetch(`${provider.baseUrl.replace(/\/+$/, "")}/responses/compact`, {
      method: "POST",
      headers,
      body: JSON.stringify({ model: turn.model, input }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`compact endpoint returned ${response.status}: ${errorText}`);
    }

    const parsed = CompactResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("compact endpoint returned a body without an output array");
    }
    return parsed.data.output.map(parseResponseItem);
  }
}

/**
 * Replace the session history with the provider's compacted version.
 */
export async function runRemoteCompactTask(
  session: AgentSession,
  turn: TurnContext,
  signal: AbortSignal,
  client: RemoteCompactClient = new HttpRemoteCompactClient(),
): Promise<string | undefined> {
  const history = session.historySnapshot();
  const compacted = await client.compact(history, turn, signal);
  signal.throwIfAborted();

  session.replaceHistory(compacted);
  session.log.info(
    "Compacted history remotely",
    { sessionId: session.id, before: history.length, after: compacted.length },
    turn.traceCtx,
  );
  await session.sendEvent(turn, { type: "context_compacted" });
  return undefined;
}
