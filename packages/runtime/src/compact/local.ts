import type { ResponseItem, TurnContext, UserInput } from "@switchyard/types";
import type { AgentSession } from "../session.js";
import {
  lastAssistantMessage,
  messageText,
  userInputToResponseItem,
} from "../response-items.js";
import { SUMMARIZATION_PROMPT, buildSummaryMessage, isSummaryMessage } from "../prompt-builder.js";

/** Most recent user messages carried across a compaction. */
export const MAX_RETAINED_USER_MESSAGES = 20;
/** Character budget for the retained user messages. */
export const RETAINED_USER_CHARS = 20_000;

function userMessage(text: string): ResponseItem {
  return { type: "message", role: "user", content: [{ type: "input_text", text }] };
}

/** User-authored messages, excluding earlier summaries. */
export function collectUserMessages(items: readonly ResponseItem[]): string[] {
  const out: string[] = [];
  for (const item of items) {
    if (item.type !== "message" || item.role !== "user") continue;
    const text = messageText(item);
    if (text !== undefined && !isSummaryMessage(text)) out.push(text);
  }
  return out;
}

/** The last `budget` UTF-16 units of `text`, not starting inside a surrogate pair. */
function keepEnd(text: string, budget: number): string {
  let start = text.length - budget;
  const code = text.charCodeAt(start);
  if (code >= 0xdc00 && code <= 0xdfff) start++;
  return text.slice(start);
}

/**
 * Keep the newest user messages that fit the budget. A message that would
 * overflow is cut to the remaining budget, keeping its end.
 */
export function selectRetainedMessages(messages: readonly string[]): string[] {
  const kept: string[] = [];
  let budget = RETAINED_USER_CHARS;
  for (let i = messages.length - 1; i >= 0 && kept.length < MAX_RETAINED_USER_MESSAGES; i--) {
    if (budget <= 0) break;
    const text = messages[i];
    kept.unshift(text.length <= budget ? text : keepEnd(text, budget));
    budget -= text.length;
  }
  return kept;
}

export function buildCompactedHistory(userMessages: readonly string[], summary: string): ResponseItem[] {
  return [...selectRetainedMessages(userMessages).map(userMessage), userMessage(buildSummaryMessage(summary))];
}

/**
 * Summarize the conversation with the session's own model and replace the
 * history with the recent user messages plus that summary.
 */
export async function runCompactTask(
  session: AgentSession,
  turn: TurnContext,
  input: readonly UserInput[],
  signal: AbortSignal,
): Promise<string | undefined> {
  const history = session.historySnapshot();
  const inputItem = userInputToResponseItem(input);
  const conversation = inputItem ? [...history, inputItem] : history;

  const output = await session.model.generate(
    { input: [...conversation, userMessage(SUMMARIZATION_PROMPT)], tools: [] },
    { signal },
  );
  const summary = lastAssistantMessage(output)?.trim();
  if (!summary) {
    throw new Error("model returned an empty summary");
  }
  signal.throwIfAborted();

  session.replaceHistory(buildCompactedHistory(collectUserMessages(conversation), summary));
  session.log.info(
    "Compacted history",
    { sessionId: session.id, before: history.length, after: session.historySnapshot().length },
    turn.traceCtx,
  );
  await session.sendEvent(turn, { type: "context_compacted" });
  return undefined;
}
