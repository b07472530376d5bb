/**
 * Prompts used when the runtime talks to the model on its own behalf.
 */

export const SUMMARIZATION_PROMPT = `You are performing a CONTEXT CHECKPOINT for a coding session.
Write a handoff summary for another agent that will continue this work.

Include:
- What the user asked for and any constraints they stated
- What has been done so far, with file names and commands where relevant
- Open problems, failing checks and the next concrete steps

Be concise. Do not restate tool output verbatim.`;

/** Leads the summary message so later compactions can recognise it. */
export const SUMMARY_PREFIX =
  "A previous portion of this conversation was summarized to save context. The summary follows:";

export function buildSummaryMessage(summary: string): string {
  return `${SUMMARY_PREFIX}\n${summary}`;
}

export function isSummaryMessage(text: string): boolean {
  return text.startsWith(`${SUMMARY_PREFIX}\n`);
}
