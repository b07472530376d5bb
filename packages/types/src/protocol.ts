import type { UserInput } from "./models.js";

/**
 * Events a session reports to its client. Published on the bus under
 * the `session.event` topic.
 */
export type EventMsg =
  | { readonly type: "error"; readonly message: string }
  | { readonly type: "warning"; readonly message: string }
  | { readonly type: "task_started"; readonly kind: TaskKind }
  | { readonly type: "task_complete"; readonly lastAgentMessage?: string }
  | { readonly type: "turn_aborted"; readonly reason: TurnAbortReason }
  | { readonly type: "context_compacted" };

export type TaskKind = "regular" | "compact";

export type TurnAbortReason = "interrupted" | "replaced";

/** What a client asks of a session. */
export type Op =
  | { readonly type: "user_input"; readonly items: readonly UserInput[] }
  | { readonly type: "compact" }
  | { readonly type: "interrupt" };

/** Payload of an `agent.turn` event. */
export interface TurnRequest {
  readonly op: Op;
  /** Echoed on `agent.complete` / `agent.error`. Generated when absent. */
  readonly subId?: string;
  /** Working directory for this turn; the loop's default otherwise. */
  readonly cwd?: string;
}

/** Payload of `agent.complete`. */
export interface TurnCompleted {
  readonly subId: string;
  readonly message?: string;
}

/** Payload of `agent.error`. */
export interface TurnFailed {
  readonly subId?: string;
  readonly error: string;
}
