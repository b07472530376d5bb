import { v7 as uuidv7 } from "uuid";
import type { TaskKind, TurnAbortReason, TurnContext, UserInput } from "@switchyard/types";
import type { AgentSession } from "../session.js";
import type { SessionTask } from "./session-task.js";

/** How a spawned task ended. */
export type TaskOutcome =
  | { readonly status: "completed"; readonly lastAgentMessage?: string }
  | { readonly status: "aborted" };

interface RunningTask {
  readonly kind: TaskKind;
  readonly turn: TurnContext;
  readonly controller: AbortController;
}

/**
 * Runs at most one task per session. Starting a task replaces whatever is
 * running; aborted tasks report `turn_aborted` instead of `task_complete`.
 */
export class TaskRunner {
  private readonly tasks = new Map<string, RunningTask>();

  constructor(private readonly session: AgentSession) {}

  /** Kinds of the tasks currently in flight. */
  running(): TaskKind[] {
    return [...this.tasks.values()].map((t) => t.kind);
  }

  /** Run `task` to completion, replacing anything already running. */
  async spawnTask(
    turn: TurnContext,
    input: readonly UserInput[],
    task: SessionTask,
  ): Promise<TaskOutcome> {
    const replaced = [...this.tasks.entries()];
    const id = uuidv7();
    const controller = new AbortController();
    this.tasks.set(id, { kind: task.kind(), turn, controller });
    this.session.log.debug("Task started", { kind: task.kind(), subId: turn.subId }, turn.traceCtx);

    try {
      await this.abortTasks(replaced, "replaced");
      await this.session.sendEvent(turn, { type: "task_started", kind: task.kind() });
      const result = await task.run(this.session, turn, input, controller.signal);
      if (controller.signal.aborted) {
        return { status: "aborted" };
      }
      await this.session.sendEvent(turn, { type: "task_complete", lastAgentMessage: result });
      return { status: "completed", lastAgentMessage: result };
    } finally {
      this.tasks.delete(id);
    }
  }

  async abortAllTasks(reason: TurnAbortReason): Promise<void> {
    await this.abortTasks([...this.tasks.entries()], reason);
  }

  private async abortTasks(entries: ReadonlyArray<[string, RunningTask]>, reason: TurnAbortReason): Promise<void> {
    for (const [id, task] of entries) {
      this.tasks.delete(id);
      task.controller.abort(reason);
      this.session.log.debug("Task aborted", { kind: task.kind, reason }, task.turn.traceCtx);
      await this.session.sendEvent(task.turn, { type: "turn_aborted", reason });
    }
  }
}
