import { describe, it, expect } from "vitest";
import type { EventMsg } from "@switchyard/types";
import { InMemoryEventBus, createLogger } from "@switchyard/core";
import { ScriptedModelAdapter } from "../model-adapter.js";
import { AgentSession, createTurnContext } from "../session.js";
import { TaskRunner } from "./runner.js";
import type { SessionTask } from "./session-task.js";

const quiet = createLogger("test", { sink: () => {} });

function setup() {
  const bus = new InMemoryEventBus(quiet);
  const session = new AgentSession({ bus, model: new ScriptedModelAdapter(), log: quiet });
  const events: EventMsg[] = [];
  bus.subscribe<EventMsg>({ topics: ["session.event"] }, (e) => {
    events.push(e.payload);
  });
  const turn = () => createTurnContext({ cwd: "/work", model: "mock", provider: { name: "local", wireApi: "chat" } });
  return { session, events, turn, runner: new TaskRunner(session) };
}

const answering = (message: string): SessionTask => ({
  kind: () => "regular",
  run: async () => message,
});

/** Runs until aborted. `started` resolves once `run` is entered. */
function blocking() {
  let markStarted: () => void = () => {};
  const started = new Promise<void>((resolve) => {
    markStarted = resolve;
  });
  const task: SessionTask = {
    kind: () => "regular",
    run: (_session, _turn, _input, signal) =>
      new Promise((resolve) => {
        markStarted();
        if (signal.aborted) return resolve(undefined);
        signal.addEventListener("abort", () => resolve(undefined), { once: true });
      }),
  };
  return { task, started };
}

describe("TaskRunner", () => {
  it("should bracket a task with started and complete events", async () => {
    const { runner, events, turn } = setup();

    const outcome = await runner.spawnTask(turn(), [], answering("all done"));

    expect(outcome).toEqual({ status: "completed", lastAgentMessage: "all done" });
    expect(events).toEqual([
      { type: "task_started", kind: "regular" },
      { type: "task_complete", lastAgentMessage: "all done" },
    ]);
    expect(runner.running()).toEqual([]);
  });

  it("should replace a running task", async () => {
    const { runner, events, turn } = setup();
    const first = blocking();

    const pending = runner.spawnTask(turn(), [], first.task);
    await first.started;
    expect(runner.running()).toEqual(["regular"]);

    const second = await runner.spawnTask(turn(), [], answering("second"));

    await expect(pending).resolves.toEqual({ status: "aborted" });
    expect(second).toEqual({ status: "completed", lastAgentMessage: "second" });
    expect(events.filter((e) => e.type === "turn_aborted")).toEqual([{ type: "turn_aborted", reason: "replaced" }]);
    expect(events.filter((e) => e.type === "task_complete")).toEqual([
      { type: "task_complete", lastAgentMessage: "second" },
    ]);
  });

  it("should interrupt everything on request", async () => {
    const { runner, events, turn } = setup();
    const { task, started } = blocking();

    const pending = runner.spawnTask(turn(), [], task);
    await started;
    await runner.abortAllTasks("interrupted");

    await expect(pending).resolves.toEqual({ status: "aborted" });
    expect(events).toEqual([
      { type: "task_started", kind: "regular" },
      { type: "turn_aborted", reason: "interrupted" },
    ]);
    expect(runner.running()).toEqual([]);
  });

  it("should be a no-op to abort when idle", async () => {
    const { runner, events } = setup();
    await runner.abortAllTasks("interrupted");
    expect(events).toEqual([]);
  });
});
