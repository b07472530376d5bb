import { describe, it, expect } from "vitest";
import type { EventMsg, ResponseItem } from "@switchyard/types";
import { InMemoryEventBus, createLogger } from "@switchyard/core";
import { ScriptedModelAdapter } from "../model-adapter.js";
import { SUMMARIZATION_PROMPT, buildSummaryMessage } from "../prompt-builder.js";
import { AgentSession, createTurnContext } from "../session.js";
import {
  MAX_RETAINED_USER_MESSAGES,
  collectUserMessages,
  runCompactTask,
  selectRetainedMessages,
} from "./local.js";

const quiet = createLogger("test", { sink: () => {} });

const user = (text: string): ResponseItem => ({ type: "message", role: "user", content: [{ type: "input_text", text }] });
const assistant = (text: string): ResponseItem => ({
  type: "message",
  role: "assistant",
  content: [{ type: "output_text", text }],
});

describe("collectUserMessages", () => {
  it("should skip assistant messages and earlier summaries", () => {
    expect(
      collectUserMessages([
        user("fix the parser"),
        assistant("on it"),
        user(buildSummaryMessage("old summary")),
        { type: "function_call", name: "shell", arguments: "{}", callId: "c1" },
        user("and add tests"),
      ]),
    ).toEqual(["fix the parser", "and add tests"]);
  });
});

describe("selectRetainedMessages", () => {
  it("should keep the newest messages and cut the one that overflows", () => {
    const kept = selectRetainedMessages(["a".repeat(15_000), "b".repeat(10_000)]);
    expect(kept).toEqual(["a".repeat(10_000), "b".repeat(10_000)]);
  });

  it("should not start a cut message inside a surrogate pair", () => {
    const kept = selectRetainedMessages(["😀".repeat(10_001), "b".repeat(9_999)]);
    expect(kept).toEqual(["😀".repeat(5_000), "b".repeat(9_999)]);
  });

  it("should stop once the budget is spent", () => {
    expect(selectRetainedMessages(["old", "x".repeat(20_000)])).toEqual(["x".repeat(20_000)]);
  });

  it("should cap the number of messages", () => {
    const messages = Array.from({ length: 25 }, (_, i) => `m${i}`);
    const kept = selectRetainedMessages(messages);
    expect(kept).toHaveLength(MAX_RETAINED_USER_MESSAGES);
    expect(kept[0]).toBe("m5");
    expect(kept.at(-1)).toBe("m24");
  });
});

describe("runCompactTask", () => {
  function setup(steps: ResponseItem[][]) {
    const bus = new InMemoryEventBus(quiet);
    const model = new ScriptedModelAdapter(steps);
    const session = new AgentSession({ bus, model, log: quiet });
    const events: EventMsg[] = [];
    bus.subscribe<EventMsg>({ topics: ["session.event"] }, (e) => {
      events.push(e.payload);
    });
    const turn = createTurnContext({ cwd: "/work", model: "mock", provider: { name: "local", wireApi: "chat" } });
    return { session, model, turn, events };
  }

  it("should replace history with retained user messages and the summary", async () => {
    const { session, model, turn, events } = setup([[assistant("  Parser fixed; tests pending.  ")]]);
    const history = [user("fix the parser"), assistant("done")];
    session.replaceHistory(history);

    const result = await runCompactTask(
      session,
      turn,
      [{ type: "text", text: "keep the API notes" }],
      new AbortController().signal,
    );

    expect(result).toBeUndefined();
    expect(model.prompts).toHaveLength(1);
    expect(model.prompts[0]).toEqual({
      input: [...history, user("keep the API notes"), user(SUMMARIZATION_PROMPT)],
      tools: [],
    });
    expect(session.historySnapshot()).toEqual([
      user("fix the parser"),
      user("keep the API notes"),
      user(buildSummaryMessage("Parser fixed; tests pending.")),
    ]);
    expect(events).toEqual([{ type: "context_compacted" }]);
  });

  it("should leave history alone when the summary is empty", async () => {
    const { session, turn, events } = setup([[assistant("   ")]]);
    session.replaceHistory([user("hello")]);

    await expect(runCompactTask(session, turn, [], new AbortController().signal)).rejects.toThrowError(
      "model returned an empty summary",
    );
    expect(session.historySnapshot()).toEqual([user("hello")]);
    expect(events).toEqual([]);
  });

  it("should reject when already cancelled", async () => {
    const { session, turn } = setup([[assistant("summary")]]);
    const controller = new AbortController();
    controller.abort();

    await expect(runCompactTask(session, turn, [], controller.signal)).rejects.toMatchObject({ name: "AbortError" });
    expect(session.historySnapshot()).toEqual([]);
  });
});
