import { z } from "zod";
import type {
  BusEvent,
  ModelProviderInfo,
  Op,
  SandboxPolicy,
  SubmissionId,
  Subscription,
  TurnCompleted,
  TurnFailed,
  TurnRequest,
  UserInput,
} from "@switchyard/types";
import { createEvent, createLogger, createTraceContext, errorMessage, type Logger } from "@switchyard/core";
import type { AgentSession } from "./session.js";
import { createTurnContext } from "./session.js";
import type { ToolRouter } from "./router.js";
import type { CompactionStrategies } from "./compact/index.js";
import { CompactTask } from "./tasks/compact.js";
import { RegularTask } from "./tasks/regular.js";
import { TaskRunner } from "./tasks/runner.js";

const UserInputSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({ type: z.literal("image"), imageUrl: z.string() }),
]);

const TurnRequestSchema = z.object({
  subId: z.string().min(1).optional(),
  cwd: z.string().min(1).optional(),
  op: z.discriminatedUnion("type", [
    z.object({ type: z.literal("user_input"), items: z.array(UserInputSchema).min(1) }),
    z.object({ type: z.literal("compact") }),
    z.object({ type: z.literal("interrupt") }),
  ]),
});

/** Turn settings used when a request does not override them. */
export interface TurnDefaults {
  cwd: string;
  model: string;
  provider: ModelProviderInfo;
  sandboxPolicy?: SandboxPolicy;
}

export interface AgentLoopOptions {
  session: AgentSession;
  router: ToolRouter;
  defaults: TurnDefaults;
  compaction?: CompactionStrategies;
  log?: Logger;
}

/**
 * Drives one session from the bus.
 *
 * Listens for `agent.turn` requests addressed to the session, runs each as
 * a task (a new task replaces the running one) and publishes
 * `agent.complete` or `agent.error` when it settles.
 */
export class AgentLoop {
  private readonly session: AgentSession;
  private readonly runner: TaskRunner;
  private readonly regular: RegularTask;
  private readonly compact: CompactTask;
  private readonly defaults: TurnDefaults;
  private readonly log: Logger;
  private subscription?: Subscription;

  constructor(opts: AgentLoopOptions) {
    this.session = opts.session;
    this.defaults = opts.defaults;
    this.runner = new TaskRunner(opts.session);
    this.regular = new RegularTask(opts.router);
    this.compact = new CompactTask(opts.compaction);
    this.log = opts.log ?? createLogger("agent-loop");
  }

  /** Start listening for turns. Calling it twice is a no-op. */
  start(): void {
    if (this.subscription) return;
    this.subscription = this.session.bus.subscribe(
      { topics: ["agent.turn"], sessionId: this.session.id },
      (event) => this.handleTurn(event),
    );
    this.log.info("Agent loop started", { sessionId: this.session.id });
  }

  /** Stop listening and interrupt whatever is running. */
  async stop(): Promise<void> {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
    await this.runner.abortAllTasks("interrupted");
    this.log.info("Agent loop stopped", { sessionId: this.session.id });
  }

  /** Submit an op directly, bypassing the bus. */
  async submit(request: TurnRequest, parent = createTraceContext()): Promise<TurnCompleted | undefined> {
    const { op } = request;
    if (op.type === "interrupt") {
      await this.runner.abortAllTasks("interrupted");
      return undefined;
    }

    const turn = createTurnContext({
      cwd: request.cwd ?? this.defaults.cwd,
      model: this.defaults.model,
      provider: this.defaults.provider,
      sandboxPolicy: this.defaults.sandboxPolicy,
      subId: request.subId === undefined ? undefined : (request.subId as SubmissionId),
      traceCtx: createTraceContext(parent),
    });
    const outcome = await this.runner.spawnTask(turn, inputOf(op), op.type === "compact" ? this.compact : this.regular);
    if (outcome.status === "aborted") {
      return undefined;
    }
    return { subId: turn.subId, message: outcome.lastAgentMessage };
  }

  private async handleTurn(event: BusEvent): Promise<void> {
    const parsed = TurnRequestSchema.safeParse(event.payload);
    if (!parsed.success) {
      const error = `invalid turn request: ${parsed.error.issues.map((i) => i.message).join("; ")}`;
      this.log.warn("Rejected turn request", { eventId: event.id, error }, event.traceCtx);
      await this.publish<TurnFailed>("agent.error", { error }, event);
      return;
    }

    const request = parsed.data;
    try {
      const completed = await this.submit(request, event.traceCtx);
      if (completed) {
        await this.publish<TurnCompleted>("agent.complete", completed, event);
      }
    } catch (err) {
      this.log.error("Turn failed", { subId: request.subId, error: errorMessage(err) }, event.traceCtx);
      await this.publish<TurnFailed>("agent.error", { subId: request.subId, error: errorMessage(err) }, event);
    }
  }

  private async publish<T>(topic: "agent.complete" | "agent.error", payload: T, cause: BusEvent): Promise<void> {
    await this.session.bus.publish(createEvent(topic, payload, createTraceContext(cause.traceCtx), this.session.id));
  }
}

function inputOf(op: Op): readonly UserInput[] {
  return op.type === "user_input" ? op.items : [];
}
