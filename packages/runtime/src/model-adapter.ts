import type { ResponseItem, ToolSpec } from "@switchyard/types";

/** What one model request carries. */
export interface ModelPrompt {
  readonly input: readonly ResponseItem[];
  readonly tools: readonly ToolSpec[];
}

export interface GenerateOptions {
  readonly signal?: AbortSignal;
}

/**
 * Abstraction over the underlying LLM.
 * `generate()` receives the conversation and returns the items the model emitted.
 */
export interface ModelAdapter {
  generate(prompt: ModelPrompt, options?: GenerateOptions): Promise<ResponseItem[]>;
}

type ScriptedStep = ResponseItem[] | ((prompt: ModelPrompt) => ResponseItem[] | Promise<ResponseItem[]>);

/**
 * A model adapter that replays pre-programmed responses, one per request.
 * Records every prompt it receives for later inspection.
 */
export class ScriptedModelAdapter implements ModelAdapter {
  readonly prompts: ModelPrompt[] = [];
  private readonly steps: ScriptedStep[];

  constructor(steps: ScriptedStep[] = []) {
    this.steps = [...steps];
  }

  /** Queue another response. */
  push(step: ScriptedStep): this {
    this.steps.push(step);
    return this;
  }

  get remaining(): number {
    return this.steps.length;
  }

  async generate(prompt: ModelPrompt, options: GenerateOptions = {}): Promise<ResponseItem[]> {
    options.signal?.throwIfAborted();
    // Snapshot: callers keep mutating their history after the request.
    this.prompts.push({ input: [...prompt.input], tools: [...prompt.tools] });

    const step = this.steps.shift();
    if (!step) {
      throw new Error("ScriptedModelAdapter: no scripted response left");
    }
    return typeof step === "function" ? step(prompt) : step;
  }
}
