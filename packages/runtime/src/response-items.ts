import { z } from "zod";
import type {
  ContentItem,
  FunctionCallOutputBody,
  ResponseInputItem,
  ResponseItem,
  UserInput,
} from "@switchyard/types";
import { FunctionCallError } from "@switchyard/core";

// ─── Wire schemas (snake_case, as the provider sends them) ──────────

const RoleSchema = z.enum(["system", "developer", "user", "assistant"]);

const ContentItemSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("input_text"), text: z.string() }),
  z.object({ type: z.literal("output_text"), text: z.string() }),
  z.object({ type: z.literal("input_image"), image_url: z.string() }),
]);

const LocalShellActionSchema = z.object({
  type: z.literal("exec"),
  command: z.array(z.string()),
  timeout_ms: z.number().int().nonnegative().nullish(),
  working_directory: z.string().nullish(),
  env: z.record(z.string()).nullish(),
  user: z.string().nullish(),
});

const WireItemSchemas = {
  message: z.object({
    id: z.string().nullish(),
    role: RoleSchema,
    content: z.array(ContentItemSchema),
  }),
  reasoning: z.object({
    id: z.string(),
    summary: z.array(z.object({ text: z.string() })).default([]),
  }),
  function_call: z.object({
    id: z.string().nullish(),
    name: z.string(),
    arguments: z.string(),
    call_id: z.string(),
  }),
  custom_tool_call: z.object({
    id: z.string().nullish(),
    name: z.string(),
    input: z.string(),
    call_id: z.string(),
  }),
  local_shell_call: z.object({
    id: z.string().nullish(),
    call_id: z.string().nullish(),
    status: z.enum(["completed", "in_progress", "incomplete"]),
    action: LocalShellActionSchema,
  }),
  web_search_call: z.object({
    id: z.string().nullish(),
    status: z.string().nullish(),
  }),
  function_call_output: z.object({
    call_id: z.string(),
    output: z.union([z.string(), z.array(ContentItemSchema)]),
  }),
  custom_tool_call_output: z.object({
    call_id: z.string(),
    output: z.string(),
  }),
};

type WireItemType = keyof typeof WireItemSchemas;

function isWireItemType(type: unknown): type is WireItemType {
  return typeof type === "string" && Object.prototype.hasOwnProperty.call(WireItemSchemas, type);
}

type WireContentItem = z.infer<typeof ContentItemSchema>;

function contentFromWire(item: WireContentItem): ContentItem {
  switch (item.type) {
    case "input_text":
    case "output_text":
      return { type: item.type, text: item.text };
    case "input_image":
      return { type: "input_image", imageUrl: item.image_url };
  }
}

function contentToWire(item: ContentItem): WireContentItem {
  switch (item.type) {
    case "input_text":
    case "output_text":
      return { type: item.type, text: item.text };
    case "input_image":
      return { type: "input_image", image_url: item.imageUrl };
  }
}

/** `null` and absent are the same on the wire. */
function opt<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

function issues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(item)"}: ${i.message}`).join("; ");
}

/**
 * Decode one wire item from the model. Item types the runtime does not
 * know decode to `{ type: "other" }`; a known type with a bad shape is
 * rejected as fatal, since its call could never be answered.
 */
export function parseResponseItem(raw: unknown): ResponseItem {
  if (typeof raw !== "object" || raw === null || !("type" in raw)) {
    throw FunctionCallError.fatal("response item is not an object with a type");
  }
  const type = raw.type;
  if (!isWireItemType(type)) {
    return { type: "other" };
  }

  const parse = <S extends z.ZodTypeAny>(schema: S): z.infer<S> => {
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw FunctionCallError.fatal(`malformed ${type} item: ${issues(result.error)}`);
    }
    return result.data;
  };

  switch (type) {
    case "message": {
      const w = parse(WireItemSchemas.message);
      return { type, id: opt(w.id), role: w.role, content: w.content.map(contentFromWire) };
    }
    case "reasoning": {
      const w = parse(WireItemSchemas.reasoning);
      return { type, id: w.id, summary: w.summary.map((s) => s.text) };
    }
    case "function_call": {
      const w = parse(WireItemSchemas.function_call);
      return { type, id: opt(w.id), name: w.name, arguments: w.arguments, callId: w.call_id };
    }
    case "custom_tool_call": {
      const w = parse(WireItemSchemas.custom_tool_call);
      return { type, id: opt(w.id), name: w.name, input: w.input, callId: w.call_id };
    }
    case "local_shell_call": {
      const w = parse(WireItemSchemas.local_shell_call);
      return {
        type,
        id: opt(w.id),
        callId: opt(w.call_id),
        status: w.status,
        action: {
          type: "exec",
          command: w.action.command,
          timeoutMs: opt(w.action.timeout_ms),
          workingDirectory: opt(w.action.working_directory),
          env: opt(w.action.env),
          user: opt(w.action.user),
        },
      };
    }
    case "web_search_call": {
      const w = parse(WireItemSchemas.web_search_call);
      return { type, id: opt(w.id), status: opt(w.status) };
    }
    case "function_call_output": {
      const w = parse(WireItemSchemas.function_call_output);
      const body: FunctionCallOutputBody =
        typeof w.output === "string"
          ? { type: "text", text: w.output }
          : { type: "content_items", items: w.output.map(contentFromWire) };
      return { type, callId: w.call_id, output: { body } };
    }
    case "custom_tool_call_output": {
      const w = parse(WireItemSchemas.custom_tool_call_output);
      return { type, callId: w.call_id, output: w.output };
    }
  }
}

function bodyToWire(body: FunctionCallOutputBody): string | WireContentItem[] {
  return body.type === "text" ? body.text : body.items.map(contentToWire);
}

/** Render an item from history in wire form. `other` items are dropped. */
export function responseItemToWire(item: ResponseItem): Record<string, unknown> | undefined {
  switch (item.type) {
    case "message":
      return { type: item.type, role: item.role, content: item.content.map(contentToWire) };
    case "reasoning":
      return {
        type: item.type,
        id: item.id,
        summary: item.summary.map((text) => ({ type: "summary_text", text })),
      };
    case "function_call":
      return { type: item.type, name: item.name, arguments: item.arguments, call_id: item.callId };
    case "custom_tool_call":
      return { type: item.type, name: item.name, input: item.input, call_id: item.callId };
    case "local_shell_call":
      return {
        type: item.type,
        id: item.id ?? null,
        call_id: item.callId ?? null,
        status: item.status,
        action: {
          type: "exec",
          command: item.action.command,
          timeout_ms: item.action.timeoutMs ?? null,
          working_directory: item.action.workingDirectory ?? null,
          env: item.action.env ?? null,
          user: item.action.user ?? null,
        },
      };
    case "web_search_call":
      return { type: item.type, status: item.status ?? null };
    case "function_call_output":
      return { type: item.type, call_id: item.callId, output: bodyToWire(item.output.body) };
    case "custom_tool_call_output":
      return { type: item.type, call_id: item.callId, output: item.output };
    case "other":
      return undefined;
  }
}

/**
 * Fold a tool result into the history item the model will see next turn.
 * MCP results become function outputs, as the model invoked them as functions.
 */
export function responseInputItemToResponseItem(item: ResponseInputItem): ResponseItem {
  switch (item.type) {
    case "message":
    case "function_call_output":
    case "custom_tool_call_output":
      return item;
    case "mcp_tool_call_output": {
      const { result } = item;
      if (!result.ok) {
        return {
          type: "function_call_output",
          callId: item.callId,
          output: { body: { type: "text", text: result.error }, success: false },
        };
      }
      return {
        type: "function_call_output",
        callId: item.callId,
        output: {
          body: { type: "text", text: JSON.stringify(result.value.content) },
          success: result.value.isError !== true,
        },
      };
    }
  }
}

/** Wire form of a tool result, ready to send to the provider. */
export function responseInputItemToWire(item: ResponseInputItem): Record<string, unknown> {
  const folded = responseItemToWire(responseInputItemToResponseItem(item));
  // Folding never yields an `other` item.
  return folded ?? {};
}

/** Wrap user input as one user message. Empty input yields no item. */
export function userInputToResponseItem(input: readonly UserInput[]): ResponseItem | undefined {
  if (input.length === 0) return undefined;
  return {
    type: "message",
    role: "user",
    content: input.map((i): ContentItem =>
      i.type === "text" ? { type: "input_text", text: i.text } : { type: "input_image", imageUrl: i.imageUrl },
    ),
  };
}

/** Concatenated text of a message item. */
export function messageText(item: ResponseItem): string | undefined {
  if (item.type !== "message") return undefined;
  return item.content
    .map((c) => (c.type === "input_image" ? "" : c.text))
    .join("");
}

/** Text of the last assistant message in `items`, if any. */
export function lastAssistantMessage(items: readonly ResponseItem[]): string | undefined {
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (item.type === "message" && item.role === "assistant") {
      return messageText(item);
    }
  }
  return undefined;
}
