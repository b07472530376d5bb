import { execFile } from "node:child_process";
import { promisify } from "node:util";
import path from "node:path";
import { z } from "zod";
import type {
  JsonSchema,
  ResponseInputItem,
  ShellToolCallParams,
  ToolHandler,
  ToolInvocation,
  ToolPayload,
  ToolSpec,
  TurnContext,
} from "@switchyard/types";
import { FunctionCallError, createLogger, errorMessage, type Logger } from "@switchyard/core";
import { truncateOutput } from "../output.js";

const execFileAsync = promisify(execFile);

/** Exit code reported when a command is killed by its timeout. */
export const TIMEOUT_EXIT_CODE = 124;

const SANDBOX_PERMISSIONS = ["use_default", "require_escalated"] as const;
const SandboxPermissionsSchema = z.enum(SANDBOX_PERMISSIONS);

/** Argument descriptions shown to the model; also attached to the zod schemas. */
const FIELD_DESCRIPTIONS = {
  argv: "The command to execute, as the program followed by its arguments.",
  script: "The shell script to execute.",
  workdir: "The working directory to execute the command in.",
  timeout_ms: "The timeout for the command in milliseconds.",
  sandbox_permissions: "Request escalated permissions when the sandbox blocks the command.",
  justification: "Only set when sandbox_permissions is require_escalated: why escalation is needed.",
  prefix_rule: "Command prefix to approve for the rest of the session.",
} as const;

const commonFields = {
  workdir: z.string().optional().describe(FIELD_DESCRIPTIONS.workdir),
  timeout_ms: z.number().int().positive().optional().describe(FIELD_DESCRIPTIONS.timeout_ms),
  sandbox_permissions: SandboxPermissionsSchema.optional().describe(FIELD_DESCRIPTIONS.sandbox_permissions),
  justification: z.string().optional().describe(FIELD_DESCRIPTIONS.justification),
  prefix_rule: z.array(z.string()).optional().describe(FIELD_DESCRIPTIONS.prefix_rule),
};

export const ShellArgsSchema = z.object({
  command: z.array(z.string()).min(1).describe(FIELD_DESCRIPTIONS.argv),
  ...commonFields,
});

export const ShellCommandArgsSchema = z.object({
  command: z.string().min(1).describe(FIELD_DESCRIPTIONS.script),
  ...commonFields,
});

const commonProperties: JsonSchema = {
  workdir: { type: "string", description: FIELD_DESCRIPTIONS.workdir },
  timeout_ms: { type: "number", description: FIELD_DESCRIPTIONS.timeout_ms },
  sandbox_permissions: { type: "string", enum: SANDBOX_PERMISSIONS, description: FIELD_DESCRIPTIONS.sandbox_permissions },
  justification: { type: "string", description: FIELD_DESCRIPTIONS.justification },
  prefix_rule: { type: "array", items: { type: "string" }, description: FIELD_DESCRIPTIONS.prefix_rule },
};

/** The `shell` function tool: argv form. */
export function shellToolSpec(): ToolSpec {
  return {
    type: "function",
    name: "shell",
    description: "Runs a program and returns its output. Pass the program and its arguments as an array.",
    strict: false,
    parameters: {
      type: "object",
      properties: {
        command: { type: "array", items: { type: "string" }, description: FIELD_DESCRIPTIONS.argv },
        ...commonProperties,
      },
      required: ["command"],
      additionalProperties: false,
    },
  };
}

/** The `shell_command` function tool: one script string. */
export function shellCommandToolSpec(): ToolSpec {
  return {
    type: "function",
    name: "shell_command",
    description: "Runs a shell script in the user's login shell and returns its output.",
    strict: false,
    parameters: {
      type: "object",
      properties: {
        command: { type: "string", description: FIELD_DESCRIPTIONS.script },
        ...commonProperties,
      },
      required: ["command"],
      additionalProperties: false,
    },
  };
}

const ShellFunctionArgsSchema = z.union([ShellArgsSchema, ShellCommandArgsSchema]);

export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly timedOut: boolean;
}

export interface CommandRunOptions {
  readonly cwd: string;
  readonly timeoutMs: number;
  readonly env?: Readonly<Record<string, string>>;
}

/** Runs one program. Rejects only when the program cannot be started. */
export type CommandRunner = (command: string[], opts: CommandRunOptions) => Promise<CommandResult>;

interface ExecFailure {
  stdout?: string;
  stderr?: string;
  code?: number | string;
  killed?: boolean;
  signal?: string | null;
}

function asExecFailure(error: unknown): ExecFailure {
  if (typeof error !== "object" || error === null) return {};
  const out: ExecFailure = {};
  if ("stdout" in error && typeof error.stdout === "string") out.stdout = error.stdout;
  if ("stderr" in error && typeof error.stderr === "string") out.stderr = error.stderr;
  if ("code" in error && (typeof error.code === "number" || typeof error.code === "string")) out.code = error.code;
  if ("killed" in error && typeof error.killed === "boolean") out.killed = error.killed;
  if ("signal" in error && typeof error.signal === "string") out.signal = error.signal;
  return out;
}

/** Default runner: `execFile` without a shell. */
export const execFileRunner: CommandRunner = async (command, opts) => {
  const [program, ...args] = command;
  try {
    const { stdout, stderr } = await execFileAsync(program, args, {
      cwd: opts.cwd,
      timeout: opts.timeoutMs,
      env: { ...process.env, ...opts.env },
      maxBuffer: 8 * 1024 * 1024,
    });
    return { stdout, stderr, exitCode: 0, timedOut: false };
  } catch (error: unknown) {
    const err = asExecFailure(error);
    // A string code (ENOENT, EACCES) means the program never ran.
    if (typeof err.code === "string") {
      throw error;
    }
    const timedOut = err.killed === true && err.signal === "SIGTERM";
    return {
      stdout: err.stdout ?? "",
      stderr: err.stderr ?? "",
      exitCode: timedOut ? TIMEOUT_EXIT_CODE : err.code ?? 1,
      timedOut,
    };
  }
};

export function isWithinDir(filePath: string, dir: string): boolean {
  const resolved = path.resolve(filePath);
  const resolvedDir = path.resolve(dir);
  return resolved === resolvedDir || resolved.startsWith(resolvedDir + path.sep);
}

/** Parse function-style arguments into shell params. */
export function parseShellArguments(raw: string): ShellToolCallParams {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw FunctionCallError.respondToModel(`failed to parse function arguments: ${errorMessage(err)}`);
  }

  const parsed = ShellFunctionArgsSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
    throw FunctionCallError.respondToModel(`failed to parse function arguments: ${detail}`);
  }

  const args = parsed.data;
  return {
    command: typeof args.command === "string" ? ["bash", "-lc", args.command] : args.command,
    workdir: args.workdir,
    timeoutMs: args.timeout_ms,
    sandboxPermissions: args.sandbox_permissions,
    justification: args.justification,
    prefixRule: args.prefix_rule,
  };
}

/** `Exit code: N` header followed by combined stdout/stderr. */
export function formatExecOutput(result: CommandResult, timeoutMs: number): string {
  const streams = [result.stdout, result.stderr].filter((s) => s.length > 0).join("\n");
  const body = result.timedOut ? `command timed out after ${timeoutMs} ms\n${streams}` : streams;
  return `Exit code: ${result.exitCode}\nOutput:\n${truncateOutput(body)}`;
}

export interface ShellHandlerOptions {
  /** Used when a call carries no timeout of its own. */
  defaultTimeoutMs?: number;
  runner?: CommandRunner;
  log?: Logger;
}

/**
 * Handles every spelling of the shell tool: function calls carrying JSON
 * arguments and legacy local-shell calls carrying structured params.
 */
export class ShellHandler implements ToolHandler {
  readonly kind = "function" as const;
  private readonly defaultTimeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(opts: ShellHandlerOptions = {}) {
    this.defaultTimeoutMs = opts.defaultTimeoutMs ?? 10_000;
    this.runner = opts.runner ?? execFileRunner;
    this.log = opts.log ?? createLogger("tools.shell");
  }

  matchesKind(payload: ToolPayload): boolean {
    return payload.type === "function" || payload.type === "local_shell";
  }

  async handle(invocation: ToolInvocation): Promise<ResponseInputItem> {
    const { payload, callId, turn } = invocation;
    let params: ShellToolCallParams;
    switch (payload.type) {
      case "function":
        params = parseShellArguments(payload.arguments);
        break;
      case "local_shell":
        params = payload.params;
        break;
      case "custom":
      case "mcp":
        throw FunctionCallError.fatal(`unsupported payload for shell handler: ${invocation.toolName}`);
    }

    const cwd = this.resolveWorkdir(params, turn);
    const timeoutMs = params.timeoutMs ?? this.defaultTimeoutMs;

    let result: CommandResult;
    try {
      result = await this.runner(params.command, { cwd, timeoutMs });
    } catch (err) {
      throw FunctionCallError.respondToModel(
        `failed to start ${params.command[0]}: ${errorMessage(err)}`,
      );
    }

    this.log.debug(
      "Command finished",
      { callId, program: params.command[0], exitCode: result.exitCode, timedOut: result.timedOut },
      turn.traceCtx,
    );

    return {
      type: "function_call_output",
      callId,
      output: {
        body: { type: "text", text: formatExecOutput(result, timeoutMs) },
        success: result.exitCode === 0,
      },
    };
  }

  private resolveWorkdir(params: ShellToolCallParams, turn: TurnContext): string {
    const escalated = params.sandboxPermissions === "require_escalated";
    if (escalated && !params.justification) {
      throw FunctionCallError.respondToModel("escalated permissions require a justification");
    }
    if (escalated && turn.sandboxPolicy === "read-only") {
      throw FunctionCallError.respondToModel(
        "escalated permissions are not available under the read-only sandbox policy",
      );
    }

    const cwd = params.workdir ? path.resolve(turn.cwd, params.workdir) : turn.cwd;
    if (
      !escalated &&
      turn.sandboxPolicy !== "danger-full-access" &&
      !isWithinDir(cwd, turn.cwd)
    ) {
      throw FunctionCallError.respondToModel(
        `working directory ${cwd} is outside the workspace ${turn.cwd}`,
      );
    }
    return cwd;
  }
}
