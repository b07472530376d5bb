/**
 * Errors raised while turning a model request into a tool result.
 *
 * Only `fatal` (and a local shell call with no id) may abort a turn;
 * `respond_to_model` is reported back to the model as the tool's output.
 */
export type FunctionCallErrorKind =
  | "fatal"
  | "respond_to_model"
  | "missing_local_shell_call_id";

export class FunctionCallError extends Error {
  readonly kind: FunctionCallErrorKind;

  private constructor(kind: FunctionCallErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FunctionCallError";
    this.kind = kind;
  }

  /** The invocation could not be interpreted at all. Aborts the turn. */
  static fatal(message: string, cause?: unknown): FunctionCallError {
    return new FunctionCallError("fatal", `Fatal error: ${message}`, { cause });
  }

  /** A tool-level failure the model should see. */
  static respondToModel(message: string): FunctionCallError {
    return new FunctionCallError("respond_to_model", message);
  }

  static missingLocalShellCallId(): FunctionCallError {
    return new FunctionCallError(
      "missing_local_shell_call_id",
      "LocalShellCall without call_id or id",
    );
  }
}

export function isFunctionCallError(err: unknown): err is FunctionCallError {
  return err instanceof FunctionCallError;
}

export function isFatal(err: unknown): err is FunctionCallError {
  return isFunctionCallError(err) && err.kind === "fatal";
}
