import type { LogEntry, LogLevel, TraceContext } from "@switchyard/types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

type LogMethod = (
  message: string,
  data?: Record<string, unknown>,
  traceCtx?: TraceContext,
) => void;

export interface Logger {
  readonly component: string;
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  /** A logger for a sub-component, e.g. `router` → `router.registry`. */
  child(component: string): Logger;
  enabled(level: LogLevel): boolean;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Where entries go. Defaults to one JSON line on stdout/stderr. */
  sink?: (entry: LogEntry) => void;
}

function consoleSink(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (LEVEL_ORDER[entry.level] >= LEVEL_ORDER.error) {
    console.error(line);
  } else {
    console.log(line);
  }
}

let defaultLevel: LogLevel = "info";

/** Set the level used by loggers created without an explicit one. */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

/**
 * Structured JSON logger. Each entry is a `LogEntry` serialized on one line.
 */
export function createLogger(component: string, opts: LoggerOptions = {}): Logger {
  const sink = opts.sink ?? consoleSink;
  const threshold = () => LEVEL_ORDER[opts.level ?? defaultLevel];

  const emit =
    (level: LogLevel): LogMethod =>
    (message, data, traceCtx) => {
      if (LEVEL_ORDER[level] < threshold()) return;
      sink({
        timestamp: new Date().toISOString(),
        level,
        message,
        component,
        ...(traceCtx ? { traceCtx } : {}),
        ...(data ? { data } : {}),
      });
    };

  return {
    component,
    trace: emit("trace"),
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    fatal: emit("fatal"),
    child: (sub) => createLogger(`${component}.${sub}`, opts),
    enabled: (level) => LEVEL_ORDER[level] >= threshold(),
  };
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
