export { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
export { createLogger, setDefaultLogLevel, errorMessage } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export { FunctionCallError, isFunctionCallError, isFatal } from "./errors.js";
export type { FunctionCallErrorKind } from "./errors.js";
export { loadRuntimeConfig, parseRuntimeConfig, RuntimeConfigSchema, ConfigError } from "./config.js";
export type { RuntimeConfig } from "./config.js";
export { MetricsRecorder } from "./telemetry.js";
export type { MetricsRecorderOptions } from "./telemetry.js";
