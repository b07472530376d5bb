import fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { createLogger } from "./logger.js";

const log = createLogger("config");

const ProviderSchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().url().optional(),
  wireApi: z.enum(["responses", "chat"]).default("responses"),
  remoteCompaction: z.boolean().optional(),
  apiKeyEnv: z.string().optional(),
});

const DynamicToolSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(""),
    format: z.enum(["function", "freeform"]).default("function"),
    inputSchema: z.record(z.unknown()).optional(),
    supportsParallel: z.boolean().optional(),
  })
  .refine((t) => t.format === "freeform" || t.inputSchema !== undefined, {
    message: "function tools need an inputSchema",
    path: ["inputSchema"],
  });

export const RuntimeConfigSchema = z.object({
  tools: z
    .object({
      shellType: z.enum(["default", "local", "shell_command", "disabled"]).default("default"),
      webSearch: z.boolean().default(false),
      shellTimeoutMs: z.number().int().positive().default(10_000),
    })
    .default({}),
  provider: ProviderSchema.default({ name: "local", wireApi: "chat" }),
  model: z.string().default("mock"),
  dynamicTools: z.array(DynamicToolSchema).default([]),
  /** How long a client may take to answer a dynamic tool call. */
  dynamicToolTimeoutMs: z.number().int().positive().default(60_000),
  logging: z
    .object({
      level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
    })
    .default({}),
  telemetry: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Validate an already-parsed config object and apply defaults. */
export function parseRuntimeConfig(raw: unknown, source = "<inline>"): RuntimeConfig {
  const result = RuntimeConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config at ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Load runtime config from a YAML file. A missing file yields defaults.
 */
export async function loadRuntimeConfig(path: string): Promise<RuntimeConfig> {
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      log.info("Config file not found, using defaults", { path });
      return parseRuntimeConfig({}, path);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid config at ${path}: ${reason}`);
  }

  const config = parseRuntimeConfig(raw, path);
  log.debug("Loaded config", { path, shellType: config.tools.shellType, provider: config.provider.name });
  return config;
}
