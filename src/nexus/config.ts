import { z } from "zod";
import { NexusError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";
import type { LogLevel } from "./logger.js";
import { MAX_TIMEOUT_MS } from "./utils/deadline.js";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v === undefined || v.length === 0 ? undefined : v));

const EnvSchema = z.object({
  NEXUS_MAX_ITERATIONS: positiveInt(10),
  NEXUS_RUN_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).default(300_000),
  NEXUS_MAX_CONCURRENT_CAPABILITIES: positiveInt(5),
  NEXUS_MAX_CONCURRENT_RUNS: positiveInt(5),
  NEXUS_QUEUE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000),
  REASONING_API_KEY: optionalString,
  REASONING_BASE_URL: z.string().url().default("https://api.deepseek.com/v1"),
  REASONING_MODEL: z.string().min(1).default("deepseek-chat"),
  ROUTER_MODEL: z.string().min(1).default("deepseek-chat"),
  REASONING_TIMEOUT_MS: positiveInt(60_000),
  HOST: z.string().min(1).default("127.0.0.1"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info")
});

export type ReasoningConfig = {
  apiKey?: string;
  baseUrl: string;
  model: string;
  routerModel: string;
  timeoutMs: number;
};

export type NexusConfig = {
  maxIterations: number;
  runTimeoutMs: number;
  maxConcurrentCapabilities: number;
  maxConcurrentRuns: number;
  queueTimeoutMs: number;
  reasoning: ReasoningConfig;
  server: { host: string; port: number };
  logLevel: LogLevel;
};

/**
 * Build the process configuration from environment variables.
 * @throws NexusError INVALID_CONFIG listing every offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<NexusConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new NexusError("INVALID_CONFIG", `Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  const e = parsed.data;

  const reasoning: ReasoningConfig = {
    baseUrl: e.REASONING_BASE_URL,
    model: e.REASONING_MODEL,
    routerModel: e.ROUTER_MODEL,
    timeoutMs: e.REASONING_TIMEOUT_MS
  };
  if (e.REASONING_API_KEY !== undefined) {
    reasoning.apiKey = e.REASONING_API_KEY;
  }

  return Object.freeze({
    maxIterations: e.NEXUS_MAX_ITERATIONS,
    runTimeoutMs: e.NEXUS_RUN_TIMEOUT_MS,
    maxConcurrentCapabilities: e.NEXUS_MAX_CONCURRENT_CAPABILITIES,
    maxConcurrentRuns: e.NEXUS_MAX_CONCURRENT_RUNS,
    queueTimeoutMs: e.NEXUS_QUEUE_TIMEOUT_MS,
    reasoning,
    server: { host: e.HOST, port: e.PORT },
    logLevel: e.LOG_LEVEL
  });
}
