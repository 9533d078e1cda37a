/**
 * Structured logger.
 *
 * JSON lines on stderr so stdout stays free for CLI output.
 *
 * ```typescript
 * const log = createChildLogger({ service: "IntentRouter" });
 * log.info({ routingDecision }, "Intent classified");
 * ```
 */

import pino, { type Logger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level used before configuration is loaded. An unknown LOG_LEVEL is left
 * for loadConfig to report.
 */
export function initialLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (isLogLevel(env.LOG_LEVEL)) return env.LOG_LEVEL;
  return env.NODE_ENV === "test" ? "silent" : "info";
}

export const logger = pino(
  {
    level: initialLogLevel(),
    base: { service: "nexus" },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err
    },
    redact: {
      paths: ["apiKey", "reasoning.apiKey", "config.reasoning.apiKey", "authorization"],
      censor: "[redacted]"
    }
  },
  pino.destination(2)
);

export type { Logger };

const children = new Set<Logger>();

export function createChildLogger(bindings: { service: string } & Record<string, unknown>): Logger {
  const child = logger.child(bindings);
  children.add(child);
  return child;
}

/** Apply a level to the root logger and every module logger created from it. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
