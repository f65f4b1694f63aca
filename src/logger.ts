import { pino, type Logger } from "pino";
import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Unknown or missing levels fall back to "info"; config validation reports them. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = z.enum(LOG_LEVELS).safeParse(value);
  return parsed.success ? parsed.data : "info";
}

/**
 * Process-wide pino logger. Engines derive a child bound to their pair id.
 * Level comes from LOG_LEVEL directly so that config validation can log.
 */
export const logger: Logger = pino({
  name: "limit-book",
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger };
