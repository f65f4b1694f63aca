import { z } from "zod";
import { LOG_LEVELS, logger } from "./logger.js";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  TAKER_FEE_BPS: z.coerce.number().int().min(0).max(1000).default(100), // 1% default
  MAX_ORDERS_PER_CALL: z.coerce.number().int().min(1).max(10_000).default(1500),
  FEE_RECIPIENT: z.string().min(1).default("fees"),
  CUSTODY_ACCOUNT: z.string().min(1).default("custody"),
});

export type Config = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(public readonly fieldErrors: Record<string, string[] | undefined>) {
    super(`Invalid environment variables: ${Object.keys(fieldErrors).join(", ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    logger.error({ fieldErrors }, "Invalid environment variables");
    throw new ConfigError(fieldErrors);
  }
  return result.data;
}

let _config: Config | null = null;

/** Lazily parsed process configuration. */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
