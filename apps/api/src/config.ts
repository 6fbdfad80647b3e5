import { z } from "zod";
import { fromEnv } from "@reqcase/agents";
import { DEFAULT_MAX_WORKERS, MAX_MAX_WORKERS, MIN_MAX_WORKERS } from "@reqcase/shared";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const ApiConfigSchema = z.object({
  port: fromEnv(z.coerce.number().int().min(1).max(65535).default(8113)),
  host: fromEnv(z.string().min(1).default("0.0.0.0")),
  logLevel: fromEnv(z.enum(LOG_LEVELS).default("info")),
  taskRetentionHours: fromEnv(z.coerce.number().positive().default(24)),
  generationMaxRetries: fromEnv(z.coerce.number().int().min(0).max(10).default(2)),
  generationRetryBackoffMs: fromEnv(z.coerce.number().int().nonnegative().default(500)),
  defaultMaxWorkers: fromEnv(
    z.coerce.number().int().min(MIN_MAX_WORKERS).max(MAX_MAX_WORKERS).default(DEFAULT_MAX_WORKERS)
  ),
});

export interface ApiConfig {
  port: number;
  host: string;
  logLevel: (typeof LOG_LEVELS)[number];
  taskRetentionHours: number;
  generationMaxRetries: number;
  generationRetryBackoffMs: number;
  defaultMaxWorkers: number;
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return ApiConfigSchema.parse({
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    taskRetentionHours: env.TASK_RETENTION_HOURS,
    generationMaxRetries: env.GENERATION_MAX_RETRIES,
    generationRetryBackoffMs: env.GENERATION_RETRY_BACKOFF_MS,
    defaultMaxWorkers: env.DEFAULT_MAX_WORKERS,
  });
}
