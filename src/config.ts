import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  PORT: int(7090, 1),
  DB_PATH: z.string().min(1).default("./data/prqueue.sqlite"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  QUEUE_API_KEY: z.string().optional(),
  DEFAULT_MAX_RETRIES: int(3),
  RECLAIM_INTERVAL_MINUTES: int(5, 1),
  MAX_PROCESSING_MINUTES: z.coerce.number().int().min(1).optional(),
  HEALTH_INTERVAL_MINUTES: int(60, 1),
  RETENTION_INTERVAL_MINUTES: int(1440, 1),
  RETENTION_DAYS: int(30),
  SCHEDULER_ENABLED: z.enum(["0", "1", "true", "false"]).default("1"),
  RATE_LIMIT_WINDOW_MS: int(60_000, 1),
  RATE_LIMIT_MAX: int(120, 1)
});

export type AppConfig = {
  port: number;
  dbPath: string;
  logLevel: string;
  apiKey?: string;
  defaultMaxRetries: number;
  reclaimIntervalMinutes: number;
  maxProcessingMinutes: number;
  healthIntervalMinutes: number;
  retentionIntervalMinutes: number;
  retentionDays: number;
  schedulerEnabled: boolean;
  rateLimitWindowMs: number;
  rateLimitMax: number;
};

/** Claims older than this many reclaim intervals count as stale. */
export const STALE_AFTER_INTERVALS = 6;

export function loadDotenv(cwd = process.cwd()) {
  dotenv.config({ path: path.resolve(cwd, ".env.local") });
  dotenv.config({ path: path.resolve(cwd, ".env") });
}

/**
 * Reads configuration from the environment. Empty strings count as unset.
 *
 * @throws ZodError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const e = EnvSchema.parse(cleaned);

  return {
    port: e.PORT,
    dbPath: e.DB_PATH,
    logLevel: e.LOG_LEVEL,
    apiKey: e.QUEUE_API_KEY,
    defaultMaxRetries: e.DEFAULT_MAX_RETRIES,
    reclaimIntervalMinutes: e.RECLAIM_INTERVAL_MINUTES,
    maxProcessingMinutes: e.MAX_PROCESSING_MINUTES ?? e.RECLAIM_INTERVAL_MINUTES * STALE_AFTER_INTERVALS,
    healthIntervalMinutes: e.HEALTH_INTERVAL_MINUTES,
    retentionIntervalMinutes: e.RETENTION_INTERVAL_MINUTES,
    retentionDays: e.RETENTION_DAYS,
    schedulerEnabled: e.SCHEDULER_ENABLED === "1" || e.SCHEDULER_ENABLED === "true",
    rateLimitWindowMs: e.RATE_LIMIT_WINDOW_MS,
    rateLimitMax: e.RATE_LIMIT_MAX
  };
}
