// ─── Configuration: defaults, env overrides, validation ─────────────────────

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors";

const periodList = z
  .array(z.number().int("Periods must be integers").positive("Periods must be positive"))
  .min(1, "At least one period is required")
  .transform((xs) => [...new Set(xs)].sort((a, b) => a - b));

export const modelParamsSchema = z.object({
  nTrees: z.number().int().positive().default(300),
  learningRate: z.number().positive().max(1).default(0.05),
  maxDepth: z.number().int().positive().default(4),
  minLeaf: z.number().int().positive().default(10),
  subsample: z.number().positive().max(1).default(0.8),
  earlyStoppingRounds: z.number().int().positive().default(50),
  seed: z.number().int().default(42),
});

export type ModelParams = z.infer<typeof modelParamsSchema>;

export const forecastConfigSchema = z.object({
  lags: periodList.default([1, 2, 3, 6, 12]),
  rollingWindows: periodList.default([3, 6, 12]),
  exogenousColumns: z
    .array(z.string().min(1))
    .default(["avg_max_temp", "price_actual", "discount_in_percent"]),
  aggregateFallback: z.enum(["null", "global_mean"]).default("null"),
  unseenEntityPolicy: z.enum(["error", "unknown"]).default("error"),
  logLevel: z.enum(["error", "warn", "info", "debug", "silent"]).default("info"),
  model: modelParamsSchema.default({}),
});

export type ForecastConfig = z.infer<typeof forecastConfigSchema>;
export type ForecastConfigInput = z.input<typeof forecastConfigSchema>;

export function parseConfig(input: unknown = {}): ForecastConfig {
  const result = forecastConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  return result.data;
}

function numberList(raw: string, name: string): number[] {
  return raw.split(",").map((part) => {
    const n = Number(part.trim());
    if (part.trim() === "" || !Number.isFinite(n)) {
      throw new ConfigurationError(`${name} must be a comma-separated list of numbers, got "${raw}"`);
    }
    return n;
  });
}

export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const input: Record<string, unknown> = {};
  if (env.LOG_LEVEL) input.logLevel = env.LOG_LEVEL;
  if (env.FORECAST_LAGS) input.lags = numberList(env.FORECAST_LAGS, "FORECAST_LAGS");
  if (env.FORECAST_ROLLING_WINDOWS) {
    input.rollingWindows = numberList(env.FORECAST_ROLLING_WINDOWS, "FORECAST_ROLLING_WINDOWS");
  }
  if (env.FORECAST_EXOGENOUS !== undefined) {
    input.exogenousColumns = env.FORECAST_EXOGENOUS.split(",").map((c) => c.trim()).filter(Boolean);
  }
  if (env.FORECAST_AGGREGATE_FALLBACK) input.aggregateFallback = env.FORECAST_AGGREGATE_FALLBACK;
  if (env.FORECAST_UNSEEN_ENTITY) input.unseenEntityPolicy = env.FORECAST_UNSEEN_ENTITY;
  return input;
}

/**
 * Merges `envFile` (if present) under `env`; variables set in `env` win, as
 * with a process environment over `.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, envFile = ".env"): ForecastConfig {
  const fromFile: Record<string, string> = {};
  loadDotenv({ path: envFile, processEnv: fromFile });
  return parseConfig(configFromEnv({ ...fromFile, ...env }));
}

/** Longest lookback any lag or rolling window needs. */
export function historyDepth(config: Pick<ForecastConfig, "lags" | "rollingWindows">): number {
  return Math.max(...config.lags, ...config.rollingWindows);
}
