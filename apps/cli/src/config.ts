import { z } from "zod";
import { DEFAULT_TIME_ZONE, FETCH_DEFAULTS, type FetchTuning } from "@drivewindow/config";
import { GOOGLE_MAPS_BASE_URL } from "@drivewindow/google-maps";

const configSchema = z
  .object({
    GOOGLE_MAPS_API_KEY: z.string().optional(),
    GOOGLE_MAPS_BASE_URL: z.string().url().default(GOOGLE_MAPS_BASE_URL),
    GOOGLE_MAPS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    FETCH_MAX_ROUNDS: z.coerce.number().int().positive().default(FETCH_DEFAULTS.maxRounds),
    FETCH_FIRST_ROUND_WORKERS: z.coerce.number().int().positive().default(FETCH_DEFAULTS.firstRoundConcurrency),
    FETCH_RETRY_WORKERS: z.coerce.number().int().positive().default(FETCH_DEFAULTS.retryConcurrency),
    FETCH_ATTEMPTS_PER_TASK: z.coerce.number().int().positive().default(FETCH_DEFAULTS.attemptsPerTask),
    FETCH_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(FETCH_DEFAULTS.retryBaseDelayMs),
    DEFAULT_TIME_ZONE: z.string().min(1).default(DEFAULT_TIME_ZONE),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
  })
  .refine((config) => config.FETCH_RETRY_WORKERS < config.FETCH_FIRST_ROUND_WORKERS, {
    message: "FETCH_RETRY_WORKERS must be less than FETCH_FIRST_ROUND_WORKERS",
    path: ["FETCH_RETRY_WORKERS"]
  });

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

// For testing: reset cached config
export function resetConfig(): void {
  cachedConfig = null;
}

export function fetchTuningFromConfig(config: Config): FetchTuning {
  return {
    maxRounds: config.FETCH_MAX_ROUNDS,
    firstRoundConcurrency: config.FETCH_FIRST_ROUND_WORKERS,
    retryConcurrency: config.FETCH_RETRY_WORKERS,
    attemptsPerTask: config.FETCH_ATTEMPTS_PER_TASK,
    retryBaseDelayMs: config.FETCH_RETRY_BASE_DELAY_MS
  };
}
