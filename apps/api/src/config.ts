import { z } from "zod";
import { DEFAULT_TIME_ZONE, FETCH_DEFAULTS, type FetchTuning } from "@drivewindow/config";
import { GOOGLE_MAPS_BASE_URL } from "@drivewindow/google-maps";

const configSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3001),
    HOST: z.string().default("0.0.0.0"),
    APP_VERSION: z.string().default("dev"),
    // Security & Rate Limiting
    ALLOWED_ORIGINS: z.string().optional(), // Comma-separated list of allowed origins for CORS
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 1000), // 1 minute
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(30), // each series fans out to many upstream calls
    // Google Maps
    GOOGLE_MAPS_API_KEY: z.string().optional(),
    GOOGLE_MAPS_BASE_URL: z.string().url().default(GOOGLE_MAPS_BASE_URL),
    GOOGLE_MAPS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    // Batch fetch
    FETCH_MAX_ROUNDS: z.coerce.number().int().positive().default(FETCH_DEFAULTS.maxRounds),
    FETCH_FIRST_ROUND_WORKERS: z.coerce.number().int().positive().default(FETCH_DEFAULTS.firstRoundConcurrency),
    FETCH_RETRY_WORKERS: z.coerce.number().int().positive().default(FETCH_DEFAULTS.retryConcurrency),
    FETCH_ATTEMPTS_PER_TASK: z.coerce.number().int().positive().default(FETCH_DEFAULTS.attemptsPerTask),
    FETCH_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(FETCH_DEFAULTS.retryBaseDelayMs),
    ETA_MAX_SAMPLES: z.coerce.number().int().positive().default(96), // 24h at 15-minute steps
    DEFAULT_TIME_ZONE: z.string().min(1).default(DEFAULT_TIME_ZONE)
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

export function parseAllowedOrigins(allowedOrigins: string | undefined): string[] | true {
  if (!allowedOrigins) {
    return true;
  }
  const origins = allowedOrigins.split(",").map((o) => o.trim()).filter((o) => o.length > 0);
  return origins.length > 0 ? origins : true;
}
