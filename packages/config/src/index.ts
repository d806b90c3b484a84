export type TrafficModel = "optimistic" | "pessimistic";

/** Order matters: tasks are built and tables printed in this order. */
export const TRAFFIC_MODELS: readonly TrafficModel[] = ["optimistic", "pessimistic"];

export function isTrafficModel(value: string): value is TrafficModel {
  return value === "optimistic" || value === "pessimistic";
}

export const DEFAULT_TIME_ZONE = "America/Los_Angeles";
export const DEFAULT_INTERVAL_MINUTES = 15;

export type FetchTuning = {
  maxRounds: number;
  firstRoundConcurrency: number;
  /** Repeated failure suggests the upstream is degraded, so retry rounds fan out less */
  retryConcurrency: number;
  /** Calls per task per round, including the first one */
  attemptsPerTask: number;
  retryBaseDelayMs: number;
};

export const FETCH_DEFAULTS: FetchTuning = {
  maxRounds: 3,
  firstRoundConcurrency: 30,
  retryConcurrency: 10,
  attemptsPerTask: 3,
  retryBaseDelayMs: 500
};

export const CHART_HEIGHT_ROWS = 20;

export const CHART_MARKERS = {
  optimistic: "+",
  pessimistic: "o",
  average: "*",
  best: "B",
  worst: "W",
  empty: " "
} as const;

export const GEOCODE_CANDIDATE_LIMIT = 5;

export const STATIC_MAP_DEFAULTS = {
  size: "640x400",
  scale: 2,
  maptype: "roadmap"
} as const;

/**
 * Round half-up to one decimal place, in a single step.
 * The small nudge keeps halves such as 10.15 (stored as 101.4999… tenths) rounding up.
 */
export function roundToTenth(value: number): number {
  return Math.round(value * 10 + 1e-9) / 10;
}

/**
 * Mean of two one-decimal values, rounded half-up to one decimal.
 * (10.1 + 10.2) / 2 → 10.2
 */
export function averageOfTenths(a: number, b: number): number {
  const tenths = Math.round(a * 10) + Math.round(b * 10);
  return Math.round(tenths / 2) / 10;
}

/** Difference of two one-decimal values without floating-point drift. */
export function differenceOfTenths(a: number, b: number): number {
  return (Math.round(a * 10) - Math.round(b * 10)) / 10;
}

export function formatMinutes(value: number): string {
  return value.toFixed(1);
}
