import { FETCH_DEFAULTS, type FetchTuning } from "@drivewindow/config";
import { runWithConcurrency } from "./pool.js";
import { ResultTable } from "./result-table.js";
import { taskKey } from "./tasks.js";
import type { FetchTask, Logger } from "./types.js";

/** Resolves to the task's duration in minutes; rejects when the call failed. */
export type FetchOne = (task: FetchTask) => Promise<number>;

export type BatchFetchOptions = FetchTuning & {
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export type BatchFetchResult = {
  table: ResultTable;
  /** Tasks that failed every attempt of every round */
  failed: FetchTask[];
  rounds: number;
};

type AttemptResult = { ok: true; minutes: number } | { ok: false; error: unknown };

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function assertPositiveInteger(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function validateOptions(options: FetchTuning) {
  assertPositiveInteger("maxRounds", options.maxRounds);
  assertPositiveInteger("firstRoundConcurrency", options.firstRoundConcurrency);
  assertPositiveInteger("retryConcurrency", options.retryConcurrency);
  assertPositiveInteger("attemptsPerTask", options.attemptsPerTask);
  if (!Number.isFinite(options.retryBaseDelayMs) || options.retryBaseDelayMs < 0) {
    throw new RangeError(`retryBaseDelayMs must be >= 0, got ${options.retryBaseDelayMs}`);
  }
  if (options.retryConcurrency >= options.firstRoundConcurrency) {
    throw new RangeError(
      `retryConcurrency (${options.retryConcurrency}) must be less than firstRoundConcurrency (${options.firstRoundConcurrency})`
    );
  }
}

function describeTask(task: FetchTask) {
  return { departure: task.instant.localTime, model: task.model };
}

/**
 * Call fetchOne up to `attempts` times, waiting (attempt + 1) × baseDelay
 * between calls. The worker slot stays with this task while it waits.
 */
async function attemptTask(
  task: FetchTask,
  fetchOne: FetchOne,
  attempts: number,
  baseDelayMs: number,
  sleep: (ms: number) => Promise<void>
): Promise<AttemptResult> {
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      const minutes = await fetchOne(task);
      return { ok: true, minutes };
    } catch (error) {
      lastError = error;
      if (attempt < attempts - 1) {
        await sleep((attempt + 1) * baseDelayMs);
      }
    }
  }

  return { ok: false, error: lastError };
}

/**
 * Fetch every task, retrying failures in rounds.
 *
 * Round 1 runs with firstRoundConcurrency workers; later rounds only see the
 * tasks that failed the round before and run with retryConcurrency workers.
 * Each round finishes completely before the next starts. Tasks still failing
 * after maxRounds are returned in `failed` instead of throwing.
 */
export async function runBatchFetch(
  tasks: readonly FetchTask[],
  fetchOne: FetchOne,
  options: Partial<BatchFetchOptions> = {}
): Promise<BatchFetchResult> {
  const tuning: FetchTuning = {
    maxRounds: options.maxRounds ?? FETCH_DEFAULTS.maxRounds,
    firstRoundConcurrency: options.firstRoundConcurrency ?? FETCH_DEFAULTS.firstRoundConcurrency,
    retryConcurrency: options.retryConcurrency ?? FETCH_DEFAULTS.retryConcurrency,
    attemptsPerTask: options.attemptsPerTask ?? FETCH_DEFAULTS.attemptsPerTask,
    retryBaseDelayMs: options.retryBaseDelayMs ?? FETCH_DEFAULTS.retryBaseDelayMs
  };
  validateOptions(tuning);

  const sleep = options.sleep ?? delay;
  const logger = options.logger;
  const table = new ResultTable();

  // Collapse duplicate (instant, model) pairs so each cell is fetched once
  const unique = new Map<string, FetchTask>();
  for (const task of tasks) {
    if (!unique.has(taskKey(task))) {
      unique.set(taskKey(task), task);
    }
  }

  let pending = Array.from(unique.values());
  let rounds = 0;

  while (pending.length > 0 && rounds < tuning.maxRounds) {
    rounds += 1;
    const workers = rounds === 1 ? tuning.firstRoundConcurrency : tuning.retryConcurrency;
    const stillFailing: FetchTask[] = [];

    logger?.info({ round: rounds, tasks: pending.length, workers }, "fetch round starting");

    await runWithConcurrency(pending, workers, async (task) => {
      const result = await attemptTask(
        task,
        fetchOne,
        tuning.attemptsPerTask,
        tuning.retryBaseDelayMs,
        sleep
      );

      if (result.ok) {
        table.record(task.instant, task.model, result.minutes);
        return;
      }

      logger?.warn(
        { ...describeTask(task), attempts: tuning.attemptsPerTask, err: result.error },
        "fetch failed after retries"
      );
      stillFailing.push(task);
    });

    pending = stillFailing;

    if (pending.length > 0) {
      logger?.warn(
        { round: rounds, failed: pending.length, willRetry: rounds < tuning.maxRounds },
        "fetch round left failures"
      );
    }
  }

  return { table, failed: pending, rounds };
}
