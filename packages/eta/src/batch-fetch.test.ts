import { describe, expect, it, vi } from "vitest";
import type { TrafficModel } from "@drivewindow/config";
import { runBatchFetch } from "./batch-fetch.js";
import { buildFetchTasks } from "./tasks.js";
import { buildTimeGrid } from "./time-grid.js";
import type { FetchTask } from "./types.js";

const origin = { lat: 37.3861, lng: -122.0839 };
const destination = { lat: 37.7749, lng: -122.4194 };
const grid = buildTimeGrid("2025-11-20", "08:00", "08:45", 15, "America/Los_Angeles");
const tasks = buildFetchTasks(origin, destination, grid);

const MINUTES: Record<TrafficModel, number[]> = {
  optimistic: [10, 12, 20, 15],
  pessimistic: [14, 16, 24, 19]
};

function durationFor(task: FetchTask): number {
  const index = grid.findIndex((instant) => instant.epochMs === task.instant.epochMs);
  return MINUTES[task.model][index];
}

const isTask = (task: FetchTask, localTime: string, model: TrafficModel) =>
  task.instant.localTime === localTime && task.model === model;

const noSleep = () => vi.fn(async (_ms: number) => {});

describe("runBatchFetch", () => {
  it("records one value per (instant, model) when nothing fails", async () => {
    const fetchOne = vi.fn(async (task: FetchTask) => durationFor(task));

    const { table, failed, rounds } = await runBatchFetch(tasks, fetchOne, { sleep: noSleep() });

    expect(fetchOne).toHaveBeenCalledTimes(8);
    expect(table.size).toBe(8);
    expect(failed).toEqual([]);
    expect(rounds).toBe(1);
    expect(table.rowsInOrder().map((row) => row.durations)).toEqual([
      { optimistic: 10, pessimistic: 14 },
      { optimistic: 12, pessimistic: 16 },
      { optimistic: 20, pessimistic: 24 },
      { optimistic: 15, pessimistic: 19 }
    ]);
  });

  it("returns an empty table for no tasks", async () => {
    const fetchOne = vi.fn(async (task: FetchTask) => durationFor(task));
    const logger = { info: vi.fn(), warn: vi.fn() };

    const { table, failed, rounds } = await runBatchFetch([], fetchOne, { logger });

    expect(table.size).toBe(0);
    expect(failed).toEqual([]);
    expect(rounds).toBe(0);
    expect(fetchOne).not.toHaveBeenCalled();
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("fetches duplicate tasks once", async () => {
    const fetchOne = vi.fn(async (task: FetchTask) => durationFor(task));

    const { table } = await runBatchFetch([...tasks, ...tasks], fetchOne, { sleep: noSleep() });

    expect(fetchOne).toHaveBeenCalledTimes(8);
    expect(table.size).toBe(8);
  });

  it("retries a task locally with growing waits", async () => {
    let failuresLeft = 2;
    const fetchOne = vi.fn(async (task: FetchTask) => {
      if (isTask(task, "08:15", "optimistic") && failuresLeft > 0) {
        failuresLeft -= 1;
        throw new Error("UNKNOWN_ERROR");
      }
      return durationFor(task);
    });
    const sleep = noSleep();

    const { table, failed, rounds } = await runBatchFetch(tasks, fetchOne, {
      sleep,
      retryBaseDelayMs: 500
    });

    expect(rounds).toBe(1);
    expect(failed).toEqual([]);
    expect(table.get(grid[1], "optimistic")).toBe(12);
    expect(fetchOne).toHaveBeenCalledTimes(10);
    expect(sleep.mock.calls).toEqual([[500], [1000]]);
  });

  it("requeues a task that exhausted its attempts and never refetches successes", async () => {
    let failuresLeft = 3;
    const fetchOne = vi.fn(async (task: FetchTask) => {
      if (isTask(task, "08:30", "pessimistic") && failuresLeft > 0) {
        failuresLeft -= 1;
        throw new Error("OVER_QUERY_LIMIT");
      }
      return durationFor(task);
    });

    const { table, failed, rounds } = await runBatchFetch(tasks, fetchOne, { sleep: noSleep() });

    expect(rounds).toBe(2);
    expect(failed).toEqual([]);
    expect(table.size).toBe(8);
    // 7 first-try successes + 3 failed attempts + 1 success in round 2
    expect(fetchOne).toHaveBeenCalledTimes(11);
    const otherCalls = fetchOne.mock.calls.filter(([task]) => !isTask(task, "08:30", "pessimistic"));
    expect(otherCalls).toHaveLength(7);
  });

  it("drops a task that fails every round and reports it", async () => {
    const fetchOne = vi.fn(async (task: FetchTask) => {
      if (isTask(task, "08:15", "pessimistic")) {
        throw new Error("REQUEST_DENIED");
      }
      return durationFor(task);
    });
    const logger = { info: vi.fn(), warn: vi.fn() };

    const { table, failed, rounds } = await runBatchFetch(tasks, fetchOne, {
      sleep: noSleep(),
      logger,
      maxRounds: 3,
      attemptsPerTask: 3,
      firstRoundConcurrency: 4,
      retryConcurrency: 2
    });

    expect(rounds).toBe(3);
    expect(failed).toHaveLength(1);
    expect(failed[0].instant.localTime).toBe("08:15");
    expect(failed[0].model).toBe("pessimistic");
    expect(table.size).toBe(7);
    expect(table.has(grid[1], "pessimistic")).toBe(false);
    expect(table.get(grid[1], "optimistic")).toBe(12);

    const failingCalls = fetchOne.mock.calls.filter(([task]) => isTask(task, "08:15", "pessimistic"));
    expect(failingCalls).toHaveLength(9);

    expect(logger.info.mock.calls).toEqual([
      [{ round: 1, tasks: 8, workers: 4 }, "fetch round starting"],
      [{ round: 2, tasks: 1, workers: 2 }, "fetch round starting"],
      [{ round: 3, tasks: 1, workers: 2 }, "fetch round starting"]
    ]);
    expect(logger.warn).toHaveBeenLastCalledWith(
      { round: 3, failed: 1, willRetry: false },
      "fetch round left failures"
    );
  });

  it("bounds in-flight fetches by the round's worker count", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const fetchOne = vi.fn(async (task: FetchTask) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight -= 1;
      return durationFor(task);
    });

    await runBatchFetch(tasks, fetchOne, { firstRoundConcurrency: 3, retryConcurrency: 1 });

    expect(maxInFlight).toBe(3);
  });

  it("rejects invalid tuning", async () => {
    const fetchOne = vi.fn(async (task: FetchTask) => durationFor(task));

    await expect(
      runBatchFetch(tasks, fetchOne, { firstRoundConcurrency: 2, retryConcurrency: 5 })
    ).rejects.toThrow(RangeError);
    await expect(
      runBatchFetch(tasks, fetchOne, { firstRoundConcurrency: 4, retryConcurrency: 4 })
    ).rejects.toThrow("retryConcurrency (4) must be less than firstRoundConcurrency (4)");
    await expect(runBatchFetch(tasks, fetchOne, { maxRounds: 0 })).rejects.toThrow(
      "maxRounds must be a positive integer, got 0"
    );
    expect(fetchOne).not.toHaveBeenCalled();
  });
});
