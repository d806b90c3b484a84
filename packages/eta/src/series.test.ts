import { describe, expect, it, vi } from "vitest";
import type { TrafficModel } from "@drivewindow/config";
import { EmptySeriesError, InvalidRangeError } from "./errors.js";
import { minutesFetcher, runEtaSeries, type EtaSeriesRequest } from "./series.js";
import { buildFetchTasks } from "./tasks.js";
import { buildTimeGrid } from "./time-grid.js";
import type { Coordinate } from "./types.js";

const origin = { lat: 37.3861, lng: -122.0839 };
const destination = { lat: 37.7749, lng: -122.4194 };
const startEpoch = Date.UTC(2025, 10, 20, 16, 0) / 1000;

const request: EtaSeriesRequest = {
  origin,
  destination,
  date: "2025-11-20",
  start: "08:00",
  end: "08:45",
  intervalMinutes: 15,
  timeZone: "America/Los_Angeles"
};

const SECONDS: Record<TrafficModel, number[]> = {
  optimistic: [600, 720, 1200, 900],
  pessimistic: [840, 960, 1440, 1140]
};

function fakeClient(fail?: (index: number, model: TrafficModel) => boolean) {
  return {
    fetchDuration: vi.fn(
      async (_origin: Coordinate, _destination: Coordinate, departure: number, model: TrafficModel) => {
        const index = (departure - startEpoch) / 900;
        if (fail?.(index, model)) {
          throw new Error("UNKNOWN_ERROR");
        }
        return SECONDS[model][index];
      }
    )
  };
}

const quick = { fetch: { sleep: async () => {} } };

describe("runEtaSeries", () => {
  it("produces the series, insight and chart", async () => {
    const client = fakeClient();

    const report = await runEtaSeries(client, request, quick);

    expect(report.grid).toHaveLength(4);
    expect(report.series.map((p) => [p.optimistic, p.pessimistic, p.average])).toEqual([
      [10, 14, 12],
      [12, 16, 14],
      [20, 24, 22],
      [15, 19, 17]
    ]);
    expect(report.insight.best.instant.localTime).toBe("08:00");
    expect(report.insight.worst.instant.localTime).toBe("08:30");
    expect(report.insight.differenceMinutes).toBe(10);
    expect(report.failedTasks).toBe(0);
    expect(report.skippedTimePoints).toBe(0);
    expect(report.chart.split("\n").at(-1)).toBe("  B = Best (08:00, 12.0 min)  |  W = Worst (08:30, 22.0 min)");
    expect(client.fetchDuration).toHaveBeenCalledTimes(8);
    expect(client.fetchDuration).toHaveBeenCalledWith(origin, destination, startEpoch, "optimistic");
  });

  it("excludes a departure whose pessimistic call never succeeds", async () => {
    const client = fakeClient((index, model) => index === 2 && model === "pessimistic");

    const report = await runEtaSeries(client, request, quick);

    expect(report.series.map((p) => p.instant.localTime)).toEqual(["08:00", "08:15", "08:45"]);
    expect(report.failedTasks).toBe(1);
    expect(report.skippedTimePoints).toBe(1);
    expect(report.insight.worst.instant.localTime).toBe("08:45");
  });

  it("throws EmptySeriesError when every call fails", async () => {
    const client = fakeClient(() => true);

    await expect(runEtaSeries(client, request, quick)).rejects.toThrow(EmptySeriesError);
  });

  it("rejects windows larger than maxSamples before fetching", async () => {
    const client = fakeClient();

    await expect(runEtaSeries(client, request, { ...quick, maxSamples: 3 })).rejects.toThrow(
      "window has 4 departures; at most 3 are allowed"
    );
    expect(client.fetchDuration).not.toHaveBeenCalled();
  });

  it("propagates an invalid window", async () => {
    const client = fakeClient();

    await expect(runEtaSeries(client, { ...request, end: "07:00" }, quick)).rejects.toThrow(InvalidRangeError);
  });
});

describe("minutesFetcher", () => {
  it("converts seconds to minutes with one decimal", async () => {
    const client = { fetchDuration: vi.fn(async () => 615) };
    const [task] = buildFetchTasks(origin, destination, buildTimeGrid("2025-11-20", "08:00", "08:15", 15, "UTC"));

    await expect(minutesFetcher(client)(task)).resolves.toBe(10.3);
  });
});
