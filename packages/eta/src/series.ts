import { roundToTenth } from "@drivewindow/config";
import { assembleSeries } from "./assemble.js";
import { runBatchFetch, type BatchFetchOptions, type FetchOne } from "./batch-fetch.js";
import { InvalidRangeError } from "./errors.js";
import { buildFetchTasks } from "./tasks.js";
import { renderTextChart } from "./text-chart.js";
import { buildTimeGrid, epochSeconds } from "./time-grid.js";
import type { Coordinate, Insight, Logger, RoutingClient, SampleInstant, SeriesPoint } from "./types.js";

export type EtaSeriesRequest = {
  origin: Coordinate;
  destination: Coordinate;
  date: string;
  start: string;
  end: string;
  intervalMinutes: number;
  timeZone: string;
};

export type EtaSeriesOptions = {
  fetch?: Partial<BatchFetchOptions>;
  logger?: Logger;
  chartHeightRows?: number;
  /** Reject grids with more departures than this */
  maxSamples?: number;
};

export type EtaSeriesReport = {
  grid: SampleInstant[];
  series: SeriesPoint[];
  insight: Insight;
  chart: string;
  /** (departure, model) calls that never succeeded */
  failedTasks: number;
  /** Departures left out of the series for lack of one or both models */
  skippedTimePoints: number;
};

export function minutesFetcher(client: RoutingClient): FetchOne {
  return async (task) => {
    const seconds = await client.fetchDuration(
      task.origin,
      task.destination,
      epochSeconds(task.instant),
      task.model
    );
    return roundToTenth(seconds / 60);
  };
}

/**
 * Grid → tasks → batch fetch → series → chart.
 * Throws InvalidRangeError for a bad window and EmptySeriesError when no
 * departure got both traffic models.
 */
export async function runEtaSeries(
  client: RoutingClient,
  request: EtaSeriesRequest,
  options: EtaSeriesOptions = {}
): Promise<EtaSeriesReport> {
  const grid = buildTimeGrid(
    request.date,
    request.start,
    request.end,
    request.intervalMinutes,
    request.timeZone
  );

  if (options.maxSamples !== undefined && grid.length > options.maxSamples) {
    throw new InvalidRangeError(
      `window has ${grid.length} departures; at most ${options.maxSamples} are allowed`
    );
  }

  const tasks = buildFetchTasks(request.origin, request.destination, grid);
  options.logger?.info(
    { departures: grid.length, tasks: tasks.length, timeZone: request.timeZone },
    "fetching eta series"
  );

  const { table, failed } = await runBatchFetch(tasks, minutesFetcher(client), {
    ...options.fetch,
    logger: options.fetch?.logger ?? options.logger
  });

  const { series, insight } = assembleSeries(table);
  const chart = renderTextChart(series, { heightRows: options.chartHeightRows });

  return {
    grid,
    series,
    insight,
    chart,
    failedTasks: failed.length,
    skippedTimePoints: grid.length - series.length
  };
}
