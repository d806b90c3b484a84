export type {
  Coordinate,
  Place,
  SampleInstant,
  FetchTask,
  SeriesPoint,
  Insight,
  Logger,
  RoutingClient,
  Geocoder,
  StaticMapBuilder,
} from "./types.js";

export type { BatchFetchOptions, BatchFetchResult, FetchOne } from "./batch-fetch.js";
export type { AssembledSeries } from "./assemble.js";
export type { ModelDurations, ResultRow } from "./result-table.js";
export type { TextChartOptions } from "./text-chart.js";
export type { EtaSeriesRequest, EtaSeriesOptions, EtaSeriesReport } from "./series.js";

export { DriveWindowError, InvalidRangeError, EmptySeriesError } from "./errors.js";
export { parseCoordinate, formatCoordinate, isValidCoordinate } from "./coordinate.js";
export { buildTimeGrid, toSampleInstant, epochSeconds, localHour, localMinute } from "./time-grid.js";
export { buildFetchTasks, taskKey } from "./tasks.js";
export { ResultTable } from "./result-table.js";
export { runWithConcurrency } from "./pool.js";
export { runBatchFetch } from "./batch-fetch.js";
export { assembleSeries, findInsight } from "./assemble.js";
export { renderTextChart } from "./text-chart.js";
export { runEtaSeries, minutesFetcher } from "./series.js";
