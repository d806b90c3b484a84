import { averageOfTenths, differenceOfTenths } from "@drivewindow/config";
import { EmptySeriesError } from "./errors.js";
import type { ResultTable } from "./result-table.js";
import type { Insight, SampleInstant, SeriesPoint } from "./types.js";

export type AssembledSeries = {
  series: SeriesPoint[];
  insight: Insight;
  /** Instants dropped because one of the models never returned */
  skipped: SampleInstant[];
};

/**
 * Best and worst by average duration. Ties go to the earliest departure.
 * Expects the series in ascending time order.
 */
export function findInsight(series: readonly SeriesPoint[]): Insight | null {
  if (series.length === 0) return null;

  let best = series[0];
  let worst = series[0];
  for (const point of series) {
    if (point.average < best.average) best = point;
    if (point.average > worst.average) worst = point;
  }

  return {
    best,
    worst,
    differenceMinutes: differenceOfTenths(worst.average, best.average)
  };
}

export function assembleSeries(table: ResultTable): AssembledSeries {
  const series: SeriesPoint[] = [];
  const skipped: SampleInstant[] = [];

  for (const { instant, durations } of table.rowsInOrder()) {
    const { optimistic, pessimistic } = durations;
    if (optimistic === undefined || pessimistic === undefined) {
      skipped.push(instant);
      continue;
    }
    series.push({
      instant,
      optimistic,
      pessimistic,
      average: averageOfTenths(optimistic, pessimistic)
    });
  }

  const insight = findInsight(series);
  if (!insight) {
    throw new EmptySeriesError();
  }

  return { series, insight, skipped };
}
