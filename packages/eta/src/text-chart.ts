import { CHART_HEIGHT_ROWS, CHART_MARKERS, formatMinutes } from "@drivewindow/config";
import { findInsight } from "./assemble.js";
import { EmptySeriesError } from "./errors.js";
import { localHour, localMinute } from "./time-grid.js";
import type { SeriesPoint } from "./types.js";

export type TextChartOptions = {
  heightRows?: number;
};

// Width of the "123 min | " row label; grid columns start right after it
const ROW_PREFIX_WIDTH = 10;
const TICK_EVERY_MINUTES = 30;

type Scale = {
  rowOf: (value: number) => number;
  valueAtRow: (row: number) => number;
};

function buildScale(series: readonly SeriesPoint[], heightRows: number): Scale {
  // Average sits between the other two, so it never widens the bounds
  const bounded = series.flatMap((p) => [p.optimistic, p.pessimistic]);
  const min = Math.min(...bounded);
  const max = Math.max(...bounded);
  const span = max - min;
  const last = heightRows - 1;

  return {
    rowOf: (value) => (span === 0 ? last : last - Math.round(((value - min) / span) * last)),
    valueAtRow: (row) => max - (row / last) * span
  };
}

function hourAxis(series: readonly SeriesPoint[]): string {
  const chars: string[] = Array.from({ length: ROW_PREFIX_WIDTH }, () => " ");
  let previousEnd = -1;

  series.forEach((point, index) => {
    if (localMinute(point.instant) !== 0) return;

    const label = String(localHour(point.instant));
    const column = ROW_PREFIX_WIDTH + index;
    // 1- and 2-digit hours differ in width; drop a label only when it would overwrite the previous one
    if (previousEnd >= 0 && column < previousEnd) return;

    while (chars.length < column) chars.push(" ");
    chars.splice(column, label.length, ...label);
    previousEnd = column + label.length;
  });

  return chars.join("").trimEnd();
}

/**
 * Plot optimistic (+), pessimistic (o) and average (*) durations per
 * departure column, with the best (B) and worst (W) averages marked.
 */
export function renderTextChart(series: readonly SeriesPoint[], options: TextChartOptions = {}): string {
  const heightRows = options.heightRows ?? CHART_HEIGHT_ROWS;
  if (!Number.isInteger(heightRows) || heightRows < 2) {
    throw new RangeError(`heightRows must be an integer >= 2, got ${heightRows}`);
  }

  const insight = findInsight(series);
  if (!insight) {
    throw new EmptySeriesError();
  }

  const width = series.length;
  const scale = buildScale(series, heightRows);
  const grid: string[][] = Array.from({ length: heightRows }, () =>
    Array.from({ length: width }, () => CHART_MARKERS.empty)
  );

  const placeIfEmpty = (row: number, column: number, marker: string) => {
    if (grid[row][column] === CHART_MARKERS.empty) {
      grid[row][column] = marker;
    }
  };

  series.forEach((point, column) => {
    placeIfEmpty(scale.rowOf(point.pessimistic), column, CHART_MARKERS.pessimistic);
    placeIfEmpty(scale.rowOf(point.optimistic), column, CHART_MARKERS.optimistic);
    grid[scale.rowOf(point.average)][column] = CHART_MARKERS.average;
  });

  const bestColumn = series.indexOf(insight.best);
  const worstColumn = series.indexOf(insight.worst);
  grid[scale.rowOf(insight.best.average)][bestColumn] = CHART_MARKERS.best;
  grid[scale.rowOf(insight.worst.average)][worstColumn] = CHART_MARKERS.worst;

  const lines = grid.map((cells, row) => {
    const label = String(Math.trunc(scale.valueAtRow(row))).padStart(3);
    return `${label} min | ${cells.join("")}`;
  });

  const ticks = series
    .map((point) => (localMinute(point.instant) % TICK_EVERY_MINUTES === 0 ? "+" : "-"))
    .join("");
  lines.push(`        +-${ticks}`);
  lines.push(hourAxis(series));
  lines.push(`${" ".repeat(ROW_PREFIX_WIDTH)}Hour of Day`);
  lines.push("");
  lines.push("LEGEND:");
  lines.push(
    `  ${CHART_MARKERS.optimistic} = Optimistic  |  ${CHART_MARKERS.pessimistic} = Pessimistic  |  ${CHART_MARKERS.average} = Average`
  );
  lines.push(
    `  ${CHART_MARKERS.best} = Best (${insight.best.instant.localTime}, ${formatMinutes(insight.best.average)} min)` +
      `  |  ${CHART_MARKERS.worst} = Worst (${insight.worst.instant.localTime}, ${formatMinutes(insight.worst.average)} min)`
  );

  return lines.join("\n");
}
