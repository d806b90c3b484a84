import { formatMinutes } from "@drivewindow/config";
import type { Insight, Place, SeriesPoint } from "@drivewindow/eta";

const TABLE_HEADERS = ["Departure", "Optimistic (min)", "Pessimistic (min)", "Average (min)"];

export function renderCandidates(label: string, places: readonly Place[]): string[] {
  return [
    `${label} candidates:`,
    ...places.map(
      (place, index) =>
        `  ${index + 1}. ${place.formattedAddress}  (${place.location.lat.toFixed(6)}, ${place.location.lng.toFixed(6)})`
    )
  ];
}

/** Departure column left-aligned, minute columns right-aligned. */
export function renderDepartureTable(series: readonly SeriesPoint[]): string[] {
  const rows = series.map((point) => [
    point.instant.localTime,
    formatMinutes(point.optimistic),
    formatMinutes(point.pessimistic),
    formatMinutes(point.average)
  ]);
  const widths = TABLE_HEADERS.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => row[column].length))
  );
  const line = (cells: readonly string[]) =>
    cells.map((cell, column) => (column === 0 ? cell.padEnd(widths[column]) : cell.padStart(widths[column]))).join("  ");

  return [line(TABLE_HEADERS), widths.map((width) => "-".repeat(width)).join("  "), ...rows.map(line)];
}

export function renderKeyPoints(insight: Insight): string[] {
  return [
    "Key points (average drive time):",
    `  Best time:   ${insight.best.instant.localTime} -> ${formatMinutes(insight.best.average)} min`,
    `  Worst time:  ${insight.worst.instant.localTime} -> ${formatMinutes(insight.worst.average)} min`,
    `  Difference:  ${formatMinutes(insight.differenceMinutes)} min`
  ];
}

export function renderFailedWarning(failedTasks: number): string | null {
  if (failedTasks === 0) {
    return null;
  }
  return `Warning: ${failedTasks} quer${failedTasks === 1 ? "y" : "ies"} failed after every retry round.`;
}

export function renderSkippedNote(skipped: number): string | null {
  if (skipped === 0) {
    return null;
  }
  return `Note: ${skipped} time point${skipped === 1 ? " was" : "s were"} skipped after failed lookups.`;
}
