import type { TrafficModel } from "@drivewindow/config";
import type { SampleInstant } from "./types.js";

export type ModelDurations = Partial<Record<TrafficModel, number>>;

export type ResultRow = {
  instant: SampleInstant;
  durations: ModelDurations;
};

/**
 * Durations in minutes keyed by (instant, traffic model).
 * Grows monotonically: the first value recorded for a cell wins.
 */
export class ResultTable {
  private readonly rows = new Map<number, ResultRow>();
  private cells = 0;

  /** Returns false when the cell already held a value. */
  record(instant: SampleInstant, model: TrafficModel, minutes: number): boolean {
    let row = this.rows.get(instant.epochMs);
    if (!row) {
      row = { instant, durations: {} };
      this.rows.set(instant.epochMs, row);
    }

    if (row.durations[model] !== undefined) {
      return false;
    }

    row.durations[model] = minutes;
    this.cells += 1;
    return true;
  }

  get(instant: SampleInstant, model: TrafficModel): number | undefined {
    return this.rows.get(instant.epochMs)?.durations[model];
  }

  has(instant: SampleInstant, model: TrafficModel): boolean {
    return this.get(instant, model) !== undefined;
  }

  /** Number of recorded (instant, model) cells. */
  get size(): number {
    return this.cells;
  }

  /** Copies of the rows, ascending by instant. */
  rowsInOrder(): ResultRow[] {
    return Array.from(this.rows.values())
      .sort((a, b) => a.instant.epochMs - b.instant.epochMs)
      .map((row) => ({ instant: row.instant, durations: { ...row.durations } }));
  }
}
