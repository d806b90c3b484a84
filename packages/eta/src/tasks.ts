import { TRAFFIC_MODELS, type TrafficModel } from "@drivewindow/config";
import type { Coordinate, FetchTask, SampleInstant } from "./types.js";

export function buildFetchTasks(
  origin: Coordinate,
  destination: Coordinate,
  grid: readonly SampleInstant[]
): FetchTask[] {
  return grid.flatMap((instant) =>
    TRAFFIC_MODELS.map((model) => ({ origin, destination, instant, model }))
  );
}

export function taskKey(task: Pick<FetchTask, "instant" | "model">): string {
  return cellKey(task.instant.epochMs, task.model);
}

export function cellKey(epochMs: number, model: TrafficModel): string {
  return `${epochMs}:${model}`;
}
