import { describe, expect, it } from "vitest";
import { buildTimeGrid, findInsight, type SeriesPoint } from "@drivewindow/eta";
import {
  renderCandidates,
  renderDepartureTable,
  renderFailedWarning,
  renderKeyPoints,
  renderSkippedNote
} from "./report";

const grid = buildTimeGrid("2025-11-20", "08:00", "08:15", 15, "America/Los_Angeles");
const series: SeriesPoint[] = [
  { instant: grid[0], optimistic: 10, pessimistic: 14, average: 12 },
  { instant: grid[1], optimistic: 9.5, pessimistic: 120.5, average: 65 }
];

describe("renderDepartureTable", () => {
  it("aligns each column to its widest cell", () => {
    expect(renderDepartureTable(series)).toEqual([
      "Departure  Optimistic (min)  Pessimistic (min)  Average (min)",
      "---------  ----------------  -----------------  -------------",
      `08:00    ${" ".repeat(14)}10.0${" ".repeat(15)}14.0${" ".repeat(11)}12.0`,
      `08:15    ${" ".repeat(15)}9.5${" ".repeat(14)}120.5${" ".repeat(11)}65.0`
    ]);
  });

  it("prints only the header for an empty series", () => {
    expect(renderDepartureTable([])).toHaveLength(2);
  });
});

describe("renderKeyPoints", () => {
  it("lists best, worst and their difference", () => {
    const insight = findInsight(series);
    if (!insight) throw new Error("expected an insight");

    expect(renderKeyPoints(insight)).toEqual([
      "Key points (average drive time):",
      "  Best time:   08:00 -> 12.0 min",
      "  Worst time:  08:15 -> 65.0 min",
      "  Difference:  53.0 min"
    ]);
  });
});

describe("renderCandidates", () => {
  it("numbers candidates with their coordinates", () => {
    expect(
      renderCandidates("Origin", [
        {
          query: "Mountain View",
          formattedAddress: "Mountain View, CA, USA",
          location: { lat: 37.3861, lng: -122.0839 },
          placeId: "place-1"
        }
      ])
    ).toEqual(["Origin candidates:", "  1. Mountain View, CA, USA  (37.386100, -122.083900)"]);
  });
});

describe("renderFailedWarning", () => {
  it("is silent when every query succeeded", () => {
    expect(renderFailedWarning(0)).toBeNull();
  });

  it("counts the queries that never succeeded", () => {
    expect(renderFailedWarning(1)).toBe("Warning: 1 query failed after every retry round.");
    expect(renderFailedWarning(4)).toBe("Warning: 4 queries failed after every retry round.");
  });
});

describe("renderSkippedNote", () => {
  it("is silent when nothing was skipped", () => {
    expect(renderSkippedNote(0)).toBeNull();
  });

  it("matches the count", () => {
    expect(renderSkippedNote(1)).toBe("Note: 1 time point was skipped after failed lookups.");
    expect(renderSkippedNote(3)).toBe("Note: 3 time points were skipped after failed lookups.");
  });
});
