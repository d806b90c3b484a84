import { describe, expect, it } from "vitest";
import { runWithConcurrency } from "./pool.js";

function tick(ms = 1) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("runWithConcurrency", () => {
  it("never exceeds the concurrency limit", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const seen: number[] = [];

    await runWithConcurrency([1, 2, 3, 4, 5, 6, 7, 8, 9, 10], 3, async (item) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await tick();
      seen.push(item);
      inFlight -= 1;
    });

    expect(maxInFlight).toBe(3);
    expect(seen.sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it("does not start more lanes than items", async () => {
    let maxInFlight = 0;
    let inFlight = 0;

    await runWithConcurrency(["a", "b"], 30, async () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await tick();
      inFlight -= 1;
    });

    expect(maxInFlight).toBe(2);
  });

  it("resolves immediately for no items", async () => {
    let calls = 0;
    await runWithConcurrency([], 4, async () => {
      calls += 1;
    });
    expect(calls).toBe(0);
  });
});
