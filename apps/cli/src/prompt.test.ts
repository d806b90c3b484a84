import { describe, expect, it } from "vitest";
import { isAffirmative } from "./prompt";

describe("isAffirmative", () => {
  it("accepts y and yes in any case", () => {
    expect(isAffirmative("y")).toBe(true);
    expect(isAffirmative(" YES \n")).toBe(true);
  });

  it("treats anything else as no", () => {
    expect(isAffirmative("")).toBe(false);
    expect(isAffirmative("n")).toBe(false);
    expect(isAffirmative("yep")).toBe(false);
  });
});
