import { describe, it, expect } from "vitest";
import { RELAXATION_TIERS, effectiveClearance, emptyTierCounts } from "../../src/world/scatter/tiers";

describe("relaxation tiers", () => {
  it("escalates strict, relaxed, forced", () => {
    expect(RELAXATION_TIERS).toEqual(["strict", "relaxed", "forced"]);
    expect(emptyTierCounts()).toEqual({ strict: 0, relaxed: 0, forced: 0 });
  });

  it("halves the clearance when relaxed and drops it to the epsilon when forced", () => {
    expect(effectiveClearance("strict", 0.5, 0.01)).toBe(0.5);
    expect(effectiveClearance("relaxed", 0.5, 0.01)).toBe(0.25);
    expect(effectiveClearance("forced", 0.5, 0.01)).toBe(0.01);
  });

  it("never raises a clearance below the epsilon", () => {
    expect(effectiveClearance("forced", 0, 0.01)).toBe(0);
  });
});
