import { describe, it, expect } from "vitest";
import {
  checkBoundary,
  checkExactOverlap,
  checkFloorContact,
  checkSeparation,
  validateEstimate,
  validateExact,
} from "../../src/world/scatter/generation/validator";
import { makeFootprint } from "../../src/world/scatter/footprint";
import type { Footprint, PlacedItem } from "../../src/world/scatter/types";
import { squareRegion } from "./helpers/fake-scene";

function boxAt(x: number, z: number, half = 0.5): Footprint {
  return makeFootprint({ x, y: half, z }, { x: half, y: half, z: half });
}

function placed(id: string, fp: Footprint): PlacedItem<null> {
  return {
    id,
    categoryId: "test",
    itemId: "box",
    position: { x: fp.center.x, y: 0, z: fp.center.z },
    orientation: 0,
    exactFootprint: fp,
    tier: "strict",
    handle: null,
  };
}

const region = squareRegion(4);

describe("checkBoundary", () => {
  it("accepts a footprint inside the inset region", () => {
    expect(checkBoundary(boxAt(2, 2), region, 0.25)).toEqual({ ok: true });
  });

  it("accepts a footprint touching the inset edge", () => {
    expect(checkBoundary(boxAt(0.75, 3.25), region, 0.25).ok).toBe(true);
  });

  it("rejects a footprint crossing the inset edge", () => {
    const result = checkBoundary(boxAt(0.7, 2), region, 0.25);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe("boundary");
  });
});

describe("checkFloorContact", () => {
  it("accepts a bottom within tolerance of the floor", () => {
    expect(checkFloorContact(makeFootprint({ x: 0, y: 1.00005, z: 0 }, { x: 1, y: 1, z: 1 }), 0).ok).toBe(true);
  });

  it("rejects a floating object", () => {
    const result = checkFloorContact(makeFootprint({ x: 0, y: 1.5, z: 0 }, { x: 1, y: 1, z: 1 }), 0);
    expect(result).toEqual({ ok: false, reason: "floor", detail: "bottom at 0.50000, floor at 0.00000" });
  });
});

describe("checkSeparation", () => {
  const existing = [placed("a", boxAt(1, 1))];

  it("accepts centers exactly the required distance apart", () => {
    // 0.5 + 0.5 + 0.25
    expect(checkSeparation(boxAt(2.25, 1), existing, 0.25).ok).toBe(true);
  });

  it("rejects centers closer than the radii plus clearance", () => {
    const result = checkSeparation(boxAt(2, 1), existing, 0.25);
    expect(result).toEqual({
      ok: false,
      reason: "separation",
      againstId: "a",
      detail: "distance 1.000 < required 1.250",
    });
  });

  it("measures the diagonal distance", () => {
    // hypot(1, 1) ≈ 1.414 >= 1.25
    expect(checkSeparation(boxAt(2, 2), existing, 0.25).ok).toBe(true);
  });
});

describe("checkExactOverlap", () => {
  const existing = [placed("a", boxAt(1, 1))];

  it("treats touching the inflated box as overlap", () => {
    const result = checkExactOverlap(boxAt(2.25, 1), existing, 0.25);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.againstId).toBe("a");
  });

  it("accepts a box clear of the inflated one", () => {
    expect(checkExactOverlap(boxAt(2.5, 1), existing, 0.25).ok).toBe(true);
  });

  it("ignores vertical separation", () => {
    const high = makeFootprint({ x: 1, y: 5, z: 1 }, { x: 0.5, y: 0.5, z: 0.5 });
    expect(checkExactOverlap(high, existing, 0).ok).toBe(false);
  });
});

describe("validateEstimate / validateExact", () => {
  it("reports the boundary before neighbours", () => {
    const existing = [placed("a", boxAt(1, 1))];
    const result = validateEstimate(boxAt(0.5, 1), region, existing, 0.25);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe("boundary");
  });

  it("lets the box test reject what the radius heuristic passes", () => {
    const existing = [placed("a", boxAt(1, 1))];
    expect(validateEstimate(boxAt(2.25, 1), region, existing, 0.25).ok).toBe(true);

    const exact = validateExact(boxAt(2.25, 1), region, existing, 0.25);
    expect(exact.ok).toBe(false);
    if (!exact.ok) expect(exact.reason).toBe("overlap");
  });

  it("passes with an empty ledger", () => {
    expect(validateExact(boxAt(2, 2), region, [], 0.25)).toEqual({ ok: true });
  });
});
