import { FLOOR_EPS } from "../constants";
import { footprintMin, horizontalRadius, inflateXZ, overlapsXZ, withinRegionXZ } from "../footprint";
import type { Footprint, PlacedItem, Region } from "../types";

export type RejectReason = "boundary" | "separation" | "overlap" | "floor";

export type Validation =
  | { ok: true }
  | { ok: false; reason: RejectReason; againstId?: string; detail: string };

const OK: Validation = { ok: true };

export function checkBoundary(fp: Footprint, region: Region, clearance: number): Validation {
  if (withinRegionXZ(fp, region, clearance)) return OK;
  return {
    ok: false,
    reason: "boundary",
    detail: `footprint leaves region inset by ${clearance}`,
  };
}

export function checkFloorContact(fp: Footprint, floorY: number): Validation {
  const bottom = footprintMin(fp).y;
  if (Math.abs(bottom - floorY) <= FLOOR_EPS) return OK;
  return {
    ok: false,
    reason: "floor",
    detail: `bottom at ${bottom.toFixed(5)}, floor at ${floorY.toFixed(5)}`,
  };
}

/**
 * Radius heuristic: centers (X,Z) must be at least
 * max(sizeX, sizeZ)/2 of each footprint plus the clearance apart.
 */
export function checkSeparation(
  fp: Footprint,
  placed: Iterable<PlacedItem<unknown>>,
  clearance: number
): Validation {
  const r = horizontalRadius(fp);
  for (const other of placed) {
    const ofp = other.exactFootprint;
    const required = r + horizontalRadius(ofp) + clearance;
    const dist = Math.hypot(fp.center.x - ofp.center.x, fp.center.z - ofp.center.z);
    if (dist < required) {
      return {
        ok: false,
        reason: "separation",
        againstId: other.id,
        detail: `distance ${dist.toFixed(3)} < required ${required.toFixed(3)}`,
      };
    }
  }
  return OK;
}

/** Box test: each existing footprint inflated by the clearance on X/Z must not touch `fp`. */
export function checkExactOverlap(
  fp: Footprint,
  placed: Iterable<PlacedItem<unknown>>,
  clearance: number
): Validation {
  for (const other of placed) {
    if (overlapsXZ(inflateXZ(other.exactFootprint, clearance), fp)) {
      return {
        ok: false,
        reason: "overlap",
        againstId: other.id,
        detail: `intersects ${other.id} inflated by ${clearance}`,
      };
    }
  }
  return OK;
}

/** Cheap pre-instantiation check on an estimated footprint. */
export function validateEstimate(
  fp: Footprint,
  region: Region,
  placed: Iterable<PlacedItem<unknown>>,
  clearance: number
): Validation {
  const boundary = checkBoundary(fp, region, clearance);
  if (!boundary.ok) return boundary;
  return checkSeparation(fp, placed, clearance);
}

/** Authoritative check on a measured footprint; both neighbour tests must pass. */
export function validateExact(
  fp: Footprint,
  region: Region,
  placed: Iterable<PlacedItem<unknown>>,
  clearance: number
): Validation {
  const boundary = checkBoundary(fp, region, clearance);
  if (!boundary.ok) return boundary;
  const separation = checkSeparation(fp, placed, clearance);
  if (!separation.ok) return separation;
  return checkExactOverlap(fp, placed, clearance);
}
