import type { RNG } from "../../../utils/seededRng";
import { regionCenter } from "../region";
import type { Footprint, Region } from "../types";

/** Allowed range for the footprint *center* on X and Z. */
export interface CandidateInterval {
  minX: number;
  maxX: number;
  minZ: number;
  maxZ: number;
}

export interface Candidate {
  x: number;
  z: number;
  source: "random" | "center";
}

/**
 * Region interior inset by the footprint's horizontal extents plus the
 * clearance on each side. Returns null when the inset range is empty on
 * either axis: the footprint does not fit at this clearance.
 */
export function candidateInterval(region: Region, footprint: Footprint, clearance: number): CandidateInterval | null {
  const minX = region.min.x + footprint.extents.x + clearance;
  const maxX = region.max.x - footprint.extents.x - clearance;
  const minZ = region.min.z + footprint.extents.z + clearance;
  const maxZ = region.max.z - footprint.extents.z - clearance;

  if (minX >= maxX || minZ >= maxZ) return null;
  return { minX, maxX, minZ, maxZ };
}

/**
 * `samples` uniform draws inside the interval, then the region's horizontal
 * center as a last candidate. The interval is symmetric about that center,
 * so the fallback always lies inside it.
 */
export function* generateCandidates(
  interval: CandidateInterval,
  region: Region,
  samples: number,
  rng: RNG
): Generator<Candidate, void, undefined> {
  for (let i = 0; i < samples; i++) {
    yield {
      x: rng.float(interval.minX, interval.maxX),
      z: rng.float(interval.minZ, interval.maxZ),
      source: "random",
    };
  }

  const c = regionCenter(region);
  yield { x: c.x, z: c.z, source: "center" };
}
