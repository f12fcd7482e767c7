import type { Footprint, Region, Vec3 } from "./types";

// Size given to anything that reports no geometry at all.
export const FALLBACK_FOOTPRINT_SIZE = 0.3;

// Absorbs float drift when a footprint sits exactly on an inset edge.
const CONTAIN_EPS = 1e-9;

export function makeFootprint(center: Vec3, extents: Vec3): Footprint {
  return {
    center: { x: center.x, y: center.y, z: center.z },
    extents: { x: Math.abs(extents.x), y: Math.abs(extents.y), z: Math.abs(extents.z) },
  };
}

export function footprintFromMinMax(min: Vec3, max: Vec3): Footprint {
  return makeFootprint(
    { x: (min.x + max.x) * 0.5, y: (min.y + max.y) * 0.5, z: (min.z + max.z) * 0.5 },
    { x: (max.x - min.x) * 0.5, y: (max.y - min.y) * 0.5, z: (max.z - min.z) * 0.5 }
  );
}

export function fallbackFootprint(pivot: Vec3): Footprint {
  const h = FALLBACK_FOOTPRINT_SIZE * 0.5;
  return makeFootprint(pivot, { x: h, y: h, z: h });
}

/**
 * Footprint from raw min/max corners, or the fallback cube around `pivot`
 * when the corners are inverted, non-finite or collapse to a point.
 */
export function footprintOrFallback(min: Vec3, max: Vec3, pivot: Vec3): Footprint {
  const ok =
    Number.isFinite(min.x) && Number.isFinite(min.y) && Number.isFinite(min.z) &&
    Number.isFinite(max.x) && Number.isFinite(max.y) && Number.isFinite(max.z) &&
    max.x >= min.x && max.y >= min.y && max.z >= min.z;
  if (!ok) return fallbackFootprint(pivot);
  if (max.x - min.x === 0 && max.y - min.y === 0 && max.z - min.z === 0) return fallbackFootprint(pivot);
  return footprintFromMinMax(min, max);
}

export function footprintMin(fp: Footprint): Vec3 {
  return { x: fp.center.x - fp.extents.x, y: fp.center.y - fp.extents.y, z: fp.center.z - fp.extents.z };
}

export function footprintMax(fp: Footprint): Vec3 {
  return { x: fp.center.x + fp.extents.x, y: fp.center.y + fp.extents.y, z: fp.center.z + fp.extents.z };
}

export function footprintSize(fp: Footprint): Vec3 {
  return { x: fp.extents.x * 2, y: fp.extents.y * 2, z: fp.extents.z * 2 };
}

export function translateFootprint(fp: Footprint, offset: Vec3): Footprint {
  return makeFootprint(
    { x: fp.center.x + offset.x, y: fp.center.y + offset.y, z: fp.center.z + offset.z },
    fp.extents
  );
}

/** Half of the larger horizontal side: the radius used by the separation heuristic. */
export function horizontalRadius(fp: Footprint): number {
  return Math.max(fp.extents.x, fp.extents.z);
}

export function inflateXZ(fp: Footprint, amount: number): Footprint {
  return makeFootprint(fp.center, {
    x: fp.extents.x + amount,
    y: fp.extents.y,
    z: fp.extents.z + amount,
  });
}

/** Closed-interval overlap on X and Z; touching boxes overlap. */
export function overlapsXZ(a: Footprint, b: Footprint): boolean {
  return (
    Math.abs(a.center.x - b.center.x) <= a.extents.x + b.extents.x &&
    Math.abs(a.center.z - b.center.z) <= a.extents.z + b.extents.z
  );
}

/** True when `fp` lies inside the region shrunk by `inset` on every horizontal side. */
export function withinRegionXZ(fp: Footprint, region: Region, inset: number): boolean {
  const min = footprintMin(fp);
  const max = footprintMax(fp);
  return (
    min.x >= region.min.x + inset - CONTAIN_EPS &&
    max.x <= region.max.x - inset + CONTAIN_EPS &&
    min.z >= region.min.z + inset - CONTAIN_EPS &&
    max.z <= region.max.z - inset + CONTAIN_EPS
  );
}
