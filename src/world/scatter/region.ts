import type { Region, Vec3 } from "./types";

function finite(v: Vec3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

export function makeRegion(min: Vec3, max: Vec3, floorY: number = min.y): Region {
  if (!finite(min) || !finite(max) || !Number.isFinite(floorY)) {
    throw new Error(`makeRegion: non-finite bounds min=${fmt(min)} max=${fmt(max)} floorY=${floorY}`);
  }
  if (!(min.x < max.x) || !(min.z < max.z)) {
    throw new Error(`makeRegion: empty floor area min=${fmt(min)} max=${fmt(max)}`);
  }
  return Object.freeze({
    min: Object.freeze({ x: min.x, y: min.y, z: min.z }),
    max: Object.freeze({ x: max.x, y: max.y, z: max.z }),
    floorY,
  });
}

export function regionArea(region: Region): number {
  return (region.max.x - region.min.x) * (region.max.z - region.min.z);
}

/** Horizontal center of the region, on the floor plane. */
export function regionCenter(region: Region): Vec3 {
  return {
    x: (region.min.x + region.max.x) * 0.5,
    y: region.floorY,
    z: (region.min.z + region.max.z) * 0.5,
  };
}

export function fmt(v: Readonly<Vec3>): string {
  return `(${v.x.toFixed(3)}, ${v.y.toFixed(3)}, ${v.z.toFixed(3)})`;
}
