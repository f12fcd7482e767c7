import type { Observable } from "@babylonjs/core";

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/** Axis-aligned floor area; `floorY` is the plane objects rest on. */
export interface Region {
  readonly min: Readonly<Vec3>;
  readonly max: Readonly<Vec3>;
  readonly floorY: number;
}

/** Axis-aligned box. `extents` are half-sizes. */
export interface Footprint {
  readonly center: Readonly<Vec3>;
  readonly extents: Readonly<Vec3>;
}

export type RelaxationTier = "strict" | "relaxed" | "forced";

export interface CategoryItem<TTemplate> {
  id: string;
  template: TTemplate;
  weight: number;
}

export interface Category<TTemplate> {
  id: string;
  candidateItems: CategoryItem<TTemplate>[];
  minCount: number;
  maxCount: number;
  clearance: number;
}

export interface PlacedItem<THandle> {
  readonly id: string;
  readonly categoryId: string;
  readonly itemId: string;
  readonly position: Readonly<Vec3>;
  readonly orientation: number; // yaw, radians
  readonly exactFootprint: Footprint;
  readonly tier: RelaxationTier;
  readonly handle: THandle;
}

// ---- External collaborators

export interface RegionProvider {
  getRegionBounds(): Region | null;
  readonly onRegionReadyObservable: Observable<Region>;
}

export interface GeometryProvider<TTemplate, THandle> {
  /** Footprint of the template with its pivot at the origin and no rotation. */
  estimateFootprint(template: TTemplate): Footprint;
  measureExactFootprint(handle: THandle): Footprint;
}

export interface InstantiationService<TTemplate, THandle, TParent = unknown> {
  create(template: TTemplate, position: Vec3, orientation: number, parent: TParent | null): THandle;
  destroy(handle: THandle): void;
  getPosition(handle: THandle): Vec3;
  setPosition(handle: THandle, position: Vec3): void;
  /** Optional post-commit hook, e.g. tagging or debug bounds. */
  onCommitted?(handle: THandle, item: PlacedItem<THandle>): void;
}

// ---- Reports

export type CategoryStatus = "complete" | "partial" | "skipped" | "infeasible" | "superseded";

export interface CategoryReport {
  categoryId: string;
  status: CategoryStatus;
  theoreticalCapacity: number;
  adjustedMax: number;
  targetCount: number;
  attemptBudget: number;
  attempts: number;
  placed: number;
  rollbacks: number;
  placedByTier: Record<RelaxationTier, number>;
}

export interface ScatterReport {
  region: Region;
  categories: CategoryReport[];
  totalPlaced: number;
  superseded: boolean;
}
