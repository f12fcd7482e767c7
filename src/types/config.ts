export type CapacityRadius = number | "measured";

/** Item reference as written in config: a template name, optionally weighted. */
export type CategoryItemConfig = string | { template: string; weight?: number };

export interface CategoryConfig {
  id: string;
  items: CategoryItemConfig[];
  minCount?: number;   // default 0
  maxCount?: number;   // default 10
  clearance?: number;  // default 0.2 (meters)
}

export interface PlacementConfigInput {
  categories: CategoryConfig[];
  perItemAttemptCap?: number;
  absoluteCap?: number;
  samplesPerTier?: number;
  capacityRadius?: CapacityRadius;
  earlyStopRatio?: number;
  forcedClearance?: number;
  randomizeOrientation?: boolean;
  debugBounds?: boolean;
  seed?: string;
}

export interface ResolvedItemConfig {
  template: string;
  weight: number;
}

export interface ResolvedCategoryConfig {
  id: string;
  items: ResolvedItemConfig[];
  minCount: number;
  maxCount: number;
  clearance: number;
}

export interface PlacementSettings {
  perItemAttemptCap: number;
  absoluteCap: number;
  samplesPerTier: number;
  capacityRadius: CapacityRadius;
  earlyStopRatio: number;
  forcedClearance: number;
  randomizeOrientation: boolean;
  debugBounds: boolean;
  seed?: string;
}

export interface PlacementConfig extends PlacementSettings {
  categories: ResolvedCategoryConfig[];
}
