import type { PlacementSettings } from "../../types/config";

// Category defaults (meters)
export const DEFAULT_MIN_COUNT = 0;
export const DEFAULT_MAX_COUNT = 10;
export const DEFAULT_CLEARANCE = 0.2;
export const DEFAULT_ITEM_WEIGHT = 1;

// Capacity heuristic: each object is assumed to claim a (2r)² square.
export const DEFAULT_CAPACITY_RADIUS = 0.5;

// Category attempt budget = target * perItemAttemptCap * ATTEMPT_BUDGET_MULTIPLIER
export const ATTEMPT_BUDGET_MULTIPLIER = 2;

// Floor alignment tolerance
export const FLOOR_EPS = 1e-4;

export const DEFAULT_SETTINGS: Readonly<PlacementSettings> = Object.freeze({
  perItemAttemptCap: 20,
  absoluteCap: 100,
  samplesPerTier: 10,
  capacityRadius: DEFAULT_CAPACITY_RADIUS,
  earlyStopRatio: 0.8,
  forcedClearance: 0.01,
  randomizeOrientation: true,
  debugBounds: false,
});
