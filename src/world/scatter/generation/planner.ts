import type { PlacementSettings } from "../../../types/config";
import type { RNG } from "../../../utils/seededRng";
import { ATTEMPT_BUDGET_MULTIPLIER } from "../constants";
import { horizontalRadius } from "../footprint";
import { regionArea } from "../region";
import type { Category, Footprint, Region } from "../types";

export interface CategoryPlan {
  theoreticalCapacity: number;
  adjustedMax: number;
  targetCount: number;
  attemptBudget: number;
  /** The category loop stops once `attempts > earlyStopAt`. */
  earlyStopAt: number;
}

type PlannerSettings = Pick<PlacementSettings, "capacityRadius" | "absoluteCap" | "perItemAttemptCap" | "earlyStopRatio">;

/**
 * Radius of the square each object is assumed to claim. "measured" averages,
 * over the category's items, half the larger horizontal side plus half the
 * clearance, so that neighbours sit one clearance apart.
 */
export function capacityRadiusFor(
  settings: Pick<PlacementSettings, "capacityRadius">,
  clearance: number,
  estimates: readonly Footprint[]
): number {
  if (settings.capacityRadius !== "measured") return settings.capacityRadius;
  if (estimates.length === 0) return 0;

  let sum = 0;
  for (const fp of estimates) sum += horizontalRadius(fp) + clearance * 0.5;
  return sum / estimates.length;
}

export function theoreticalCapacity(region: Region, radius: number, absoluteCap: number): number {
  const cell = (2 * radius) ** 2;
  if (!(cell > 0)) return absoluteCap;
  return Math.floor(regionArea(region) / cell);
}

/**
 * Target count and attempt budget for one category.
 *
 * Capacity wins over preference: when the region cannot hold `minCount`
 * objects the target collapses to the capacity, possibly 0.
 */
export function planCategory<TTemplate>(
  region: Region,
  category: Category<TTemplate>,
  settings: PlannerSettings,
  rng: RNG,
  estimates: readonly Footprint[]
): CategoryPlan {
  const radius = capacityRadiusFor(settings, category.clearance, estimates);
  const capacity = theoreticalCapacity(region, radius, settings.absoluteCap);
  const adjustedMax = Math.max(0, Math.min(category.maxCount, capacity, settings.absoluteCap));
  const lower = Math.min(category.minCount, adjustedMax);
  const targetCount = rng.int(lower, adjustedMax);
  const attemptBudget = targetCount * settings.perItemAttemptCap * ATTEMPT_BUDGET_MULTIPLIER;

  return {
    theoreticalCapacity: capacity,
    adjustedMax,
    targetCount,
    attemptBudget,
    earlyStopAt: attemptBudget * settings.earlyStopRatio,
  };
}
