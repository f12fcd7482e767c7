import type { RelaxationTier } from "./types";

export const RELAXATION_TIERS: readonly RelaxationTier[] = ["strict", "relaxed", "forced"];

export function emptyTierCounts(): Record<RelaxationTier, number> {
  return { strict: 0, relaxed: 0, forced: 0 };
}

/**
 * Clearance applied at a tier. Forced drops the category clearance to a
 * near-zero epsilon; region containment still holds at every tier.
 */
export function effectiveClearance(tier: RelaxationTier, clearance: number, forcedClearance: number): number {
  switch (tier) {
    case "strict":
      return clearance;
    case "relaxed":
      return clearance * 0.5;
    case "forced":
      return Math.min(clearance, forcedClearance);
  }
}
