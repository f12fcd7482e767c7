import type {
  CapacityRadius,
  PlacementConfig,
  PlacementConfigInput,
  ResolvedCategoryConfig,
  ResolvedItemConfig,
} from "../types/config";
import {
  DEFAULT_CLEARANCE,
  DEFAULT_ITEM_WEIGHT,
  DEFAULT_MAX_COUNT,
  DEFAULT_MIN_COUNT,
  DEFAULT_SETTINGS,
} from "../world/scatter/constants";

type Rec = Record<string, unknown>;

function isRec(x: unknown): x is Rec {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function fail(path: string, msg: string): never {
  throw new Error(`placement config: ${path} ${msg}`);
}

function num(rec: Rec, key: string, path: string, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
  const v = rec[key];
  if (v === undefined) return fallback;
  if (typeof v !== "number" || !Number.isFinite(v)) fail(`${path}.${key}`, `must be a finite number (got ${JSON.stringify(v)})`);
  if (opts.integer && !Number.isInteger(v)) fail(`${path}.${key}`, `must be an integer (got ${v})`);
  if (opts.min !== undefined && v < opts.min) fail(`${path}.${key}`, `must be >= ${opts.min} (got ${v})`);
  return v;
}

function bool(rec: Rec, key: string, path: string, fallback: boolean): boolean {
  const v = rec[key];
  if (v === undefined) return fallback;
  if (typeof v !== "boolean") fail(`${path}.${key}`, `must be a boolean (got ${JSON.stringify(v)})`);
  return v;
}

function capacityRadius(rec: Rec, path: string): CapacityRadius {
  const v = rec.capacityRadius;
  if (v === undefined) return DEFAULT_SETTINGS.capacityRadius;
  if (v === "measured") return v;
  if (typeof v === "number" && Number.isFinite(v) && v > 0) return v;
  return fail(`${path}.capacityRadius`, `must be a positive number or "measured" (got ${JSON.stringify(v)})`);
}

function resolveItem(raw: unknown, path: string): ResolvedItemConfig {
  if (typeof raw === "string") {
    if (raw.length === 0) fail(path, "must not be an empty template name");
    return { template: raw, weight: DEFAULT_ITEM_WEIGHT };
  }
  if (!isRec(raw) || typeof raw.template !== "string" || raw.template.length === 0) {
    return fail(path, "must be a template name or { template, weight }");
  }
  return { template: raw.template, weight: num(raw, "weight", path, DEFAULT_ITEM_WEIGHT, { min: 0 }) };
}

function resolveCategory(raw: unknown, path: string): ResolvedCategoryConfig {
  if (!isRec(raw)) fail(path, "must be an object");
  if (typeof raw.id !== "string" || raw.id.length === 0) fail(`${path}.id`, "must be a non-empty string");

  const rawItems = raw.items ?? [];
  if (!Array.isArray(rawItems)) fail(`${path}.items`, "must be an array");

  const minCount = num(raw, "minCount", path, DEFAULT_MIN_COUNT, { min: 0, integer: true });
  const maxCount = num(raw, "maxCount", path, Math.max(DEFAULT_MAX_COUNT, minCount), { min: 0, integer: true });
  if (maxCount < minCount) fail(`${path}.maxCount`, `must be >= minCount (${maxCount} < ${minCount})`);

  return {
    id: raw.id,
    // An empty item list is legal; the category is skipped at run time.
    items: rawItems.map((it, i) => resolveItem(it, `${path}.items[${i}]`)),
    minCount,
    maxCount,
    clearance: num(raw, "clearance", path, DEFAULT_CLEARANCE, { min: 0 }),
  };
}

/**
 * Validates a placement config (typically parsed JSON, shaped like
 * {@link PlacementConfigInput}) and fills defaults.
 * Throws on the first invalid field, naming its path.
 */
export function resolvePlacementConfig(input: unknown): PlacementConfig {
  if (!isRec(input)) fail("<root>", "must be an object");
  const rawCategories = input.categories ?? [];
  if (!Array.isArray(rawCategories)) fail("categories", "must be an array");

  const categories = rawCategories.map((c, i) => resolveCategory(c, `categories[${i}]`));
  const seen = new Set<string>();
  for (const [i, c] of categories.entries()) {
    if (seen.has(c.id)) fail(`categories[${i}].id`, `duplicates "${c.id}"`);
    seen.add(c.id);
  }

  const root = "config";
  const earlyStopRatio = num(input, "earlyStopRatio", root, DEFAULT_SETTINGS.earlyStopRatio, { min: 0 });
  if (earlyStopRatio > 1) fail(`${root}.earlyStopRatio`, `must be <= 1 (got ${earlyStopRatio})`);

  let seed: string | undefined;
  if (input.seed !== undefined) {
    if (typeof input.seed !== "string") fail(`${root}.seed`, "must be a string");
    seed = input.seed;
  }

  return {
    categories,
    perItemAttemptCap: num(input, "perItemAttemptCap", root, DEFAULT_SETTINGS.perItemAttemptCap, { min: 1, integer: true }),
    absoluteCap: num(input, "absoluteCap", root, DEFAULT_SETTINGS.absoluteCap, { min: 1, integer: true }),
    samplesPerTier: num(input, "samplesPerTier", root, DEFAULT_SETTINGS.samplesPerTier, { min: 0, integer: true }),
    capacityRadius: capacityRadius(input, root),
    earlyStopRatio,
    forcedClearance: num(input, "forcedClearance", root, DEFAULT_SETTINGS.forcedClearance, { min: 0 }),
    randomizeOrientation: bool(input, "randomizeOrientation", root, DEFAULT_SETTINGS.randomizeOrientation),
    debugBounds: bool(input, "debugBounds", root, DEFAULT_SETTINGS.debugBounds),
    ...(seed !== undefined ? { seed } : {}),
  };
}

/** Typed entry point for configs written in code rather than loaded from JSON. */
export function definePlacementConfig(input: PlacementConfigInput): PlacementConfig {
  return resolvePlacementConfig(input);
}
