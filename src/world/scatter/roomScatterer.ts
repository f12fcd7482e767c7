import type { Observer } from "@babylonjs/core";

import type { PlacementSettings } from "../../types/config";
import { Logger, errorMessage } from "../../utils/logger";
import { makeRng, type RNG } from "../../utils/seededRng";
import { PlacementExecutor } from "./generation/executor";
import { planCategory } from "./generation/planner";
import { PlacementLedger } from "./ledger";
import { fmt } from "./region";
import { emptyTierCounts } from "./tiers";
import type {
  Category,
  CategoryItem,
  CategoryReport,
  Footprint,
  GeometryProvider,
  InstantiationService,
  Region,
  RegionProvider,
  ScatterReport,
} from "./types";

// Follow-up passes queued by re-entrant requests, per outer call.
const MAX_FOLLOW_UP_PASSES = 4;

export interface RoomScattererOptions<TTemplate, THandle, TParent> {
  settings: PlacementSettings;
  categories: Category<TTemplate>[];
  geometry: GeometryProvider<TTemplate, THandle>;
  instances: InstantiationService<TTemplate, THandle, TParent>;
  parent?: TParent | null;
  rng?: RNG;
}

function emptyReport(categoryId: string, status: CategoryReport["status"]): CategoryReport {
  return {
    categoryId,
    status,
    theoreticalCapacity: 0,
    adjustedMax: 0,
    targetCount: 0,
    attemptBudget: 0,
    attempts: 0,
    placed: 0,
    rollbacks: 0,
    placedByTier: emptyTierCounts(),
  };
}

/**
 * Scatter pipeline for one room:
 * Input: Region (from a RegionProvider event or a direct call)
 * Step 1) Drain the ledger (destroying every placed instance)
 * Step 2) Per category: memoized footprint estimates → plan → executor loop
 * Output: ScatterReport; the ledger holds what was placed
 *
 * Runs are synchronous. A request that arrives while a run is in progress
 * resets the ledger at once (superseding that run) and is replayed when the
 * run unwinds.
 */
export class RoomScatterer<TTemplate, THandle, TParent = unknown> {
  readonly ledger = new PlacementLedger<THandle>();

  private readonly settings: PlacementSettings;
  private readonly categories: Category<TTemplate>[];
  private readonly geometry: GeometryProvider<TTemplate, THandle>;
  private readonly instances: InstantiationService<TTemplate, THandle, TParent>;
  private readonly executor: PlacementExecutor<TTemplate, THandle, TParent>;
  private readonly rng: RNG;
  private readonly estimates = new Map<CategoryItem<TTemplate>, Footprint | null>();

  private region: Region | null = null;
  private provider: RegionProvider | null = null;
  private observer: Observer<Region> | null = null;
  private running = false;
  private pending: Region | null = null;
  private last: ScatterReport | null = null;

  constructor(opts: RoomScattererOptions<TTemplate, THandle, TParent>) {
    this.settings = opts.settings;
    this.categories = opts.categories;
    this.geometry = opts.geometry;
    this.instances = opts.instances;

    this.rng = opts.rng ?? makeRng(opts.settings.seed ?? `scatter/${Date.now()}`);
    this.executor = new PlacementExecutor({
      geometry: opts.geometry,
      instances: opts.instances,
      ledger: this.ledger,
      rng: this.rng,
      settings: opts.settings,
      parent: opts.parent ?? null,
    });
  }

  get currentRegion(): Region | null {
    return this.region;
  }

  get lastReport(): ScatterReport | null {
    return this.last;
  }

  /** Subscribes to the provider's region-ready event; each firing triggers a fresh pass. */
  attach(provider: RegionProvider): void {
    this.detach();
    this.provider = provider;
    this.observer = provider.onRegionReadyObservable.add((region) => {
      this.scatter(region);
    });
  }

  detach(): void {
    if (this.provider && this.observer) {
      this.provider.onRegionReadyObservable.remove(this.observer);
    }
    this.provider = null;
    this.observer = null;
  }

  /**
   * Replaces the region and runs a full pass. Returns null when the request
   * arrived during a run and was deferred until that run unwinds.
   */
  scatter(region: Region): ScatterReport | null {
    this.region = region;

    if (this.running) {
      Logger.warn("scatter requested during a run; superseding it");
      this.reset();
      this.pending = region;
      return null;
    }

    this.running = true;
    try {
      let report = this.runPass(region);
      for (let i = 0; this.pending && i < MAX_FOLLOW_UP_PASSES; i++) {
        const next = this.pending;
        this.pending = null;
        report = this.runPass(next);
      }
      if (this.pending) {
        Logger.warn(`dropping scatter request: more than ${MAX_FOLLOW_UP_PASSES} re-entrant passes`);
        this.pending = null;
      }
      this.last = report;
      return report;
    } finally {
      this.running = false;
    }
  }

  dispose(): void {
    this.detach();
    this.reset();
  }

  /** Destroys every placed instance. Safe to call repeatedly. */
  reset(): number {
    const removed = this.ledger.reset((item) => this.instances.destroy(item.handle));
    if (removed > 0) Logger.info(`reset: destroyed ${removed} placed item(s)`);
    return removed;
  }

  /**
   * Operator action: drain the ledger, then re-run against the current region.
   * Without a region this only resets and returns null.
   */
  resetAndRegenerate(): ScatterReport | null {
    this.reset();
    const region = this.region ?? this.provider?.getRegionBounds() ?? null;
    if (!region) {
      Logger.warn("cannot regenerate: no region available yet");
      return null;
    }
    return this.scatter(region);
  }

  private runPass(region: Region): ScatterReport {
    this.reset();
    const generation = this.ledger.generation;
    const msg = `scatter: region ${fmt(region.min)} to ${fmt(region.max)}, floorY=${region.floorY}`;
    if (this.settings.debugBounds) Logger.info(msg);
    else Logger.debug(msg);

    const reports: CategoryReport[] = [];
    let superseded = false;

    for (const category of this.categories) {
      if (!this.ledger.isCurrent(generation)) {
        superseded = true;
        break;
      }

      if (category.candidateItems.length === 0) {
        Logger.warn(`category "${category.id}" has no candidate items; skipping`);
        reports.push(emptyReport(category.id, "skipped"));
        continue;
      }

      const usable = category.candidateItems.filter((item) => this.estimateOf(item) !== null);
      if (usable.length === 0) {
        Logger.warn(`category "${category.id}": no item could be measured; abandoning`);
        reports.push(emptyReport(category.id, "infeasible"));
        continue;
      }

      const scoped: Category<TTemplate> = { ...category, candidateItems: usable };
      const estimateOf = (item: CategoryItem<TTemplate>): Footprint => {
        const fp = this.estimateOf(item);
        if (!fp) throw new Error(`no estimate for ${category.id}/${item.id}`);
        return fp;
      };

      const plan = planCategory(region, scoped, this.settings, this.rng, usable.map(estimateOf));
      Logger.info(
        `category "${category.id}": target ${plan.targetCount} ` +
          `(max ${category.maxCount} adjusted to ${plan.adjustedMax}, capacity ${plan.theoreticalCapacity}), ` +
          `clearance ${category.clearance}`
      );

      const report = this.executor.runCategory({ region, category: scoped, plan, generation, estimateOf });
      reports.push(report);
      Logger.info(
        `category "${category.id}": placed ${report.placed}/${report.targetCount} ` +
          `after ${report.attempts} attempt(s) [${report.status}]`
      );

      if (report.status === "superseded") {
        superseded = true;
        break;
      }
    }

    const totalPlaced = superseded ? 0 : reports.reduce((n, r) => n + r.placed, 0);
    return { region, categories: reports, totalPlaced, superseded };
  }

  /** Memoized per item; a provider failure is remembered as null. */
  private estimateOf(item: CategoryItem<TTemplate>): Footprint | null {
    if (this.estimates.has(item)) return this.estimates.get(item) ?? null;

    let fp: Footprint | null;
    try {
      fp = this.geometry.estimateFootprint(item.template);
    } catch (err) {
      Logger.error(`estimating footprint of "${item.id}" failed: ${errorMessage(err)}`);
      fp = null;
    }
    this.estimates.set(item, fp);
    return fp;
  }
}
