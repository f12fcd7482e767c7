import type { PlacementSettings } from "../../../types/config";
import { Logger, errorMessage } from "../../../utils/logger";
import type { RNG } from "../../../utils/seededRng";
import { footprintMin, makeFootprint } from "../footprint";
import type { PlacementLedger } from "../ledger";
import { fmt } from "../region";
import { RELAXATION_TIERS, effectiveClearance, emptyTierCounts } from "../tiers";
import type {
  Category,
  CategoryItem,
  CategoryReport,
  Footprint,
  GeometryProvider,
  InstantiationService,
  PlacedItem,
  Region,
  RelaxationTier,
  Vec3,
} from "../types";
import { candidateInterval, generateCandidates, type Candidate } from "./candidates";
import type { CategoryPlan } from "./planner";
import { checkFloorContact, validateEstimate, validateExact } from "./validator";

/**
 * Stages of one item attempt:
 * SelectItem → EstimateFootprint → GenerateCandidate → ValidateEstimate →
 * Instantiate → AlignToFloor → ValidateExact → Commit.
 * A failed ValidateEstimate/ValidateExact goes back to GenerateCandidate
 * (same tier); an exhausted tier escalates to the next one.
 */
export type PlacementStage =
  | "select-item"
  | "estimate-footprint"
  | "generate-candidate"
  | "validate-estimate"
  | "instantiate"
  | "align-to-floor"
  | "validate-exact"
  | "commit";

export type AttemptOutcome<THandle> =
  | { kind: "placed"; placed: PlacedItem<THandle>; rollbacks: number }
  | { kind: "failed"; rollbacks: number }
  | { kind: "superseded"; rollbacks: number };

function trace(stage: PlacementStage, msg: string): void {
  Logger.debug(`[${stage}] ${msg}`);
}

type SampleOutcome<THandle> =
  | { kind: "placed"; placed: PlacedItem<THandle> }
  | { kind: "rolled-back" }
  | { kind: "error" }
  | { kind: "superseded" };

export type ExecutorSettings = Pick<PlacementSettings, "samplesPerTier" | "forcedClearance" | "randomizeOrientation">;

export interface ExecutorDeps<TTemplate, THandle, TParent> {
  geometry: GeometryProvider<TTemplate, THandle>;
  instances: InstantiationService<TTemplate, THandle, TParent>;
  ledger: PlacementLedger<THandle>;
  rng: RNG;
  settings: ExecutorSettings;
  parent: TParent | null;
}

export interface CategoryRun<TTemplate> {
  region: Region;
  category: Category<TTemplate>;
  plan: CategoryPlan;
  /** Ledger generation the run started under. */
  generation: number;
  estimateOf: (item: CategoryItem<TTemplate>) => Footprint;
}

export class PlacementExecutor<TTemplate, THandle, TParent = unknown> {
  private serial = 0;

  constructor(private readonly deps: ExecutorDeps<TTemplate, THandle, TParent>) {}

  /**
   * Loops item attempts until the plan's target is met, its attempt budget is
   * spent, the early-stop threshold is crossed, or a reset supersedes the run.
   */
  runCategory(run: CategoryRun<TTemplate>): CategoryReport {
    const { region, category, plan } = run;
    const report: CategoryReport = {
      categoryId: category.id,
      status: "complete",
      theoreticalCapacity: plan.theoreticalCapacity,
      adjustedMax: plan.adjustedMax,
      targetCount: plan.targetCount,
      attemptBudget: plan.attemptBudget,
      attempts: 0,
      placed: 0,
      rollbacks: 0,
      placedByTier: emptyTierCounts(),
    };

    // Items that cannot fit even at the forced clearance never will.
    const feasible = category.candidateItems.filter((item) => {
      const clearance = effectiveClearance("forced", category.clearance, this.deps.settings.forcedClearance);
      return candidateInterval(region, run.estimateOf(item), clearance) !== null;
    });
    if (plan.targetCount > 0 && feasible.length === 0) {
      Logger.warn(`category "${category.id}": no item fits the region at any tier; abandoning`);
      report.status = "infeasible";
      return report;
    }

    while (report.placed < plan.targetCount && report.attempts < plan.attemptBudget) {
      const outcome = this.attemptItem(run, feasible);
      report.attempts++;
      report.rollbacks += outcome.rollbacks;

      if (outcome.kind === "superseded") {
        Logger.warn(`category "${category.id}": run superseded by a reset; stopping`);
        report.status = "superseded";
        return report;
      }
      if (outcome.kind === "placed") {
        report.placed++;
        report.placedByTier[outcome.placed.tier]++;
      }

      if (report.placed < plan.targetCount && report.attempts > plan.earlyStopAt) {
        Logger.warn(
          `category "${category.id}": approaching attempt limit (${report.attempts}/${plan.attemptBudget}); stopping early`
        );
        break;
      }
    }

    if (report.placed < plan.targetCount) report.status = "partial";
    return report;
  }

  /** One item attempt: pick an item, then walk the tiers until something commits. */
  attemptItem(run: CategoryRun<TTemplate>, items: readonly CategoryItem<TTemplate>[]): AttemptOutcome<THandle> {
    const { region, category } = run;
    const { ledger, rng, settings } = this.deps;

    const item = rng.pickWeighted(items, (it) => it.weight);
    trace("select-item", `${category.id}: picked ${item.id}`);
    const estimate = run.estimateOf(item);

    let rollbacks = 0;

    for (const tier of RELAXATION_TIERS) {
      const clearance = effectiveClearance(tier, category.clearance, settings.forcedClearance);
      const interval = candidateInterval(region, estimate, clearance);
      if (!interval) {
        trace("generate-candidate", `${category.id}/${item.id}: region too small at tier ${tier} (clearance ${clearance})`);
        continue;
      }

      for (const cand of generateCandidates(interval, region, settings.samplesPerTier, rng)) {
        if (!ledger.isCurrent(run.generation)) return { kind: "superseded", rollbacks };

        const fp = makeFootprint({ x: cand.x, y: estimate.center.y, z: cand.z }, estimate.extents);
        const check = validateEstimate(fp, region, ledger, clearance);
        if (!check.ok) {
          trace("validate-estimate", `${category.id}/${item.id}: ${tier} ${cand.source} candidate rejected (${check.reason}: ${check.detail})`);
          continue;
        }

        const outcome = this.instantiateAndCommit(run, item, estimate, cand, tier, clearance);
        if (outcome.kind === "placed") return { kind: "placed", placed: outcome.placed, rollbacks };
        if (outcome.kind === "superseded") return { kind: "superseded", rollbacks };
        if (outcome.kind === "rolled-back") rollbacks++;
      }

      trace("generate-candidate", `${category.id}/${item.id}: tier ${tier} exhausted`);
    }

    return { kind: "failed", rollbacks };
  }

  /**
   * Moves the instance vertically so its lowest extent rests on `floorY`,
   * whatever its pivot offset. Returns the re-measured footprint.
   */
  alignToFloor(handle: THandle, floorY: number): Footprint {
    const { geometry, instances } = this.deps;
    const pos = instances.getPosition(handle);
    const measured = geometry.measureExactFootprint(handle);
    const pivotToBottomOffset = pos.y - footprintMin(measured).y;

    instances.setPosition(handle, { x: pos.x, y: floorY + pivotToBottomOffset, z: pos.z });
    return geometry.measureExactFootprint(handle);
  }

  private instantiateAndCommit(
    run: CategoryRun<TTemplate>,
    item: CategoryItem<TTemplate>,
    estimate: Footprint,
    cand: Candidate,
    tier: RelaxationTier,
    clearance: number
  ): SampleOutcome<THandle> {
    const { region, category } = run;
    const { instances, ledger, rng, settings, parent } = this.deps;

    // Candidates locate the footprint center; the pivot sits at the estimate's offset from it.
    const provisional: Vec3 = { x: cand.x - estimate.center.x, y: region.floorY, z: cand.z - estimate.center.z };
    const orientation = settings.randomizeOrientation ? rng.angle() : 0;

    let handle: THandle;
    try {
      handle = instances.create(item.template, provisional, orientation, parent);
    } catch (err) {
      Logger.error(`${category.id}/${item.id}: instantiation failed: ${errorMessage(err)}`);
      return { kind: "error" };
    }

    let exact: Footprint;
    let position: Vec3;
    try {
      exact = this.alignToFloor(handle, region.floorY);
      position = instances.getPosition(handle);
    } catch (err) {
      Logger.error(`${category.id}/${item.id}: measuring instance failed: ${errorMessage(err)}`);
      this.destroyQuietly(handle);
      return { kind: "error" };
    }

    const floor = checkFloorContact(exact, region.floorY);
    const check = floor.ok ? validateExact(exact, region, ledger, clearance) : floor;
    if (!check.ok) {
      Logger.warn(`${category.id}/${item.id}: exact bounds rejected at ${fmt(position)} (${check.reason}: ${check.detail}); rolling back`);
      this.destroyQuietly(handle);
      return { kind: "rolled-back" };
    }

    const placed: PlacedItem<THandle> = {
      id: `${category.id}-${++this.serial}`,
      categoryId: category.id,
      itemId: item.id,
      position,
      orientation,
      exactFootprint: exact,
      tier,
      handle,
    };

    if (!ledger.append(placed, run.generation)) {
      this.destroyQuietly(handle);
      return { kind: "superseded" };
    }

    try {
      instances.onCommitted?.(handle, placed);
    } catch (err) {
      Logger.error(`${placed.id}: commit hook failed: ${errorMessage(err)}`);
    }

    trace("commit", `${placed.id}: placed ${item.id} at ${fmt(position)} (tier ${tier})`);
    return { kind: "placed", placed };
  }

  private destroyQuietly(handle: THandle): void {
    try {
      this.deps.instances.destroy(handle);
    } catch (err) {
      Logger.error(`destroying rolled-back instance failed: ${errorMessage(err)}`);
    }
  }
}
