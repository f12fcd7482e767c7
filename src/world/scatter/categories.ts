import type { ResolvedCategoryConfig } from "../../types/config";
import { Logger } from "../../utils/logger";
import type { Category, CategoryItem } from "./types";

/**
 * Binds config categories to live templates. Names `lookup` cannot resolve
 * are dropped with a warning; a category can end up with no items, which
 * the scatterer skips.
 */
export function buildCategories<TTemplate>(
  configs: readonly ResolvedCategoryConfig[],
  lookup: (templateName: string) => TTemplate | null
): Category<TTemplate>[] {
  return configs.map((cfg) => {
    const candidateItems: CategoryItem<TTemplate>[] = [];
    for (const it of cfg.items) {
      const template = lookup(it.template);
      if (template === null) {
        Logger.warn(`category "${cfg.id}": template "${it.template}" not found; dropping it`);
        continue;
      }
      candidateItems.push({ id: it.template, template, weight: it.weight });
    }
    return {
      id: cfg.id,
      candidateItems,
      minCount: cfg.minCount,
      maxCount: cfg.maxCount,
      clearance: cfg.clearance,
    };
  });
}
