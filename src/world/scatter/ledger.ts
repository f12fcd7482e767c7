import { Logger, errorMessage } from "../../utils/logger";
import type { PlacedItem } from "./types";

/**
 * Ordered record of committed placements (insertion order = placement order).
 *
 * Every reset bumps `generation`. A run captures the generation when it
 * starts and can only commit while that generation is current, so nothing
 * from a superseded run lands in the ledger after a reset has begun.
 */
export class PlacementLedger<THandle> implements Iterable<PlacedItem<THandle>> {
  private items: PlacedItem<THandle>[] = [];
  private gen = 0;

  get generation(): number {
    return this.gen;
  }

  get size(): number {
    return this.items.length;
  }

  get entries(): readonly PlacedItem<THandle>[] {
    return this.items;
  }

  isCurrent(generation: number): boolean {
    return generation === this.gen;
  }

  /** Returns false (and leaves the ledger untouched) when `generation` is stale. */
  append(item: PlacedItem<THandle>, generation: number): boolean {
    if (!this.isCurrent(generation)) return false;
    this.items.push(item);
    return true;
  }

  /**
   * Empties the ledger, then destroys what it held. The ledger is already
   * empty while `destroy` runs; a throwing `destroy` is logged and the
   * remaining entries are still destroyed.
   */
  reset(destroy: (item: PlacedItem<THandle>) => void): number {
    const drained = this.items;
    this.items = [];
    this.gen++;

    for (const item of drained) {
      try {
        destroy(item);
      } catch (err) {
        Logger.error(`reset: failed to destroy ${item.id}: ${errorMessage(err)}`);
      }
    }
    return drained.length;
  }

  [Symbol.iterator](): Iterator<PlacedItem<THandle>> {
    return this.items[Symbol.iterator]();
  }
}
