import { describe, it, expect, vi, afterEach } from "vitest";
import { PlacementLedger } from "../../src/world/scatter/ledger";
import { makeFootprint } from "../../src/world/scatter/footprint";
import type { PlacedItem } from "../../src/world/scatter/types";

function item(id: string, handle: string): PlacedItem<string> {
  return {
    id,
    categoryId: "test",
    itemId: "box",
    position: { x: 0, y: 0, z: 0 },
    orientation: 0,
    exactFootprint: makeFootprint({ x: 0, y: 0.5, z: 0 }, { x: 0.5, y: 0.5, z: 0.5 }),
    tier: "strict",
    handle,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("PlacementLedger", () => {
  it("keeps insertion order", () => {
    const ledger = new PlacementLedger<string>();
    ledger.append(item("a", "h1"), ledger.generation);
    ledger.append(item("b", "h2"), ledger.generation);

    expect(ledger.size).toBe(2);
    expect([...ledger].map(p => p.id)).toEqual(["a", "b"]);
  });

  it("destroys every entry on reset and is empty while doing so", () => {
    const ledger = new PlacementLedger<string>();
    ledger.append(item("a", "h1"), 0);
    ledger.append(item("b", "h2"), 0);

    const seen: [string, number][] = [];
    const removed = ledger.reset(p => seen.push([p.handle, ledger.size]));

    expect(removed).toBe(2);
    expect(seen).toEqual([["h1", 0], ["h2", 0]]);
    expect(ledger.size).toBe(0);
  });

  it("is idempotent", () => {
    const ledger = new PlacementLedger<string>();
    ledger.append(item("a", "h1"), 0);
    const destroy = vi.fn();

    expect(ledger.reset(destroy)).toBe(1);
    expect(ledger.reset(destroy)).toBe(0);
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it("refuses commits from a superseded generation", () => {
    const ledger = new PlacementLedger<string>();
    const gen = ledger.generation;
    ledger.reset(() => {});

    expect(ledger.isCurrent(gen)).toBe(false);
    expect(ledger.append(item("late", "h9"), gen)).toBe(false);
    expect(ledger.size).toBe(0);
    expect(ledger.append(item("fresh", "h10"), ledger.generation)).toBe(true);
  });

  it("keeps destroying after a failing destroy", () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const ledger = new PlacementLedger<string>();
    ledger.append(item("a", "h1"), 0);
    ledger.append(item("b", "h2"), 0);

    const destroyed: string[] = [];
    const removed = ledger.reset(p => {
      if (p.id === "a") throw new Error("already gone");
      destroyed.push(p.handle);
    });

    expect(removed).toBe(2);
    expect(destroyed).toEqual(["h2"]);
    expect(errors).toHaveBeenCalledWith("[scatter] reset: failed to destroy a: already gone");
  });
});
