export interface RNG {
  next(): number; // [0,1)
  float(min: number, max: number): number;
  int(minInclusive: number, maxInclusive: number): number;
  angle(): number; // [0, 2π)
  pick<T>(arr: readonly T[]): T;
  pickWeighted<T>(arr: readonly T[], weightOf: (item: T) => number): T;
}

function xmur3(str: string) {
  let h = 1779033703 ^ str.length;
  for (let i = 0; i < str.length; i++) {
    h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return function () {
    h = Math.imul(h ^ (h >>> 16), 2246822507);
    h = Math.imul(h ^ (h >>> 13), 3266489909);
    h ^= h >>> 16;
    return h >>> 0;
  };
}

function mulberry32(seed: number) {
  return function () {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function makeRng(seedString: string): RNG {
  const seedGen = xmur3(seedString);
  return rngFrom(mulberry32(seedGen()));
}

/** Wraps any [0,1) source, e.g. `Math.random`, in the RNG interface. */
export function rngFrom(rand: () => number): RNG {
  const pick = <T,>(arr: readonly T[]): T => {
    if (arr.length === 0) throw new Error("pick() called with empty array");
    const idx = Math.min(arr.length - 1, Math.floor(rand() * arr.length));
    return arr[idx]!;
  };

  return {
    next: () => rand(),
    float: (min, max) => min + (max - min) * rand(),
    int: (minInclusive, maxInclusive) => {
      if (maxInclusive < minInclusive) {
        throw new Error(`int() called with empty range [${minInclusive}, ${maxInclusive}]`);
      }
      const span = maxInclusive - minInclusive + 1;
      return minInclusive + Math.min(span - 1, Math.floor(rand() * span));
    },
    angle: () => rand() * Math.PI * 2,
    pick,
    pickWeighted: <T,>(arr: readonly T[], weightOf: (item: T) => number): T => {
      let total = 0;
      for (const item of arr) total += Math.max(0, weightOf(item));
      if (!(total > 0) || !Number.isFinite(total)) return pick(arr);

      let r = rand() * total;
      for (const item of arr) {
        const w = Math.max(0, weightOf(item));
        if (r < w) return item;
        r -= w;
      }
      // Float drift can leave r marginally above zero; the last weighted item absorbs it.
      for (let i = arr.length - 1; i >= 0; i--) {
        if (weightOf(arr[i]!) > 0) return arr[i]!;
      }
      return pick(arr);
    },
  };
}
