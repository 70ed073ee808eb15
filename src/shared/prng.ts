/** Seeded generator so randomized self-play runs replay the same games. */
export type Prng = {
  nextFloat(): number; // [0,1)
  int(min: number, maxExclusive: number): number;
  pick<T>(arr: readonly T[]): T;
};

function hashSeed(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

// Mulberry32.
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createPrng(seed: number | string): Prng {
  const next = mulberry32(typeof seed === "string" ? hashSeed(seed) : seed >>> 0);

  const int = (min: number, maxExclusive: number): number => {
    const lo = Math.floor(min);
    const hi = Math.floor(maxExclusive);
    if (hi <= lo) return lo;
    return lo + Math.floor(next() * (hi - lo));
  };

  return {
    nextFloat: next,
    int,
    pick: <T,>(arr: readonly T[]): T => {
      if (arr.length === 0) throw new Error("pick() from empty array");
      return arr[int(0, arr.length)];
    },
  };
}
