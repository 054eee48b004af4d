// src/random.ts

export interface RandomSource {
  // uniform in [0, 1)
  next(): number;
  // uniform integer in [0, n)
  int(n: number): number;
}

export function mulberry32(seed: number) {
  let a = seed >>> 0;
  return () => {
    let t = (a += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function fromGenerator(gen: () => number): RandomSource {
  return {
    next: gen,
    int(n: number) {
      if (!Number.isInteger(n) || n <= 0) {
        throw new RangeError(`int(n) needs a positive integer, got ${n}`);
      }
      return Math.min(n - 1, Math.floor(gen() * n));
    },
  };
}

export function createRandom(seed: number): RandomSource {
  return fromGenerator(mulberry32(seed));
}

/** One `int(items.length)` draw. */
export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('pick() from an empty list');
  return items[rng.int(items.length)];
}
