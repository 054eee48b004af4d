// src/stats.ts
import { createRandom, type RandomSource } from './random.ts';
import type { Summary } from './types.ts';

export function mean(xs: readonly number[]) {
  return xs.length ? xs.reduce((a, b) => a + b, 0) / xs.length : 0;
}

// sample standard deviation (n - 1)
export function sd(xs: readonly number[]) {
  if (xs.length <= 1) return 0;
  const m = mean(xs);
  const v = xs.reduce((a, b) => a + (b - m) ** 2, 0) / (xs.length - 1);
  return Math.sqrt(v);
}

// population standard deviation (n), used for per-generation grid summaries
export function sdPopulation(xs: readonly number[]) {
  if (xs.length === 0) return 0;
  const m = mean(xs);
  const v = xs.reduce((a, b) => a + (b - m) ** 2, 0) / xs.length;
  return Math.sqrt(v);
}

export function summarize(xs: readonly number[]): Summary {
  if (xs.length === 0) return { mean: 0, std: 0, min: 0, max: 0 };
  let min = Infinity;
  let max = -Infinity;
  for (const x of xs) {
    if (x < min) min = x;
    if (x > max) max = x;
  }
  return { mean: mean(xs), std: sdPopulation(xs), min, max };
}

// pooled sample sd of two groups
export function pooledSd(x: readonly number[], y: readonly number[]) {
  const df = x.length + y.length - 2;
  if (df <= 0) return 0;
  const ssx = (x.length - 1) * sd(x) ** 2;
  const ssy = (y.length - 1) * sd(y) ** 2;
  return Math.sqrt((ssx + ssy) / df);
}

/**
 * Standardized mean difference of x over y with the small-sample
 * correction J = 1 - 3 / (4 df - 1). Null when either group has fewer than
 * two values or both groups are constant.
 */
export function hedgesG(x: readonly number[], y: readonly number[]): number | null {
  if (x.length < 2 || y.length < 2) return null;
  const sp = pooledSd(x, y);
  if (!(sp > 0)) return null;
  const df = x.length + y.length - 2;
  return ((mean(x) - mean(y)) / sp) * (1 - 3 / (4 * df - 1));
}

export interface Interval {
  lo: number;
  hi: number;
}

export interface BootstrapOptions {
  resamples?: number;
  alpha?: number;
  rng?: RandomSource;
}

// nearest-rank quantile of ascending data
export function quantileSorted(sorted: readonly number[], q: number) {
  if (sorted.length === 0) return 0;
  const i = Math.min(sorted.length - 1, Math.max(0, Math.floor(q * (sorted.length - 1))));
  return sorted[i];
}

/** Percentile bootstrap interval of `statistic`, resampling xs with replacement. */
export function bootstrapCI(
  xs: readonly number[],
  statistic: (sample: number[]) => number,
  opts: BootstrapOptions = {}
): Interval {
  if (xs.length === 0) return { lo: 0, hi: 0 };
  const { resamples = 2000, alpha = 0.05, rng = createRandom(12345) } = opts;

  const values = new Float64Array(resamples);
  const sample = new Array<number>(xs.length);
  for (let b = 0; b < resamples; b++) {
    for (let i = 0; i < xs.length; i++) sample[i] = xs[rng.int(xs.length)];
    values[b] = statistic(sample);
  }
  values.sort();
  const sorted = Array.from(values);
  return { lo: quantileSorted(sorted, alpha / 2), hi: quantileSorted(sorted, 1 - alpha / 2) };
}
