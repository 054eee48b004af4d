/**
 * Shared test fixtures
 */

import { fidelityPolicy } from '../src/policy.ts';
import type { RandomSource } from '../src/random.ts';
import type { MemeSpace, PoolRules, SelectionPolicy } from '../src/types.ts';

export function makeSpace(overrides: Partial<MemeSpace> = {}): MemeSpace {
  return {
    length: 4,
    utilityPatterns: [],
    mutationScale: 0,
    ...overrides,
  };
}

export function makeRules(overrides: Partial<PoolRules> & { policy?: SelectionPolicy } = {}): PoolRules {
  return {
    capacity: 1,
    policy: fidelityPolicy(),
    internalRate: 0,
    externalRate: 0,
    ...overrides,
  };
}

/**
 * Replays queued values: int(n) returns the next queued int modulo n (0 once
 * the queue is empty), next() the next queued float (`fallback` afterwards).
 */
export function scriptedRandom(ints: number[] = [], floats: number[] = [], fallback = 0.5) {
  const intQueue = ints.slice();
  const floatQueue = floats.slice();
  const calls = { next: 0, int: 0 };
  const rng: RandomSource = {
    next() {
      calls.next++;
      return floatQueue.shift() ?? fallback;
    },
    int(n: number) {
      calls.int++;
      return (intQueue.shift() ?? 0) % n;
    },
  };
  return { rng, calls };
}

export function keys(patterns: readonly (readonly number[])[]) {
  return patterns.map(p => p.join(''));
}
