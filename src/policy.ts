// src/policy.ts
// One selection rule for both policies: every meme gets a fitness (higher is
// better); the dominant meme is the fittest, the evicted one the least fit.
// Ties go to the earliest-inserted member in both directions.
import type { Meme } from './meme.ts';
import type { FidelityPolicy, MutationBasis, SelectionPolicy, UtilityPolicy } from './types.ts';

export function fidelityPolicy(metric: MutationBasis = 'entropy', mutationBasis: MutationBasis = 'entropy'): FidelityPolicy {
  return { kind: 'fidelity', metric, mutationBasis };
}

export function utilityPolicy(alpha = 0.5, beta = 0.5, mutationBasis: MutationBasis = 'complexity'): UtilityPolicy {
  return { kind: 'utility', alpha, beta, mutationBasis };
}

export function fitness(policy: SelectionPolicy, meme: Meme): number {
  if (policy.kind === 'utility') return meme.combinedScore(policy.alpha, policy.beta);
  return -(policy.metric === 'entropy' ? meme.entropy() : meme.complexity());
}

export function dominantIndex(policy: SelectionPolicy, pool: readonly Meme[]): number {
  if (pool.length === 0) return -1;
  let best = 0;
  let bestFit = fitness(policy, pool[0]);
  for (let i = 1; i < pool.length; i++) {
    const f = fitness(policy, pool[i]);
    if (f > bestFit) {
      best = i;
      bestFit = f;
    }
  }
  return best;
}

export function evictionIndex(policy: SelectionPolicy, pool: readonly Meme[]): number {
  if (pool.length === 0) return -1;
  let worst = 0;
  let worstFit = fitness(policy, pool[0]);
  for (let i = 1; i < pool.length; i++) {
    const f = fitness(policy, pool[i]);
    if (f < worstFit) {
      worst = i;
      worstFit = f;
    }
  }
  return worst;
}

export function describePolicy(policy: SelectionPolicy): string {
  if (policy.kind === 'utility') {
    return `utility(alpha=${policy.alpha}, beta=${policy.beta}, basis=${policy.mutationBasis})`;
  }
  return `fidelity(metric=${policy.metric}, basis=${policy.mutationBasis})`;
}
