// src/types.ts

// ------------------------------
// Core types
// ------------------------------
export type Bit = 0 | 1;

// what the mutation rate scales with: normalized complexity or raw entropy
export type MutationBasis = 'complexity' | 'entropy';

export type FidelityPolicy = {
  kind: 'fidelity';
  // select lowest, evict highest
  metric: MutationBasis;
  mutationBasis: MutationBasis;
};

export type UtilityPolicy = {
  kind: 'utility';
  // S = alpha * U - beta * C; select highest, evict lowest
  alpha: number;
  beta: number;
  mutationBasis: MutationBasis;
};

export type SelectionPolicy = FidelityPolicy | UtilityPolicy;

export type PolicyKind = SelectionPolicy['kind'];

// Everything a meme needs to score itself and scale its mutation rate.
// The basis the rate scales with belongs to the selection policy.
export interface MemeSpace {
  length: number;
  utilityPatterns: readonly (readonly Bit[])[];
  mutationScale: number;
}

// Per-agent pool behaviour, shared by every cell of a grid.
export interface PoolRules {
  capacity: number;
  policy: SelectionPolicy;
  internalRate: number;
  externalRate: number;
}

export interface UserConfig {
  // lattice
  gridSize: number;
  memeLength: number;

  // agents
  poolCapacity: number;

  // mutation
  internalRate: number;
  externalRate: number;
  mutationScale: number;

  // selection
  policy: SelectionPolicy;
  utilityPatterns: number[][];

  // seed patterns dropped on random cells after initialization
  injectPatterns?: number[][];

  seed: number;
}

// ------------------------------
// Statistics
// ------------------------------
export interface Summary {
  mean: number;
  std: number;
  min: number;
  max: number;
}

export interface GridStatistics {
  // dominant meme per cell
  dominantComplexity: Summary;
  dominantEntropy: Summary;
  // utility policy only
  dominantUtility?: Summary;
  dominantScore?: Summary;

  // every meme in every pool
  poolComplexityMean: number;
  poolEntropyMean: number;
  poolUtilityMean: number;

  // diversity
  uniquePatterns: number;
  totalPatterns: number;
  diversity: number;
}

export interface PoolStats {
  poolSize: number;
  avgComplexity: number;
  minComplexity: number;
  maxComplexity: number;
  avgUtility: number;
  minUtility: number;
  maxUtility: number;
  avgScore: number;
  avgAge: number;
  dominantComplexity: number;
  dominantUtility: number;
  dominantScore: number;
}

export type EngineState = 'idle' | 'stepping';
