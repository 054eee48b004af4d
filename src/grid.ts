// src/grid.ts
import { Agent } from './agent.ts';
import { CountMismatchError, ConfigurationError } from './errors.ts';
import { Meme } from './meme.ts';
import type { RandomSource } from './random.ts';
import { summarize } from './stats.ts';
import type { Bit, GridStatistics, MemeSpace, PoolRules, Summary } from './types.ts';

/**
 * N x N torus of agents. Cells are stored row-major with x outer and y inner,
 * i.e. agent (x, y) lives at index x * N + y. Every traversal that draws
 * random numbers follows this order.
 */
export class Grid {
  readonly size: number;
  readonly space: MemeSpace;
  readonly rules: PoolRules;

  private cells: Agent[];

  constructor(size: number, agents: readonly Agent[], space: MemeSpace, rules: PoolRules) {
    if (!Number.isInteger(size) || size < 1) {
      throw new ConfigurationError(`grid size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.space = space;
    this.rules = rules;
    Grid.checkOrder(size, agents);
    this.cells = agents.slice();
  }

  static initializeRandom(size: number, space: MemeSpace, rules: PoolRules, rng: RandomSource): Grid {
    const agents: Agent[] = [];
    for (let x = 0; x < size; x++) {
      for (let y = 0; y < size; y++) {
        const memes: Meme[] = [];
        for (let k = 0; k < rules.capacity; k++) memes.push(Meme.random(space, rng));
        agents.push(new Agent(x, y, memes, rules));
      }
    }
    return new Grid(size, agents, space, rules);
  }

  // pools[i] holds the patterns of cell i in canonical order
  static fromPatterns(size: number, pools: readonly (readonly number[][])[], space: MemeSpace, rules: PoolRules): Grid {
    if (pools.length !== size * size) {
      throw new CountMismatchError(`expected ${size * size} pools, got ${pools.length}`);
    }
    const agents = pools.map((patterns, i) =>
      new Agent(Math.floor(i / size), i % size, patterns.map(p => Meme.create(p, space)), rules));
    return new Grid(size, agents, space, rules);
  }

  private static checkOrder(size: number, agents: readonly Agent[]) {
    const n = size * size;
    if (agents.length !== n) {
      throw new CountMismatchError(`grid of size ${size} needs ${n} agents, got ${agents.length}`);
    }
    for (let i = 0; i < n; i++) {
      const a = agents[i];
      const x = Math.floor(i / size);
      const y = i % size;
      if (a.x !== x || a.y !== y) {
        throw new CountMismatchError(`slot ${i} expects agent (${x},${y}), got (${a.x},${a.y})`);
      }
    }
  }

  private index(x: number, y: number) {
    const N = this.size;
    const wx = ((x % N) + N) % N;
    const wy = ((y % N) + N) % N;
    return wx * N + wy;
  }

  agentAt(x: number, y: number): Agent {
    return this.cells[this.index(x, y)];
  }

  allAgents(): readonly Agent[] {
    return this.cells;
  }

  /** Drop a seed meme on a random cell through that cell's normal insert. */
  injectPattern(pattern: readonly number[], rng: RandomSource): Agent {
    const meme = Meme.create(pattern, this.space);
    const x = rng.int(this.size);
    const y = rng.int(this.size);
    const agent = this.agentAt(x, y);
    agent.insert(meme);
    return agent;
  }

  // Moore-8 with wraparound: dx outer, dy inner, self skipped
  mooreNeighbors(x: number, y: number): Agent[] {
    const out: Agent[] = [];
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        if (dx === 0 && dy === 0) continue;
        out.push(this.cells[this.index(x + dx, y + dy)]);
      }
    }
    return out;
  }

  /** The only place the visible state changes during the external phase. */
  replaceAll(newAgents: readonly Agent[]) {
    Grid.checkOrder(this.size, newAgents);
    this.cells = newAgents.slice();
  }

  dominantPatterns(): (readonly Bit[])[] {
    return this.cells.map(a => a.getDominant().pattern);
  }

  aggregateStatistics(): GridStatistics {
    const { policy } = this.rules;

    const domComplexity: number[] = [];
    const domEntropy: number[] = [];
    const domUtility: number[] = [];
    const domScore: number[] = [];

    let poolComplexity = 0;
    let poolEntropy = 0;
    let poolUtility = 0;
    let total = 0;
    const unique = new Set<string>();

    for (const agent of this.cells) {
      const d = agent.getDominant();
      domComplexity.push(d.complexity());
      domEntropy.push(d.entropy());
      if (policy.kind === 'utility') {
        domUtility.push(d.utility());
        domScore.push(d.combinedScore(policy.alpha, policy.beta));
      }

      for (const m of agent.memes()) {
        poolComplexity += m.complexity();
        poolEntropy += m.entropy();
        poolUtility += m.utility();
        unique.add(m.key());
        total++;
      }
    }

    const stats: GridStatistics = {
      dominantComplexity: summarize(domComplexity),
      dominantEntropy: summarize(domEntropy),
      poolComplexityMean: total ? poolComplexity / total : 0,
      poolEntropyMean: total ? poolEntropy / total : 0,
      poolUtilityMean: total ? poolUtility / total : 0,
      uniquePatterns: unique.size,
      totalPatterns: total,
      diversity: total ? unique.size / total : 0,
    };
    if (policy.kind === 'utility') {
      stats.dominantUtility = summarize(domUtility);
      stats.dominantScore = summarize(domScore);
    }
    return stats;
  }
}

function putSummary(out: Record<string, number>, prefix: string, s: Summary) {
  out[`${prefix}_mean`] = s.mean;
  out[`${prefix}_std`] = s.std;
  out[`${prefix}_min`] = s.min;
  out[`${prefix}_max`] = s.max;
}

/** name -> value view of the statistics, keys in a fixed order. */
export function flattenStatistics(stats: GridStatistics): Record<string, number> {
  const out: Record<string, number> = {};
  putSummary(out, 'dominant_complexity', stats.dominantComplexity);
  putSummary(out, 'dominant_entropy', stats.dominantEntropy);
  if (stats.dominantUtility) putSummary(out, 'dominant_utility', stats.dominantUtility);
  if (stats.dominantScore) putSummary(out, 'dominant_score', stats.dominantScore);
  out.pool_complexity_mean = stats.poolComplexityMean;
  out.pool_entropy_mean = stats.poolEntropyMean;
  out.pool_utility_mean = stats.poolUtilityMean;
  out.unique_patterns = stats.uniquePatterns;
  out.total_patterns = stats.totalPatterns;
  out.pattern_diversity = stats.diversity;
  return out;
}
