// src/agent.ts
import { EmptyPoolViolationError } from './errors.ts';
import { Meme } from './meme.ts';
import { dominantIndex, evictionIndex } from './policy.ts';
import { pick, type RandomSource } from './random.ts';
import { mean } from './stats.ts';
import type { PoolRules, PoolStats } from './types.ts';

/**
 * A lattice cell. Owns a bounded pool of memes kept in insertion order;
 * every meme in the pool belongs to this agent alone.
 */
export class Agent {
  readonly x: number;
  readonly y: number;
  readonly rules: PoolRules;

  private readonly pool: Meme[];

  constructor(x: number, y: number, memes: readonly Meme[], rules: PoolRules) {
    if (!Number.isInteger(rules.capacity) || rules.capacity < 1) {
      throw new EmptyPoolViolationError(`pool capacity must be >= 1, got ${rules.capacity}`);
    }
    if (memes.length === 0) {
      throw new EmptyPoolViolationError(`agent (${x},${y}) needs at least one meme`);
    }
    this.x = x;
    this.y = y;
    this.rules = rules;
    this.pool = memes.slice(0, rules.capacity);
  }

  get size() {
    return this.pool.length;
  }

  memes(): readonly Meme[] {
    return this.pool;
  }

  getDominant(): Meme {
    return this.pool[dominantIndex(this.rules.policy, this.pool)];
  }

  // internal drift: copy one of our own memes (uniform, with replacement).
  // Returns the copy, which may already have been evicted.
  rehearsal(rng: RandomSource): Meme {
    const source = pick(rng, this.pool);
    const copy = source.mutate(this.rules.internalRate, this.rules.policy.mutationBasis, rng);
    this.insert(copy);
    return copy;
  }

  // noisy copy of a neighbour's dominant meme
  receiveMeme(source: Meme, rng: RandomSource): Meme {
    const copy = source.mutate(this.rules.externalRate, this.rules.policy.mutationBasis, rng);
    this.insert(copy);
    return copy;
  }

  /** Append, then evict the least fit member if over capacity. Returns the evicted meme. */
  insert(meme: Meme): Meme | null {
    this.pool.push(meme);
    if (this.pool.length <= this.rules.capacity) return null;
    const idx = evictionIndex(this.rules.policy, this.pool);
    const [evicted] = this.pool.splice(idx, 1);
    return evicted;
  }

  ageAll() {
    for (const m of this.pool) m.incrementAge();
  }

  snapshotCopy(): Agent {
    return new Agent(this.x, this.y, this.pool.map(m => m.clone()), this.rules);
  }

  poolStats(): PoolStats {
    const { policy } = this.rules;
    const alpha = policy.kind === 'utility' ? policy.alpha : 0;
    const beta = policy.kind === 'utility' ? policy.beta : 0;

    const complexities = this.pool.map(m => m.complexity());
    const utilities = this.pool.map(m => m.utility());
    const dominant = this.getDominant();

    return {
      poolSize: this.pool.length,
      avgComplexity: mean(complexities),
      minComplexity: Math.min(...complexities),
      maxComplexity: Math.max(...complexities),
      avgUtility: mean(utilities),
      minUtility: Math.min(...utilities),
      maxUtility: Math.max(...utilities),
      avgScore: mean(this.pool.map(m => m.combinedScore(alpha, beta))),
      avgAge: mean(this.pool.map(m => m.age)),
      dominantComplexity: dominant.complexity(),
      dominantUtility: dominant.utility(),
      dominantScore: dominant.combinedScore(alpha, beta),
    };
  }

  label() {
    return `Agent(${this.x},${this.y})`;
  }

  toString() {
    return `${this.label()} with ${this.pool.length} memes`;
  }
}
