// src/meme.ts
import { InvalidPatternError } from './errors.ts';
import type { RandomSource } from './random.ts';
import type { Bit, MemeSpace, MutationBasis } from './types.ts';

// validated copy of a raw pattern
export function checkPattern(pattern: readonly number[], length: number): Bit[] {
  if (pattern.length !== length) {
    throw new InvalidPatternError(`pattern must have length ${length}, got ${pattern.length}`);
  }
  const bits: Bit[] = [];
  for (let i = 0; i < pattern.length; i++) {
    const b = pattern[i];
    if (b !== 0 && b !== 1) {
      throw new InvalidPatternError(`pattern[${i}]=${b} is not 0 or 1`);
    }
    bits.push(b === 1 ? 1 : 0);
  }
  return bits;
}

/**
 * An L-bit pattern plus an age. The pattern never changes after construction,
 * so the derived scores are computed once on first read.
 */
export class Meme {
  readonly pattern: readonly Bit[];
  readonly space: MemeSpace;
  age: number;

  private entropyCache: number | null = null;
  private utilityCache: number | null = null;

  private constructor(pattern: readonly Bit[], space: MemeSpace, age: number) {
    this.pattern = pattern;
    this.space = space;
    this.age = age;
  }

  static create(pattern: readonly number[], space: MemeSpace, age = 0): Meme {
    if (!Number.isInteger(age) || age < 0) {
      throw new RangeError(`meme age must be a non-negative integer, got ${age}`);
    }
    return new Meme(checkPattern(pattern, space.length), space, age);
  }

  // white noise
  static random(space: MemeSpace, rng: RandomSource): Meme {
    const bits: Bit[] = [];
    for (let i = 0; i < space.length; i++) bits.push(rng.next() < 0.5 ? 1 : 0);
    return new Meme(bits, space, 0);
  }

  // H = -(p0 log2 p0 + p1 log2 p1), 0 log2 0 := 0
  entropy(): number {
    if (this.entropyCache !== null) return this.entropyCache;
    const L = this.pattern.length;
    let ones = 0;
    for (const b of this.pattern) ones += b;
    const p1 = ones / L;
    const p0 = 1 - p1;
    let h = 0;
    if (p0 > 0) h -= p0 * Math.log2(p0);
    if (p1 > 0) h -= p1 * Math.log2(p1);
    this.entropyCache = h;
    return h;
  }

  complexity(): number {
    return this.entropy() / Math.log2(this.pattern.length);
  }

  hammingDistance(other: Meme | readonly Bit[]): number {
    const bits = other instanceof Meme ? other.pattern : other;
    let diff = 0;
    for (let i = 0; i < this.pattern.length; i++) {
      if (this.pattern[i] !== bits[i]) diff++;
    }
    return diff / this.pattern.length;
  }

  // 1 - distance to the nearest reference pattern
  utility(): number {
    if (this.utilityCache !== null) return this.utilityCache;
    const refs = this.space.utilityPatterns;
    if (refs.length === 0) {
      this.utilityCache = 0;
      return 0;
    }
    let best = Infinity;
    for (const ref of refs) best = Math.min(best, this.hammingDistance(ref));
    this.utilityCache = 1 - best;
    return this.utilityCache;
  }

  combinedScore(alpha: number, beta: number): number {
    return alpha * this.utility() - beta * this.complexity();
  }

  /**
   * Copy with per-bit flips at mu_eff = muBase + k * (complexity or entropy).
   * Always consumes exactly L draws. The copy starts at age 0.
   */
  mutate(muBase: number, basis: MutationBasis, rng: RandomSource): Meme {
    const level = basis === 'entropy' ? this.entropy() : this.complexity();
    const muEff = muBase + this.space.mutationScale * level;
    const bits: Bit[] = [];
    for (const b of this.pattern) {
      const flip = rng.next() < muEff;
      bits.push(flip ? (b === 1 ? 0 : 1) : b);
    }
    return new Meme(bits, this.space, 0);
  }

  incrementAge() {
    this.age += 1;
  }

  clone(): Meme {
    const m = new Meme(this.pattern.slice(), this.space, this.age);
    m.entropyCache = this.entropyCache;
    m.utilityCache = this.utilityCache;
    return m;
  }

  key(): string {
    return this.pattern.join('');
  }

  toString() {
    return `Meme(${this.key()}, C=${this.complexity().toFixed(3)}, U=${this.utility().toFixed(3)}, age=${this.age})`;
  }
}
