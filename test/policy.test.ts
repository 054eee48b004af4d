/**
 * Selection Policy Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Meme } from '../src/meme.ts';
import { describePolicy, dominantIndex, evictionIndex, fidelityPolicy, fitness, utilityPolicy } from '../src/policy.ts';
import { makeSpace } from './helpers.ts';

const space = makeSpace();
const pool = (...keys: string[]) => keys.map(k => Meme.create(k.split('').map(Number), space));

describe('policy constructors', () => {
  it('should default the fidelity basis to entropy', () => {
    assert.deepStrictEqual(fidelityPolicy(), { kind: 'fidelity', metric: 'entropy', mutationBasis: 'entropy' });
  });

  it('should default the utility basis to complexity', () => {
    assert.deepStrictEqual(utilityPolicy(1, 0.25), { kind: 'utility', alpha: 1, beta: 0.25, mutationBasis: 'complexity' });
  });

  it('should describe itself', () => {
    assert.strictEqual(describePolicy(utilityPolicy(1, 0.5)), 'utility(alpha=1, beta=0.5, basis=complexity)');
    assert.strictEqual(describePolicy(fidelityPolicy('complexity')), 'fidelity(metric=complexity, basis=entropy)');
  });
});

describe('fidelity policy', () => {
  const policy = fidelityPolicy();

  it('should score by negative entropy', () => {
    assert.strictEqual(fitness(policy, pool('0011')[0]), -1);
  });

  it('should prefer the lowest entropy as dominant', () => {
    assert.strictEqual(dominantIndex(policy, pool('0011', '0001', '1000')), 1);
  });

  it('should evict the highest entropy', () => {
    assert.strictEqual(evictionIndex(policy, pool('0001', '0011', '0000')), 1);
  });

  it('should break ties by earliest insertion both ways', () => {
    const p = pool('0001', '0010', '0100');
    assert.strictEqual(dominantIndex(policy, p), 0);
    assert.strictEqual(evictionIndex(policy, p), 0);
  });

  it('should order the same way under the complexity metric', () => {
    const p = pool('0011', '0000', '0001');
    assert.strictEqual(dominantIndex(fidelityPolicy('complexity'), p), 1);
    assert.strictEqual(evictionIndex(fidelityPolicy('complexity'), p), 0);
  });
});

describe('utility policy', () => {
  const s = makeSpace({ utilityPatterns: [[1, 1, 1, 1]] });
  const p = ['0000', '0111', '1111'].map(k => Meme.create(k.split('').map(Number), s));

  it('should select the highest combined score', () => {
    assert.strictEqual(dominantIndex(utilityPolicy(1, 0), p), 2);
  });

  it('should evict the lowest combined score', () => {
    assert.strictEqual(evictionIndex(utilityPolicy(1, 0), p), 0);
  });

  it('should let complexity weight flip the choice', () => {
    // 0111: 0.75 - 2 * 0.4056 < 0; 0000: 0; 1111: 1
    assert.strictEqual(evictionIndex(utilityPolicy(1, 2), p), 1);
  });

  it('should return -1 on an empty pool', () => {
    assert.strictEqual(dominantIndex(utilityPolicy(), []), -1);
    assert.strictEqual(evictionIndex(utilityPolicy(), []), -1);
  });
});
