/**
 * Agent Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Agent } from '../src/agent.ts';
import { EmptyPoolViolationError } from '../src/errors.ts';
import { Meme } from '../src/meme.ts';
import { utilityPolicy } from '../src/policy.ts';
import { createRandom } from '../src/random.ts';
import type { MemeSpace, PoolRules } from '../src/types.ts';
import { makeRules, makeSpace, scriptedRandom } from './helpers.ts';

const space = makeSpace();

function agent(keys: string[], rules: PoolRules, s: MemeSpace = space) {
  return new Agent(0, 0, keys.map(k => Meme.create(k.split('').map(Number), s)), rules);
}

function poolKeys(a: Agent) {
  return a.memes().map(m => m.key());
}

describe('Agent construction', () => {
  it('should reject an empty pool', () => {
    assert.throws(() => new Agent(0, 0, [], makeRules()), EmptyPoolViolationError);
  });

  it('should reject a capacity below 1', () => {
    assert.throws(() => agent(['0000'], makeRules({ capacity: 0 })), EmptyPoolViolationError);
  });

  it('should drop initial memes beyond capacity', () => {
    const a = agent(['0000', '0001', '0011'], makeRules({ capacity: 2 }));
    assert.deepStrictEqual(poolKeys(a), ['0000', '0001']);
  });
});

describe('insert', () => {
  it('should append while below capacity', () => {
    const a = agent(['0000'], makeRules({ capacity: 2 }));
    assert.strictEqual(a.insert(Meme.create([0, 0, 1, 1], space)), null);
    assert.deepStrictEqual(poolKeys(a), ['0000', '0011']);
  });

  it('should evict the highest entropy under the fidelity policy', () => {
    const a = agent(['0000', '0011'], makeRules({ capacity: 2 }));
    const evicted = a.insert(Meme.create([0, 0, 0, 1], space));
    assert.strictEqual(evicted?.key(), '0011');
    assert.deepStrictEqual(poolKeys(a), ['0000', '0001']);
  });

  it('should evict the earliest member on ties', () => {
    const a = agent(['0001'], makeRules());
    a.insert(Meme.create([0, 0, 1, 0], space));
    assert.deepStrictEqual(poolKeys(a), ['0010']);
  });

  it('should evict the lowest combined score under the utility policy', () => {
    const s = makeSpace({ utilityPatterns: [[1, 1, 1, 1]] });
    const a = agent(['1111', '0111'], makeRules({ capacity: 2, policy: utilityPolicy(1, 0) }), s);
    a.insert(Meme.create([0, 0, 0, 0], s));
    assert.deepStrictEqual(poolKeys(a), ['1111', '0111']);
  });

  it('should keep the pool within [1, K] for any insert sequence', () => {
    const rng = createRandom(11);
    const a = agent(['0000'], makeRules({ capacity: 3 }));
    for (let i = 0; i < 200; i++) {
      a.insert(Meme.random(space, rng));
      assert.ok(a.size >= 1 && a.size <= 3);
    }
    assert.strictEqual(a.size, 3);
  });
});

describe('getDominant', () => {
  it('should pick the lowest entropy under the fidelity policy', () => {
    assert.strictEqual(agent(['0011', '0111', '1111'], makeRules({ capacity: 3 })).getDominant().key(), '1111');
  });

  it('should pick the highest combined score under the utility policy', () => {
    const s = makeSpace({ utilityPatterns: [[0, 1, 0, 1]] });
    const a = agent(['0000', '0101', '0100'], makeRules({ capacity: 3, policy: utilityPolicy(1, 0) }), s);
    assert.strictEqual(a.getDominant().key(), '0101');
  });
});

describe('rehearsal / receiveMeme', () => {
  it('should copy a drawn pool member with the internal rate', () => {
    const a = agent(['0000', '1111'], makeRules({ capacity: 3 }));
    const { rng, calls } = scriptedRandom([1]);
    a.rehearsal(rng);
    assert.deepStrictEqual(poolKeys(a), ['0000', '1111', '1111']);
    assert.strictEqual(a.memes()[2].age, 0);
    assert.deepStrictEqual(calls, { next: 4, int: 1 });
  });

  it('should copy the source with the external rate', () => {
    const a = agent(['0000'], makeRules({ capacity: 2, externalRate: 1 }));
    const source = Meme.create([0, 0, 1, 1], space, 7);
    a.receiveMeme(source, createRandom(5));
    assert.deepStrictEqual(poolKeys(a), ['0000', '1100']);
    assert.strictEqual(source.key(), '0011');
    assert.strictEqual(source.age, 7);
  });

  it('should not use the internal rate for reception', () => {
    const a = agent(['0000'], makeRules({ capacity: 2, internalRate: 1 }));
    a.receiveMeme(Meme.create([0, 0, 1, 1], space), createRandom(5));
    assert.deepStrictEqual(poolKeys(a), ['0000', '0011']);
  });
});

describe('ageAll / snapshotCopy', () => {
  it('should age every member', () => {
    const a = agent(['0000', '0001'], makeRules({ capacity: 2 }));
    a.ageAll();
    a.ageAll();
    assert.deepStrictEqual(a.memes().map(m => m.age), [2, 2]);
  });

  it('should deep copy the pool', () => {
    const a = agent(['0000', '0001'], makeRules({ capacity: 2 }));
    a.ageAll();
    const copy = a.snapshotCopy();

    assert.strictEqual(copy.x, a.x);
    assert.strictEqual(copy.y, a.y);
    assert.deepStrictEqual(poolKeys(copy), poolKeys(a));
    assert.deepStrictEqual(copy.memes().map(m => m.age), [1, 1]);
    for (let i = 0; i < a.size; i++) assert.notStrictEqual(copy.memes()[i], a.memes()[i]);

    copy.ageAll();
    copy.insert(Meme.create([1, 1, 1, 1], space));
    assert.deepStrictEqual(poolKeys(a), ['0000', '0001']);
    assert.deepStrictEqual(a.memes().map(m => m.age), [1, 1]);
  });
});

describe('poolStats', () => {
  it('should summarize the pool', () => {
    const a = agent(['0000', '0011'], makeRules({ capacity: 2 }));
    const s = a.poolStats();
    assert.strictEqual(s.poolSize, 2);
    assert.strictEqual(s.avgComplexity, 0.25);
    assert.strictEqual(s.minComplexity, 0);
    assert.strictEqual(s.maxComplexity, 0.5);
    assert.strictEqual(s.avgUtility, 0);
    assert.strictEqual(s.avgAge, 0);
    assert.strictEqual(s.dominantComplexity, 0);
  });
});
