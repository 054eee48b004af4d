// src/config.ts
import { readFileSync } from 'node:fs';
import { ConfigurationError, EmptyPoolViolationError, InvalidPatternError } from './errors.ts';
import { checkPattern } from './meme.ts';
import { utilityPolicy } from './policy.ts';
import type { Bit, MemeSpace, PoolRules, UserConfig } from './types.ts';

export const baseConfig: UserConfig = {
  gridSize: 30,
  memeLength: 16,

  poolCapacity: 5,

  internalRate: 0.1,
  externalRate: 0.5,
  mutationScale: 0.5,

  policy: utilityPolicy(0.5, 0.5),
  utilityPatterns: [],
  injectPatterns: [],

  seed: 42,
};

function requireInt(name: string, v: number, min: number) {
  if (!Number.isInteger(v) || v < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got ${v}`);
  }
}

function requireRate(name: string, v: number) {
  if (!Number.isFinite(v) || v < 0) {
    throw new ConfigurationError(`${name} must be a finite number >= 0, got ${v}`);
  }
}

/** Throws on the first bad field; returns the config unchanged otherwise. */
export function validateConfig(config: UserConfig): UserConfig {
  if (!Number.isInteger(config.poolCapacity) || config.poolCapacity < 1) {
    throw new EmptyPoolViolationError(`poolCapacity must be >= 1, got ${config.poolCapacity}`);
  }
  // fewer than 3 cells per side would make Moore neighbours repeat
  requireInt('gridSize', config.gridSize, 3);
  // log2(L) is the complexity normaliser
  requireInt('memeLength', config.memeLength, 2);

  requireRate('internalRate', config.internalRate);
  requireRate('externalRate', config.externalRate);
  requireRate('mutationScale', config.mutationScale);

  const { policy } = config;
  if (policy.kind === 'utility') {
    if (!Number.isFinite(policy.alpha) || !Number.isFinite(policy.beta)) {
      throw new ConfigurationError(`utility weights must be finite, got alpha=${policy.alpha} beta=${policy.beta}`);
    }
  }

  config.utilityPatterns.forEach((p, i) => {
    try {
      checkPattern(p, config.memeLength);
    } catch (e) {
      throw new InvalidPatternError(`utilityPatterns[${i}]: ${e instanceof Error ? e.message : String(e)}`);
    }
  });
  (config.injectPatterns ?? []).forEach((p, i) => {
    try {
      checkPattern(p, config.memeLength);
    } catch (e) {
      throw new InvalidPatternError(`injectPatterns[${i}]: ${e instanceof Error ? e.message : String(e)}`);
    }
  });

  if (!Number.isFinite(config.seed)) {
    throw new ConfigurationError(`seed must be finite, got ${config.seed}`);
  }
  return config;
}

export function buildModel(config: UserConfig): { space: MemeSpace; rules: PoolRules } {
  const utilityPatterns: Bit[][] = config.utilityPatterns.map(p => checkPattern(p, config.memeLength));
  const space: MemeSpace = {
    length: config.memeLength,
    utilityPatterns,
    mutationScale: config.mutationScale,
  };
  const rules: PoolRules = {
    capacity: config.poolCapacity,
    policy: config.policy,
    internalRate: config.internalRate,
    externalRate: config.externalRate,
  };
  return { space, rules };
}

// ------------------------------
// pattern files
// ------------------------------
export interface PatternFile {
  utilityPatterns: number[][];
  injectPatterns: number[][];
}

function isPatternList(v: unknown): v is number[][] {
  return Array.isArray(v) && v.every(p => Array.isArray(p) && p.every(b => typeof b === 'number'));
}

/**
 * Accepts `{ "utilityPatterns": [...], "injectPatterns": [...] }` or a bare
 * array (used as utility patterns). Bit values are checked later against L.
 */
export function parsePatternFile(raw: unknown): PatternFile {
  if (isPatternList(raw)) return { utilityPatterns: raw, injectPatterns: [] };
  if (typeof raw !== 'object' || raw === null) {
    throw new ConfigurationError('pattern file must be an array or an object');
  }
  const utility: unknown = 'utilityPatterns' in raw ? raw.utilityPatterns : [];
  const inject: unknown = 'injectPatterns' in raw ? raw.injectPatterns : [];
  if (!isPatternList(utility)) throw new ConfigurationError('utilityPatterns must be an array of number arrays');
  if (!isPatternList(inject)) throw new ConfigurationError('injectPatterns must be an array of number arrays');
  return { utilityPatterns: utility, injectPatterns: inject };
}

export function loadPatternFile(path: string): PatternFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`cannot read pattern file ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parsePatternFile(raw);
}
