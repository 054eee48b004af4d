// src/runner.ts
// Headless batch runs: seeds x policies, per-generation statistics, and a
// cross-seed summary of the final generation.
import { flattenStatistics } from './grid.ts';
import { parseLogLevel, type LogLevel } from './logger.ts';
import { fidelityPolicy, utilityPolicy } from './policy.ts';
import { SimulationEngine } from './simulationEngine.ts';
import { bootstrapCI, hedgesG, mean, sd } from './stats.ts';
import type { PolicyKind, SelectionPolicy, UserConfig } from './types.ts';
import { ConfigurationError } from './errors.ts';
import type { PatternFile } from './config.ts';

export type Job = {
  jobId: number;
  seed: number;
  generations: number;
  conf: UserConfig;
};

export type GenerationRow = {
  generation: number;
  values: Record<string, number>;
};

export type JobResult = {
  jobId: number;
  seed: number;
  policy: PolicyKind;
  rows: GenerationRow[];
};

export type RunnerOptions = {
  conf: UserConfig;
  policies: SelectionPolicy[];
  seeds: number[];
  generations: number;
  workers: number;
  outDir: string;
  logLevel: LogLevel;
  timestamps: boolean;
};

export type SummaryRow = {
  group: string;
  metric: string;
  n: number;
  mean: number;
  sd: number;
  ciLo: number;
  ciHi: number;
  hedgesG: number | null;
};

// ------------------------------
// args
// ------------------------------
// --key value, --key=value, or a bare --flag (read as "true"); stray words are skipped
export function parseArgs(argv: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  let pending: string | null = null;
  for (const token of argv) {
    if (token.startsWith('--')) {
      if (pending !== null) out[pending] = 'true';
      const eq = token.indexOf('=');
      if (eq > 2) {
        out[token.slice(2, eq)] = token.slice(eq + 1);
        pending = null;
      } else {
        pending = token.slice(2);
      }
    } else if (pending !== null) {
      out[pending] = token;
      pending = null;
    }
  }
  if (pending !== null) out[pending] = 'true';
  return out;
}

export function numberOption(
  args: Record<string, string>,
  name: string,
  fallback: number,
  opts: { integer?: boolean; min?: number } = {}
): number {
  const raw = args[name];
  if (raw === undefined) return fallback;
  const v = raw.trim() === '' ? NaN : Number(raw);
  if (!Number.isFinite(v)) throw new ConfigurationError(`--${name} expects a number, got "${raw}"`);
  if (opts.integer && !Number.isInteger(v)) throw new ConfigurationError(`--${name} expects an integer, got "${raw}"`);
  if (opts.min !== undefined && v < opts.min) throw new ConfigurationError(`--${name} must be >= ${opts.min}, got ${v}`);
  return v;
}

export function flagOption(args: Record<string, string>, name: string, fallback: boolean): boolean {
  const raw = args[name];
  if (raw === undefined) return fallback;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new ConfigurationError(`--${name} expects true or false, got "${raw}"`);
}

// "5" -> seedBase..seedBase+4, "1,7,9" -> those seeds
export function parseSeedsSpec(spec: string | undefined, seedBase: number, fallbackCount: number) {
  const range = (n: number) => Array.from({ length: n }, (_, k) => seedBase + k);
  if (!spec) return range(fallbackCount);

  const trimmed = spec.trim();
  if (trimmed.includes(',')) {
    return trimmed.split(',').map(x => x.trim()).filter(Boolean)
      .map(p => Number(p)).filter(v => Number.isFinite(v)).map(v => Math.floor(v));
  }
  const n = Number(trimmed);
  if (Number.isInteger(n) && n > 0) return range(n);
  return range(fallbackCount);
}

function parsePolicies(name: string, alpha: number, beta: number): SelectionPolicy[] {
  switch (name) {
    case 'fidelity': return [fidelityPolicy()];
    case 'utility': return [utilityPolicy(alpha, beta)];
    case 'both': return [fidelityPolicy(), utilityPolicy(alpha, beta)];
    default: throw new ConfigurationError(`unknown policy "${name}" (fidelity|utility|both)`);
  }
}

export function parseRunnerOptions(
  args: Record<string, string>,
  base: UserConfig,
  patterns: PatternFile,
  defaultWorkers: number
): RunnerOptions {
  const alpha = numberOption(args, 'alpha', base.policy.kind === 'utility' ? base.policy.alpha : 0.5);
  const beta = numberOption(args, 'beta', base.policy.kind === 'utility' ? base.policy.beta : 0.5);
  const policies = parsePolicies(args.policy ?? base.policy.kind, alpha, beta);

  const inject = flagOption(args, 'inject', false);
  const conf: UserConfig = {
    ...base,
    gridSize: numberOption(args, 'gridSize', base.gridSize),
    memeLength: numberOption(args, 'memeLength', base.memeLength),
    poolCapacity: numberOption(args, 'pool', base.poolCapacity),
    internalRate: numberOption(args, 'muInternal', base.internalRate),
    externalRate: numberOption(args, 'muExternal', base.externalRate),
    mutationScale: numberOption(args, 'k', base.mutationScale),
    policy: policies[0],
    utilityPatterns: patterns.utilityPatterns,
    // --inject drops the utility patterns too when the file names no seeds
    injectPatterns: inject
      ? (patterns.injectPatterns.length ? patterns.injectPatterns : patterns.utilityPatterns)
      : [],
  };

  const seedBase = numberOption(args, 'seedBase', base.seed, { integer: true });
  const seeds = parseSeedsSpec(args.seeds, seedBase, 1);
  if (seeds.length === 0) throw new ConfigurationError(`no usable seeds in "${args.seeds}"`);

  const logLevel = parseLogLevel(args.logLevel ?? 'info');
  if (!logLevel) throw new ConfigurationError(`unknown log level "${args.logLevel}"`);

  const outDirRaw = (args.outDir ?? 'out').trim();

  return {
    conf,
    policies,
    seeds,
    generations: numberOption(args, 'generations', 200, { integer: true, min: 0 }),
    workers: numberOption(args, 'workers', defaultWorkers, { integer: true, min: 1 }),
    outDir: outDirRaw.length ? outDirRaw : 'out',
    logLevel,
    timestamps: flagOption(args, 'timestamps', true),
  };
}

// ------------------------------
// jobs
// ------------------------------
export function buildJobs(opts: Pick<RunnerOptions, 'conf' | 'policies' | 'seeds' | 'generations'>): Job[] {
  const jobs: Job[] = [];
  let jobId = 0;
  for (const seed of opts.seeds) {
    for (const policy of opts.policies) {
      jobs.push({ jobId: jobId++, seed, generations: opts.generations, conf: { ...opts.conf, policy, seed } });
    }
  }
  return jobs;
}

function assertFiniteRow(row: GenerationRow, ctx: string) {
  for (const [k, v] of Object.entries(row.values)) {
    if (!Number.isFinite(v)) throw new Error(`NaN/Inf detected (${ctx}) ${k}=${v}`);
  }
}

// generation 0 (initial state) plus one row per step
export function runJob(job: Job): JobResult {
  const engine = SimulationEngine.create(job.conf);
  const rows: GenerationRow[] = [{ generation: 0, values: flattenStatistics(engine.getStatistics()) }];

  engine.run(job.generations, (generation, stats) => {
    const row = { generation, values: flattenStatistics(stats) };
    assertFiniteRow(row, `seed=${job.seed} policy=${job.conf.policy.kind} gen=${generation}`);
    rows.push(row);
  });

  return { jobId: job.jobId, seed: job.seed, policy: job.conf.policy.kind, rows };
}

// ------------------------------
// output
// ------------------------------
export function toCSV(headers: string[], rows: (string | number)[][]) {
  const h = headers.join(',');
  const body = rows.map(r => r.join(',')).join('\n');
  return h + '\n' + body + '\n';
}

function metricKeys(results: readonly JobResult[]) {
  const keys: string[] = [];
  const seen = new Set<string>();
  for (const r of results) {
    for (const row of r.rows) {
      for (const k of Object.keys(row.values)) {
        if (!seen.has(k)) {
          seen.add(k);
          keys.push(k);
        }
      }
    }
  }
  return keys;
}

export function timeseriesCSV(results: readonly JobResult[]) {
  const keys = metricKeys(results);
  const rows: (string | number)[][] = [];
  for (const r of results) {
    for (const row of r.rows) {
      rows.push([r.seed, r.policy, row.generation, ...keys.map(k => {
        const v = row.values[k];
        return v === undefined ? '' : v.toFixed(6);
      })]);
    }
  }
  return toCSV(['seed', 'policy', 'generation', ...keys], rows);
}

function finalValues(r: JobResult): Record<string, number> {
  return r.rows.length ? r.rows[r.rows.length - 1].values : {};
}

/**
 * Final-generation metrics across seeds, per policy. When both policies ran,
 * adds a `utility-fidelity` group of per-seed paired differences with
 * Hedges' g on the two samples.
 */
export function summarizeRuns(results: readonly JobResult[], B = 2000): SummaryRow[] {
  const out: SummaryRow[] = [];
  const keys = metricKeys(results);

  const byPolicy = new Map<PolicyKind, JobResult[]>();
  for (const r of results) {
    const list = byPolicy.get(r.policy) ?? [];
    list.push(r);
    byPolicy.set(r.policy, list);
  }

  for (const [policy, runs] of byPolicy) {
    for (const key of keys) {
      const xs = runs.map(finalValues).map(v => v[key]).filter((v): v is number => v !== undefined);
      if (xs.length === 0) continue;
      const ci = bootstrapCI(xs, mean, { resamples: B });
      out.push({ group: policy, metric: key, n: xs.length, mean: mean(xs), sd: sd(xs), ciLo: ci.lo, ciHi: ci.hi, hedgesG: null });
    }
  }

  const fid = byPolicy.get('fidelity');
  const uti = byPolicy.get('utility');
  if (fid && uti) {
    const fidBySeed = new Map(fid.map(r => [r.seed, finalValues(r)]));
    for (const key of keys) {
      const d: number[] = [];
      const a: number[] = [];
      const b: number[] = [];
      for (const r of uti) {
        const u = finalValues(r)[key];
        const f = fidBySeed.get(r.seed)?.[key];
        if (u === undefined || f === undefined) continue;
        d.push(u - f);
        a.push(u);
        b.push(f);
      }
      if (d.length === 0) continue;
      const ci = bootstrapCI(d, mean, { resamples: B });
      out.push({ group: 'utility-fidelity', metric: key, n: d.length, mean: mean(d), sd: sd(d), ciLo: ci.lo, ciHi: ci.hi, hedgesG: hedgesG(a, b) });
    }
  }
  return out;
}

export function summaryCSV(rows: readonly SummaryRow[]) {
  return toCSV(
    ['group', 'metric', 'n', 'mean', 'sd', 'ciLo', 'ciHi', 'hedgesG'],
    rows.map(r => [
      r.group, r.metric, r.n,
      r.mean.toFixed(6), r.sd.toFixed(6), r.ciLo.toFixed(6), r.ciHi.toFixed(6),
      r.hedgesG === null ? '' : r.hedgesG.toFixed(6),
    ])
  );
}

// 1h02m03s, 2m05s; n/a for unknown
export function formatDuration(ms: number) {
  if (!Number.isFinite(ms) || ms < 0) return 'n/a';
  const total = Math.floor(ms / 1000);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const sec = String(total % 60).padStart(2, '0');
  return h > 0 ? `${h}h${String(m).padStart(2, '0')}m${sec}s` : `${m}m${sec}s`;
}

export interface ProgressOptions {
  intervalMs?: number;
  out?: { write(chunk: string): unknown };
  now?: () => number;
}

/** One rewritten status line of finished jobs; ends with a newline once all are done. */
export class ProgressReporter {
  private readonly total: number;
  private readonly intervalMs: number;
  private readonly out: { write(chunk: string): unknown };
  private readonly now: () => number;
  private readonly started: number;
  private lastWrite = -Infinity;
  private closed = false;

  constructor(total: number, opts: ProgressOptions = {}) {
    this.total = total;
    this.intervalMs = opts.intervalMs ?? 200;
    this.out = opts.out ?? process.stderr;
    this.now = opts.now ?? Date.now;
    this.started = this.now();
  }

  update(done: number, force = false) {
    if (this.closed) return;
    const t = this.now();
    const complete = done >= this.total;
    if (!force && !complete && t - this.lastWrite < this.intervalMs) return;
    this.lastWrite = t;

    const elapsed = t - this.started;
    const pct = this.total > 0 ? (100 * done) / this.total : 100;
    const eta = done > 0 ? (elapsed / done) * (this.total - done) : NaN;
    this.out.write(
      `\rjobs ${done}/${this.total} (${pct.toFixed(1)}%) elapsed ${formatDuration(elapsed)} eta ${formatDuration(eta)}`
    );
    if (complete) {
      this.out.write('\n');
      this.closed = true;
    }
  }
}
