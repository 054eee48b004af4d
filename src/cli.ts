#!/usr/bin/env -S node --import tsx
// src/cli.ts
import { mkdirSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import { Worker, isMainThread, parentPort, workerData } from 'node:worker_threads';
import { baseConfig, loadPatternFile, validateConfig, type PatternFile } from './config.ts';
import { createLogger, parseLogLevel, setLogLevel, setLogTimestamps, type LogLevel } from './logger.ts';
import { describePolicy } from './policy.ts';
import {
  ProgressReporter,
  buildJobs,
  parseArgs,
  parseRunnerOptions,
  runJob,
  summarizeRuns,
  summaryCSV,
  timeseriesCSV,
  type Job,
  type JobResult,
} from './runner.ts';

const log = createLogger('runner');

// log settings handed to every worker at spawn
type WorkerSettings = { logLevel: LogLevel; timestamps: boolean };

type ToWorker = { type: 'job'; payload: Job } | { type: 'shutdown' };

type FromWorker =
  | { type: 'result'; payload: JobResult }
  | { type: 'error'; payload: { jobId: number; message: string; stack: string } };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function isJobResult(v: unknown): v is JobResult {
  return isRecord(v) && typeof v.jobId === 'number' && typeof v.seed === 'number'
    && (v.policy === 'fidelity' || v.policy === 'utility') && Array.isArray(v.rows);
}

function isFromWorker(msg: unknown): msg is FromWorker {
  if (!isRecord(msg) || !isRecord(msg.payload)) return false;
  if (msg.type === 'result') return isJobResult(msg.payload);
  return msg.type === 'error' && typeof msg.payload.jobId === 'number';
}

function isToWorker(msg: unknown): msg is ToWorker {
  if (!isRecord(msg)) return false;
  if (msg.type === 'shutdown') return true;
  return msg.type === 'job' && isRecord(msg.payload) && typeof msg.payload.jobId === 'number';
}

async function runParallel(jobs: Job[], workers: number, settings: WorkerSettings): Promise<JobResult[]> {
  if (jobs.length === 0) return [];
  const n = Math.min(Math.max(1, Math.floor(workers)), jobs.length);

  const progress = new ProgressReporter(jobs.length);
  const results = new Map<number, JobResult>();
  let nextIdx = 0;
  let done = 0;

  await new Promise<void>((resolve, reject) => {
    const pool: Worker[] = [];
    let finished = false;

    const send = (w: Worker, msg: ToWorker) => w.postMessage(msg);

    const feed = (w: Worker) => {
      if (nextIdx < jobs.length) send(w, { type: 'job', payload: jobs[nextIdx++] });
      else send(w, { type: 'shutdown' });
    };

    const shutdownAll = () => {
      for (const w of pool) {
        w.terminate().catch((e: unknown) => log.warn(`terminate failed: ${String(e)}`));
      }
    };

    const fail = (err: unknown) => {
      if (finished) return;
      finished = true;
      progress.update(done, true);
      shutdownAll();
      reject(err instanceof Error ? err : new Error(String(err)));
    };

    const spawn = () => {
      const w = new Worker(new URL(import.meta.url), {
        argv: ['--worker'],
        execArgv: ['--import', 'tsx'],
        workerData: settings,
      });

      w.on('message', (msg: unknown) => {
        if (!isFromWorker(msg)) {
          fail(new Error('unexpected message from worker'));
          return;
        }
        if (msg.type === 'error') {
          const p = msg.payload;
          fail(new Error(`Worker job failed jobId=${p.jobId}: ${p.message}\n${p.stack}`));
          return;
        }
        results.set(msg.payload.jobId, msg.payload);
        done++;
        progress.update(done);
        feed(w);
        if (done === jobs.length && !finished) {
          finished = true;
          resolve();
        }
      });
      w.on('error', fail);
      w.on('exit', (code: number) => {
        if (code !== 0 && done < jobs.length) fail(new Error(`Worker exited with code ${code}`));
      });

      pool.push(w);
    };

    for (let i = 0; i < n; i++) spawn();
    for (const w of pool) feed(w);
  });

  progress.update(done, true);

  return jobs.map(j => {
    const r = results.get(j.jobId);
    if (!r) throw new Error(`Missing job result jobId=${j.jobId}`);
    return r;
  });
}

function runSequential(jobs: Job[]): JobResult[] {
  const progress = new ProgressReporter(jobs.length);
  const out: JobResult[] = [];
  for (const job of jobs) {
    out.push(runJob(job));
    progress.update(out.length);
  }
  progress.update(out.length, true);
  return out;
}

function applyWorkerSettings(data: unknown) {
  if (!isRecord(data)) return;
  const level = typeof data.logLevel === 'string' ? parseLogLevel(data.logLevel) : null;
  if (level) setLogLevel(level);
  if (typeof data.timestamps === 'boolean') setLogTimestamps(data.timestamps);
}

function workerLoop() {
  const port = parentPort;
  if (!port) throw new Error('worker has no parentPort');
  const data: unknown = workerData;
  applyWorkerSettings(data);

  port.on('message', (msg: unknown) => {
    if (!isToWorker(msg)) return;

    if (msg.type === 'shutdown') {
      port.close();
      return;
    }

    const job = msg.payload;
    try {
      const result: FromWorker = { type: 'result', payload: runJob(job) };
      port.postMessage(result);
    } catch (e) {
      const err = e instanceof Error ? e : new Error(String(e));
      const reply: FromWorker = {
        type: 'error',
        payload: { jobId: job.jobId, message: err.message, stack: err.stack ?? '' },
      };
      port.postMessage(reply);
    }
  });
}

function readPatterns(arg: string | undefined): PatternFile {
  if (arg === 'none') return { utilityPatterns: [], injectPatterns: [] };
  const path = arg ?? fileURLToPath(new URL('../data/patterns.json', import.meta.url));
  return loadPatternFile(path);
}

async function main() {
  const args = parseArgs(process.argv.slice(2).filter(a => a !== '--worker'));
  const defaultWorkers = Math.max(1, os.availableParallelism() - 1);
  const opts = parseRunnerOptions(args, baseConfig, readPatterns(args.patterns), defaultWorkers);
  setLogLevel(opts.logLevel);
  setLogTimestamps(opts.timestamps);

  for (const policy of opts.policies) validateConfig({ ...opts.conf, policy });

  const jobs = buildJobs(opts);
  log.info(
    `jobs=${jobs.length} (seeds=${opts.seeds.length}, policies=${opts.policies.map(describePolicy).join(' / ')}) ` +
    `generations=${opts.generations} grid=${opts.conf.gridSize} workers=${opts.workers}`
  );

  const results = opts.workers > 1 && jobs.length > 1
    ? await runParallel(jobs, opts.workers, { logLevel: opts.logLevel, timestamps: opts.timestamps })
    : runSequential(jobs);

  const outDir = opts.outDir;
  mkdirSync(outDir, { recursive: true });
  writeFileSync(`${outDir}/timeseries.csv`, timeseriesCSV(results), 'utf-8');
  writeFileSync(`${outDir}/summary.csv`, summaryCSV(summarizeRuns(results)), 'utf-8');
  writeFileSync(`${outDir}/meta.json`, JSON.stringify({
    conf: opts.conf,
    policies: opts.policies,
    seeds: opts.seeds,
    generations: opts.generations,
  }, null, 2), 'utf-8');

  log.info(`Done. Wrote ${outDir}/timeseries.csv ${outDir}/summary.csv ${outDir}/meta.json`);
}

if (!isMainThread && process.argv.includes('--worker')) {
  workerLoop();
} else {
  main().catch((e: unknown) => {
    log.error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  });
}
