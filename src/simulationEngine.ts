// src/simulationEngine.ts
import type { Agent } from './agent.ts';
import { buildModel, validateConfig } from './config.ts';
import { Grid } from './grid.ts';
import { EngineBusyError } from './errors.ts';
import { createLogger, type Logger } from './logger.ts';
import { describePolicy } from './policy.ts';
import { createRandom, pick, type RandomSource } from './random.ts';
import type { Bit, EngineState, GridStatistics, UserConfig } from './types.ts';

export interface EngineOptions {
  logger?: Logger;
}

/**
 * Drives generations. Per step:
 *   1. internal phase, in place, canonical order: rehearsal then ageAll
 *   2. external phase, double buffered: copies of every agent receive the
 *      dominant meme of a random neighbour looked up on the *old* grid, then
 *      the whole copy list is published with one replaceAll
 *   3. generation += 1, statistics recomputed
 *
 * Draw schedule (single stream, canonical order x outer / y inner):
 *   phase 1, per agent: int(|pool|), then L bit draws
 *   phase 2, per agent: int(8), then L bit draws
 */
export class SimulationEngine {
  private readonly grid: Grid;
  private readonly rng: RandomSource;
  private readonly log: Logger;

  private generation = 0;
  private state: EngineState = 'idle';
  private stats: GridStatistics;

  constructor(grid: Grid, rng: RandomSource, opts: EngineOptions = {}) {
    this.grid = grid;
    this.rng = rng;
    this.log = opts.logger ?? createLogger('engine');
    this.stats = grid.aggregateStatistics();
  }

  /** Seeded rng, random grid, then the configured seed patterns. */
  static create(config: UserConfig, opts: EngineOptions = {}): SimulationEngine {
    validateConfig(config);
    const { space, rules } = buildModel(config);
    const rng = createRandom(config.seed);
    const grid = Grid.initializeRandom(config.gridSize, space, rules, rng);
    for (const p of config.injectPatterns ?? []) grid.injectPattern(p, rng);

    const engine = new SimulationEngine(grid, rng, opts);
    engine.log.debug(
      `grid ${config.gridSize}x${config.gridSize} L=${config.memeLength} K=${config.poolCapacity} ` +
      `${describePolicy(config.policy)} seed=${config.seed} injected=${config.injectPatterns?.length ?? 0}`
    );
    return engine;
  }

  getGeneration() {
    return this.generation;
  }

  getState(): EngineState {
    return this.state;
  }

  getGrid(): Grid {
    return this.grid;
  }

  getStatistics(): GridStatistics {
    return this.stats;
  }

  dominantPatterns(): (readonly Bit[])[] {
    return this.grid.dominantPatterns();
  }

  step(): GridStatistics {
    if (this.state !== 'idle') {
      throw new EngineBusyError(`step() called while ${this.state} (generation=${this.generation})`);
    }
    this.state = 'stepping';
    try {
      this.internalPhase();
      this.externalPhase();
      this.generation++;
      this.stats = this.grid.aggregateStatistics();
    } finally {
      this.state = 'idle';
    }

    if (this.log.isEnabled('debug')) {
      const s = this.stats;
      const parts = [
        `gen ${this.generation}:`,
        `avg_C=${s.dominantComplexity.mean.toFixed(4)}`,
        s.dominantUtility ? `avg_U=${s.dominantUtility.mean.toFixed(4)}` : `min_C=${s.dominantComplexity.min.toFixed(4)}`,
        s.dominantScore ? `avg_S=${s.dominantScore.mean.toFixed(4)}` : `max_C=${s.dominantComplexity.max.toFixed(4)}`,
        `diversity=${s.diversity.toFixed(3)}`,
        `unique=${s.uniquePatterns}`,
      ];
      this.log.debug(parts.join(' '));
    }
    return this.stats;
  }

  /** Steps `generations` times; the callback sees each generation's statistics. */
  run(generations: number, onStep?: (generation: number, stats: GridStatistics) => void): GridStatistics {
    for (let g = 0; g < generations; g++) {
      const s = this.step();
      onStep?.(this.generation, s);
    }
    return this.stats;
  }

  // agents only touch their own pools here
  private internalPhase() {
    const trace = this.log.isEnabled('debug');
    for (const agent of this.grid.allAgents()) {
      agent.rehearsal(this.rng);
      agent.ageAll();
      if (trace) {
        const p = agent.poolStats();
        this.log.debug(
          `${agent.label()} rehearsed: pool=${p.poolSize} avg_C=${p.avgComplexity.toFixed(3)} ` +
          `avg_U=${p.avgUtility.toFixed(3)} dom_C=${p.dominantComplexity.toFixed(3)} avg_age=${p.avgAge.toFixed(2)}`
        );
      }
    }
  }

  private externalPhase() {
    const trace = this.log.isEnabled('debug');
    const old = this.grid;
    const next: Agent[] = old.allAgents().map(a => a.snapshotCopy());

    for (const agent of next) {
      const neighbour = pick(this.rng, old.mooreNeighbors(agent.x, agent.y));
      const copy = agent.receiveMeme(neighbour.getDominant(), this.rng);
      if (trace) {
        this.log.debug(
          `${agent.label()} <- ${neighbour.label()}: copied meme ` +
          `C=${copy.complexity().toFixed(3)}, U=${copy.utility().toFixed(3)}`
        );
      }
    }

    old.replaceAll(next);
  }
}
