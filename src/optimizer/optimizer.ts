/**
 * Alpha Optimizer
 *
 * Greedy local search over validator-accepted mutants. A mutant replaces
 * the current best only when it validates cleanly and scores strictly
 * higher, so the result is never worse than the input.
 */

import type { Catalog } from '../catalog/catalog.js';
import { OptimizationError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { SeededRandom, randomSeed } from '../generator/random.js';
import type { AlphaCandidate } from '../types/index.js';
import type { AlphaValidator } from '../validator/validator.js';
import { MUTATIONS, mutate } from './mutations.js';
import { scoreExpression, type ScoreWeights } from './score.js';
import { DEFAULT_SEARCH_CONFIG, type Mutation, type OptimizationResult, type SearchConfig, type StopReason } from './types.js';

export interface OptimizerOptions extends Partial<SearchConfig> {
  weights?: ScoreWeights;
  mutations?: readonly Mutation[];
  logger?: Logger;
}

/**
 * FNV-1a hash of the candidate id, xor'd with the base seed.
 */
function searchSeed(baseSeed: number, id: string): number {
  let hash = 0x811c9dc5;
  for (let idx = 0; idx < id.length; idx++) {
    hash = Math.imul(hash ^ id.charCodeAt(idx), 0x01000193);
  }
  return (hash ^ baseSeed) >>> 0;
}

export class AlphaOptimizer {
  private readonly config: SearchConfig;
  private readonly baseSeed: number;
  private readonly weights: ScoreWeights | undefined;
  private readonly mutations: readonly Mutation[];
  private readonly logger: Logger;

  constructor(
    private readonly catalog: Catalog,
    private readonly validator: AlphaValidator,
    options: OptimizerOptions = {}
  ) {
    this.config = {
      iterations: options.iterations ?? DEFAULT_SEARCH_CONFIG.iterations,
      patience: options.patience ?? DEFAULT_SEARCH_CONFIG.patience,
      retriesPerIteration: options.retriesPerIteration ?? DEFAULT_SEARCH_CONFIG.retriesPerIteration,
      seed: options.seed,
    };
    this.baseSeed = options.seed ?? randomSeed();
    this.weights = options.weights;
    this.mutations = options.mutations ?? MUTATIONS;
    this.logger = options.logger ?? new Logger('info');
  }

  optimize(candidate: AlphaCandidate, iterations: number = this.config.iterations): AlphaCandidate {
    return this.search(candidate, iterations).best;
  }

  optimizeBatch(candidates: Iterable<AlphaCandidate>, iterations: number = this.config.iterations): AlphaCandidate[] {
    return Array.from(candidates, (candidate) => this.optimize(candidate, iterations));
  }

  /**
   * Hill-climb from `candidate` for at most `iterations` rounds. Repeated
   * calls with the same candidate and budget take the same path.
   */
  search(candidate: AlphaCandidate, iterations: number = this.config.iterations): OptimizationResult {
    if (!Number.isInteger(iterations) || iterations < 0) {
      throw new OptimizationError(`Iterations must be a non-negative integer, got ${iterations}`, candidate.id);
    }
    const initialReport = this.validator.validate(candidate);
    if (!initialReport.accepted) {
      const reasons = initialReport.violations.map((v) => `${v.ruleId}: ${v.reason}`).join('; ');
      throw new OptimizationError(`Cannot optimize rejected candidate ${candidate.id}: ${reasons}`, candidate.id);
    }

    const rng = new SeededRandom(searchSeed(this.baseSeed, candidate.id));
    const initialScore = this.score(candidate);
    let best: AlphaCandidate = { ...candidate, score: initialScore };
    const stats: OptimizationResult['stats'] = {
      mutantsGenerated: 0,
      mutantsRejected: 0,
      improvements: 0,
      mutationUsage: { swap_field: 0, swap_operator: 0, adjust_window: 0 },
      scoreHistory: [initialScore],
    };

    let round = 0;
    let stale = 0;
    let stopReason: StopReason = 'max_iterations';

    while (round < iterations) {
      round++;
      let improved = false;

      for (let attempt = 0; attempt < this.config.retriesPerIteration; attempt++) {
        const mutant = mutate(best.root, this.catalog, rng, this.mutations);
        if (!mutant) break;
        stats.mutantsGenerated++;
        stats.mutationUsage[mutant.type]++;

        const report = this.validator.validateTree(mutant.root, best.tier);
        if (!report.accepted) {
          stats.mutantsRejected++;
          continue;
        }

        const score = this.score({ ...best, root: mutant.root });
        if (score > best.score) {
          this.logger.debug(`${candidate.id} round ${round}: ${mutant.type} ${best.score} -> ${score}`);
          best = { ...best, root: mutant.root, score };
          stats.improvements++;
          improved = true;
        }
        break;
      }

      stats.scoreHistory.push(best.score);
      stale = improved ? 0 : stale + 1;
      if (stale >= this.config.patience) {
        stopReason = 'no_improvement';
        break;
      }
    }

    this.logger.info(
      `Optimized ${candidate.id}: ${initialScore} -> ${best.score} in ${round} round(s) (${stopReason})`
    );

    return {
      best: this.validator.review(best),
      initialScore,
      iterations: round,
      stopReason,
      stats,
    };
  }

  private score(candidate: AlphaCandidate): number {
    return scoreExpression(candidate.root, this.catalog, this.weights).total;
  }
}
