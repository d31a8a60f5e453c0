/**
 * Optimizer Types
 */

import type { Catalog } from '../catalog/catalog.js';
import type { ExpressionNode } from '../expression/types.js';
import type { SeededRandom } from '../generator/random.js';
import type { AlphaCandidate } from '../types/index.js';

// ============================================================================
// Mutations
// ============================================================================

export type MutationType = 'swap_field' | 'swap_operator' | 'adjust_window';

export interface Mutation {
  type: MutationType;
  /**
   * Mutated copy of `root`, or null when nothing in the tree can be
   * mutated this way. The input is never modified.
   */
  apply(root: ExpressionNode, catalog: Catalog, rng: SeededRandom): ExpressionNode | null;
}

// ============================================================================
// Search Config
// ============================================================================

export interface SearchConfig {
  /** Upper bound on rounds */
  iterations: number;
  /** Stop after this many consecutive rounds without improvement */
  patience: number;
  /** Mutants tried per round before the round counts as failed */
  retriesPerIteration: number;
  seed?: number;
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  iterations: 50,
  patience: 10,
  retriesPerIteration: 5,
};

// ============================================================================
// Search Results
// ============================================================================

export type StopReason = 'max_iterations' | 'no_improvement';

export interface OptimizationResult {
  best: AlphaCandidate;
  initialScore: number;
  iterations: number;
  stopReason: StopReason;
  stats: {
    mutantsGenerated: number;
    mutantsRejected: number;
    improvements: number;
    mutationUsage: Record<MutationType, number>;
    /** Best score after each round, starting with the input score */
    scoreHistory: number[];
  };
}
