/**
 * Heuristic alpha score.
 *
 * Deterministic, in [0, 1]. Rewards operator and data-source diversity, a
 * moderate depth, conventional look-back windows and root wrapping.
 */

import type { Catalog } from '../catalog/catalog.js';
import { depth, walk } from '../expression/tree.js';
import type { ExpressionNode } from '../expression/types.js';

/** Look-back periods (trading days) windows are pulled toward. */
export const COMMON_PERIODS = [5, 10, 20, 60, 120, 252] as const;

/** Delay-style windows inside this span count as conventional. */
const LAG_SPAN = { min: 1, max: 20 };

const IDEAL_DEPTH = 4;
const DEPTH_SPREAD = 4;
/** Distinct categories at which each diversity share saturates. */
const CATEGORY_TARGET = 3;

export interface ScoreWeights {
  diversity: number;
  robustness: number;
  normalizeBonus: number;
  neutralizeBonus: number;
}

export const DEFAULT_SCORE_WEIGHTS: ScoreWeights = {
  diversity: 0.45,
  robustness: 0.4,
  normalizeBonus: 0.075,
  neutralizeBonus: 0.075,
};

export interface ScoreBreakdown {
  total: number;
  diversity: number;
  robustness: number;
  bonus: number;
}

export function nearestPeriod(window: number): number {
  return COMMON_PERIODS.reduce<number>(
    (best, period) => (Math.abs(period - window) < Math.abs(best - window) ? period : best),
    COMMON_PERIODS[0]
  );
}

/**
 * The expression below any root normalize/neutralize wrapping.
 */
export function innerRoot(root: ExpressionNode, catalog: Catalog): ExpressionNode {
  let current = root;
  for (;;) {
    if (current.kind !== 'apply' || !catalog.getOperator(current.operator)?.role) return current;
    const child = current.children[0];
    if (!child) return current;
    current = child;
  }
}

export function scoreExpression(
  root: ExpressionNode,
  catalog: Catalog,
  weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS
): ScoreBreakdown {
  const diversity = diversityScore(root, catalog);
  const robustness = robustnessScore(root, catalog);
  const bonus = wrappingBonus(root, catalog, weights);
  const raw = weights.diversity * diversity + weights.robustness * robustness + bonus;
  return {
    total: round(Math.min(1, Math.max(0, raw))),
    diversity: round(diversity),
    robustness: round(robustness),
    bonus: round(bonus),
  };
}

function diversityScore(root: ExpressionNode, catalog: Catalog): number {
  const operatorCategories = new Set<string>();
  const fieldCategories = new Set<string>();

  for (const { node, path, parent } of walk(root)) {
    if (node.kind === 'apply') {
      const op = catalog.getOperator(node.operator);
      if (op && !op.role) operatorCategories.add(op.category);
    } else if (node.kind === 'field') {
      // group arguments of wrapping operators are not data sources
      const argIndex = path[path.length - 1] ?? 0;
      const wrapper = parent ? catalog.getOperator(parent.operator)?.role : undefined;
      if (wrapper && argIndex > 0) continue;
      const field = catalog.getField(node.field);
      if (field) fieldCategories.add(field.category);
    }
  }

  const operatorShare = Math.min(1, operatorCategories.size / CATEGORY_TARGET);
  const fieldShare = Math.min(1, fieldCategories.size / CATEGORY_TARGET);
  return 0.6 * operatorShare + 0.4 * fieldShare;
}

function robustnessScore(root: ExpressionNode, catalog: Catalog): number {
  const innerDepth = depth(innerRoot(root, catalog));
  const depthTerm = Math.max(0, 1 - Math.abs(innerDepth - IDEAL_DEPTH) / DEPTH_SPREAD);

  const windowTerms: number[] = [];
  for (const { node } of walk(root)) {
    if (node.kind !== 'apply' || node.window === undefined) continue;
    const op = catalog.getOperator(node.operator);
    if (op?.tags.includes('lag')) {
      windowTerms.push(node.window >= LAG_SPAN.min && node.window <= LAG_SPAN.max ? 1 : 0.5);
    } else {
      const period = nearestPeriod(node.window);
      windowTerms.push(Math.max(0, 1 - Math.abs(node.window - period) / period));
    }
  }
  const windowTerm =
    windowTerms.length === 0 ? 0.5 : windowTerms.reduce((sum, term) => sum + term, 0) / windowTerms.length;

  return 0.7 * depthTerm + 0.3 * windowTerm;
}

function wrappingBonus(root: ExpressionNode, catalog: Catalog, weights: ScoreWeights): number {
  if (root.kind !== 'apply') return 0;
  const rootRole = catalog.getOperator(root.operator)?.role;
  if (rootRole === 'neutralize') return weights.neutralizeBonus;
  if (rootRole !== 'normalize') return 0;

  const child = root.children[0];
  const childRole = child?.kind === 'apply' ? catalog.getOperator(child.operator)?.role : undefined;
  return weights.normalizeBonus + (childRole === 'neutralize' ? weights.neutralizeBonus : 0);
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}
