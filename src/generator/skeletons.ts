/**
 * Expression Skeletons
 *
 * Structural templates the generator draws from. Basic skeletons apply one
 * operator to field references; creative skeletons combine 2–4 basic
 * sub-expressions under arithmetic combinators.
 */

import type { Catalog, OperatorQuery } from '../catalog/catalog.js';
import type { Domain, WindowRange } from '../catalog/types.js';
import { childCount } from '../catalog/types.js';
import { LITERAL_DOMAIN } from '../expression/domain.js';
import { apply, fieldRef, literal, type ExpressionNode } from '../expression/types.js';
import type { FieldPicker } from './fields.js';
import type { SeededRandom } from './random.js';

export type SkeletonTier = 'basic' | 'creative';

export interface LiteralRange {
  min: number;
  max: number;
}

export interface BuildContext {
  catalog: Catalog;
  rng: SeededRandom;
  fields: FieldPicker;
  /** Range the blend weight of `weighted_blend` is drawn from */
  literalRange: LiteralRange;
  /** Draw a basic sub-expression whose output is one of `target`. */
  sub(target: readonly Domain[]): ExpressionNode;
}

export interface Skeleton {
  id: string;
  tier: SkeletonTier;
  /** Base selection weight before recency weighting */
  weight: number;
  build(ctx: BuildContext, target: readonly Domain[]): ExpressionNode;
}

/**
 * The catalog has nothing that fits a skeleton slot.
 */
export class SkeletonUnavailableError extends Error {
  constructor(
    public readonly skeletonId: string,
    detail: string
  ) {
    super(`Skeleton "${skeletonId}" unavailable: ${detail}`);
    this.name = 'SkeletonUnavailableError';
  }
}

type ArgBuilder = (slot: readonly Domain[]) => ExpressionNode;

const COMBINE: OperatorQuery = { arity: 'binary', category: 'arithmetic' };
const ADDITIVE: OperatorQuery = { arity: 'binary', category: 'arithmetic', tag: 'additive' };
const MULTIPLICATIVE: OperatorQuery = { arity: 'binary', category: 'arithmetic', tag: 'multiplicative' };
const CROSS_SECTIONAL: OperatorQuery = { arity: 'unary', category: 'cross_sectional' };
const SMOOTHING: OperatorQuery = { arity: 'windowed', category: 'time_series', tag: 'smoothing' };

/** Look-back cap for freshly drawn windows. */
const MAX_INITIAL_WINDOW = 60;

export function pickWindow(rng: SeededRandom, range: WindowRange): number {
  const upper = Math.max(range.min, Math.min(range.max, MAX_INITIAL_WINDOW));
  return rng.int(range.min, upper);
}

/**
 * Apply an operator matching `query` whose output fits `target`, building
 * each argument with the matching builder.
 */
function call(
  skeletonId: string,
  ctx: BuildContext,
  target: readonly Domain[],
  query: OperatorQuery,
  args: ArgBuilder[]
): ExpressionNode {
  const ops = ctx.catalog
    .compatibleOperators({ ...query, output: [...target] })
    .filter((op) => childCount(op.arity) === args.length);
  if (ops.length === 0) {
    throw new SkeletonUnavailableError(skeletonId, `no operator for ${JSON.stringify(query)} producing ${target.join('|')}`);
  }
  const op = ctx.rng.pick(ops);
  const children = op.inputs.map((slot, idx) => {
    const build = args[idx];
    if (!build) throw new SkeletonUnavailableError(skeletonId, `missing argument ${idx} for ${op.id}`);
    return build(slot);
  });
  return apply(op.id, children, op.window ? pickWindow(ctx.rng, op.window) : undefined);
}

/**
 * Basic skeletons share one weight; only recency separates them.
 */
function basicSkeleton(id: string, query: OperatorQuery): Skeleton {
  return {
    id,
    tier: 'basic',
    weight: 1,
    build(ctx, target) {
      const ops = ctx.catalog
        .compatibleOperators({ ...query, output: [...target] })
        .filter((op) => op.inputs.every((slot) => ctx.fields.canSupply(slot)));
      if (ops.length === 0) {
        throw new SkeletonUnavailableError(id, `no field-fed operator producing ${target.join('|')}`);
      }
      const op = ctx.rng.pick(ops);
      const used: string[] = [];
      const children = op.inputs.map((slot) => {
        const field = ctx.fields.pick(slot, used);
        used.push(field);
        return fieldRef(field);
      });
      return apply(op.id, children, op.window ? pickWindow(ctx.rng, op.window) : undefined);
    },
  };
}

function creativeSkeleton(
  id: string,
  weight: number,
  shape: (ctx: BuildContext, target: readonly Domain[], s: ArgBuilder) => ExpressionNode
): Skeleton {
  return {
    id,
    tier: 'creative',
    weight,
    build(ctx, target) {
      return shape(ctx, target, (slot) => ctx.sub(slot));
    },
  };
}

export const BASIC_SKELETONS: readonly Skeleton[] = [
  basicSkeleton('cross_rank', CROSS_SECTIONAL),
  basicSkeleton('ts_window', SMOOTHING),
  basicSkeleton('lagged', { arity: 'windowed', category: 'time_series', tag: 'lag' }),
  basicSkeleton('ratio', MULTIPLICATIVE),
  basicSkeleton('spread', ADDITIVE),
  basicSkeleton('transform', { arity: 'unary', category: 'transform' }),
];

export const CREATIVE_SKELETONS: readonly Skeleton[] = [
  creativeSkeleton('pair', 3, (ctx, target, s) => call('pair', ctx, target, COMBINE, [s, s])),

  creativeSkeleton('ranked_pair', 3, (ctx, target, s) =>
    call('ranked_pair', ctx, target, CROSS_SECTIONAL, [
      (slot) => call('ranked_pair', ctx, slot, COMBINE, [s, s]),
    ])
  ),

  creativeSkeleton('smoothed_pair', 2, (ctx, target, s) =>
    call('smoothed_pair', ctx, target, SMOOTHING, [
      (slot) => call('smoothed_pair', ctx, slot, COMBINE, [s, s]),
    ])
  ),

  creativeSkeleton('chain3', 2, (ctx, target, s) =>
    call('chain3', ctx, target, COMBINE, [(slot) => call('chain3', ctx, slot, COMBINE, [s, s]), s])
  ),

  creativeSkeleton('balanced4', 2, (ctx, target, s) =>
    call('balanced4', ctx, target, COMBINE, [
      (slot) => call('balanced4', ctx, slot, COMBINE, [s, s]),
      (slot) => call('balanced4', ctx, slot, COMBINE, [s, s]),
    ])
  ),

  creativeSkeleton('weighted_blend', 2, (ctx, target, s) => {
    const weight = Number(ctx.rng.uniform(ctx.literalRange.min, ctx.literalRange.max).toFixed(2));
    const weightArg = (value: number): ArgBuilder => (slot) => {
      if (!slot.includes(LITERAL_DOMAIN)) {
        throw new SkeletonUnavailableError('weighted_blend', 'multiplier does not accept literals');
      }
      return literal(value);
    };
    return call('weighted_blend', ctx, target, ADDITIVE, [
      (slot) => call('weighted_blend', ctx, slot, MULTIPLICATIVE, [s, weightArg(weight)]),
      (slot) => call('weighted_blend', ctx, slot, MULTIPLICATIVE, [s, weightArg(Number((1 - weight).toFixed(2)))]),
    ]);
  }),

  creativeSkeleton('ranked_chain3', 1, (ctx, target, s) =>
    call('ranked_chain3', ctx, target, CROSS_SECTIONAL, [
      (slot) =>
        call('ranked_chain3', ctx, slot, COMBINE, [(inner) => call('ranked_chain3', ctx, inner, COMBINE, [s, s]), s]),
    ])
  ),
];
