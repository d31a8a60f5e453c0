/**
 * Alpha Generator
 *
 * Builds candidate expression trees from the catalog. Every tree is
 * domain-consistent by construction; the validator re-checks it anyway.
 */

import type { Catalog } from '../catalog/catalog.js';
import type { Domain, OperatorSpec } from '../catalog/types.js';
import { GenerationError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { apply, fieldRef, type ExpressionNode } from '../expression/types.js';
import { scoreExpression } from '../optimizer/score.js';
import { isGenerationTier, type AlphaCandidate, type GenerationTier } from '../types/index.js';
import { DEFAULT_MAX_FIELD_REPEATS } from '../validator/rules.js';
import { FieldPicker } from './fields.js';
import { SeededRandom, randomSeed } from './random.js';
import { SkeletonRotation } from './rotation.js';
import {
  BASIC_SKELETONS,
  CREATIVE_SKELETONS,
  SkeletonUnavailableError,
  type BuildContext,
  type LiteralRange,
  type Skeleton,
} from './skeletons.js';

export const DEFAULT_NEUTRALIZATION = 'industry';
export const DEFAULT_LITERAL_RANGE: LiteralRange = { min: 0.4, max: 0.6 };

/** Seeded dry runs per skeleton when checking what the catalog can build. */
const FEASIBILITY_PROBES = 8;
/** Full passes over the eligible skeletons before giving up on a candidate. */
const MAX_BUILD_ROUNDS = 10;

export interface GenerateOptions {
  seed?: number;
  /** Group field the optimize tier neutralizes against */
  neutralization?: string;
  maxFieldRepeats?: number;
  literalRange?: LiteralRange;
}

export interface GeneratorOptions {
  logger?: Logger;
}

interface GenerationPlan {
  tier: GenerationTier;
  count: number;
  seed: number;
  maxFieldRepeats: number;
  literalRange: LiteralRange;
  /** Domains the inner expression may produce */
  signal: readonly Domain[];
  skeletons: readonly Skeleton[];
  wrap?: { normalize: Readonly<OperatorSpec>; neutralize: Readonly<OperatorSpec>; group: string };
}

/**
 * Lazy, finite batch of candidates. Iterating it again replays the same
 * candidates from the fixed seed.
 */
export class CandidateSequence implements Iterable<AlphaCandidate> {
  constructor(
    private readonly plan: GenerationPlan,
    private readonly catalog: Catalog,
    private readonly logger: Logger
  ) {}

  get seed(): number {
    return this.plan.seed;
  }

  get count(): number {
    return this.plan.count;
  }

  get tier(): GenerationTier {
    return this.plan.tier;
  }

  toArray(): AlphaCandidate[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<AlphaCandidate> {
    const { plan, catalog } = this;
    const rng = new SeededRandom(plan.seed);
    const weights = new Map([...BASIC_SKELETONS, ...CREATIVE_SKELETONS].map((s) => [s.id, s.weight]));
    const baseWeight = (id: string): number => weights.get(id) ?? 1;
    const topRotation = new SkeletonRotation(
      plan.skeletons.map((s) => s.id),
      baseWeight,
      'strict'
    );
    const subRotation = new SkeletonRotation(
      BASIC_SKELETONS.map((s) => s.id),
      baseWeight,
      'soft'
    );

    for (let index = 0; index < plan.count; index++) {
      const fields = new FieldPicker(catalog, rng, plan.maxFieldRepeats);
      const ctx: BuildContext = {
        catalog,
        rng,
        fields,
        literalRange: plan.literalRange,
        sub: (target) => buildFrom(BASIC_SKELETONS, subRotation, ctx, target).root,
      };

      const { skeleton, root: inner } = buildFrom(plan.skeletons, topRotation, ctx, plan.signal);
      const root = plan.wrap
        ? apply(plan.wrap.normalize.id, [apply(plan.wrap.neutralize.id, [inner, fieldRef(plan.wrap.group)])])
        : inner;

      const candidate: AlphaCandidate = {
        id: `${plan.tier}-${plan.seed.toString(36)}-${index + 1}`,
        tier: plan.tier,
        skeletonId: skeleton.id,
        root,
        neutralization: plan.wrap?.group ?? 'none',
        normalization: plan.wrap?.normalize.id ?? 'none',
        score: scoreExpression(root, catalog).total,
        status: 'pending',
      };
      this.logger.debug(`Generated ${candidate.id} from skeleton ${skeleton.id}`);
      yield candidate;
    }
  }
}

export class AlphaGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly catalog: Catalog,
    options: GeneratorOptions = {}
  ) {
    this.logger = options.logger ?? new Logger('info');
  }

  /**
   * Plan a batch of `count` candidates of `tier`. Bad requests throw
   * GenerationError here, before any candidate exists.
   */
  generate(tier: string, count: number, options: GenerateOptions = {}): CandidateSequence {
    if (!isGenerationTier(tier)) {
      throw new GenerationError(`Unknown generation tier "${tier}" (expected basic, creative or optimize)`);
    }
    if (!Number.isInteger(count) || count < 1) {
      throw new GenerationError(`Count must be an integer >= 1, got ${count}`);
    }
    const maxFieldRepeats = options.maxFieldRepeats ?? DEFAULT_MAX_FIELD_REPEATS;
    if (!Number.isInteger(maxFieldRepeats) || maxFieldRepeats < 1) {
      throw new GenerationError(`maxFieldRepeats must be an integer >= 1, got ${maxFieldRepeats}`);
    }
    const literalRange = options.literalRange ?? DEFAULT_LITERAL_RANGE;
    if (!(literalRange.min > 0 && literalRange.min <= literalRange.max && literalRange.max < 1)) {
      throw new GenerationError(`literalRange must satisfy 0 < min <= max < 1, got ${literalRange.min}..${literalRange.max}`);
    }
    const seed = options.seed ?? randomSeed();
    if (!Number.isInteger(seed)) {
      throw new GenerationError(`Seed must be an integer, got ${seed}`);
    }

    const neutralize = this.catalog.operatorForRole('neutralize');
    const normalize = this.catalog.operatorForRole('normalize');
    const signal = neutralize?.inputs[0] ?? normalize?.inputs[0] ?? this.catalog.listDomains();

    let wrap: GenerationPlan['wrap'];
    if (tier === 'optimize') {
      if (!neutralize || !normalize) {
        throw new GenerationError('Optimize tier needs a neutralize and a normalize operator in the catalog');
      }
      wrap = { neutralize, normalize, group: this.resolveGroup(options.neutralization ?? DEFAULT_NEUTRALIZATION, neutralize) };
    }

    const plan: GenerationPlan = {
      tier,
      count,
      seed,
      maxFieldRepeats,
      literalRange,
      signal,
      skeletons: [],
      wrap,
    };
    plan.skeletons = this.feasibleSkeletons(plan);
    if (plan.skeletons.length === 0) {
      throw new GenerationError(`No ${tier} skeleton can be built from this catalog`);
    }

    this.logger.info(`Generating ${count} ${tier} alpha(s) with seed ${seed}`);
    return new CandidateSequence(plan, this.catalog, this.logger);
  }

  private resolveGroup(group: string, neutralize: Readonly<OperatorSpec>): string {
    if (group === 'none') {
      throw new GenerationError('Optimize tier requires a neutralization group, got "none"');
    }
    const field = this.catalog.getField(group);
    const slot = neutralize.inputs[1] ?? [];
    if (!field || !slot.includes(field.domain)) {
      throw new GenerationError(`Neutralization "${group}" is not a group field accepted by ${neutralize.id}`);
    }
    return field.id;
  }

  /**
   * Skeletons of the tier that at least one seeded dry run manages to build.
   */
  private feasibleSkeletons(plan: GenerationPlan): Skeleton[] {
    const pool = plan.tier === 'basic' ? BASIC_SKELETONS : CREATIVE_SKELETONS;
    const rng = new SeededRandom(plan.seed ^ 0x5bd1e995);
    return pool.filter((skeleton) => {
      for (let probe = 0; probe < FEASIBILITY_PROBES; probe++) {
        const ctx: BuildContext = {
          catalog: this.catalog,
          rng,
          fields: new FieldPicker(this.catalog, rng, plan.maxFieldRepeats),
          literalRange: plan.literalRange,
          sub: (target) => buildFrom(BASIC_SKELETONS, null, ctx, target).root,
        };
        try {
          skeleton.build(ctx, plan.signal);
          return true;
        } catch (error) {
          if (!(error instanceof SkeletonUnavailableError)) throw error;
        }
      }
      this.logger.debug(`Skeleton ${skeleton.id} cannot be built from this catalog`);
      return false;
    });
  }
}

/**
 * Build from the first skeleton the rotation offers that succeeds. Without
 * a rotation the skeletons are tried in a random order.
 */
function buildFrom(
  skeletons: readonly Skeleton[],
  rotation: SkeletonRotation | null,
  ctx: BuildContext,
  target: readonly Domain[]
): { skeleton: Skeleton; root: ExpressionNode } {
  const byId = new Map(skeletons.map((s) => [s.id, s]));
  for (let round = 0; round < MAX_BUILD_ROUNDS; round++) {
    const failed = new Set<string>();
    for (;;) {
      const id = rotation
        ? rotation.pick(ctx.rng, failed)
        : pickUntried(skeletons, failed, ctx);
      const skeleton = id === null ? undefined : byId.get(id);
      if (!skeleton) break;
      try {
        const root = skeleton.build(ctx, target);
        rotation?.commit(skeleton.id);
        return { skeleton, root };
      } catch (error) {
        if (!(error instanceof SkeletonUnavailableError)) throw error;
        failed.add(skeleton.id);
      }
    }
  }
  throw new SkeletonUnavailableError(
    skeletons.map((s) => s.id).join('|'),
    `nothing produces ${target.join('|')}`
  );
}

function pickUntried(skeletons: readonly Skeleton[], failed: ReadonlySet<string>, ctx: BuildContext): string | null {
  const open = skeletons.filter((s) => !failed.has(s.id));
  return open.length === 0 ? null : ctx.rng.weighted(open, (s) => s.weight).id;
}

/**
 * Functional entry point: `generate` on a throwaway generator.
 */
export function generateAlphas(
  catalog: Catalog,
  tier: string,
  count: number,
  options: GenerateOptions & GeneratorOptions = {}
): CandidateSequence {
  return new AlphaGenerator(catalog, { logger: options.logger }).generate(tier, count, options);
}
