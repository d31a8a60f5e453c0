/**
 * Alpha Validator
 *
 * Checks candidates against the platform's structural and semantic rules.
 * Validation is pure: the same candidate always yields the same report, and
 * a rejected candidate is never repaired.
 */

import type { Catalog } from '../catalog/catalog.js';
import { Logger } from '../core/logger.js';
import type { ExpressionNode } from '../expression/types.js';
import type { AlphaCandidate, GenerationTier, ValidationReport } from '../types/index.js';
import { DEFAULT_MAX_FIELD_REPEATS, VALIDATION_RULES, type RuleContext, type ValidationRule } from './rules.js';

export interface ValidatorOptions {
  /** Maximum references to a single field (default 3) */
  maxFieldRepeats?: number;
  rules?: readonly ValidationRule[];
  logger?: Logger;
}

export interface ReviewedBatch {
  accepted: AlphaCandidate[];
  rejected: AlphaCandidate[];
}

export class AlphaValidator {
  private readonly maxFieldRepeats: number;
  private readonly rules: readonly ValidationRule[];
  private readonly logger: Logger;

  constructor(
    private readonly catalog: Catalog,
    options: ValidatorOptions = {}
  ) {
    this.maxFieldRepeats = options.maxFieldRepeats ?? DEFAULT_MAX_FIELD_REPEATS;
    this.rules = options.rules ?? VALIDATION_RULES;
    this.logger = options.logger ?? new Logger('info');
  }

  get fieldRepeatCap(): number {
    return this.maxFieldRepeats;
  }

  validate(candidate: AlphaCandidate): ValidationReport {
    return this.validateTree(candidate.root, candidate.tier);
  }

  /**
   * Run every rule, in order, without short-circuiting.
   */
  validateTree(root: ExpressionNode, tier: GenerationTier): ValidationReport {
    const ctx: RuleContext = { catalog: this.catalog, tier, maxFieldRepeats: this.maxFieldRepeats };
    const violations = this.rules.flatMap((rule) => rule.check(root, ctx));
    return { accepted: violations.length === 0, violations };
  }

  /**
   * Copy of the candidate stamped with its validation outcome.
   */
  review(candidate: AlphaCandidate): AlphaCandidate {
    const report = this.validate(candidate);
    return { ...candidate, status: report.accepted ? 'accepted' : 'rejected', report };
  }

  reviewBatch(candidates: Iterable<AlphaCandidate>): ReviewedBatch {
    const accepted: AlphaCandidate[] = [];
    const rejected: AlphaCandidate[] = [];
    for (const candidate of candidates) {
      const reviewed = this.review(candidate);
      if (reviewed.status === 'accepted') {
        accepted.push(reviewed);
      } else {
        rejected.push(reviewed);
      }
    }
    this.logger.debug(`${accepted.length} of ${accepted.length + rejected.length} alphas are valid`);
    return { accepted, rejected };
  }
}
