/**
 * Pipeline Driver
 *
 * generate -> optimize (optional) -> validate, repeated until enough
 * candidates are accepted or the attempt budget runs out. Accepted
 * candidates that render to an expression already kept are dropped.
 */

import type { Catalog } from '../catalog/catalog.js';
import { Logger } from '../core/logger.js';
import { renderExpression } from '../expression/render.js';
import type { AlphaGenerator, GenerateOptions } from '../generator/generator.js';
import type { AlphaOptimizer } from '../optimizer/optimizer.js';
import type { AlphaCandidate, GenerationTier } from '../types/index.js';
import type { AlphaValidator } from '../validator/validator.js';

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface PipelineRequest {
  tier: GenerationTier;
  count: number;
  optimize: boolean;
  iterations: number;
  maxAttempts?: number;
  seed?: number;
  neutralization?: string;
  maxFieldRepeats?: number;
}

export interface PipelineDeps {
  generator: AlphaGenerator;
  validator: AlphaValidator;
  /** Required when the request asks for optimization */
  optimizer?: AlphaOptimizer;
  logger?: Logger;
}

export interface PipelineResult {
  accepted: AlphaCandidate[];
  rejected: AlphaCandidate[];
  attempts: number;
  requested: number;
}

export function runPipeline(catalog: Catalog, request: PipelineRequest, deps: PipelineDeps): PipelineResult {
  const logger = deps.logger ?? new Logger('info');
  const maxAttempts = request.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  if (request.optimize && !deps.optimizer) {
    throw new Error('runPipeline: optimization requested without an optimizer');
  }

  const accepted: AlphaCandidate[] = [];
  const rejected: AlphaCandidate[] = [];
  const seen = new Set<string>();
  let attempts = 0;

  while (accepted.length < request.count && attempts < maxAttempts) {
    const missing = request.count - accepted.length;
    const options: GenerateOptions = {
      neutralization: request.neutralization,
      maxFieldRepeats: request.maxFieldRepeats,
    };
    if (request.seed !== undefined) options.seed = request.seed + attempts;
    attempts++;

    logger.info(`Attempt ${attempts}/${maxAttempts}: generating ${missing} ${request.tier} alpha(s)`);
    let batch = deps.generator.generate(request.tier, missing, options).toArray();

    if (request.optimize && deps.optimizer) {
      const optimizer = deps.optimizer;
      logger.info('Optimizing alpha expressions...');
      batch = batch.map((candidate) =>
        deps.validator.validate(candidate).accepted ? optimizer.optimize(candidate, request.iterations) : candidate
      );
    }

    logger.info('Validating alpha expressions...');
    const reviewed = deps.validator.reviewBatch(batch);
    for (const candidate of reviewed.accepted) {
      const expression = renderExpression(candidate.root, catalog);
      if (seen.has(expression)) {
        logger.debug(`Dropping duplicate ${candidate.id}: ${expression}`);
        continue;
      }
      seen.add(expression);
      accepted.push(candidate);
    }
    rejected.push(...reviewed.rejected);
  }

  if (accepted.length < request.count) {
    logger.warn(`Only ${accepted.length} of ${request.count} alphas passed validation after ${attempts} attempt(s)`);
  }

  return { accepted, rejected, attempts, requested: request.count };
}
