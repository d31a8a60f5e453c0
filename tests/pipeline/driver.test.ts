import { describe, it, expect, vi } from 'vitest';

import { loadDefaultCatalog } from '../../src/catalog/loader.js';
import { Logger } from '../../src/core/logger.js';
import { renderExpression } from '../../src/expression/render.js';
import { apply, fieldRef, type ExpressionNode } from '../../src/expression/types.js';
import { AlphaGenerator } from '../../src/generator/generator.js';
import { AlphaOptimizer } from '../../src/optimizer/optimizer.js';
import { runPipeline } from '../../src/pipeline/driver.js';
import { toCandidateRecord } from '../../src/pipeline/records.js';
import type { AlphaCandidate } from '../../src/types/index.js';
import type { ValidationRule } from '../../src/validator/rules.js';
import { AlphaValidator } from '../../src/validator/validator.js';

const logger = new Logger('error');

function basicCandidate(id: string, root: ExpressionNode): AlphaCandidate {
  return {
    id,
    tier: 'basic',
    skeletonId: 'cross_rank',
    root,
    neutralization: 'none',
    normalization: 'none',
    score: 0.5,
    status: 'pending',
  };
}

const rejectAll: ValidationRule = {
  id: 'structure',
  description: 'Rejects everything',
  check: () => [{ ruleId: 'structure', severity: 'low', reason: 'rejected for the test' }],
};

describe('runPipeline', () => {
  const catalog = loadDefaultCatalog();
  const generator = new AlphaGenerator(catalog, { logger });
  const validator = new AlphaValidator(catalog, { logger });

  it('returns the requested number of accepted candidates', () => {
    const result = runPipeline(
      catalog,
      { tier: 'basic', count: 3, optimize: false, iterations: 0, seed: 5 },
      { generator, validator, logger }
    );
    expect(result.accepted).toHaveLength(3);
    expect(result.rejected).toEqual([]);
    expect(result.attempts).toBe(1);
    expect(result.requested).toBe(3);
    expect(result.accepted.every((c) => c.status === 'accepted')).toBe(true);
  });

  it('stops after maxAttempts and returns fewer than requested', () => {
    const strict = new AlphaValidator(catalog, { rules: [rejectAll], logger });
    const result = runPipeline(
      catalog,
      { tier: 'creative', count: 2, optimize: false, iterations: 0, maxAttempts: 3, seed: 1 },
      { generator, validator: strict, logger }
    );
    expect(result.accepted).toEqual([]);
    expect(result.rejected).toHaveLength(6);
    expect(result.attempts).toBe(3);
  });

  it('moves the seed forward on each attempt', () => {
    const strict = new AlphaValidator(catalog, { rules: [rejectAll], logger });
    const spy = vi.spyOn(generator, 'generate');
    runPipeline(
      catalog,
      { tier: 'basic', count: 1, optimize: false, iterations: 0, maxAttempts: 3, seed: 10 },
      { generator, validator: strict, logger }
    );
    expect(spy.mock.calls.map(([, , options]) => options?.seed)).toEqual([10, 11, 12]);
  });

  it('optimizes before validating when asked', () => {
    const optimizer = new AlphaOptimizer(catalog, validator, { seed: 3, logger });
    const spy = vi.spyOn(optimizer, 'optimize');
    const result = runPipeline(
      catalog,
      { tier: 'optimize', count: 2, optimize: true, iterations: 10, seed: 3 },
      { generator, validator, optimizer, logger }
    );
    expect(spy).toHaveBeenCalledTimes(2);
    expect(spy.mock.calls.every(([, iterations]) => iterations === 10)).toBe(true);
    expect(result.accepted).toHaveLength(2);
  });

  it('drops repeated formulas and runs another attempt to fill the count', () => {
    const stubbed = new AlphaGenerator(catalog, { logger });
    const first = stubbed.generate('basic', 2, { seed: 1 });
    vi.spyOn(first, 'toArray').mockReturnValue([
      basicCandidate('first-1', apply('rank', [fieldRef('close')])),
      basicCandidate('first-2', apply('rank', [fieldRef('close')])),
    ]);
    const second = stubbed.generate('basic', 1, { seed: 2 });
    vi.spyOn(second, 'toArray').mockReturnValue([basicCandidate('second-1', apply('rank', [fieldRef('volume')]))]);
    const spy = vi.spyOn(stubbed, 'generate').mockReturnValueOnce(first).mockReturnValueOnce(second);

    const result = runPipeline(
      catalog,
      { tier: 'basic', count: 2, optimize: false, iterations: 0, seed: 1 },
      { generator: stubbed, validator, logger }
    );

    expect(result.accepted.map((c) => c.id)).toEqual(['first-1', 'second-1']);
    expect(result.accepted.map((c) => renderExpression(c.root, catalog))).toEqual(['rank(close)', 'rank(volume)']);
    expect(result.rejected).toEqual([]);
    expect(result.attempts).toBe(2);
    expect(spy.mock.calls.map(([, count]) => count)).toEqual([2, 1]);
  });

  it('requires an optimizer when optimization is requested', () => {
    expect(() =>
      runPipeline(catalog, { tier: 'basic', count: 1, optimize: true, iterations: 5 }, { generator, validator, logger })
    ).toThrow('runPipeline: optimization requested without an optimizer');
  });
});

describe('toCandidateRecord', () => {
  it('flattens a reviewed candidate', () => {
    const catalog = loadDefaultCatalog();
    const [candidate] = new AlphaGenerator(catalog, { logger }).generate('optimize', 1, { seed: 2 });
    if (!candidate) throw new Error('no candidate generated');
    const reviewed = new AlphaValidator(catalog).review(candidate);
    expect(toCandidateRecord(reviewed, catalog)).toEqual({
      id: candidate.id,
      expression: renderExpression(candidate.root, catalog),
      tier: 'optimize',
      skeletonId: candidate.skeletonId,
      neutralization: 'industry',
      normalization: 'zscore',
      score: candidate.score,
      status: 'accepted',
      violations: [],
    });
  });
});
