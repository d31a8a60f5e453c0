import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { Logger } from '../../src/core/logger.js';
import { candidateFileName, loadCandidates, saveCandidates } from '../../src/pipeline/store.js';
import type { CandidateRecord } from '../../src/types/index.js';

const records: CandidateRecord[] = [
  {
    id: 'creative-1-1',
    expression: 'rank(subtract(ts_mean(close, 20), vwap))',
    tier: 'creative',
    skeletonId: 'ranked_pair',
    neutralization: 'none',
    normalization: 'none',
    score: 0.7125,
    status: 'accepted',
    violations: [],
  },
  {
    id: 'creative-1-2',
    expression: 'log(news_sentiment)',
    tier: 'creative',
    skeletonId: 'transform',
    neutralization: 'none',
    normalization: 'none',
    score: 0.2,
    status: 'rejected',
    violations: [
      {
        ruleId: 'domain',
        severity: 'critical',
        reason: 'Operator "log" argument 1 accepts real, got bounded',
        path: 'root.0',
      },
    ],
  },
];

describe('result store', () => {
  let dir: string;
  let logger: Logger;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'alpha-forge-store-'));
    logger = new Logger('error');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('names files by local timestamp', () => {
    expect(candidateFileName(new Date(2024, 0, 2, 3, 4, 5))).toBe('alphas_20240102_030405.json');
    expect(candidateFileName(new Date(2025, 11, 31, 23, 59, 58))).toBe('alphas_20251231_235958.json');
  });

  it('writes pretty JSON into a created directory', () => {
    const target = join(dir, 'nested', 'out');
    const path = saveCandidates(records, target, new Date(2024, 5, 7, 8, 9, 10), logger);
    expect(path).toBe(join(target, 'alphas_20240607_080910.json'));
    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, 'utf-8')).toBe(`${JSON.stringify(records, null, 2)}\n`);
  });

  it('loads what it saved', () => {
    const path = saveCandidates(records, dir, new Date(2024, 5, 7, 8, 9, 10), logger);
    expect(loadCandidates(path, logger)).toEqual(records);
  });

  it('returns an empty list for a missing file', () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const missing = join(dir, 'missing.json');
    expect(loadCandidates(missing, logger)).toEqual([]);
    expect(error).toHaveBeenCalledWith(`File not found: ${missing}`);
  });

  it('returns an empty list for invalid JSON', () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const path = join(dir, 'broken.json');
    writeFileSync(path, '[{"id": ');
    expect(loadCandidates(path, logger)).toEqual([]);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('returns an empty list for records of the wrong shape', () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const path = join(dir, 'shape.json');
    writeFileSync(path, JSON.stringify([{ id: 'x', expression: 'rank(close)' }]));
    expect(loadCandidates(path, logger)).toEqual([]);
    expect(error.mock.calls[0]?.[0]).toMatch(/^Malformed alpha file /);
  });
});
