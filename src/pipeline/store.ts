/**
 * Result Store
 *
 * Accepted candidates are written as pretty-printed JSON, one timestamped
 * file per run.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { Logger } from '../core/logger.js';
import { GENERATION_TIERS, type CandidateRecord } from '../types/index.js';

const ViolationSchema = z.object({
  ruleId: z.enum(['structure', 'domain', 'limits', 'field_usage', 'placement']),
  reason: z.string(),
  severity: z.enum(['low', 'medium', 'high', 'critical']),
  path: z.string().optional(),
});

const CandidateRecordSchema = z.object({
  id: z.string(),
  expression: z.string(),
  tier: z.enum(GENERATION_TIERS),
  skeletonId: z.string(),
  neutralization: z.string(),
  normalization: z.string(),
  score: z.number(),
  status: z.enum(['pending', 'accepted', 'rejected']),
  violations: z.array(ViolationSchema),
});

const CandidateFileSchema = z.array(CandidateRecordSchema);

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `alphas_YYYYMMDD_HHMMSS.json`, local time.
 */
export function candidateFileName(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `alphas_${date}_${time}.json`;
}

export function saveCandidates(
  records: readonly CandidateRecord[],
  dir: string,
  now: Date = new Date(),
  logger: Logger = new Logger('info')
): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, candidateFileName(now));
  writeFileSync(path, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
  logger.info(`Saved ${records.length} alphas to ${path}`);
  return path;
}

/**
 * Read a saved file. A missing or malformed file is logged and yields [].
 */
export function loadCandidates(path: string, logger: Logger = new Logger('info')): CandidateRecord[] {
  if (!existsSync(path)) {
    logger.error(`File not found: ${path}`);
    return [];
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    logger.error(`Error loading alphas from ${path}`, error);
    return [];
  }

  const parsed = CandidateFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    logger.error(`Malformed alpha file ${path}: ${issues.join('; ')}`);
    return [];
  }

  logger.info(`Loaded ${parsed.data.length} alphas from ${path}`);
  return parsed.data;
}
