/**
 * Alpha Display
 *
 * Plain-text sheets for manual submission. Functions return the text; the
 * CLI decides where it goes.
 */

import type { CandidateRecord } from '../types/index.js';

const WIDTH = 80;

export const EMPTY_SHEET = '=== NO VALID ALPHAS GENERATED ===';

const SUBMISSION_STEPS = [
  'Log in to the alpha research platform',
  'Open the alpha lab and create a new alpha',
  'Paste the expression',
  'Set neutralization to match the record (region, universe and delay as usual)',
  'Run a simulation and submit if the results look good',
];

export function formatCandidates(records: readonly CandidateRecord[], outputFile?: string): string {
  if (records.length === 0) {
    return EMPTY_SHEET;
  }

  const lines: string[] = [];
  lines.push('═'.repeat(WIDTH));
  lines.push('GENERATED ALPHAS');
  lines.push('═'.repeat(WIDTH));
  lines.push('');
  lines.push(`Generated ${records.length} valid alpha expression(s) for manual submission.`);
  if (outputFile) {
    lines.push(`Saved to: ${outputFile}`);
  }
  lines.push('');

  records.forEach((record, idx) => {
    lines.push(`Alpha #${idx + 1} (${record.id})`);
    lines.push('─'.repeat(40));
    lines.push(record.expression);
    lines.push('─'.repeat(40));
    lines.push(
      `tier=${record.tier} | skeleton=${record.skeletonId} | score=${record.score.toFixed(4)} | status=${record.status}`
    );
    if (record.neutralization !== 'none' || record.normalization !== 'none') {
      lines.push(`neutralization=${record.neutralization} | normalization=${record.normalization}`);
    }
    lines.push('');
  });

  lines.push('Instructions for manual submission:');
  SUBMISSION_STEPS.forEach((step, idx) => lines.push(`${idx + 1}. ${step}`));
  lines.push('═'.repeat(WIDTH));
  return lines.join('\n');
}

/**
 * Validation outcome of one record, one violation per line.
 */
export function formatReport(record: CandidateRecord): string {
  const lines = [`${record.id}: ${record.status}`];
  if (record.violations.length === 0) {
    lines.push('No violations.');
  }
  for (const violation of record.violations) {
    lines.push(`- [${violation.severity}] ${violation.ruleId}: ${violation.reason}`);
  }
  return lines.join('\n');
}
