import type { Catalog } from '../catalog/catalog.js';
import { renderExpression } from '../expression/render.js';
import type { AlphaCandidate, CandidateRecord } from '../types/index.js';

/**
 * Flatten a candidate into the record the store and display work with.
 */
export function toCandidateRecord(candidate: AlphaCandidate, catalog: Catalog): CandidateRecord {
  return {
    id: candidate.id,
    expression: renderExpression(candidate.root, catalog),
    tier: candidate.tier,
    skeletonId: candidate.skeletonId,
    neutralization: candidate.neutralization,
    normalization: candidate.normalization,
    score: candidate.score,
    status: candidate.status,
    violations: candidate.report?.violations ?? [],
  };
}
