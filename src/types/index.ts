/**
 * Core type definitions for Alpha Forge
 */

import type { ExpressionNode } from '../expression/types.js';

// ============================================================================
// Generation Types
// ============================================================================

export const GENERATION_TIERS = ['basic', 'creative', 'optimize'] as const;

export type GenerationTier = (typeof GENERATION_TIERS)[number];

export function isGenerationTier(value: unknown): value is GenerationTier {
  return GENERATION_TIERS.some((tier) => tier === value);
}

/** `none`, or the group field the signal is neutralized against. */
export type NeutralizationSetting = string;

/** `none`, or the normalize operator applied at the root. */
export type NormalizationSetting = string;

// ============================================================================
// Validation Types
// ============================================================================

export type ValidationRuleId = 'structure' | 'domain' | 'limits' | 'field_usage' | 'placement';

export type ViolationSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ValidationViolation {
  ruleId: ValidationRuleId;
  /** Human-readable reason */
  reason: string;
  severity: ViolationSeverity;
  /** Offending node, e.g. `root.0.1` */
  path?: string;
}

export interface ValidationReport {
  /** True iff there are no violations */
  accepted: boolean;
  violations: ValidationViolation[];
}

export type ValidationStatus = 'pending' | 'accepted' | 'rejected';

// ============================================================================
// Candidate Types
// ============================================================================

export interface AlphaCandidate {
  id: string;
  tier: GenerationTier;
  /** Skeleton the root structure was drawn from */
  skeletonId: string;
  root: ExpressionNode;
  neutralization: NeutralizationSetting;
  normalization: NormalizationSetting;
  /** Heuristic quality score in [0, 1] */
  score: number;
  status: ValidationStatus;
  report?: ValidationReport;
}

/**
 * Flat record handed to the result store and the display.
 */
export interface CandidateRecord {
  id: string;
  expression: string;
  tier: GenerationTier;
  skeletonId: string;
  neutralization: NeutralizationSetting;
  normalization: NormalizationSetting;
  score: number;
  status: ValidationStatus;
  violations: ValidationViolation[];
}
