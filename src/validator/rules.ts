/**
 * Validation Rules
 *
 * Each rule inspects the whole tree and returns every violation it finds.
 */

import type { Catalog } from '../catalog/catalog.js';
import { childCount } from '../catalog/types.js';
import { outputDomain } from '../expression/domain.js';
import { depth, fieldUsage, formatPath, nodeCount, walk } from '../expression/tree.js';
import type { ExpressionNode, NodePath } from '../expression/types.js';
import type { GenerationTier, ValidationRuleId, ValidationViolation } from '../types/index.js';

/** Platform limits on expression size. */
export const MAX_EXPRESSION_DEPTH = 8;
export const MAX_EXPRESSION_NODES = 48;

export const DEFAULT_MAX_FIELD_REPEATS = 3;

export interface RuleContext {
  catalog: Catalog;
  tier: GenerationTier;
  maxFieldRepeats: number;
}

export interface ValidationRule {
  id: ValidationRuleId;
  description: string;
  check(root: ExpressionNode, ctx: RuleContext): ValidationViolation[];
}

/**
 * Operators exist and receive the right number of children, windows are in
 * range, leaves are fields or finite literals, and no node is shared.
 */
export const structureRule: ValidationRule = {
  id: 'structure',
  description: 'Structural well-formedness',
  check(root, ctx) {
    const violations: ValidationViolation[] = [];
    const seen = new Set<ExpressionNode>();

    const visit = (node: ExpressionNode, path: NodePath, ancestors: Set<ExpressionNode>): void => {
      const at = formatPath(path);
      if (ancestors.has(node)) {
        violations.push({ ruleId: 'structure', severity: 'critical', reason: 'Node is its own ancestor (cycle)', path: at });
        return;
      }
      if (seen.has(node)) {
        violations.push({ ruleId: 'structure', severity: 'critical', reason: 'Node is shared between parents', path: at });
        return;
      }
      seen.add(node);

      if (node.kind === 'field') {
        if (!ctx.catalog.getField(node.field)) {
          violations.push({ ruleId: 'structure', severity: 'critical', reason: `Unknown field "${node.field}"`, path: at });
        }
        return;
      }

      if (node.kind === 'literal') {
        if (!Number.isFinite(node.value)) {
          violations.push({ ruleId: 'structure', severity: 'critical', reason: `Literal ${node.value} is not a finite number`, path: at });
        }
        return;
      }

      const op = ctx.catalog.getOperator(node.operator);
      if (!op) {
        violations.push({ ruleId: 'structure', severity: 'critical', reason: `Unknown operator "${node.operator}"`, path: at });
      } else {
        const expected = childCount(op.arity);
        if (node.children.length !== expected) {
          violations.push({
            ruleId: 'structure',
            severity: 'critical',
            reason: `Operator "${op.id}" expects ${expected} argument(s), got ${node.children.length}`,
            path: at,
          });
        }
        if (op.window) {
          const { min, max } = op.window;
          if (node.window === undefined) {
            violations.push({ ruleId: 'structure', severity: 'critical', reason: `Operator "${op.id}" is missing its window`, path: at });
          } else if (!Number.isInteger(node.window) || node.window < min || node.window > max) {
            violations.push({
              ruleId: 'structure',
              severity: 'critical',
              reason: `Operator "${op.id}" window ${node.window} outside ${min}..${max}`,
              path: at,
            });
          }
        } else if (node.window !== undefined) {
          violations.push({ ruleId: 'structure', severity: 'critical', reason: `Operator "${op.id}" does not take a window`, path: at });
        }
      }

      const nextAncestors = new Set(ancestors).add(node);
      node.children.forEach((child, idx) => visit(child, [...path, idx], nextAncestors));
    };

    visit(root, [], new Set());
    return violations;
  },
};

/**
 * Every child produces a domain its parent's argument slot accepts.
 */
export const domainRule: ValidationRule = {
  id: 'domain',
  description: 'Domain consistency',
  check(root, ctx) {
    const violations: ValidationViolation[] = [];
    for (const { node, path } of walk(root)) {
      if (node.kind !== 'apply') continue;
      const op = ctx.catalog.getOperator(node.operator);
      if (!op) continue;
      node.children.forEach((child, idx) => {
        const accepted = op.inputs[idx];
        const produced = outputDomain(child, ctx.catalog);
        if (!accepted || produced === undefined) return;
        if (!accepted.includes(produced)) {
          violations.push({
            ruleId: 'domain',
            severity: 'critical',
            reason: `Operator "${op.id}" argument ${idx + 1} accepts ${accepted.join('|')}, got ${produced}`,
            path: formatPath([...path, idx]),
          });
        }
      });
    }
    return violations;
  },
};

export const limitsRule: ValidationRule = {
  id: 'limits',
  description: 'Depth and size limits',
  check(root) {
    const violations: ValidationViolation[] = [];
    const treeDepth = depth(root);
    if (treeDepth > MAX_EXPRESSION_DEPTH) {
      violations.push({
        ruleId: 'limits',
        severity: 'high',
        reason: `Expression depth ${treeDepth} exceeds ${MAX_EXPRESSION_DEPTH}`,
      });
    }
    const size = nodeCount(root);
    if (size > MAX_EXPRESSION_NODES) {
      violations.push({
        ruleId: 'limits',
        severity: 'high',
        reason: `Expression has ${size} nodes, limit is ${MAX_EXPRESSION_NODES}`,
      });
    }
    return violations;
  },
};

export const fieldUsageRule: ValidationRule = {
  id: 'field_usage',
  description: 'Field usage policy',
  check(root, ctx) {
    const violations: ValidationViolation[] = [];
    const usage = fieldUsage(root);
    if (usage.size === 0) {
      violations.push({
        ruleId: 'field_usage',
        severity: 'high',
        reason: 'Expression references no data field',
      });
    }
    for (const [field, count] of usage) {
      if (count > ctx.maxFieldRepeats) {
        violations.push({
          ruleId: 'field_usage',
          severity: 'medium',
          reason: `Field "${field}" referenced ${count} times (max ${ctx.maxFieldRepeats})`,
        });
      }
    }
    return violations;
  },
};

/**
 * Optimize tier: normalize only at the root, neutralize only at the root or
 * directly under a root normalize.
 */
export const placementRule: ValidationRule = {
  id: 'placement',
  description: 'Neutralization/normalization placement',
  check(root, ctx) {
    if (ctx.tier !== 'optimize') return [];
    const violations: ValidationViolation[] = [];
    for (const { node, path, parent } of walk(root)) {
      if (node.kind !== 'apply') continue;
      const role = ctx.catalog.getOperator(node.operator)?.role;
      if (!role) continue;

      let allowed = path.length === 0;
      if (role === 'neutralize' && path.length === 1 && parent) {
        allowed = ctx.catalog.getOperator(parent.operator)?.role === 'normalize';
      }
      if (!allowed) {
        violations.push({
          ruleId: 'placement',
          severity: 'high',
          reason: `${role === 'normalize' ? 'Normalization' : 'Neutralization'} operator "${node.operator}" is nested below the root`,
          path: formatPath(path),
        });
      }
    }
    return violations;
  },
};

/** Rules in evaluation order. */
export const VALIDATION_RULES: readonly ValidationRule[] = [
  structureRule,
  domainRule,
  limitsRule,
  fieldUsageRule,
  placementRule,
];
