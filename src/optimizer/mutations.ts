/**
 * Mutation Operators
 *
 * Local, type-preserving edits of an expression tree:
 * - SWAP_FIELD: replace a field with another of the same domain
 * - SWAP_OPERATOR: replace an operator with a compatible one of the same arity
 * - ADJUST_WINDOW: move a window inside its operator's range
 *
 * Wrapping operators and the group argument they take are never touched.
 */

import type { Catalog } from '../catalog/catalog.js';
import { outputDomain } from '../expression/domain.js';
import { replaceAt, walk, type VisitedNode } from '../expression/tree.js';
import { apply as applyOperator, fieldRef, type ExpressionNode, type FieldRef, type NodePath, type OperatorApply } from '../expression/types.js';
import type { SeededRandom } from '../generator/random.js';
import { nearestPeriod } from './score.js';
import type { Mutation, MutationType } from './types.js';

// ============================================================================
// Utility Functions
// ============================================================================

interface Located<T extends ExpressionNode> {
  node: T;
  path: NodePath;
  parent: OperatorApply | null;
}

function isWrapper(node: OperatorApply | null, catalog: Catalog): boolean {
  return node !== null && catalog.getOperator(node.operator)?.role !== undefined;
}

/**
 * Nodes outside the wrapping layer: not a wrapping operator and not the
 * group argument of one.
 */
function mutable(root: ExpressionNode, catalog: Catalog): VisitedNode[] {
  return Array.from(walk(root)).filter(({ node, path, parent }) => {
    if (node.kind === 'apply' && isWrapper(node, catalog)) return false;
    if (isWrapper(parent, catalog) && (path[path.length - 1] ?? 0) > 0) return false;
    return true;
  });
}

function fieldNodes(root: ExpressionNode, catalog: Catalog): Located<FieldRef>[] {
  return mutable(root, catalog).flatMap(({ node, path, parent }) =>
    node.kind === 'field' ? [{ node, path, parent }] : []
  );
}

function applyNodes(root: ExpressionNode, catalog: Catalog): Located<OperatorApply>[] {
  return mutable(root, catalog).flatMap(({ node, path, parent }) =>
    node.kind === 'apply' ? [{ node, path, parent }] : []
  );
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ============================================================================
// SWAP_FIELD
// ============================================================================

export const swapField: Mutation = {
  type: 'swap_field',
  apply(root, catalog, rng) {
    const options = fieldNodes(root, catalog).flatMap((located) => {
      const domain = catalog.getField(located.node.field)?.domain;
      if (domain === undefined) return [];
      const alternatives = catalog.fieldsByDomain([domain]).filter((field) => field.id !== located.node.field);
      return alternatives.length > 0 ? [{ located, alternatives }] : [];
    });
    if (options.length === 0) return null;

    const { located, alternatives } = rng.pick(options);
    const replacement = rng.pick(alternatives);
    return replaceAt(root, located.path, fieldRef(replacement.id));
  },
};

// ============================================================================
// SWAP_OPERATOR
// ============================================================================

export const swapOperator: Mutation = {
  type: 'swap_operator',
  apply(root, catalog, rng) {
    const options = applyNodes(root, catalog).flatMap((located) => {
      const current = catalog.getOperator(located.node.operator);
      if (!current) return [];

      const childDomains: string[] = [];
      for (const child of located.node.children) {
        const domain = outputDomain(child, catalog);
        if (domain === undefined) return [];
        childDomains.push(domain);
      }

      const idx = located.path[located.path.length - 1];
      const parentOp = located.parent ? catalog.getOperator(located.parent.operator) : undefined;
      const parentSlot = idx !== undefined && parentOp ? parentOp.inputs[idx] : undefined;

      const alternatives = catalog
        .compatibleOperators({ arity: current.arity, accepts: childDomains })
        .filter((op) => op.id !== current.id)
        .filter((op) => (parentSlot ? parentSlot.includes(op.output) : op.output === current.output));
      return alternatives.length > 0 ? [{ located, alternatives }] : [];
    });
    if (options.length === 0) return null;

    const { located, alternatives } = rng.pick(options);
    const op = rng.pick(alternatives);
    const window = op.window
      ? clamp(located.node.window ?? op.window.min, op.window.min, op.window.max)
      : undefined;
    return replaceAt(root, located.path, applyOperator(op.id, [...located.node.children], window));
  },
};

// ============================================================================
// ADJUST_WINDOW
// ============================================================================

export const adjustWindow: Mutation = {
  type: 'adjust_window',
  apply(root, catalog, rng) {
    const options = applyNodes(root, catalog).filter(
      (located) => located.node.window !== undefined && catalog.getOperator(located.node.operator)?.window
    );
    if (options.length === 0) return null;

    const located = rng.pick(options);
    const range = catalog.getOperator(located.node.operator)?.window;
    const current = located.node.window;
    if (!range || current === undefined) return null;

    let next: number;
    const period = nearestPeriod(current);
    if (period !== current && rng.next() < 0.5) {
      next = period;
    } else {
      const step = Math.max(1, Math.round(current * 0.25));
      next = current + (rng.next() < 0.5 ? -step : step);
    }
    next = clamp(next, range.min, range.max);
    if (next === current) return null;

    return replaceAt(root, located.path, { ...located.node, window: next });
  },
};

export const MUTATIONS: readonly Mutation[] = [swapField, swapOperator, adjustWindow];

/**
 * Apply a randomly chosen mutation, trying the others when it has nothing
 * to act on.
 */
export function mutate(
  root: ExpressionNode,
  catalog: Catalog,
  rng: SeededRandom,
  mutations: readonly Mutation[] = MUTATIONS
): { type: MutationType; root: ExpressionNode } | null {
  const order = [...mutations];
  while (order.length > 0) {
    const idx = Math.floor(rng.next() * order.length);
    const [mutation] = order.splice(idx, 1);
    if (!mutation) break;
    const mutated = mutation.apply(root, catalog, rng);
    if (mutated) return { type: mutation.type, root: mutated };
  }
  return null;
}
