import type { ExpressionNode, NodePath, OperatorApply } from './types.js';

export interface VisitedNode {
  node: ExpressionNode;
  path: NodePath;
  depth: number;
  parent: OperatorApply | null;
}

/**
 * Pre-order traversal. Depth of the root is 1. A node object reached a
 * second time (shared subtree or cycle) is not visited again.
 */
export function* walk(root: ExpressionNode): Generator<VisitedNode> {
  const seen = new Set<ExpressionNode>();
  const stack: VisitedNode[] = [{ node: root, path: [], depth: 1, parent: null }];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (seen.has(current.node)) continue;
    seen.add(current.node);
    yield current;
    if (current.node.kind === 'apply') {
      const { node } = current;
      for (let idx = node.children.length - 1; idx >= 0; idx--) {
        const child = node.children[idx];
        if (child) {
          stack.push({ node: child, path: [...current.path, idx], depth: current.depth + 1, parent: node });
        }
      }
    }
  }
}

export function depth(root: ExpressionNode): number {
  let deepest = 0;
  for (const visited of walk(root)) {
    deepest = Math.max(deepest, visited.depth);
  }
  return deepest;
}

export function nodeCount(root: ExpressionNode): number {
  let count = 0;
  for (const _visited of walk(root)) count++;
  return count;
}

/**
 * Occurrences of each field id, in first-seen order.
 */
export function fieldUsage(root: ExpressionNode): Map<string, number> {
  const usage = new Map<string, number>();
  for (const { node } of walk(root)) {
    if (node.kind === 'field') {
      usage.set(node.field, (usage.get(node.field) ?? 0) + 1);
    }
  }
  return usage;
}

export function nodeAt(root: ExpressionNode, path: NodePath): ExpressionNode | undefined {
  let current: ExpressionNode | undefined = root;
  for (const idx of path) {
    if (!current || current.kind !== 'apply') return undefined;
    current = current.children[idx];
  }
  return current;
}

/**
 * Copy of `root` with the node at `path` replaced. The input is untouched.
 */
export function replaceAt(root: ExpressionNode, path: NodePath, replacement: ExpressionNode): ExpressionNode {
  const [head, ...rest] = path;
  if (head === undefined) return replacement;
  if (root.kind !== 'apply') return root;
  const child = root.children[head];
  if (!child) return root;
  const children = [...root.children];
  children[head] = replaceAt(child, rest, replacement);
  return { ...root, children };
}

export function formatPath(path: NodePath): string {
  return path.length === 0 ? 'root' : `root.${path.join('.')}`;
}
