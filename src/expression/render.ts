import type { Catalog } from '../catalog/catalog.js';
import type { ExpressionNode } from './types.js';

export function formatLiteral(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  return String(Number(value.toFixed(4)));
}

/**
 * Render a tree to the single-line formula submitted to the platform.
 *
 * Operators missing from the catalog render in call syntax so that malformed
 * trees can still be shown next to their validation report.
 */
export function renderExpression(root: ExpressionNode, catalog: Catalog): string {
  switch (root.kind) {
    case 'field':
      return root.field;
    case 'literal':
      return formatLiteral(root.value);
    case 'apply': {
      const children = root.children.map((child) => renderExpression(child, catalog));
      const op = catalog.getOperator(root.operator);
      if (!op) {
        const args = root.window === undefined ? children : [...children, String(root.window)];
        return `${root.operator}(${args.join(', ')})`;
      }
      return op.template.replace(/\{(\d+|window)\}/g, (match: string, key: string) => {
        if (key === 'window') return root.window === undefined ? match : String(root.window);
        return children[Number(key)] ?? match;
      });
    }
  }
}

const CALL_TEMPLATE = /^(\w+)\((.*)\)$/;

export interface FormatOptions {
  width?: number;
  indent?: string;
}

/**
 * Multi-line rendering for display: a call that does not fit in `width`
 * puts each argument on its own indented line.
 */
export function formatExpression(root: ExpressionNode, catalog: Catalog, options: FormatOptions = {}): string {
  const width = options.width ?? 60;
  const indent = options.indent ?? '  ';
  return formatNode(root, catalog, width, indent, 0);
}

function formatNode(node: ExpressionNode, catalog: Catalog, width: number, indent: string, level: number): string {
  const inline = renderExpression(node, catalog);
  const pad = indent.repeat(level);
  if (node.kind !== 'apply' || pad.length + inline.length <= width) {
    return pad + inline;
  }

  const template = catalog.getOperator(node.operator)?.template ?? '';
  const match = CALL_TEMPLATE.exec(template);
  if (!match) return pad + inline;

  const [, name = node.operator, argList = ''] = match;
  const lines = argList.split(/,\s*/).map((arg) => {
    const slot = /^\{(\d+)\}$/.exec(arg);
    const child = slot ? node.children[Number(slot[1])] : undefined;
    if (child) return formatNode(child, catalog, width, indent, level + 1);
    const text = arg === '{window}' && node.window !== undefined ? String(node.window) : arg;
    return indent.repeat(level + 1) + text;
  });
  return `${pad}${name}(\n${lines.join(',\n')}\n${pad})`;
}
