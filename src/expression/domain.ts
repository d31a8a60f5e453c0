import type { Catalog } from '../catalog/catalog.js';
import type { Domain } from '../catalog/types.js';
import type { ExpressionNode } from './types.js';

/** Numeric literals are scalars of the unbounded domain. */
export const LITERAL_DOMAIN: Domain = 'real';

/**
 * Domain a node produces, or undefined when it references something the
 * catalog does not know.
 */
export function outputDomain(node: ExpressionNode, catalog: Catalog): Domain | undefined {
  switch (node.kind) {
    case 'field':
      return catalog.getField(node.field)?.domain;
    case 'literal':
      return LITERAL_DOMAIN;
    case 'apply':
      return catalog.getOperator(node.operator)?.output;
  }
}
