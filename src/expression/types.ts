/**
 * Expression Tree Types
 *
 * A node owns its children; trees never share subtrees.
 */

export interface FieldRef {
  kind: 'field';
  field: string;
}

export interface Literal {
  kind: 'literal';
  value: number;
}

export interface OperatorApply {
  kind: 'apply';
  operator: string;
  children: ExpressionNode[];
  /** Window length, windowed operators only. */
  window?: number;
}

export type ExpressionNode = FieldRef | Literal | OperatorApply;

/** Child indices from the root down to a node. */
export type NodePath = number[];

export function fieldRef(field: string): FieldRef {
  return { kind: 'field', field };
}

export function literal(value: number): Literal {
  return { kind: 'literal', value };
}

export function apply(operator: string, children: ExpressionNode[], window?: number): OperatorApply {
  return window === undefined
    ? { kind: 'apply', operator, children }
    : { kind: 'apply', operator, children, window };
}
