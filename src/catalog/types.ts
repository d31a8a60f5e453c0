/**
 * Catalog Types
 *
 * Data fields and operators an alpha expression can be built from.
 */

/** Numeric domain of a value: `real`, `bounded`, `categorical`, ... */
export type Domain = string;

export type OperatorArity = 'unary' | 'binary' | 'windowed';

export type OperatorCategory =
  | 'arithmetic'
  | 'time_series'
  | 'cross_sectional'
  | 'transform'
  | 'group';

/**
 * Wrapping roles applied by the optimize tier.
 */
export type OperatorRole = 'neutralize' | 'normalize';

export interface WindowRange {
  min: number;
  max: number;
}

export interface FieldSpec {
  id: string;
  /** price, volume, fundamental, analyst, sentiment, group, ... */
  category: string;
  domain: Domain;
  description?: string;
}

export interface OperatorSpec {
  id: string;
  category: OperatorCategory;
  arity: OperatorArity;
  /** Accepted domains, one list per child argument. */
  inputs: Domain[][];
  output: Domain;
  /** Rendering template: `{0}`, `{1}` for children, `{window}` for the window length. */
  template: string;
  window?: WindowRange;
  role?: OperatorRole;
  /** Free-form traits skeletons select on (`additive`, `lag`, ...). */
  tags: string[];
  description?: string;
}

export interface CatalogDefinition {
  domains: Domain[];
  fields: FieldSpec[];
  operators: OperatorSpec[];
}

export function childCount(arity: OperatorArity): number {
  return arity === 'binary' ? 2 : 1;
}
