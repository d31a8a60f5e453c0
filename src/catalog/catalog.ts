/**
 * Field & Operator Catalog
 *
 * Read-only registry built once from a definition and passed by reference to
 * the generator, validator and optimizer.
 */

import { CatalogError } from '../core/errors.js';
import type {
  CatalogDefinition,
  Domain,
  FieldSpec,
  OperatorArity,
  OperatorCategory,
  OperatorRole,
  OperatorSpec,
} from './types.js';
import { childCount } from './types.js';

export interface OperatorQuery {
  arity?: OperatorArity;
  category?: OperatorCategory;
  tag?: string;
  /** Domains of the children, one per argument; each must be accepted. */
  accepts?: Domain[];
  /** Allowed output domains. */
  output?: Domain[];
  /** Wrapping operators are left out unless asked for. */
  includeRoles?: boolean;
}

export class Catalog {
  private readonly fields: ReadonlyMap<string, Readonly<FieldSpec>>;
  private readonly operators: ReadonlyMap<string, Readonly<OperatorSpec>>;
  private readonly domains: ReadonlySet<Domain>;

  private constructor(definition: CatalogDefinition) {
    this.domains = new Set(definition.domains);
    this.fields = new Map(definition.fields.map((field) => [field.id, Object.freeze({ ...field })]));
    this.operators = new Map(
      definition.operators.map((op) => [
        op.id,
        Object.freeze({
          ...op,
          inputs: op.inputs.map((slot) => [...slot]),
          tags: [...op.tags],
          window: op.window ? { ...op.window } : undefined,
        }),
      ])
    );
  }

  /**
   * Build a catalog, rejecting malformed definitions with CatalogError.
   */
  static create(definition: CatalogDefinition): Catalog {
    const issues = checkDefinition(definition);
    if (issues.length > 0) {
      throw new CatalogError('Malformed catalog definition', issues);
    }
    return new Catalog(definition);
  }

  hasDomain(domain: Domain): boolean {
    return this.domains.has(domain);
  }

  listDomains(): Domain[] {
    return Array.from(this.domains);
  }

  getField(id: string): Readonly<FieldSpec> | undefined {
    return this.fields.get(id);
  }

  requireField(id: string): Readonly<FieldSpec> {
    const field = this.fields.get(id);
    if (!field) throw new CatalogError(`Unknown field: ${id}`);
    return field;
  }

  getOperator(id: string): Readonly<OperatorSpec> | undefined {
    return this.operators.get(id);
  }

  requireOperator(id: string): Readonly<OperatorSpec> {
    const op = this.operators.get(id);
    if (!op) throw new CatalogError(`Unknown operator: ${id}`);
    return op;
  }

  listFields(): Readonly<FieldSpec>[] {
    return Array.from(this.fields.values());
  }

  listFieldCategories(): string[] {
    return Array.from(new Set(this.listFields().map((field) => field.category)));
  }

  fieldsByCategory(category: string): Readonly<FieldSpec>[] {
    return this.listFields().filter((field) => field.category === category);
  }

  fieldsByDomain(domains: readonly Domain[]): Readonly<FieldSpec>[] {
    return this.listFields().filter((field) => domains.includes(field.domain));
  }

  listOperators(): Readonly<OperatorSpec>[] {
    return Array.from(this.operators.values());
  }

  operatorsByArity(arity: OperatorArity): Readonly<OperatorSpec>[] {
    return this.listOperators().filter((op) => op.arity === arity);
  }

  compatibleOperators(query: OperatorQuery): Readonly<OperatorSpec>[] {
    return this.listOperators().filter((op) => {
      if (op.role && !query.includeRoles) return false;
      if (query.arity && op.arity !== query.arity) return false;
      if (query.category && op.category !== query.category) return false;
      if (query.tag && !op.tags.includes(query.tag)) return false;
      if (query.output && !query.output.includes(op.output)) return false;
      if (query.accepts) {
        if (query.accepts.length !== op.inputs.length) return false;
        return query.accepts.every((domain, idx) => op.inputs[idx]?.includes(domain) ?? false);
      }
      return true;
    });
  }

  operatorForRole(role: OperatorRole): Readonly<OperatorSpec> | undefined {
    return this.listOperators().find((op) => op.role === role);
  }
}

export function createCatalog(definition: CatalogDefinition): Catalog {
  return Catalog.create(definition);
}

function checkDefinition(definition: CatalogDefinition): string[] {
  const issues: string[] = [];
  const domains = new Set(definition.domains);

  if (domains.size !== definition.domains.length) {
    issues.push('duplicate domain identifiers');
  }

  const fieldIds = new Set<string>();
  for (const field of definition.fields) {
    if (fieldIds.has(field.id)) {
      issues.push(`duplicate field id "${field.id}"`);
    }
    fieldIds.add(field.id);
    if (!domains.has(field.domain)) {
      issues.push(`field "${field.id}" references unknown domain "${field.domain}"`);
    }
  }

  const operatorIds = new Set<string>();
  for (const op of definition.operators) {
    if (operatorIds.has(op.id)) {
      issues.push(`duplicate operator id "${op.id}"`);
    }
    operatorIds.add(op.id);
    issues.push(...checkOperator(op, domains));
  }

  const roles = definition.operators.map((op) => op.role).filter((role): role is OperatorRole => !!role);
  for (const role of new Set(roles)) {
    if (roles.filter((r) => r === role).length > 1) {
      issues.push(`more than one operator has role "${role}"`);
    }
  }

  return issues;
}

function checkOperator(op: OperatorSpec, domains: ReadonlySet<Domain>): string[] {
  const issues: string[] = [];
  const expected = childCount(op.arity);

  if (op.inputs.length !== expected) {
    issues.push(`operator "${op.id}" declares ${op.inputs.length} input slots for arity ${op.arity}`);
  }
  op.inputs.forEach((slot, idx) => {
    if (slot.length === 0) {
      issues.push(`operator "${op.id}" input ${idx} accepts no domain`);
    }
    for (const domain of slot) {
      if (!domains.has(domain)) {
        issues.push(`operator "${op.id}" input ${idx} references unknown domain "${domain}"`);
      }
    }
  });
  if (!domains.has(op.output)) {
    issues.push(`operator "${op.id}" outputs unknown domain "${op.output}"`);
  }

  if (op.arity === 'windowed') {
    const window = op.window;
    if (!window) {
      issues.push(`windowed operator "${op.id}" has no window range`);
    } else if (!Number.isInteger(window.min) || !Number.isInteger(window.max) || window.min < 1 || window.max < window.min) {
      issues.push(`operator "${op.id}" has invalid window range ${window.min}..${window.max}`);
    }
    if (!op.template.includes('{window}')) {
      issues.push(`operator "${op.id}" template lacks {window}`);
    }
  } else if (op.window) {
    issues.push(`operator "${op.id}" declares a window but is ${op.arity}`);
  }

  for (let idx = 0; idx < expected; idx++) {
    if (!op.template.includes(`{${idx}}`)) {
      issues.push(`operator "${op.id}" template lacks {${idx}}`);
    }
  }

  if (op.role === 'normalize' && op.arity !== 'unary') {
    issues.push(`normalize operator "${op.id}" must be unary`);
  }
  if (op.role === 'neutralize' && op.arity !== 'binary') {
    issues.push(`neutralize operator "${op.id}" must be binary`);
  }

  return issues;
}
