import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';
import yaml from 'yaml';

import { CatalogError, describeError } from '../core/errors.js';
import { Catalog } from './catalog.js';
import type { CatalogDefinition } from './types.js';

const FieldSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  domain: z.string().min(1),
  description: z.string().optional(),
});

const OperatorSchema = z.object({
  id: z.string().min(1),
  category: z.enum(['arithmetic', 'time_series', 'cross_sectional', 'transform', 'group']),
  arity: z.enum(['unary', 'binary', 'windowed']),
  inputs: z.array(z.array(z.string().min(1))),
  output: z.string().min(1),
  template: z.string().min(1),
  window: z.object({ min: z.number(), max: z.number() }).optional(),
  role: z.enum(['neutralize', 'normalize']).optional(),
  tags: z.array(z.string()).default([]),
  description: z.string().optional(),
});

const CatalogSchema = z.object({
  domains: z.array(z.string().min(1)).min(1),
  fields: z.array(FieldSchema).min(1),
  operators: z.array(OperatorSchema).min(1),
});

export function defaultCatalogPath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, '..', '..', 'config', 'catalog.yaml');
}

/**
 * Validate an untyped definition (parsed YAML/JSON) and build the catalog.
 */
export function parseCatalogDefinition(input: unknown): Catalog {
  const result = CatalogSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new CatalogError('Catalog definition does not match schema', issues);
  }
  const definition: CatalogDefinition = result.data;
  return Catalog.create(definition);
}

export function loadCatalog(path: string): Catalog {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new CatalogError(`Cannot read catalog ${path}: ${describeError(error)}`, [], { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = path.toLowerCase().endsWith('.json') ? JSON.parse(raw) : yaml.parse(raw);
  } catch (error) {
    throw new CatalogError(`Cannot parse catalog ${path}: ${describeError(error)}`, [], { cause: error });
  }

  return parseCatalogDefinition(parsed);
}

export function loadDefaultCatalog(): Catalog {
  return loadCatalog(defaultCatalogPath());
}
