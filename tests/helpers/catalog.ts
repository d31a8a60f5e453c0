import { createCatalog, type Catalog } from '../../src/catalog/catalog.js';
import type { CatalogDefinition } from '../../src/catalog/types.js';

/**
 * Small catalog covering every basic skeleton and both wrapping roles.
 * Returns a fresh definition on each call so tests can mutate it.
 */
export function testDefinition(): CatalogDefinition {
  return {
    domains: ['real', 'bounded', 'categorical'],
    fields: [
      { id: 'close', category: 'price', domain: 'real' },
      { id: 'volume', category: 'volume', domain: 'real' },
      { id: 'cap', category: 'fundamental', domain: 'real' },
      { id: 'sentiment', category: 'sentiment', domain: 'bounded' },
      { id: 'industry', category: 'group', domain: 'categorical' },
      { id: 'sector', category: 'group', domain: 'categorical' },
    ],
    operators: [
      {
        id: 'add',
        category: 'arithmetic',
        arity: 'binary',
        inputs: [['real', 'bounded'], ['real', 'bounded']],
        output: 'real',
        template: 'add({0}, {1})',
        tags: ['additive'],
      },
      {
        id: 'multiply',
        category: 'arithmetic',
        arity: 'binary',
        inputs: [['real', 'bounded'], ['real', 'bounded']],
        output: 'real',
        template: 'multiply({0}, {1})',
        tags: ['multiplicative'],
      },
      {
        id: 'rank',
        category: 'cross_sectional',
        arity: 'unary',
        inputs: [['real', 'bounded']],
        output: 'bounded',
        template: 'rank({0})',
        tags: [],
      },
      {
        id: 'log',
        category: 'transform',
        arity: 'unary',
        inputs: [['real']],
        output: 'real',
        template: 'log({0})',
        tags: [],
      },
      {
        id: 'ts_mean',
        category: 'time_series',
        arity: 'windowed',
        inputs: [['real', 'bounded']],
        output: 'real',
        template: 'ts_mean({0}, {window})',
        window: { min: 5, max: 252 },
        tags: ['smoothing'],
      },
      {
        id: 'delay',
        category: 'time_series',
        arity: 'windowed',
        inputs: [['real', 'bounded']],
        output: 'real',
        template: 'delay({0}, {window})',
        window: { min: 1, max: 20 },
        tags: ['lag'],
      },
      {
        id: 'zscore',
        category: 'cross_sectional',
        arity: 'unary',
        inputs: [['real', 'bounded']],
        output: 'real',
        template: 'zscore({0})',
        role: 'normalize',
        tags: [],
      },
      {
        id: 'group_neutralize',
        category: 'group',
        arity: 'binary',
        inputs: [['real', 'bounded'], ['categorical']],
        output: 'real',
        template: 'group_neutralize({0}, {1})',
        role: 'neutralize',
        tags: [],
      },
    ],
  };
}

export function testCatalog(): Catalog {
  return createCatalog(testDefinition());
}
