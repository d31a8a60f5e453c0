import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { loadCatalog, loadDefaultCatalog, parseCatalogDefinition } from '../../src/catalog/loader.js';
import { CatalogError } from '../../src/core/errors.js';
import { testDefinition } from '../helpers/catalog.js';

describe('catalog loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'alpha-forge-catalog-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled catalog', () => {
    const catalog = loadDefaultCatalog();
    expect(catalog.listFields()).toHaveLength(24);
    expect(catalog.listOperators()).toHaveLength(22);
    expect(catalog.operatorForRole('normalize')?.id).toBe('zscore');
    expect(catalog.operatorForRole('neutralize')?.id).toBe('group_neutralize');
    expect(catalog.getField('ebitda')?.description).toBe(
      'Earnings before interest, taxes, depreciation and amortization'
    );
  });

  it('reads JSON by extension', () => {
    const path = join(dir, 'catalog.json');
    writeFileSync(path, JSON.stringify(testDefinition()));
    expect(loadCatalog(path).getOperator('delay')?.window).toEqual({ min: 1, max: 20 });
  });

  it('defaults operator tags to an empty list', () => {
    const definition = testDefinition();
    const { tags: _tags, ...log } = definition.operators[3] ?? { tags: [] };
    const catalog = parseCatalogDefinition({ ...definition, operators: [log] });
    expect(catalog.getOperator('log')?.tags).toEqual([]);
  });

  it('throws CatalogError for a missing file', () => {
    expect(() => loadCatalog(join(dir, 'absent.yaml'))).toThrow(CatalogError);
  });

  it('throws CatalogError for a definition that does not match the schema', () => {
    const path = join(dir, 'catalog.yaml');
    writeFileSync(path, 'domains: []\nfields: []\noperators: []\n');
    expect(() => loadCatalog(path)).toThrow('Catalog definition does not match schema');
  });

  it('throws CatalogError for unparsable JSON', () => {
    const path = join(dir, 'catalog.json');
    writeFileSync(path, '{ "domains": ');
    expect(() => loadCatalog(path)).toThrow(/^Cannot parse catalog/);
  });
});
