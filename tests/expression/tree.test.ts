import { describe, it, expect } from 'vitest';

import {
  depth,
  fieldUsage,
  formatPath,
  nodeAt,
  nodeCount,
  replaceAt,
  walk,
} from '../../src/expression/tree.js';
import { outputDomain } from '../../src/expression/domain.js';
import { apply, fieldRef, literal, type OperatorApply } from '../../src/expression/types.js';
import { testCatalog } from '../helpers/catalog.js';

describe('expression tree', () => {
  const tree = apply('add', [apply('rank', [fieldRef('close')]), fieldRef('volume')]);

  it('measures depth and size', () => {
    expect(depth(tree)).toBe(3);
    expect(nodeCount(tree)).toBe(4);
    expect(depth(fieldRef('close'))).toBe(1);
  });

  it('walks in pre-order with paths', () => {
    const visited = Array.from(walk(tree)).map(({ path, depth: d }) => [formatPath(path), d]);
    expect(visited).toEqual([
      ['root', 1],
      ['root.0', 2],
      ['root.0.0', 3],
      ['root.1', 2],
    ]);
  });

  it('terminates on cyclic input', () => {
    const node: OperatorApply = { kind: 'apply', operator: 'rank', children: [] };
    node.children.push(node);
    expect(nodeCount(node)).toBe(1);
    expect(depth(node)).toBe(1);
  });

  it('counts field references', () => {
    const usage = fieldUsage(apply('add', [fieldRef('close'), apply('rank', [fieldRef('close')])]));
    expect(Array.from(usage)).toEqual([['close', 2]]);
  });

  it('replaces a node without touching the original', () => {
    const updated = replaceAt(tree, [1], fieldRef('cap'));
    expect(nodeAt(updated, [1])).toEqual(fieldRef('cap'));
    expect(nodeAt(tree, [1])).toEqual(fieldRef('volume'));
    expect(nodeAt(updated, [0])).toBe(nodeAt(tree, [0]));
  });

  it('returns undefined for paths that leave the tree', () => {
    expect(nodeAt(tree, [0, 0, 0])).toBeUndefined();
    expect(nodeAt(tree, [5])).toBeUndefined();
  });

  it('omits the window key when none is given', () => {
    expect(Object.keys(apply('rank', [fieldRef('close')]))).toEqual(['kind', 'operator', 'children']);
    expect(apply('ts_mean', [fieldRef('close')], 20).window).toBe(20);
  });

  it('derives output domains from the catalog', () => {
    const catalog = testCatalog();
    expect(outputDomain(tree, catalog)).toBe('real');
    expect(outputDomain(apply('rank', [fieldRef('close')]), catalog)).toBe('bounded');
    expect(outputDomain(literal(2), catalog)).toBe('real');
    expect(outputDomain(fieldRef('industry'), catalog)).toBe('categorical');
    expect(outputDomain(fieldRef('missing'), catalog)).toBeUndefined();
  });
});
