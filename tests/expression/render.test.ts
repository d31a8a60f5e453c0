import { describe, it, expect } from 'vitest';

import { formatExpression, formatLiteral, renderExpression } from '../../src/expression/render.js';
import { apply, fieldRef, literal } from '../../src/expression/types.js';
import { testCatalog } from '../helpers/catalog.js';

describe('renderExpression', () => {
  const catalog = testCatalog();

  it('substitutes children and windows into templates', () => {
    const tree = apply('ts_mean', [apply('add', [fieldRef('close'), fieldRef('volume')])], 20);
    expect(renderExpression(tree, catalog)).toBe('ts_mean(add(close, volume), 20)');
  });

  it('renders literals with at most four decimals', () => {
    expect(formatLiteral(0.5)).toBe('0.5');
    expect(formatLiteral(0.123456)).toBe('0.1235');
    expect(renderExpression(apply('multiply', [fieldRef('cap'), literal(0.45)]), catalog)).toBe(
      'multiply(cap, 0.45)'
    );
  });

  it('falls back to call syntax for unknown operators', () => {
    expect(renderExpression(apply('decay', [fieldRef('close')], 3), catalog)).toBe('decay(close, 3)');
  });
});

describe('formatExpression', () => {
  const catalog = testCatalog();

  it('keeps short expressions on one line', () => {
    const tree = apply('add', [apply('rank', [fieldRef('close')]), fieldRef('volume')]);
    expect(formatExpression(tree, catalog)).toBe('add(rank(close), volume)');
  });

  it('breaks long calls into indented arguments', () => {
    const tree = apply('add', [apply('rank', [fieldRef('close')]), fieldRef('volume')]);
    expect(formatExpression(tree, catalog, { width: 10 })).toBe(
      ['add(', '  rank(', '    close', '  ),', '  volume', ')'].join('\n')
    );
  });

  it('prints the window as its own argument', () => {
    const tree = apply('ts_mean', [apply('add', [fieldRef('close'), fieldRef('volume')])], 20);
    expect(formatExpression(tree, catalog, { width: 15 })).toBe(
      ['ts_mean(', '  add(', '    close,', '    volume', '  ),', '  20', ')'].join('\n')
    );
  });

  it('honours a custom indent', () => {
    const tree = apply('rank', [apply('add', [fieldRef('close'), fieldRef('volume')])]);
    expect(formatExpression(tree, catalog, { width: 20, indent: '\t' })).toBe(
      ['rank(', '\tadd(close, volume)', ')'].join('\n')
    );
  });
});
