import { describe, it, expect } from 'vitest';

import { SeededRandom } from '../../src/generator/random.js';
import { SkeletonRotation } from '../../src/generator/rotation.js';

describe('SeededRandom', () => {
  it('replays the same stream for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const first = Array.from({ length: 5 }, () => a.next());
    expect(Array.from({ length: 5 }, () => b.next())).toEqual(first);
    expect(first.every((value) => value >= 0 && value < 1)).toBe(true);
  });

  it('draws integers inside inclusive bounds', () => {
    const rng = new SeededRandom(7);
    const draws = Array.from({ length: 200 }, () => rng.int(3, 5));
    expect(new Set(draws)).toEqual(new Set([3, 4, 5]));
  });

  it('refuses to pick from an empty list', () => {
    expect(() => new SeededRandom(1).pick([])).toThrow('Cannot pick from an empty list');
  });

  it('never picks zero-weight items while others have weight', () => {
    const rng = new SeededRandom(3);
    const picks = Array.from({ length: 50 }, () => rng.weighted(['a', 'b', 'c'], (item) => (item === 'b' ? 1 : 0)));
    expect(new Set(picks)).toEqual(new Set(['b']));
  });
});

describe('SkeletonRotation', () => {
  const ids = ['a', 'b', 'c', 'd'];

  function drawSequence(mode: 'strict' | 'soft', length: number, seed: number): string[] {
    const rng = new SeededRandom(seed);
    const rotation = new SkeletonRotation(ids, () => 1, mode);
    const picks: string[] = [];
    for (let i = 0; i < length; i++) {
      const id = rotation.pick(rng);
      if (id === null) break;
      rotation.commit(id);
      picks.push(id);
    }
    return picks;
  }

  it('uses every id before repeating in strict mode', () => {
    const picks = drawSequence('strict', 4, 11);
    expect(new Set(picks).size).toBe(4);
  });

  it('never repeats the previous pick in strict mode', () => {
    const picks = drawSequence('strict', 40, 5);
    for (let i = 1; i < picks.length; i++) {
      expect(picks[i]).not.toBe(picks[i - 1]);
    }
  });

  it('skips excluded ids and reports when nothing is left', () => {
    const rng = new SeededRandom(1);
    const rotation = new SkeletonRotation(['a', 'b'], () => 1);
    expect(rotation.pick(rng, new Set(['a']))).toBe('b');
    expect(rotation.pick(rng, new Set(['a', 'b']))).toBeNull();
  });

  it('does not record picks until they are committed', () => {
    const rng = new SeededRandom(9);
    const rotation = new SkeletonRotation(['a', 'b'], () => 1);
    rotation.commit('a');
    // 'a' is used, so strict mode offers only 'b' no matter how often we ask
    expect([rotation.pick(rng), rotation.pick(rng), rotation.pick(rng)]).toEqual(['b', 'b', 'b']);
  });
});
