import { randomInt } from 'node:crypto';

const MODULUS = 0x80000000;

/**
 * Linear congruential generator, seeded for reproducible batches.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = Math.abs(Math.trunc(seed)) % MODULUS;
  }

  /** Uniform in [0, 1). */
  next(): number {
    this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
    return this.state / MODULUS;
  }

  /** Uniform integer in [min, max]. */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  uniform(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  pick<T>(items: readonly T[]): T {
    const item = items[Math.floor(this.next() * items.length)];
    if (item === undefined) {
      throw new Error('Cannot pick from an empty list');
    }
    return item;
  }

  /**
   * Pick with probability proportional to `weight(item)`. Falls back to a
   * uniform pick when every weight is zero.
   */
  weighted<T>(items: readonly T[], weight: (item: T) => number): T {
    const weights = items.map((item) => Math.max(0, weight(item)));
    const total = weights.reduce((sum, w) => sum + w, 0);
    if (total <= 0) return this.pick(items);
    let threshold = this.next() * total;
    for (let idx = 0; idx < items.length; idx++) {
      threshold -= weights[idx] ?? 0;
      const item = items[idx];
      if (threshold < 0 && item !== undefined) return item;
    }
    return this.pick(items.slice(-1));
  }
}

export function randomSeed(): number {
  return randomInt(0, 0x7fffffff);
}
