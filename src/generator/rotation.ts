import type { SeededRandom } from './random.js';

export type RotationMode = 'strict' | 'soft';

/**
 * Batch-scoped skeleton picker weighted toward less-recently-used ids.
 *
 * `strict` exhausts every id before repeating one and never repeats the
 * previous pick (unless it is the only id). `soft` only weights by recency.
 */
export class SkeletonRotation {
  private readonly lastUsed = new Map<string, number>();
  private previous: string | null = null;
  private tick = 0;

  constructor(
    private readonly ids: readonly string[],
    private readonly baseWeight: (id: string) => number,
    private readonly mode: RotationMode = 'strict'
  ) {}

  pick(rng: SeededRandom, exclude: ReadonlySet<string> = new Set()): string | null {
    const available = this.ids.filter((id) => !exclude.has(id));
    if (available.length === 0) return null;

    let eligible = available;
    if (this.mode === 'strict') {
      const unused = available.filter((id) => !this.lastUsed.has(id));
      if (unused.length > 0) {
        eligible = unused;
      } else {
        const notPrevious = available.filter((id) => id !== this.previous);
        if (notPrevious.length > 0) eligible = notPrevious;
      }
    }

    return rng.weighted(eligible, (id) => this.baseWeight(id) * this.age(id));
  }

  /**
   * Record a pick that was actually used.
   */
  commit(id: string): void {
    this.tick++;
    this.lastUsed.set(id, this.tick);
    this.previous = id;
  }

  private age(id: string): number {
    const last = this.lastUsed.get(id);
    return last === undefined ? this.tick + 1 : this.tick - last;
  }
}
