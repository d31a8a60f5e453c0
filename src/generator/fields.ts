import type { Catalog } from '../catalog/catalog.js';
import type { Domain } from '../catalog/types.js';
import type { SeededRandom } from './random.js';

/**
 * Candidate-scoped field chooser.
 *
 * Stays under the repetition cap when the domain allows it, avoids fields
 * already used by the same operator, and prefers categories the candidate
 * has not touched yet.
 */
export class FieldPicker {
  private readonly usage = new Map<string, number>();
  private readonly categories = new Set<string>();

  constructor(
    private readonly catalog: Catalog,
    private readonly rng: SeededRandom,
    private readonly maxRepeats: number
  ) {}

  canSupply(domains: readonly Domain[]): boolean {
    return this.catalog.fieldsByDomain(domains).length > 0;
  }

  pick(domains: readonly Domain[], avoid: readonly string[] = []): string {
    let pool = this.catalog.fieldsByDomain(domains);
    if (pool.length === 0) {
      throw new Error(`No field produces ${domains.join('|')}`);
    }

    pool = preferNonEmpty(pool, (field) => (this.usage.get(field.id) ?? 0) < this.maxRepeats);
    pool = preferNonEmpty(pool, (field) => !avoid.includes(field.id));
    pool = preferNonEmpty(pool, (field) => !this.categories.has(field.category));

    const field = this.rng.pick(pool);
    this.usage.set(field.id, (this.usage.get(field.id) ?? 0) + 1);
    this.categories.add(field.category);
    return field.id;
  }
}

function preferNonEmpty<T>(items: T[], predicate: (item: T) => boolean): T[] {
  const filtered = items.filter(predicate);
  return filtered.length > 0 ? filtered : items;
}
