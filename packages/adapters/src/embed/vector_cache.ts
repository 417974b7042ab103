import { ConfigError } from '@docvault/shared';
import { hash } from 'ohash';

export interface VectorCacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Bounded text-to-vector cache with least-recently-used eviction. Entries
 * are keyed by a hash of the text; vectors are copied in and out.
 */
export class VectorCache {
  // Map iteration order doubles as recency order: oldest first.
  private readonly entries = new Map<string, number[]>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new ConfigError(`Vector cache size must be a positive integer, got ${maxEntries}`);
    }
  }

  lookup(text: string): number[] | undefined {
    const key = hash(text);
    const vector = this.entries.get(key);
    if (vector === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    this.entries.delete(key);
    this.entries.set(key, vector);
    return [...vector];
  }

  store(text: string, vector: number[]): void {
    const key = hash(text);
    if (!this.entries.delete(key) && this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, [...vector]);
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): VectorCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}
