import { EmbeddingError } from '@docvault/shared';
import type { Embedder } from './embedder';
import { VectorCache, type VectorCacheStats } from './vector_cache';

/** Maximum number of per-text embeddings to cache */
const EMBEDDING_CACHE_MAX_SIZE = 2000;

/**
 * Caches vectors per text and only forwards cache misses, in one batch,
 * to the wrapped embedder.
 */
export class CachingEmbedder implements Embedder {
  private readonly cache: VectorCache;

  constructor(
    private readonly underlyingEmbedder: Embedder,
    maxEntries: number = EMBEDDING_CACHE_MAX_SIZE,
  ) {
    this.cache = new VectorCache(maxEntries);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    const results = texts.map((text) => this.cache.lookup(text));
    const misses = [...new Set(texts.filter((_, i) => results[i] === undefined))];

    if (misses.length > 0) {
      const embeddings = await this.underlyingEmbedder.embedTexts(misses);
      if (embeddings.length !== misses.length) {
        throw new EmbeddingError(
          `${this.id()} returned ${embeddings.length} vectors for ${misses.length} texts`,
        );
      }
      const byText = new Map(misses.map((text, i) => [text, embeddings[i]]));
      byText.forEach((vector, text) => this.cache.store(text, vector));

      return texts.map((text, i) => results[i] ?? byText.get(text) ?? []);
    }

    return texts.map((_, i) => results[i] ?? []);
  }

  dims(): number {
    return this.underlyingEmbedder.dims();
  }

  id(): string {
    return this.underlyingEmbedder.id();
  }

  cacheStats(): VectorCacheStats {
    return this.cache.stats();
  }
}
