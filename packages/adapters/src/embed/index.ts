export type { Embedder } from './embedder';
export { LocalHashEmbedder } from './local_hash_embedder';
export { CachingEmbedder } from './caching_embedder';
export { VectorCache, type VectorCacheStats } from './vector_cache';
export { OpenAIEmbedder, type OpenAIEmbedderConfig } from './openai_embedder';
export { createEmbedder } from './factory';
