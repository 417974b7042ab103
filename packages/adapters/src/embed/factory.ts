import type { EmbeddingsConfig } from '@docvault/shared';
import type { Embedder } from './embedder';
import { OpenAIEmbedder } from './openai_embedder';
import { LocalHashEmbedder } from './local_hash_embedder';
import { CachingEmbedder } from './caching_embedder';

export function createEmbedder(config: EmbeddingsConfig): Embedder {
  let embedder: Embedder;
  switch (config.provider) {
    case 'openai':
      embedder = new OpenAIEmbedder({
        apiKeyEnv: config.apiKeyEnv,
        model: config.model,
        dimensions: config.dims,
      });
      break;
    case 'local-hash':
      embedder = new LocalHashEmbedder(config.dims);
      break;
    default:
      throw new Error(`Unsupported embedder provider: ${String(config.provider)}`);
  }

  return new CachingEmbedder(embedder);
}
