import OpenAI, { APIError } from 'openai';
import { ConfigError, ProviderError, RateLimitError } from '@docvault/shared';
import type { Embedder } from './embedder';

export interface OpenAIEmbedderConfig {
  apiKey?: string;
  apiKeyEnv?: string;
  model?: string;
  dimensions?: number;
}

const DEFAULT_MODEL = 'text-embedding-3-small';

const KNOWN_MODEL_DIMS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;
  private model: string;
  private dimensions?: number;

  constructor(config: OpenAIEmbedderConfig) {
    const apiKey = config.apiKey || (config.apiKeyEnv && process.env[config.apiKeyEnv]);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for OpenAI provider. Checked config.apiKey and env var ${config.apiKeyEnv}`,
      );
    }
    this.model = config.model || DEFAULT_MODEL;
    this.dimensions = config.dimensions;
    this.client = new OpenAI({
      apiKey,
    });
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        dimensions: this.dimensions,
      });
      // The API returns one embedding per input, in input order.
      return response.data.map((d) => d.embedding);
    } catch (error) {
      throw this.mapError(error);
    }
  }

  dims(): number {
    if (this.dimensions) {
      return this.dimensions;
    }
    return KNOWN_MODEL_DIMS[this.model] ?? 0;
  }

  id(): string {
    return this.dimensions ? `openai:${this.model}:${this.dimensions}` : `openai:${this.model}`;
  }

  private mapError(error: unknown): Error {
    if (error instanceof APIError) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error });
      }
      if (error.status === 401) {
        return new ConfigError(error.message, { cause: error });
      }
      return new ProviderError(error.message, { cause: error, details: { status: error.status } });
    }
    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}
