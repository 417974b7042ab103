import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigError, ProviderError, RateLimitError } from '@docvault/shared';
import { OpenAIEmbedder } from './openai_embedder';

const { mockEmbeddingsCreate, MockAPIError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    constructor(
      message: string,
      public readonly status: number,
    ) {
      super(message);
    }
  }
  return { mockEmbeddingsCreate: vi.fn(), MockAPIError };
});

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      embeddings = {
        create: mockEmbeddingsCreate,
      };
    },
    APIError: MockAPIError,
  };
});

function apiError(message: string, status: number): Error {
  return new MockAPIError(message, status);
}

describe('OpenAIEmbedder', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('throws ConfigError when API key is missing', () => {
    expect(() => new OpenAIEmbedder({ apiKeyEnv: 'DOCVAULT_MISSING_KEY' })).toThrow(ConfigError);
  });

  it('reads API key from env and embeds texts', async () => {
    process.env.DOCVAULT_TEST_OPENAI_KEY = 'test-key';
    mockEmbeddingsCreate.mockResolvedValue({
      data: [{ embedding: [1, 2] }, { embedding: [3, 4] }],
    });

    const embedder = new OpenAIEmbedder({ apiKeyEnv: 'DOCVAULT_TEST_OPENAI_KEY', model: 'm' });
    await expect(embedder.embedTexts(['a', 'b'])).resolves.toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(mockEmbeddingsCreate).toHaveBeenCalledWith({
      model: 'm',
      input: ['a', 'b'],
      dimensions: undefined,
    });
    delete process.env.DOCVAULT_TEST_OPENAI_KEY;
  });

  it('does not call the API for an empty batch', async () => {
    const embedder = new OpenAIEmbedder({ apiKey: 'test-key' });
    await expect(embedder.embedTexts([])).resolves.toEqual([]);
    expect(mockEmbeddingsCreate).not.toHaveBeenCalled();
  });

  it('maps rate limit errors', async () => {
    mockEmbeddingsCreate.mockRejectedValue(apiError('rate limited', 429));
    const embedder = new OpenAIEmbedder({ apiKey: 'test-key' });

    await expect(embedder.embedTexts(['a'])).rejects.toBeInstanceOf(RateLimitError);
  });

  it('maps auth errors to ConfigError', async () => {
    mockEmbeddingsCreate.mockRejectedValue(apiError('unauthorized', 401));
    const embedder = new OpenAIEmbedder({ apiKey: 'test-key' });

    await expect(embedder.embedTexts(['a'])).rejects.toBeInstanceOf(ConfigError);
  });

  it('maps other API errors to ProviderError', async () => {
    mockEmbeddingsCreate.mockRejectedValue(apiError('server exploded', 500));
    const embedder = new OpenAIEmbedder({ apiKey: 'test-key' });

    await expect(embedder.embedTexts(['a'])).rejects.toBeInstanceOf(ProviderError);
  });

  it('wraps non-Error failures', async () => {
    mockEmbeddingsCreate.mockRejectedValue('boom');
    const embedder = new OpenAIEmbedder({ apiKey: 'test-key' });

    await expect(embedder.embedTexts(['a'])).rejects.toThrow('boom');
  });

  it('returns configured dimensions and a stable id', () => {
    const embedder = new OpenAIEmbedder({ apiKey: 'test-key', model: 'm', dimensions: 12 });
    expect(embedder.dims()).toBe(12);
    expect(embedder.id()).toBe('openai:m:12');
  });

  it('infers default dims for known models', () => {
    expect(new OpenAIEmbedder({ apiKey: 'test-key' }).dims()).toBe(1536);
    expect(
      new OpenAIEmbedder({ apiKey: 'test-key', model: 'text-embedding-3-large' }).dims(),
    ).toBe(3072);
    expect(new OpenAIEmbedder({ apiKey: 'test-key', model: 'unknown' }).dims()).toBe(0);
  });
});
