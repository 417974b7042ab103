import { z } from 'zod';

export const ChunkingConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().default(1000),
    chunkOverlap: z.number().int().nonnegative().default(200),
    /** Display cap for stored snippets; embeddings always use the full chunk text */
    snippetMaxChars: z.number().int().positive().default(1000),
  })
  .refine((data) => data.chunkOverlap < data.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['openai', 'local-hash']).default('local-hash'),
  model: z.string().optional(),
  dims: z.number().int().positive().default(384),
  batchSize: z.number().int().positive().default(32),
  /** Environment variable holding the provider API key */
  apiKeyEnv: z.string().default('OPENAI_API_KEY'),
});

export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;

export const StorageConfigSchema = z.object({
  backend: z.enum(['json', 'sqlite', 'memory']).default('json'),
  /** Directory for the json backend, database file for sqlite */
  path: z.string().default('data/vectors'),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export const RetrievalConfigSchema = z.object({
  topK: z.number().int().positive().default(3),
  maxAnswerChars: z.number().int().positive().default(10_000),
});

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;

export const IngestionConfigSchema = z.object({
  maxFileSizeBytes: z.number().int().positive().default(10 * 1024 * 1024),
  extensions: z.array(z.string().startsWith('.')).default(['.md', '.txt']),
});

export type IngestionConfig = z.infer<typeof IngestionConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  /** When set, structured events are appended to this JSONL file */
  eventsPath: z.string().optional(),
});

export const DocvaultConfigSchema = z
  .object({
    configVersion: z.literal(1).default(1),
    knowledgeDir: z.string().default('data/knowledge'),
    chunking: ChunkingConfigSchema.default({}),
    embeddings: EmbeddingsConfigSchema.default({}),
    storage: StorageConfigSchema.default({}),
    retrieval: RetrievalConfigSchema.default({}),
    ingestion: IngestionConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .refine((data) => data.embeddings.provider === 'local-hash' || !!data.embeddings.model, {
    message: "embeddings.model is required when provider is not 'local-hash'",
    path: ['embeddings', 'model'],
  });

export type DocvaultConfig = z.infer<typeof DocvaultConfigSchema>;

/** Config as written in files and flags: every field optional */
export type DocvaultConfigInput = z.input<typeof DocvaultConfigSchema>;
