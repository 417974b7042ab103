import type { Embedder } from '@docvault/adapters';
import {
  AppError,
  ConfigError,
  ContentError,
  EmbeddingError,
  MalformedRecordError,
  UsageError,
  errorMessage,
  eventEnvelope,
  logger as defaultLogger,
  type Logger,
} from '@docvault/shared';
import type { VectorRecord, VectorRecordStore } from '@docvault/store';
import { assertChunkParameters, chunkText } from '../chunking/chunker';
import { computeChecksum } from '../sources/checksum';
import { normalizeText } from '../sources/normalize';
import { KeyedLock } from './keyed_lock';
import type {
  CacheInvalidator,
  DocumentInput,
  IngestConfig,
  IngestResult,
} from './types';

const DEFAULT_INGEST_CONFIG: IngestConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  snippetMaxChars: 1000,
};

const DEFAULT_EMBED_BATCH_SIZE = 32;

export interface IngestionOrchestratorOptions {
  store: VectorRecordStore;
  embedder: Embedder;
  /** Defaults for `ingest` calls that pass no config of their own */
  defaults?: Partial<IngestConfig>;
  embedBatchSize?: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Turns raw document text into a stored `VectorRecord`: normalise, checksum,
 * chunk, embed, persist. A document whose checksum matches the stored record
 * is skipped; a changed document replaces its record in a single `put`.
 */
export class IngestionOrchestrator {
  private readonly store: VectorRecordStore;
  private readonly embedder: Embedder;
  private readonly defaults: IngestConfig;
  private readonly embedBatchSize: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly locks = new KeyedLock();
  private readonly caches = new Set<CacheInvalidator>();

  constructor(options: IngestionOrchestratorOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.defaults = { ...DEFAULT_INGEST_CONFIG, ...options.defaults };
    this.embedBatchSize = options.embedBatchSize ?? DEFAULT_EMBED_BATCH_SIZE;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());

    if (!Number.isInteger(this.embedBatchSize) || this.embedBatchSize <= 0) {
      throw new ConfigError(`embedBatchSize must be a positive integer, got ${this.embedBatchSize}`);
    }
  }

  /**
   * Registers a cache to be invalidated after every successful write.
   * Returns a function that unregisters it.
   */
  registerCache(cache: CacheInvalidator): () => void {
    this.caches.add(cache);
    return () => {
      this.caches.delete(cache);
    };
  }

  /**
   * @throws ConfigError for invalid chunking parameters
   * @throws UsageError for an empty filename
   */
  async ingest(
    filename: string,
    rawText: unknown,
    config?: Partial<IngestConfig>,
  ): Promise<IngestResult> {
    const resolved = this.resolveConfig(config);
    if (!filename) {
      throw new UsageError('filename must not be empty');
    }
    return this.locks.run(filename, () => this.ingestLocked(filename, rawText, resolved));
  }

  /**
   * Ingests documents one after another. A failing document does not stop
   * the batch; results are returned in input order.
   */
  async ingestMany(
    documents: DocumentInput[],
    config?: Partial<IngestConfig>,
  ): Promise<IngestResult[]> {
    this.resolveConfig(config);
    const results: IngestResult[] = [];
    for (const document of documents) {
      results.push(await this.ingest(document.filename, document.text, config));
    }
    return results;
  }

  /**
   * Deletes the record for `filename`. Returns false when none existed.
   */
  async remove(filename: string): Promise<boolean> {
    return this.locks.run(filename, async () => {
      const deleted = await this.store.delete(filename);
      if (deleted) {
        this.invalidateCaches();
        await this.logger.log({
          ...eventEnvelope(this.now()),
          type: 'DocumentRemoved',
          payload: { filename },
        });
      }
      return deleted;
    });
  }

  private resolveConfig(config: Partial<IngestConfig> = {}): IngestConfig {
    const resolved: IngestConfig = {
      chunkSize: config.chunkSize ?? this.defaults.chunkSize,
      chunkOverlap: config.chunkOverlap ?? this.defaults.chunkOverlap,
      snippetMaxChars: config.snippetMaxChars ?? this.defaults.snippetMaxChars,
    };
    assertChunkParameters(resolved.chunkSize, resolved.chunkOverlap, resolved.snippetMaxChars);
    return resolved;
  }

  private async ingestLocked(
    filename: string,
    rawText: unknown,
    config: IngestConfig,
  ): Promise<IngestResult> {
    const startTime = Date.now();
    const log = this.logger.child({ filename });

    try {
      if (typeof rawText !== 'string') {
        throw new ContentError('Document content must be a string');
      }
      const text = normalizeText(rawText);
      if (text.length === 0) {
        throw new ContentError('Document is empty');
      }
      const checksum = computeChecksum(text);

      let existing: VectorRecord | undefined;
      let replacesMalformed = false;
      try {
        existing = await this.store.get(filename);
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) {
          throw error;
        }
        await log.warn(`Replacing unreadable stored record: ${error.message}`);
        replacesMalformed = true;
      }

      if (existing && existing.checksum === checksum) {
        const chunkCount = existing.chunks.length;
        await this.logger.log({
          ...eventEnvelope(this.now()),
          type: 'DocumentIngested',
          payload: {
            filename,
            status: 'skipped_duplicate',
            checksum,
            chunkCount,
            durationMs: Date.now() - startTime,
          },
        });
        return {
          filename,
          status: 'skipped_duplicate',
          chunkCount,
          message: `Unchanged since last ingest (${chunkCount} chunks)`,
          checksum,
        };
      }

      const status = existing || replacesMalformed ? 'updated' : 'created';
      const chunks = chunkText(text, config.chunkSize, config.chunkOverlap, {
        snippetMaxChars: config.snippetMaxChars,
      });
      const vectors = await this.embedChunks(chunks.map((chunk) => chunk.text));

      const record: VectorRecord = {
        filename,
        checksum,
        ingestTimestamp: this.now().toISOString(),
        chunkSize: config.chunkSize,
        chunkOverlap: config.chunkOverlap,
        embedderId: this.embedder.id(),
        embeddingDimension: vectors[0].length,
        chunks: chunks.map((chunk, i) => ({
          index: chunk.index,
          charStart: chunk.charStart,
          charEnd: chunk.charEnd,
          snippet: chunk.snippet,
          embedding: vectors[i],
        })),
      };

      await this.store.put(filename, record);
      this.invalidateCaches();

      await this.logger.log({
        ...eventEnvelope(this.now()),
        type: 'DocumentIngested',
        payload: {
          filename,
          status,
          checksum,
          chunkCount: chunks.length,
          durationMs: Date.now() - startTime,
        },
      });
      await log.debug(`${status} with ${chunks.length} chunks`);

      return {
        filename,
        status,
        chunkCount: chunks.length,
        message:
          status === 'created'
            ? `Ingested ${chunks.length} chunks`
            : `Replaced previous version with ${chunks.length} chunks`,
        checksum,
      };
    } catch (error) {
      const reason = errorMessage(error);
      const errorCode = error instanceof AppError ? error.code : 'UnknownError';
      await log.warn(`Ingestion failed: ${reason}`);
      await this.logger.log({
        ...eventEnvelope(this.now()),
        type: 'DocumentIngestFailed',
        payload: { filename, errorCode, message: reason },
      });
      return { filename, status: 'failed', chunkCount: 0, message: reason };
    }
  }

  private async embedChunks(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let offset = 0; offset < texts.length; offset += this.embedBatchSize) {
      const batch = texts.slice(offset, offset + this.embedBatchSize);
      let embedded: number[][];
      try {
        embedded = await this.embedder.embedTexts(batch);
      } catch (error) {
        throw new EmbeddingError(`Embedder ${this.embedder.id()} failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      if (embedded.length !== batch.length) {
        throw new EmbeddingError(
          `Embedder returned ${embedded.length} vectors for ${batch.length} chunks`,
        );
      }
      vectors.push(...embedded);
    }

    this.assertConsistentVectors(vectors);
    return vectors;
  }

  private assertConsistentVectors(vectors: number[][]): void {
    const dimension = vectors[0]?.length ?? 0;
    if (dimension === 0) {
      throw new EmbeddingError('Embedder returned an empty vector');
    }
    const declared = this.embedder.dims();
    if (declared > 0 && dimension !== declared) {
      throw new EmbeddingError(
        `Embedder declares ${declared} dimensions but returned ${dimension}`,
      );
    }
    vectors.forEach((vector, i) => {
      if (vector.length !== dimension) {
        throw new EmbeddingError(
          `Chunk ${i} has ${vector.length} dimensions, expected ${dimension}`,
        );
      }
      if (!vector.every((value) => Number.isFinite(value))) {
        throw new EmbeddingError(`Chunk ${i} has a non-finite embedding value`);
      }
    });
  }

  private invalidateCaches(): void {
    for (const cache of this.caches) {
      cache.invalidate();
    }
  }
}
