import type { Embedder } from '@docvault/adapters';
import {
  ConfigError,
  DimensionMismatchError,
  EmbeddingError,
  UsageError,
  errorMessage,
  eventEnvelope,
  logger as defaultLogger,
  type Logger,
} from '@docvault/shared';
import type { VectorRecordStore } from '@docvault/store';
import type { CacheInvalidator } from '../ingestion/types';
import { composeAnswer } from './answer';
import { buildMatchLink } from './links';
import { TopKHeap, compareRanked, cosineSimilarity } from './vector_math';
import type { AnswerResult, Match, SearchResult } from './types';

interface IndexedChunk {
  filename: string;
  checksum: string;
  index: number;
  charStart: number;
  charEnd: number;
  snippet: string;
  embedding: number[];
}

type ScoredChunk = IndexedChunk & { score: number };

const DEFAULT_TOP_K = 3;
const DEFAULT_MAX_ANSWER_CHARS = 10_000;

export interface RetrievalEngineOptions {
  store: VectorRecordStore;
  embedder: Embedder;
  /** Used for `file://` provenance links; relative links without it */
  knowledgeDir?: string;
  defaultTopK?: number;
  maxAnswerChars?: number;
  logger?: Logger;
}

/**
 * Answers questions from the stored records. The flattened chunk list is
 * cached until `invalidate()` is called.
 */
export class RetrievalEngine implements CacheInvalidator {
  private readonly store: VectorRecordStore;
  private readonly embedder: Embedder;
  private readonly knowledgeDir?: string;
  private readonly defaultTopK: number;
  private readonly maxAnswerChars: number;
  private readonly logger: Logger;
  private index: IndexedChunk[] | null = null;
  private indexVersion = 0;

  constructor(options: RetrievalEngineOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.knowledgeDir = options.knowledgeDir;
    this.defaultTopK = options.defaultTopK ?? DEFAULT_TOP_K;
    this.maxAnswerChars = options.maxAnswerChars ?? DEFAULT_MAX_ANSWER_CHARS;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Drops the cached index; the next query reloads it from the store.
   */
  invalidate(): void {
    this.index = null;
    this.indexVersion++;
  }

  async answer(question: string, k: number = this.defaultTopK): Promise<AnswerResult> {
    const startTime = Date.now();
    const { matches, candidateCount, skipped } = await this.search(question, k);
    const answer = composeAnswer(
      matches.map((match) => match.snippet),
      this.maxAnswerChars,
    );

    await this.logger.log({
      ...eventEnvelope(),
      type: 'QueryAnswered',
      payload: {
        k,
        candidateCount,
        matchCount: matches.length,
        skippedDimensionMismatch: skipped.dimensionMismatch,
        durationMs: Date.now() - startTime,
      },
    });

    return { question, answer, matches, skipped };
  }

  /**
   * Top `k` chunks by cosine similarity to the question.
   *
   * @throws ConfigError when `k` is not a positive integer
   * @throws UsageError when the question is empty
   */
  async search(question: string, k: number = this.defaultTopK): Promise<SearchResult> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new ConfigError(`k must be a positive integer, got ${k}`);
    }
    if (question.trim().length === 0) {
      throw new UsageError('Question must not be empty');
    }

    const chunks = await this.loadIndex();
    if (chunks.length === 0) {
      return { matches: [], candidateCount: 0, skipped: { dimensionMismatch: 0 } };
    }

    const queryVector = await this.embedQuery(question);
    const heap = new TopKHeap<ScoredChunk>(k, compareRanked);
    const mismatchedFiles = new Map<string, DimensionMismatchError>();
    let dimensionMismatch = 0;

    for (const chunk of chunks) {
      if (chunk.embedding.length !== queryVector.length) {
        dimensionMismatch++;
        if (!mismatchedFiles.has(chunk.filename)) {
          mismatchedFiles.set(
            chunk.filename,
            new DimensionMismatchError(queryVector.length, chunk.embedding.length),
          );
        }
        continue;
      }
      heap.push({ ...chunk, score: cosineSimilarity(queryVector, chunk.embedding) });
    }

    for (const [filename, error] of mismatchedFiles) {
      await this.logger.warn(`Skipping chunks of ${filename}: ${error.message}`);
    }

    const matches = await Promise.all(heap.results().map((scored) => this.toMatch(scored)));
    return {
      matches,
      candidateCount: chunks.length - dimensionMismatch,
      skipped: { dimensionMismatch },
    };
  }

  private async embedQuery(question: string): Promise<number[]> {
    let vectors: number[][];
    try {
      vectors = await this.embedder.embedTexts([question]);
    } catch (error) {
      throw new EmbeddingError(`Embedder ${this.embedder.id()} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    const [vector] = vectors;
    if (!vector || vector.length === 0) {
      throw new EmbeddingError('Embedder returned no vector for the question');
    }
    return vector;
  }

  private async loadIndex(): Promise<IndexedChunk[]> {
    if (this.index) {
      return this.index;
    }

    const startTime = Date.now();
    const version = this.indexVersion;
    const records = await this.store.allRecords();
    const chunks: IndexedChunk[] = records.flatMap((record) =>
      record.chunks.map((chunk) => ({
        filename: record.filename,
        checksum: record.checksum,
        index: chunk.index,
        charStart: chunk.charStart,
        charEnd: chunk.charEnd,
        snippet: chunk.snippet,
        embedding: chunk.embedding,
      })),
    );

    // A write that landed while loading makes this snapshot stale.
    if (version === this.indexVersion) {
      this.index = chunks;
    }

    await this.logger.log({
      ...eventEnvelope(),
      type: 'RetrievalIndexLoaded',
      payload: {
        recordCount: records.length,
        chunkCount: chunks.length,
        durationMs: Date.now() - startTime,
      },
    });
    return chunks;
  }

  private async toMatch(scored: ScoredChunk): Promise<Match> {
    return {
      filename: scored.filename,
      checksum: scored.checksum,
      index: scored.index,
      charStart: scored.charStart,
      charEnd: scored.charEnd,
      snippet: scored.snippet,
      score: scored.score,
      link: await buildMatchLink(this.knowledgeDir, scored.filename, scored.charStart, scored.charEnd),
    };
  }
}
