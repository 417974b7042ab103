import { z } from 'zod';
import { MalformedRecordError, UsageError } from '@docvault/shared';
import type { StoreInfo, StoreBackend, VectorRecord } from './types';

const PersistedChunkSchema = z
  .object({
    index: z.number().int().nonnegative(),
    char_start: z.number().int().nonnegative(),
    char_end: z.number().int().nonnegative(),
    snippet: z.string(),
    embedding: z.array(z.number().finite()),
  })
  .refine((chunk) => chunk.char_end >= chunk.char_start, {
    message: 'char_end must not precede char_start',
    path: ['char_end'],
  });

export const PersistedRecordSchema = z.object({
  filename: z.string().min(1),
  checksum: z.string().min(1),
  ingest_timestamp: z.string().min(1),
  chunk_size: z.number().int().positive().optional(),
  chunk_overlap: z.number().int().nonnegative().optional(),
  embedding_model: z.string().optional(),
  embedding_dimension: z.number().int().nonnegative().optional(),
  chunks: z.array(PersistedChunkSchema),
});

/** On-disk shape shared by the JSON and SQLite backends */
export type PersistedRecord = z.infer<typeof PersistedRecordSchema>;

export function encodeRecord(record: VectorRecord): PersistedRecord {
  return {
    filename: record.filename,
    checksum: record.checksum,
    ingest_timestamp: record.ingestTimestamp,
    chunk_size: record.chunkSize,
    chunk_overlap: record.chunkOverlap,
    embedding_model: record.embedderId,
    embedding_dimension: record.embeddingDimension,
    chunks: record.chunks.map((chunk) => ({
      index: chunk.index,
      char_start: chunk.charStart,
      char_end: chunk.charEnd,
      snippet: chunk.snippet,
      embedding: [...chunk.embedding],
    })),
  };
}

/** Record fields with the chunks left unchecked, for chunk-by-chunk decoding */
const PersistedRecordHeaderSchema = PersistedRecordSchema.extend({
  chunks: z.array(z.unknown()),
});

type PersistedChunk = z.infer<typeof PersistedChunkSchema>;

export interface PartialDecode {
  record: VectorRecord;
  /** One description per chunk that failed validation and was left out */
  droppedChunks: string[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

function toVectorRecord(
  data: z.infer<typeof PersistedRecordHeaderSchema>,
  chunks: PersistedChunk[],
): VectorRecord {
  return {
    filename: data.filename,
    checksum: data.checksum,
    ingestTimestamp: data.ingest_timestamp,
    chunkSize: data.chunk_size,
    chunkOverlap: data.chunk_overlap,
    embedderId: data.embedding_model,
    embeddingDimension: data.embedding_dimension,
    chunks: chunks.map((chunk) => ({
      index: chunk.index,
      charStart: chunk.char_start,
      charEnd: chunk.char_end,
      snippet: chunk.snippet,
      embedding: chunk.embedding,
    })),
  };
}

/**
 * Validates a persisted value and maps it to a `VectorRecord`.
 *
 * @param origin where the value was read from, used in the error message
 * @throws MalformedRecordError
 */
export function decodeRecord(value: unknown, origin: string): VectorRecord {
  const result = PersistedRecordSchema.safeParse(value);
  if (!result.success) {
    throw new MalformedRecordError(origin, formatIssues(result.error));
  }
  return toVectorRecord(result.data, result.data.chunks);
}

/**
 * Bulk-load variant of `decodeRecord`: chunks that fail validation are
 * dropped and described, the valid ones are kept.
 *
 * @throws MalformedRecordError when the record-level fields are invalid
 */
export function decodeRecordChunks(value: unknown, origin: string): PartialDecode {
  const header = PersistedRecordHeaderSchema.safeParse(value);
  if (!header.success) {
    throw new MalformedRecordError(origin, formatIssues(header.error));
  }

  const chunks: PersistedChunk[] = [];
  const droppedChunks: string[] = [];
  header.data.chunks.forEach((raw, position) => {
    const chunk = PersistedChunkSchema.safeParse(raw);
    if (chunk.success) {
      chunks.push(chunk.data);
    } else {
      droppedChunks.push(`chunks.${position}: ${formatIssues(chunk.error)}`);
    }
  });

  return { record: toVectorRecord(header.data, chunks), droppedChunks };
}

export function assertRecordKey(filename: string, record: VectorRecord): void {
  if (!filename) {
    throw new UsageError('Record filename must not be empty');
  }
  if (record.filename !== filename) {
    throw new UsageError(
      `Record filename "${record.filename}" does not match store key "${filename}"`,
    );
  }
}

export function summarizeRecords(
  backend: StoreBackend,
  location: string,
  records: VectorRecord[],
): StoreInfo {
  const dimensions = new Set<number>();
  let chunkCount = 0;
  for (const record of records) {
    chunkCount += record.chunks.length;
    for (const chunk of record.chunks) {
      dimensions.add(chunk.embedding.length);
    }
  }
  return {
    backend,
    location,
    recordCount: records.length,
    chunkCount,
    dimensions: [...dimensions].sort((a, b) => a - b),
  };
}
