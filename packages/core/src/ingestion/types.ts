import type { IngestStatus } from '@docvault/shared';

export interface IngestConfig {
  chunkSize: number;
  chunkOverlap: number;
  snippetMaxChars?: number;
}

export interface IngestResult {
  filename: string;
  status: IngestStatus;
  chunkCount: number;
  /** Human-readable outcome; the failure reason when `status` is `failed` */
  message: string;
  checksum?: string;
}

export interface DocumentInput {
  filename: string;
  text: unknown;
}

/** Anything holding derived state that must be dropped after a store write */
export interface CacheInvalidator {
  invalidate(): void;
}
