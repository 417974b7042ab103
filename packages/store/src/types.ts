export interface EmbeddedChunk {
  index: number;
  /** Half-open offsets into the normalised document text */
  charStart: number;
  charEnd: number;
  snippet: string;
  embedding: number[];
}

/**
 * Everything persisted for one document. A record is replaced as a whole,
 * never patched.
 */
export interface VectorRecord {
  filename: string;
  /** SHA-256 hex of the normalised text */
  checksum: string;
  /** ISO 8601 */
  ingestTimestamp: string;
  chunkSize?: number;
  chunkOverlap?: number;
  embedderId?: string;
  embeddingDimension?: number;
  chunks: EmbeddedChunk[];
}

export type StoreBackend = 'memory' | 'json' | 'sqlite';

export interface StoreInfo {
  backend: StoreBackend;
  location: string;
  recordCount: number;
  chunkCount: number;
  /** Distinct embedding dimensions across stored chunks, ascending */
  dimensions: number[];
}

/**
 * Keyed, per-document persistence. Writes are all-or-nothing: a reader sees
 * either the previous record or the new one.
 */
export interface VectorRecordStore {
  get(filename: string): Promise<VectorRecord | undefined>;
  put(filename: string, record: VectorRecord): Promise<void>;
  delete(filename: string): Promise<boolean>;
  listFilenames(): Promise<Set<string>>;
  /** Every readable record, ordered by filename. Malformed records are skipped. */
  allRecords(): Promise<VectorRecord[]>;
  info(): Promise<StoreInfo>;
  close(): Promise<void>;
}
