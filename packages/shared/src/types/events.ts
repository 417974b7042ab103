/**
 * Base interface for all docvault events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Event type discriminator */
  type: string;
}

export type IngestStatus = 'created' | 'skipped_duplicate' | 'updated' | 'failed';

/** Emitted after a document has been processed by the ingestion orchestrator */
export interface DocumentIngested extends BaseEvent {
  type: 'DocumentIngested';
  payload: {
    filename: string;
    status: Exclude<IngestStatus, 'failed'>;
    checksum: string;
    chunkCount: number;
    durationMs: number;
  };
}

/** Emitted when ingestion of a single document fails */
export interface DocumentIngestFailed extends BaseEvent {
  type: 'DocumentIngestFailed';
  payload: {
    filename: string;
    errorCode: string;
    message: string;
  };
}

/** Emitted when a stored record is deleted */
export interface DocumentRemoved extends BaseEvent {
  type: 'DocumentRemoved';
  payload: {
    filename: string;
  };
}

/** Emitted when the retrieval engine (re)loads its in-memory index */
export interface RetrievalIndexLoaded extends BaseEvent {
  type: 'RetrievalIndexLoaded';
  payload: {
    recordCount: number;
    chunkCount: number;
    durationMs: number;
  };
}

/** Emitted after a question has been answered */
export interface QueryAnswered extends BaseEvent {
  type: 'QueryAnswered';
  payload: {
    k: number;
    candidateCount: number;
    matchCount: number;
    skippedDimensionMismatch: number;
    durationMs: number;
  };
}

export type DocvaultEvent =
  | DocumentIngested
  | DocumentIngestFailed
  | DocumentRemoved
  | RetrievalIndexLoaded
  | QueryAnswered;

export type DocvaultEventType = DocvaultEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common envelope fields for a new event.
 */
export function eventEnvelope(now: Date = new Date()): Pick<BaseEvent, 'schemaVersion' | 'timestamp'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: now.toISOString(),
  };
}
