import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import {
  AppError,
  MalformedRecordError,
  StoreError,
  errorMessage,
  logger as defaultLogger,
  type Logger,
} from '@docvault/shared';
import { CREATE_TABLES_SQL } from './schema';
import {
  assertRecordKey,
  decodeRecord,
  decodeRecordChunks,
  encodeRecord,
  type PersistedRecord,
} from './codec';
import type { StoreInfo, VectorRecord, VectorRecordStore } from './types';

const IN_MEMORY = ':memory:';

const RecordRowSchema = z.object({
  filename: z.string(),
  checksum: z.string(),
  ingest_timestamp: z.string(),
  chunk_size: z.number().nullable(),
  chunk_overlap: z.number().nullable(),
  embedding_model: z.string().nullable(),
  embedding_dimension: z.number().nullable(),
});

const ChunkRowSchema = z.object({
  chunk_index: z.number(),
  char_start: z.number(),
  char_end: z.number(),
  snippet: z.string(),
  embedding_b64: z.string(),
});

const CountRowSchema = z.object({ count: z.number() });

// Vectors are stored as little-endian float64 so they read back bit-identical.
function vectorToBase64(vector: number[]): string {
  const buffer = Buffer.alloc(vector.length * Float64Array.BYTES_PER_ELEMENT);
  vector.forEach((value, i) => buffer.writeDoubleLE(value, i * Float64Array.BYTES_PER_ELEMENT));
  return buffer.toString('base64');
}

/** `null` when the byte length is not a whole number of doubles */
function base64ToVector(base64: string): number[] | null {
  const buffer = Buffer.from(base64, 'base64');
  if (buffer.length % Float64Array.BYTES_PER_ELEMENT !== 0) {
    return null;
  }
  const vector: number[] = [];
  for (let offset = 0; offset < buffer.length; offset += Float64Array.BYTES_PER_ELEMENT) {
    vector.push(buffer.readDoubleLE(offset));
  }
  return vector;
}

function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== IN_MEMORY) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
    }
    db.exec(CREATE_TABLES_SQL);
    return db;
  } catch (error) {
    throw new StoreError(`Failed to open SQLite store ${dbPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export interface SqliteRecordStoreOptions {
  logger?: Logger;
}

/**
 * better-sqlite3 backend: one row per record plus one row per chunk.
 * A record's rows are replaced inside a single transaction.
 */
export class SqliteRecordStore implements VectorRecordStore {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(
    readonly dbPath: string,
    options: SqliteRecordStoreOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.db = openDatabase(dbPath);
  }

  async get(filename: string): Promise<VectorRecord | undefined> {
    return this.withStoreErrors('read', () => {
      const stored = this.readRows(filename);
      return stored && decodeRecord(stored.value, stored.origin);
    });
  }

  async put(filename: string, record: VectorRecord): Promise<void> {
    assertRecordKey(filename, record);
    const persisted = encodeRecord(record);
    this.withStoreErrors('write', () => this.replaceRecord(persisted));
  }

  async delete(filename: string): Promise<boolean> {
    return this.withStoreErrors('delete', () => {
      const remove = this.db.transaction((key: string) => {
        this.db.prepare('DELETE FROM vector_chunks WHERE filename = ?').run(key);
        return this.db.prepare('DELETE FROM vector_records WHERE filename = ?').run(key).changes;
      });
      return remove(filename) > 0;
    });
  }

  async listFilenames(): Promise<Set<string>> {
    return this.withStoreErrors('list', () => {
      const rows = this.db.prepare('SELECT filename FROM vector_records').all();
      return new Set(rows.map((row) => z.object({ filename: z.string() }).parse(row).filename));
    });
  }

  /**
   * Every decodable record, ordered by filename. Malformed records are
   * skipped and invalid chunks dropped, each with a warning.
   */
  async allRecords(): Promise<VectorRecord[]> {
    const filenames = [...(await this.listFilenames())].sort();
    const records: VectorRecord[] = [];
    for (const filename of filenames) {
      try {
        const stored = this.withStoreErrors('read', () => this.readRows(filename));
        if (stored === undefined) {
          continue;
        }
        const { record, droppedChunks } = decodeRecordChunks(stored.value, stored.origin);
        for (const reason of droppedChunks) {
          await this.logger.warn(`Dropping malformed chunk of ${filename}: ${reason}`);
        }
        records.push(record);
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) {
          throw error;
        }
        await this.logger.warn(`Skipping malformed record: ${error.message}`);
      }
    }
    return records;
  }

  async info(): Promise<StoreInfo> {
    return this.withStoreErrors('inspect', () => {
      const count = (sql: string) => CountRowSchema.parse(this.db.prepare(sql).get()).count;
      const dimensions = this.db
        .prepare('SELECT DISTINCT embedding_dim AS dim FROM vector_chunks ORDER BY dim')
        .all()
        .map((row) => z.object({ dim: z.number() }).parse(row).dim);
      return {
        backend: 'sqlite' as const,
        location: this.dbPath,
        recordCount: count('SELECT COUNT(*) AS count FROM vector_records'),
        chunkCount: count('SELECT COUNT(*) AS count FROM vector_chunks'),
        dimensions,
      };
    });
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  /**
   * Loads a record's rows in the persisted shape, leaving validation to the
   * codec. Chunk rows that cannot be converted are passed through as they
   * are so the codec reports them.
   */
  private readRows(filename: string): { origin: string; value: unknown } | undefined {
    const origin = `${this.dbPath}#${filename}`;
    const row = this.db.prepare('SELECT * FROM vector_records WHERE filename = ?').get(filename);
    if (row === undefined) {
      return undefined;
    }
    const recordRow = RecordRowSchema.safeParse(row);
    if (!recordRow.success) {
      throw new MalformedRecordError(origin, recordRow.error.message);
    }

    const chunks = this.db
      .prepare('SELECT * FROM vector_chunks WHERE filename = ? ORDER BY chunk_index')
      .all(filename)
      .map((raw): unknown => {
        const chunkRow = ChunkRowSchema.safeParse(raw);
        if (!chunkRow.success) {
          return raw;
        }
        return {
          index: chunkRow.data.chunk_index,
          char_start: chunkRow.data.char_start,
          char_end: chunkRow.data.char_end,
          snippet: chunkRow.data.snippet,
          embedding: base64ToVector(chunkRow.data.embedding_b64),
        };
      });

    const data = recordRow.data;
    return {
      origin,
      value: {
        filename: data.filename,
        checksum: data.checksum,
        ingest_timestamp: data.ingest_timestamp,
        chunk_size: data.chunk_size ?? undefined,
        chunk_overlap: data.chunk_overlap ?? undefined,
        embedding_model: data.embedding_model ?? undefined,
        embedding_dimension: data.embedding_dimension ?? undefined,
        chunks,
      },
    };
  }

  private replaceRecord(record: PersistedRecord): void {
    const replace = this.db.transaction((next: PersistedRecord) => {
      this.db.prepare('DELETE FROM vector_chunks WHERE filename = ?').run(next.filename);
      this.db
        .prepare(
          `INSERT OR REPLACE INTO vector_records
             (filename, checksum, ingest_timestamp, chunk_size, chunk_overlap, embedding_model, embedding_dimension)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          next.filename,
          next.checksum,
          next.ingest_timestamp,
          next.chunk_size ?? null,
          next.chunk_overlap ?? null,
          next.embedding_model ?? null,
          next.embedding_dimension ?? null,
        );
      const insertChunk = this.db.prepare(
        'INSERT INTO vector_chunks (filename, chunk_index, char_start, char_end, snippet, embedding_dim, embedding_b64) VALUES (?, ?, ?, ?, ?, ?, ?)',
      );
      for (const chunk of next.chunks) {
        insertChunk.run(
          next.filename,
          chunk.index,
          chunk.char_start,
          chunk.char_end,
          chunk.snippet,
          chunk.embedding.length,
          vectorToBase64(chunk.embedding),
        );
      }
    });
    replace(record);
  }

  private withStoreErrors<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new StoreError(`Failed to ${action} SQLite store ${this.dbPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
