import { promises as fs } from 'fs';
import path from 'path';
import {
  atomicWriteJson,
  MalformedRecordError,
  StoreError,
  errorMessage,
  logger as defaultLogger,
  type Logger,
} from '@docvault/shared';
import {
  assertRecordKey,
  decodeRecord,
  decodeRecordChunks,
  encodeRecord,
  summarizeRecords,
} from './codec';
import type { StoreInfo, VectorRecord, VectorRecordStore } from './types';

const RECORD_EXTENSION = '.json';

export interface JsonFileRecordStoreOptions {
  logger?: Logger;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * One JSON file per document under `directory`. File names are the
 * URI-encoded document filename, so any filename maps to a flat entry.
 */
export class JsonFileRecordStore implements VectorRecordStore {
  private readonly logger: Logger;

  constructor(
    readonly directory: string,
    options: JsonFileRecordStoreOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  recordPath(filename: string): string {
    return path.join(this.directory, `${encodeURIComponent(filename)}${RECORD_EXTENSION}`);
  }

  async get(filename: string): Promise<VectorRecord | undefined> {
    const stored = await this.readStored(filename);
    if (stored === undefined) {
      return undefined;
    }
    const record = decodeRecord(stored.value, stored.filePath);
    this.assertStoredName(filename, record, stored.filePath);
    return record;
  }

  async put(filename: string, record: VectorRecord): Promise<void> {
    assertRecordKey(filename, record);
    const filePath = this.recordPath(filename);
    try {
      await atomicWriteJson(filePath, encodeRecord(record));
    } catch (error) {
      throw new StoreError(`Failed to write record ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async delete(filename: string): Promise<boolean> {
    const filePath = this.recordPath(filename);
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return false;
      }
      throw new StoreError(`Failed to delete record ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async listFilenames(): Promise<Set<string>> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return new Set();
      }
      throw new StoreError(`Failed to list ${this.directory}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const filenames = new Set<string>();
    for (const entry of entries) {
      // Temp files from atomic writes carry no extension, so they never match.
      if (!entry.endsWith(RECORD_EXTENSION)) {
        continue;
      }
      try {
        filenames.add(decodeURIComponent(entry.slice(0, -RECORD_EXTENSION.length)));
      } catch (error) {
        await this.logger.warn(`Ignoring unrecognised record file ${entry}: ${errorMessage(error)}`);
      }
    }
    return filenames;
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
        const stored = await this.readStored(filename);
        if (stored === undefined) {
          continue;
        }
        const { record, droppedChunks } = decodeRecordChunks(stored.value, stored.filePath);
        this.assertStoredName(filename, record, stored.filePath);
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
    return summarizeRecords('json', this.directory, await this.allRecords());
  }

  async close(): Promise<void> {}

  private async readStored(
    filename: string,
  ): Promise<{ filePath: string; value: unknown } | undefined> {
    const filePath = this.recordPath(filename);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return undefined;
      }
      throw new StoreError(`Failed to read record ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      return { filePath, value: JSON.parse(raw) };
    } catch (error) {
      throw new MalformedRecordError(filePath, errorMessage(error), { cause: error });
    }
  }

  private assertStoredName(filename: string, record: VectorRecord, filePath: string): void {
    if (record.filename !== filename) {
      throw new MalformedRecordError(
        filePath,
        `filename "${record.filename}" does not match "${filename}"`,
      );
    }
  }
}
