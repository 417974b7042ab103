import { decodeRecord, encodeRecord, assertRecordKey, summarizeRecords } from './codec';
import type { PersistedRecord } from './codec';
import type { StoreInfo, VectorRecord, VectorRecordStore } from './types';

/**
 * Process-local store. Records are kept in their persisted shape, so callers
 * never share references with the stored copy.
 */
export class MemoryRecordStore implements VectorRecordStore {
  private readonly records = new Map<string, PersistedRecord>();

  async get(filename: string): Promise<VectorRecord | undefined> {
    const stored = this.records.get(filename);
    return stored ? decodeRecord(stored, `memory:${filename}`) : undefined;
  }

  async put(filename: string, record: VectorRecord): Promise<void> {
    assertRecordKey(filename, record);
    this.records.set(filename, encodeRecord(record));
  }

  async delete(filename: string): Promise<boolean> {
    return this.records.delete(filename);
  }

  async listFilenames(): Promise<Set<string>> {
    return new Set(this.records.keys());
  }

  async allRecords(): Promise<VectorRecord[]> {
    return [...this.records.keys()]
      .sort()
      .map((filename) => decodeRecord(this.records.get(filename), `memory:${filename}`));
  }

  async info(): Promise<StoreInfo> {
    return summarizeRecords('memory', ':memory:', await this.allRecords());
  }

  async close(): Promise<void> {}
}
