export const name = '@docvault/store';

export type {
  EmbeddedChunk,
  VectorRecord,
  VectorRecordStore,
  StoreInfo,
  StoreBackend,
} from './types';
export {
  PersistedRecordSchema,
  encodeRecord,
  decodeRecord,
  decodeRecordChunks,
  assertRecordKey,
  type PersistedRecord,
  type PartialDecode,
} from './codec';
export { MemoryRecordStore } from './memory_store';
export { JsonFileRecordStore, type JsonFileRecordStoreOptions } from './json_store';
export { SqliteRecordStore, type SqliteRecordStoreOptions } from './sqlite_store';
export { createRecordStore, type CreateRecordStoreOptions } from './factory';
