import type { Logger, StorageConfig } from '@docvault/shared';
import { MemoryRecordStore } from './memory_store';
import { JsonFileRecordStore } from './json_store';
import { SqliteRecordStore } from './sqlite_store';
import type { VectorRecordStore } from './types';

export interface CreateRecordStoreOptions {
  logger?: Logger;
}

export function createRecordStore(
  config: StorageConfig,
  options: CreateRecordStoreOptions = {},
): VectorRecordStore {
  switch (config.backend) {
    case 'memory':
      return new MemoryRecordStore();
    case 'json':
      return new JsonFileRecordStore(config.path, { logger: options.logger });
    case 'sqlite':
      return new SqliteRecordStore(config.path, { logger: options.logger });
    default:
      throw new Error(`Unsupported storage backend: ${String(config.backend)}`);
  }
}
