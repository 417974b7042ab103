import { createRecordStore } from './factory';
import { MemoryRecordStore } from './memory_store';
import { JsonFileRecordStore } from './json_store';
import { SqliteRecordStore } from './sqlite_store';

describe('createRecordStore', () => {
  it('creates the memory backend', () => {
    expect(createRecordStore({ backend: 'memory', path: 'ignored' })).toBeInstanceOf(
      MemoryRecordStore,
    );
  });

  it('creates the JSON backend rooted at the configured path', () => {
    const store = createRecordStore({ backend: 'json', path: '/tmp/docvault-vectors' });
    expect(store).toBeInstanceOf(JsonFileRecordStore);
    expect(store instanceof JsonFileRecordStore && store.directory).toBe('/tmp/docvault-vectors');
  });

  it('creates the SQLite backend', async () => {
    const store = createRecordStore({ backend: 'sqlite', path: ':memory:' });
    expect(store).toBeInstanceOf(SqliteRecordStore);
    await store.close();
  });

  it('throws for unsupported backends', () => {
    expect(() => createRecordStore({ backend: 'redis' as never, path: 'x' })).toThrow(
      'Unsupported storage backend: redis',
    );
  });
});
