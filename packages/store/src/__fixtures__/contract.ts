import { UsageError } from '@docvault/shared';
import type { VectorRecordStore } from '../types';
import { makeRecord } from './records';

/**
 * Behaviour every backend shares. Each backend's test file runs it against
 * a fresh store.
 */
export function describeRecordStoreContract(
  label: string,
  createStore: () => Promise<VectorRecordStore>,
): void {
  describe(`${label} (store contract)`, () => {
    let store: VectorRecordStore;

    beforeEach(async () => {
      store = await createStore();
    });

    afterEach(async () => {
      await store.close();
    });

    it('returns undefined for an unknown filename', async () => {
      await expect(store.get('missing.md')).resolves.toBeUndefined();
    });

    it('round-trips a record', async () => {
      const record = makeRecord('guide.md');
      await store.put('guide.md', record);

      await expect(store.get('guide.md')).resolves.toEqual(record);
    });

    it('replaces a record as a whole', async () => {
      await store.put('guide.md', makeRecord('guide.md'));
      const replacement = makeRecord('guide.md', {
        checksum: 'checksum-2',
        chunks: [{ index: 0, charStart: 0, charEnd: 12, snippet: 'only', embedding: [1, 0, 0] }],
      });
      await store.put('guide.md', replacement);

      const stored = await store.get('guide.md');
      expect(stored?.checksum).toBe('checksum-2');
      expect(stored?.chunks).toEqual(replacement.chunks);
    });

    it('does not share references with callers', async () => {
      const record = makeRecord('guide.md');
      await store.put('guide.md', record);
      record.chunks[0].embedding[0] = 99;

      const stored = await store.get('guide.md');
      expect(stored?.chunks[0].embedding[0]).toBe(0.1);
    });

    it('rejects a record stored under a different key', async () => {
      await expect(store.put('other.md', makeRecord('guide.md'))).rejects.toBeInstanceOf(
        UsageError,
      );
    });

    it('lists filenames and returns all records ordered by filename', async () => {
      await store.put('b.md', makeRecord('b.md'));
      await store.put('a b/c.txt', makeRecord('a b/c.txt'));

      await expect(store.listFilenames()).resolves.toEqual(new Set(['b.md', 'a b/c.txt']));
      const records = await store.allRecords();
      expect(records.map((r) => r.filename)).toEqual(['a b/c.txt', 'b.md']);
    });

    it('deletes records', async () => {
      await store.put('guide.md', makeRecord('guide.md'));

      await expect(store.delete('guide.md')).resolves.toBe(true);
      await expect(store.delete('guide.md')).resolves.toBe(false);
      await expect(store.get('guide.md')).resolves.toBeUndefined();
    });

    it('reports record and chunk counts', async () => {
      await store.put('a.md', makeRecord('a.md'));
      await store.put(
        'b.md',
        makeRecord('b.md', {
          chunks: [{ index: 0, charStart: 0, charEnd: 4, snippet: 'tiny', embedding: [1, 0] }],
        }),
      );

      const info = await store.info();
      expect(info.recordCount).toBe(2);
      expect(info.chunkCount).toBe(3);
      expect(info.dimensions).toEqual([2, 3]);
    });
  });
}
