import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import { ConfigError, UsageError } from '@docvault/shared';
import { MemoryRecordStore, type VectorRecord } from '@docvault/store';
import { IngestionOrchestrator } from '../ingestion/orchestrator';
import { RetrievalEngine } from './engine';
import { LetterEmbedder, TableEmbedder } from '../__fixtures__/embedders';
import { mockLogger } from '../__fixtures__/logger';

function letters(length: number): string {
  return Array.from({ length }, (_, i) => String.fromCharCode(97 + (i % 26))).join('');
}

function record(filename: string, embeddings: number[][], snippet = filename): VectorRecord {
  return {
    filename,
    checksum: `sum-${filename}`,
    ingestTimestamp: '2026-03-01T12:00:00.000Z',
    chunks: embeddings.map((embedding, index) => ({
      index,
      charStart: index * 10,
      charEnd: index * 10 + 10,
      snippet: `${snippet} #${index}`,
      embedding,
    })),
  };
}

describe('RetrievalEngine', () => {
  let store: MemoryRecordStore;
  let logs: ReturnType<typeof mockLogger>;

  beforeEach(() => {
    store = new MemoryRecordStore();
    logs = mockLogger();
  });

  describe('with ingested documents', () => {
    const text = letters(100);
    let embedder: LetterEmbedder;
    let orchestrator: IngestionOrchestrator;
    let engine: RetrievalEngine;

    beforeEach(async () => {
      embedder = new LetterEmbedder();
      orchestrator = new IngestionOrchestrator({ store, embedder, logger: logs.logger });
      engine = new RetrievalEngine({ store, embedder, logger: logs.logger });
      orchestrator.registerCache(engine);
      await orchestrator.ingest('guide.md', text, { chunkSize: 40, chunkOverlap: 10 });
    });

    it('finds the chunk a question was taken from', async () => {
      const result = await engine.answer(text.slice(30, 70), 1);

      expect(result.matches).toHaveLength(1);
      expect(result.matches[0]).toMatchObject({
        filename: 'guide.md',
        index: 1,
        charStart: 30,
        charEnd: 70,
        link: './guide.md#chars=30-70',
      });
      expect(result.matches[0].score).toBeCloseTo(1, 10);
      expect(result.answer).toBe(text.slice(30, 70));
    });

    it('returns every candidate, ranked, when k exceeds them', async () => {
      const { matches } = await engine.search(text.slice(30, 70), 10);

      expect(matches.map((m) => m.index)).toHaveLength(3);
      expect(matches[0].index).toBe(1);
      expect(matches[0].score).toBeGreaterThanOrEqual(matches[1].score);
      expect(matches[1].score).toBeGreaterThanOrEqual(matches[2].score);
    });

    it('reuses the cached index until a write invalidates it', async () => {
      const allRecords = vi.spyOn(store, 'allRecords');

      await engine.search('abc', 1);
      await engine.search('xyz', 1);
      expect(allRecords).toHaveBeenCalledTimes(1);

      await orchestrator.ingest('other.md', 'zzzz', { chunkSize: 40, chunkOverlap: 10 });
      const { matches } = await engine.search('zzz', 1);
      expect(allRecords).toHaveBeenCalledTimes(2);
      expect(matches[0].filename).toBe('other.md');
    });

    it('reloads after an explicit invalidate', async () => {
      const allRecords = vi.spyOn(store, 'allRecords');
      await engine.search('abc', 1);

      engine.invalidate();
      await engine.search('abc', 1);

      expect(allRecords).toHaveBeenCalledTimes(2);
    });

    it('logs the answered query', async () => {
      await engine.answer('abc', 2);

      expect(logs.log).toHaveBeenCalledWith(
        expect.objectContaining({
          type: 'QueryAnswered',
          payload: expect.objectContaining({
            k: 2,
            candidateCount: 3,
            matchCount: 2,
            skippedDimensionMismatch: 0,
          }),
        }),
      );
    });
  });

  it('answers with nothing from an empty store', async () => {
    const embedder = new LetterEmbedder();
    const engine = new RetrievalEngine({ store, embedder, logger: logs.logger });

    await expect(engine.answer('anything', 3)).resolves.toEqual({
      question: 'anything',
      answer: '',
      matches: [],
      skipped: { dimensionMismatch: 0 },
    });
    expect(embedder.calls).toBe(0);
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects k=%s', async (k) => {
    const engine = new RetrievalEngine({ store, embedder: new LetterEmbedder() });

    await expect(engine.answer('question', k)).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects an empty question', async () => {
    const engine = new RetrievalEngine({ store, embedder: new LetterEmbedder() });

    await expect(engine.answer('   ', 3)).rejects.toBeInstanceOf(UsageError);
  });

  it('breaks score ties by filename, then chunk index', async () => {
    await store.put('b.md', record('b.md', [[1, 0], [3, 0]]));
    await store.put('a.md', record('a.md', [[2, 0], [0, 1]]));
    const engine = new RetrievalEngine({
      store,
      embedder: new TableEmbedder({ q: [1, 0] }),
      logger: logs.logger,
    });

    const { matches } = await engine.search('q', 4);

    expect(matches.map((m) => [m.filename, m.index, m.score])).toEqual([
      ['a.md', 0, 1],
      ['b.md', 0, 1],
      ['b.md', 1, 1],
      ['a.md', 1, 0],
    ]);
  });

  it('skips chunks with a different embedding dimension', async () => {
    await store.put('new.md', record('new.md', [[1, 0]]));
    await store.put('old.md', record('old.md', [[1, 0, 0], [0, 1, 0]]));
    const engine = new RetrievalEngine({
      store,
      embedder: new TableEmbedder({ q: [1, 0] }),
      logger: logs.logger,
    });

    const result = await engine.answer('q', 5);

    expect(result.matches.map((m) => m.filename)).toEqual(['new.md']);
    expect(result.skipped).toEqual({ dimensionMismatch: 2 });
    expect(logs.warn).toHaveBeenCalledTimes(1);
    expect(logs.warn).toHaveBeenCalledWith(
      'Skipping chunks of old.md: Embedding dimension mismatch: expected 2, got 3',
    );
  });

  it('scores every chunk 0 for a query without features', async () => {
    await store.put('a.md', record('a.md', [[1, 0]]));
    const engine = new RetrievalEngine({
      store,
      embedder: new TableEmbedder({ '...': [0, 0] }),
      logger: logs.logger,
    });

    const { matches } = await engine.search('...', 1);

    expect(matches[0].score).toBe(0);
  });

  it('deduplicates snippets and caps the answer', async () => {
    await store.put('a.md', record('a.md', [[1, 0], [1, 0]], 'same words here'));
    await store.put('b.md', record('b.md', [[1, 0]], 'same words here'));
    const engine = new RetrievalEngine({
      store,
      embedder: new TableEmbedder({ q: [1, 0] }),
      maxAnswerChars: 20,
      logger: logs.logger,
    });

    const result = await engine.answer('q', 3);

    // snippets: "same words here #0", "same words here #1", "same words here #0"
    expect(result.answer).toBe('same words here...');
  });

  it('links to files in the knowledge directory', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docvault-engine-'));
    try {
      await fs.writeFile(path.join(dir, 'a.md'), 'text');
      await store.put('a.md', record('a.md', [[1, 0]]));
      const engine = new RetrievalEngine({
        store,
        embedder: new TableEmbedder({ q: [1, 0] }),
        knowledgeDir: dir,
        logger: logs.logger,
      });

      const { matches } = await engine.search('q', 1);

      expect(matches[0].link).toBe(`${pathToFileURL(path.join(dir, 'a.md')).href}#chars=0-10`);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('uses the default k', async () => {
    await store.put('a.md', record('a.md', [[1, 0], [1, 1], [0, 1], [1, 2]]));
    const engine = new RetrievalEngine({
      store,
      embedder: new TableEmbedder({ q: [1, 0] }),
      defaultTopK: 2,
      logger: logs.logger,
    });

    const { matches } = await engine.answer('q');

    expect(matches.map((m) => m.index)).toEqual([0, 1]);
  });
});
