import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runCli } from '../src';

const PROJECT_CONFIG = `
knowledgeDir: knowledge
storage:
  backend: json
  path: vectors
embeddings:
  provider: local-hash
  dims: 64
chunking:
  chunkSize: 40
  chunkOverlap: 10
logging:
  level: silent
`;

describe('docvault CLI', () => {
  let workDir: string;
  let knowledgeDir: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  const run = (...args: string[]) => runCli(['node', 'docvault', ...args], { cwd: workDir });

  const lastJson = (): unknown => {
    const calls = logSpy.mock.calls;
    return JSON.parse(String(calls[calls.length - 1][0]));
  };

  const errors = () => errSpy.mock.calls.map((call) => String(call[0]));

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docvault-cli-'));
    knowledgeDir = path.join(workDir, 'knowledge');
    await fs.mkdir(knowledgeDir);
    await fs.writeFile(path.join(workDir, '.docvault.yaml'), PROJECT_CONFIG);
    await fs.writeFile(path.join(knowledgeDir, 'alpha.md'), 'Cats purr when they are content.\n');
    await fs.writeFile(path.join(knowledgeDir, 'beta.txt'), 'Rust prevents data races.\n');

    vi.spyOn(os, 'homedir').mockReturnValue(workDir);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('ingest', () => {
    it('ingests every document with --all and skips them on the second run', async () => {
      expect(await run('--json', 'ingest', '--all')).toBe(0);
      const first = lastJson();
      expect(first).toEqual([
        expect.objectContaining({ filename: 'alpha.md', status: 'created', chunkCount: 1 }),
        expect.objectContaining({ filename: 'beta.txt', status: 'created', chunkCount: 1 }),
      ]);

      expect(await run('--json', 'ingest', '--all')).toBe(0);
      expect(lastJson()).toEqual([
        expect.objectContaining({ filename: 'alpha.md', status: 'skipped_duplicate' }),
        expect.objectContaining({ filename: 'beta.txt', status: 'skipped_duplicate' }),
      ]);
    });

    it('applies --chunk-size and --chunk-overlap', async () => {
      expect(
        await run('--json', 'ingest', 'alpha.md', '--chunk-size', '20', '--chunk-overlap', '5'),
      ).toBe(0);
      // "Cats purr when they are content." is 32 characters: [0,20) and [15,32)
      expect(lastJson()).toEqual([
        expect.objectContaining({ filename: 'alpha.md', status: 'created', chunkCount: 2 }),
      ]);
    });

    it('reports failed files and exits with 1', async () => {
      expect(await run('--json', 'ingest', 'alpha.md', 'missing.md')).toBe(1);
      expect(lastJson()).toEqual([
        expect.objectContaining({ filename: 'alpha.md', status: 'created' }),
        expect.objectContaining({ filename: 'missing.md', status: 'failed', chunkCount: 0 }),
      ]);
      expect(errors()).toContain('1 of 2 documents failed to ingest');
    });

    it('prints one line per file in human mode', async () => {
      expect(await run('ingest', 'alpha.md')).toBe(0);
      const lines = logSpy.mock.calls.map((call) => String(call[0]));
      expect(lines.some((line) => line.includes('alpha.md') && line.includes('Ingested 1 chunks'))).toBe(
        true,
      );
      expect(lines[lines.length - 1]).toBe('\n1 created, 0 updated, 0 unchanged, 0 failed');
    });

    it('rejects a call with neither files nor --all', async () => {
      expect(await run('ingest')).toBe(2);
      expect(errors()[0]).toBe('Error: Nothing to ingest: pass file names or --all');
    });

    it('rejects a non-numeric chunk size as a ConfigError', async () => {
      expect(await run('--json', 'ingest', '--all', '--chunk-size', 'abc')).toBe(2);
      expect(lastJson()).toEqual({
        error: {
          code: 'ConfigError',
          message: '--chunk-size must be an integer of at least 1, got "abc"',
        },
      });
    });

    it('rejects an overlap that is not smaller than the chunk size', async () => {
      expect(
        await run('--json', 'ingest', '--all', '--chunk-size', '10', '--chunk-overlap', '10'),
      ).toBe(2);
      expect(lastJson()).toEqual({
        error: expect.objectContaining({ code: 'ConfigError' }),
      });
    });
  });

  describe('list', () => {
    it('reports new, ingested, changed and orphaned documents', async () => {
      await run('ingest', '--all');
      await fs.writeFile(path.join(knowledgeDir, 'beta.txt'), 'Rust prevents data races at compile time.\n');
      await fs.writeFile(path.join(knowledgeDir, 'gamma.md'), 'Go has goroutines.\n');
      await fs.rm(path.join(knowledgeDir, 'alpha.md'));

      expect(await run('--json', 'list')).toBe(0);
      const listing = lastJson();
      expect(listing).toEqual([
        expect.objectContaining({ filename: 'beta.txt', state: 'changed', chunkCount: 1 }),
        expect.objectContaining({ filename: 'gamma.md', state: 'new' }),
        expect.objectContaining({ filename: 'alpha.md', state: 'orphaned', chunkCount: 1 }),
      ]);
    });

    it('marks ingested documents', async () => {
      await run('ingest', 'alpha.md');
      expect(await run('--json', 'list')).toBe(0);
      expect(lastJson()).toEqual([
        expect.objectContaining({ filename: 'alpha.md', state: 'ingested' }),
        expect.objectContaining({ filename: 'beta.txt', state: 'new' }),
      ]);
    });
  });

  describe('ask', () => {
    it('answers with the top matches as JSON', async () => {
      await run('ingest', '--all');
      expect(await run('ask', 'why', 'do', 'cats', 'purr', '--k', '1')).toBe(0);

      const output = lastJson();
      expect(output).toMatchObject({
        question: 'why do cats purr',
        skipped: { dimensionMismatch: 0 },
      });
      expect(output).not.toHaveProperty('references');
    });

    it('adds a reference table with --references', async () => {
      await run('ingest', '--all');
      expect(await run('ask', 'cats', '--k', '2', '--references')).toBe(0);

      const output = lastJson();
      expect(output).toHaveProperty('matches');
      expect(output).toHaveProperty(
        'references',
        expect.stringContaining('| filename | checksum | index | char_start | char_end | score |'),
      );
    });

    it('rejects a k of zero', async () => {
      expect(await run('--json', 'ask', 'cats', '--k', '0')).toBe(2);
      expect(lastJson()).toEqual({
        error: {
          code: 'ConfigError',
          message: '--k must be an integer of at least 1, got "0"',
        },
      });
    });
  });

  describe('status', () => {
    it('reports backend, counts and dimensions', async () => {
      await run('ingest', '--all');
      expect(await run('--json', 'status')).toBe(0);
      expect(lastJson()).toEqual({
        backend: 'json',
        location: path.join(workDir, 'vectors'),
        recordCount: 2,
        chunkCount: 2,
        dimensions: [64],
        knowledgeDir,
        embedder: 'local-hash:64',
      });
    });
  });

  describe('remove', () => {
    it('deletes a stored record', async () => {
      await run('ingest', '--all');
      expect(await run('--json', 'remove', 'alpha.md')).toBe(0);
      expect(lastJson()).toEqual({ filename: 'alpha.md', removed: true });

      expect(await run('--json', 'remove', 'alpha.md')).toBe(1);
      expect(lastJson()).toEqual({ filename: 'alpha.md', removed: false });
    });
  });

  it('exits with 2 on an unknown command', async () => {
    expect(await run('frobnicate')).toBe(2);
  });

  it('reports a missing --config file as a ConfigError', async () => {
    expect(await run('--json', '--config', 'nope.yaml', 'status')).toBe(2);
    expect(lastJson()).toEqual({
      error: expect.objectContaining({ code: 'ConfigError' }),
    });
  });
});
