import type { VectorRecord } from '../types';

export function makeRecord(filename: string, overrides: Partial<VectorRecord> = {}): VectorRecord {
  return {
    filename,
    checksum: 'checksum-1',
    ingestTimestamp: '2026-01-15T10:00:00.000Z',
    chunkSize: 40,
    chunkOverlap: 10,
    embedderId: 'local-hash:3',
    embeddingDimension: 3,
    chunks: [
      { index: 0, charStart: 0, charEnd: 40, snippet: 'first', embedding: [0.1, 0.2, 0.3] },
      { index: 1, charStart: 30, charEnd: 55, snippet: 'second', embedding: [-0.5, 0, 1 / 3] },
    ],
    ...overrides,
  };
}
