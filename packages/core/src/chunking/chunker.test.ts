import { ConfigError } from '@docvault/shared';
import { chunkText } from './chunker';

function letters(length: number): string {
  return Array.from({ length }, (_, i) => String.fromCharCode(97 + (i % 26))).join('');
}

describe('chunkText', () => {
  it('splits 100 characters with size 40 and overlap 10 into three windows', () => {
    const text = letters(100);
    const chunks = chunkText(text, 40, 10);

    expect(chunks.map((c) => [c.charStart, c.charEnd])).toEqual([
      [0, 40],
      [30, 70],
      [60, 100],
    ]);
    expect(chunks.map((c) => c.index)).toEqual([0, 1, 2]);
    expect(chunks[1].text).toBe(text.slice(30, 70));
  });

  it('returns no chunks for empty text', () => {
    expect(chunkText('', 10, 2)).toEqual([]);
  });

  it('returns a single chunk for text shorter than the chunk size', () => {
    expect(chunkText('short', 10, 2)).toEqual([
      { index: 0, charStart: 0, charEnd: 5, text: 'short', snippet: 'short' },
    ]);
  });

  it('ends with a shorter chunk when the text does not divide evenly', () => {
    const chunks = chunkText(letters(25), 10, 0);
    expect(chunks.map((c) => [c.charStart, c.charEnd])).toEqual([
      [0, 10],
      [10, 20],
      [20, 25],
    ]);
  });

  it('covers the text without gaps and overlaps consecutive chunks by the overlap', () => {
    for (const [length, size, overlap] of [
      [1, 1, 0],
      [97, 13, 5],
      [500, 64, 63],
      [1000, 1000, 200],
      [1001, 1000, 200],
    ]) {
      const text = letters(length);
      const chunks = chunkText(text, size, overlap);

      expect(chunks[0].charStart).toBe(0);
      expect(chunks[chunks.length - 1].charEnd).toBe(length);
      for (const chunk of chunks) {
        expect(chunk.charEnd - chunk.charStart).toBeLessThanOrEqual(size);
        expect(chunk.text).toBe(text.slice(chunk.charStart, chunk.charEnd));
      }
      for (let i = 1; i < chunks.length; i++) {
        expect(chunks[i].charStart).toBeGreaterThan(chunks[i - 1].charStart);
        expect(chunks[i].charStart).toBeLessThanOrEqual(chunks[i - 1].charEnd);
        if (i < chunks.length - 1) {
          expect(chunks[i - 1].charEnd - chunks[i].charStart).toBe(overlap);
        }
      }
    }
  });

  it('is deterministic', () => {
    const text = letters(321);
    expect(chunkText(text, 50, 7)).toEqual(chunkText(text, 50, 7));
  });

  it('caps snippets without changing the chunk text', () => {
    const [chunk] = chunkText('abcdefghij', 10, 0, { snippetMaxChars: 4 });
    expect(chunk.snippet).toBe('abcd');
    expect(chunk.text).toBe('abcdefghij');
  });

  it.each([
    [0, 0],
    [-5, 0],
    [10.5, 0],
    [10, 10],
    [10, 11],
    [10, -1],
  ])('rejects chunkSize=%s chunkOverlap=%s', (size, overlap) => {
    expect(() => chunkText('some text', size, overlap)).toThrow(ConfigError);
  });

  it('rejects a non-positive snippet cap', () => {
    expect(() => chunkText('some text', 10, 0, { snippetMaxChars: 0 })).toThrow(ConfigError);
  });
});
