import type { Embedder } from '@docvault/adapters';

/**
 * Deterministic 3-dimensional embedder: counts of vowels, consonants and
 * everything else. Distinct enough for ranking tests.
 */
export class CountingEmbedder implements Embedder {
  readonly calls: string[][] = [];

  constructor(private readonly identity = 'counting:3') {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => {
      const vowels = (text.match(/[aeiou]/gi) ?? []).length;
      const consonants = (text.match(/[b-df-hj-np-tv-z]/gi) ?? []).length;
      return [vowels, consonants, text.length - vowels - consonants];
    });
  }

  dims(): number {
    return 3;
  }

  id(): string {
    return this.identity;
  }
}

/** Embedder whose vectors are looked up from a fixed table */
export class TableEmbedder implements Embedder {
  constructor(
    private readonly table: Record<string, number[]>,
    private readonly dimensions = 2,
  ) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => {
      const vector = this.table[text];
      if (!vector) {
        throw new Error(`No vector for "${text}"`);
      }
      return vector;
    });
  }

  dims(): number {
    return this.dimensions;
  }

  id(): string {
    return `table:${this.dimensions}`;
  }
}

/** Letter-frequency vectors over a-z; other characters are ignored */
export class LetterEmbedder implements Embedder {
  calls = 0;

  async embedTexts(texts: string[]): Promise<number[][]> {
    this.calls++;
    return texts.map((text) => {
      const vector = new Array<number>(26).fill(0);
      for (const char of text.toLowerCase()) {
        const code = char.charCodeAt(0) - 97;
        if (code >= 0 && code < 26) {
          vector[code]++;
        }
      }
      return vector;
    });
  }

  dims(): number {
    return 26;
  }

  id(): string {
    return 'letters:26';
  }
}
