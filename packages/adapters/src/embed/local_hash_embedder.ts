import { createHash } from 'crypto';
import { ConfigError } from '@docvault/shared';
import type { Embedder } from './embedder';

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Offline reference embedder: signed feature hashing of lower-cased word
 * tokens into a fixed number of buckets, L2-normalised.
 *
 * Texts sharing vocabulary land close together, identical texts produce
 * identical vectors, and text without word characters maps to the zero vector.
 */
export class LocalHashEmbedder implements Embedder {
  constructor(private readonly dimensions: number = 384) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ConfigError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedText(text));
  }

  dims(): number {
    return this.dimensions;
  }

  id(): string {
    return `local-hash:${this.dimensions}`;
  }

  private embedText(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];

    for (const token of tokens) {
      const digest = createHash('sha256').update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      const sign = (digest.readUInt8(4) & 1) === 0 ? 1 : -1;
      vector[bucket] += sign;
    }

    return this.l2Normalize(vector);
  }

  private l2Normalize(arr: number[]): number[] {
    const sumOfSquares = arr.reduce((sum, val) => sum + val * val, 0);
    const norm = Math.sqrt(sumOfSquares);
    if (norm === 0) {
      return arr;
    }
    return arr.map((val) => val / norm);
  }
}
