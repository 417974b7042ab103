import { DimensionMismatchError } from '@docvault/shared';

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero magnitude.
 *
 * @throws DimensionMismatchError when the vectors differ in length
 */
export function cosineSimilarity(vecA: readonly number[], vecB: readonly number[]): number {
  if (vecA.length !== vecB.length) {
    throw new DimensionMismatchError(vecA.length, vecB.length);
  }

  let dotProduct = 0.0;
  let normA = 0.0;
  let normB = 0.0;

  for (let i = 0; i < vecA.length; i++) {
    dotProduct += vecA[i] * vecB[i];
    normA += vecA[i] * vecA[i];
    normB += vecB[i] * vecB[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  // Rounding can push identical directions a hair past 1.
  return Math.max(-1, Math.min(1, dotProduct / (Math.sqrt(normA) * Math.sqrt(normB))));
}

/**
 * A bounded heap that keeps the `capacity` best items seen so far.
 * `compare(a, b) < 0` means `a` ranks ahead of `b`; the root is the worst kept
 * item, so a new candidate only has to beat the root to get in.
 */
export class TopKHeap<T> {
  private items: T[] = [];

  constructor(
    readonly capacity: number,
    private readonly compare: (a: T, b: T) => number,
  ) {}

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.bubbleUp(this.items.length - 1);
    } else if (this.capacity > 0 && this.compare(item, this.items[0]) < 0) {
      this.items[0] = item;
      this.bubbleDown(0);
    }
  }

  /** Kept items, best first */
  results(): T[] {
    return [...this.items].sort(this.compare);
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const parent = Math.floor((i - 1) / 2);
      if (this.compare(this.items[parent], this.items[i]) >= 0) break;
      [this.items[parent], this.items[i]] = [this.items[i], this.items[parent]];
      i = parent;
    }
  }

  private bubbleDown(i: number): void {
    while (true) {
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      let worst = i;

      if (left < this.items.length && this.compare(this.items[left], this.items[worst]) > 0) {
        worst = left;
      }
      if (right < this.items.length && this.compare(this.items[right], this.items[worst]) > 0) {
        worst = right;
      }

      if (worst === i) break;
      [this.items[i], this.items[worst]] = [this.items[worst], this.items[i]];
      i = worst;
    }
  }
}

export interface Ranked {
  filename: string;
  index: number;
  score: number;
}

/** Descending score, then ascending filename, then ascending chunk index */
export function compareRanked(a: Ranked, b: Ranked): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.filename !== b.filename) {
    return a.filename < b.filename ? -1 : 1;
  }
  return a.index - b.index;
}
