/**
 * Text → vector capability shared by ingestion and retrieval.
 *
 * Implementations must be deterministic for a given configuration: the same
 * text always maps to the same vector, and every vector has `dims()` entries.
 */
export interface Embedder {
  embedTexts(texts: string[]): Promise<number[][]>;
  /** Vector dimension, or 0 when the provider does not report it up front */
  dims(): number;
  /** Stable identity of the embedder configuration, persisted with records */
  id(): string;
}
