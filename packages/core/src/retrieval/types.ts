export interface Match {
  filename: string;
  checksum: string;
  index: number;
  charStart: number;
  charEnd: number;
  snippet: string;
  /** Cosine similarity in [-1, 1] */
  score: number;
  link: string;
}

export interface SkippedCounts {
  /** Stored chunks whose embedding dimension differs from the query's */
  dimensionMismatch: number;
}

export interface SearchResult {
  matches: Match[];
  /** Chunks the query was actually compared against */
  candidateCount: number;
  skipped: SkippedCounts;
}

export interface AnswerResult {
  question: string;
  answer: string;
  matches: Match[];
  skipped: SkippedCounts;
}
