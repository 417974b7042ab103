export { RetrievalEngine, type RetrievalEngineOptions } from './engine';
export { composeAnswer, renderReferencesTable } from './answer';
export { buildMatchLink } from './links';
export { cosineSimilarity, TopKHeap, compareRanked, type Ranked } from './vector_math';
export type { Match, SkippedCounts, SearchResult, AnswerResult } from './types';
