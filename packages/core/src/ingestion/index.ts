export { IngestionOrchestrator, type IngestionOrchestratorOptions } from './orchestrator';
export { KeyedLock } from './keyed_lock';
export type { IngestConfig, IngestResult, DocumentInput, CacheInvalidator } from './types';
