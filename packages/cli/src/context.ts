import { createEmbedder, type Embedder } from '@docvault/adapters';
import { ConfigLoader, IngestionOrchestrator, RetrievalEngine } from '@docvault/core';
import {
  ConsoleLogger,
  JsonlLogger,
  type DocvaultConfig,
  type DocvaultConfigInput,
  type Logger,
} from '@docvault/shared';
import { createRecordStore, type VectorRecordStore } from '@docvault/store';
import type { CliRuntime, GlobalOptions } from './types';

export interface CliServices {
  config: DocvaultConfig;
  logger: Logger;
  embedder: Embedder;
  store: VectorRecordStore;
  orchestrator: IngestionOrchestrator;
  engine: RetrievalEngine;
}

export function createLogger(config: DocvaultConfig, globalOpts: GlobalOptions): Logger {
  const level = globalOpts.verbose ? 'debug' : config.logging.level;
  if (config.logging.eventsPath) {
    return new JsonlLogger(config.logging.eventsPath, {}, level);
  }
  return new ConsoleLogger({ level });
}

/**
 * Loads the effective config and wires store, embedder, orchestrator and
 * retrieval engine for one command.
 */
export function createServices(
  globalOpts: GlobalOptions,
  runtime: CliRuntime,
  flags: DocvaultConfigInput = {},
): CliServices {
  const config = ConfigLoader.load({ configPath: globalOpts.config, cwd: runtime.cwd, flags });
  const logger = createLogger(config, globalOpts);
  const embedder = createEmbedder(config.embeddings);
  const store = createRecordStore(config.storage, { logger: logger.child({ component: 'store' }) });

  const orchestrator = new IngestionOrchestrator({
    store,
    embedder,
    defaults: config.chunking,
    embedBatchSize: config.embeddings.batchSize,
    logger: logger.child({ component: 'ingest' }),
  });
  const engine = new RetrievalEngine({
    store,
    embedder,
    knowledgeDir: config.knowledgeDir,
    defaultTopK: config.retrieval.topK,
    maxAnswerChars: config.retrieval.maxAnswerChars,
    logger: logger.child({ component: 'retrieval' }),
  });
  orchestrator.registerCache(engine);

  return { config, logger, embedder, store, orchestrator, engine };
}

/**
 * Runs `task` with fresh services and closes the store afterwards.
 */
export async function withServices<T>(
  globalOpts: GlobalOptions,
  runtime: CliRuntime,
  flags: DocvaultConfigInput,
  task: (services: CliServices) => Promise<T>,
): Promise<T> {
  const services = createServices(globalOpts, runtime, flags);
  try {
    return await task(services);
  } finally {
    await services.store.close();
  }
}
