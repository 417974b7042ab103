import type { Command } from 'commander';
import { listDocuments, readDocument, type IngestResult } from '@docvault/core';
import { ContentError, UsageError, type DocvaultConfigInput } from '@docvault/shared';
import { withServices } from '../context';
import { OutputRenderer } from '../output';
import type { CliRuntime, GlobalOptions } from '../types';
import { integerOption } from './options';

interface IngestOptions {
  all?: boolean;
  chunkSize?: number;
  chunkOverlap?: number;
}

export function registerIngestCommand(program: Command, runtime: CliRuntime) {
  program
    .command('ingest')
    .description('Chunk, embed and store documents from the knowledge directory')
    .argument('[files...]', 'File names inside the knowledge directory')
    .option('--all', 'Ingest every supported document in the knowledge directory')
    .option('--chunk-size <n>', 'Characters per chunk', integerOption('--chunk-size', 1))
    .option(
      '--chunk-overlap <n>',
      'Characters shared by consecutive chunks',
      integerOption('--chunk-overlap', 0),
    )
    .action(async (files: string[], options: IngestOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      if (files.length > 0 && options.all) {
        throw new UsageError('Pass file names or --all, not both');
      }
      if (files.length === 0 && !options.all) {
        throw new UsageError('Nothing to ingest: pass file names or --all');
      }

      const flags: DocvaultConfigInput = {
        chunking: { chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap },
      };

      const results = await withServices(globalOpts, runtime, flags, async (services) => {
        const { config, orchestrator, logger } = services;
        const targets = options.all
          ? await listDocuments(config.knowledgeDir, config.ingestion.extensions)
          : files;

        const batch: IngestResult[] = [];
        for (const filename of targets) {
          let text: string;
          try {
            text = await readDocument(config.knowledgeDir, filename, config.ingestion);
          } catch (error) {
            if (!(error instanceof ContentError)) {
              throw error;
            }
            await logger.warn(`Cannot ingest ${filename}: ${error.message}`);
            batch.push({ filename, status: 'failed', chunkCount: 0, message: error.message });
            continue;
          }
          batch.push(await orchestrator.ingest(filename, text));
        }
        return batch;
      });

      new OutputRenderer(!!globalOpts.json).ingestResults(results);

      const failed = results.filter((result) => result.status === 'failed').length;
      if (failed > 0) {
        console.error(`${failed} of ${results.length} documents failed to ingest`);
        runtime.exitCode = 1;
      }
    });
}
