import type { Command } from 'commander';
import { withServices } from '../context';
import { OutputRenderer } from '../output';
import type { CliRuntime, GlobalOptions } from '../types';

export function registerStatusCommand(program: Command, runtime: CliRuntime) {
  program
    .command('status')
    .description('Show vector store backend, location and counts')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();

      const report = await withServices(
        globalOpts,
        runtime,
        {},
        async ({ config, store, embedder }) => ({
          ...(await store.info()),
          knowledgeDir: config.knowledgeDir,
          embedder: embedder.id(),
        }),
      );

      new OutputRenderer(!!globalOpts.json).status(report);
    });
}
