import type { Command } from 'commander';
import { withServices } from '../context';
import { OutputRenderer } from '../output';
import type { CliRuntime, GlobalOptions } from '../types';

export function registerRemoveCommand(program: Command, runtime: CliRuntime) {
  program
    .command('remove')
    .description('Delete the stored record of a document')
    .argument('<filename>', 'Stored document name')
    .action(async (filename: string) => {
      const globalOpts = program.opts<GlobalOptions>();

      const removed = await withServices(globalOpts, runtime, {}, ({ orchestrator }) =>
        orchestrator.remove(filename),
      );

      new OutputRenderer(!!globalOpts.json).removal(filename, removed);
      if (!removed) {
        runtime.exitCode = 1;
      }
    });
}
