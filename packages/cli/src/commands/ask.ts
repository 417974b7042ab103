import type { Command } from 'commander';
import { renderReferencesTable } from '@docvault/core';
import { withServices } from '../context';
import { OutputRenderer } from '../output';
import type { CliRuntime, GlobalOptions } from '../types';
import { integerOption } from './options';

interface AskOptions {
  k?: number;
  references?: boolean;
}

export function registerAskCommand(program: Command, runtime: CliRuntime) {
  program
    .command('ask')
    .description('Answer a question from the most similar stored chunks')
    .argument('<question...>', 'Question text')
    .option('--k <n>', 'Number of chunks to retrieve', integerOption('--k', 1))
    .option('--references', 'Include a Markdown reference table')
    .action(async (words: string[], options: AskOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const question = words.join(' ');

      const output = await withServices(globalOpts, runtime, {}, async ({ engine }) => {
        const result = await engine.answer(question, options.k);
        return options.references
          ? { ...result, references: renderReferencesTable(result.matches) }
          : result;
      });

      // Answers are JSON with or without --json.
      new OutputRenderer(true).json(output);
    });
}
