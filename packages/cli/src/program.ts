import { Command, CommanderError } from 'commander';
import { version } from '../package.json';
import {
  registerAskCommand,
  registerIngestCommand,
  registerListCommand,
  registerRemoveCommand,
  registerStatusCommand,
} from './commands';
import { AppError, ConfigError, UsageError } from '@docvault/shared';
import type { CliRuntime, GlobalOptions } from './types';

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command();

  program
    .name('docvault')
    .description('Ingest local documents into a vector store and answer questions from them')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    // Subcommands inherit this; usage errors come back as CommanderError.
    .exitOverride();

  registerListCommand(program, runtime);
  registerIngestCommand(program, runtime);
  registerAskCommand(program, runtime);
  registerStatusCommand(program, runtime);
  registerRemoveCommand(program, runtime);

  return program;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? 0 : 2;
  }
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}

export function reportError(error: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    const payload =
      error instanceof AppError
        ? { code: error.code, message: error.message, details: error.details }
        : { code: 'UnknownError', message: error instanceof Error ? error.message : String(error) };
    console.log(JSON.stringify({ error: payload }));
    return;
  }

  console.error(`Error: ${(error instanceof Error && error.message) || String(error)}`);
  if (error instanceof AppError && error.details) {
    console.error(
      `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
    );
  }
  if (opts.verbose && error instanceof Error && error.stack) {
    console.error(`\nStack Trace:\n${error.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses `argv` (node-style, program path first) and runs the command.
 * Resolves to the process exit code instead of exiting.
 */
export async function runCli(argv: string[], options: { cwd?: string } = {}): Promise<number> {
  const runtime: CliRuntime = { cwd: options.cwd ?? process.cwd(), exitCode: 0 };
  const program = createProgram(runtime);

  try {
    await program.parseAsync(argv);
    return runtime.exitCode;
  } catch (error) {
    // commander has already printed its own usage message.
    if (!(error instanceof CommanderError)) {
      reportError(error, program.opts<GlobalOptions>());
    }
    return exitCodeFor(error);
  }
}
