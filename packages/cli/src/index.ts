export const name = '@docvault/cli';

export { createProgram, runCli, exitCodeFor, reportError } from './program';
export { createServices, createLogger, withServices, type CliServices } from './context';
export type { CliRuntime, GlobalOptions } from './types';
