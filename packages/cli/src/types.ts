export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};

/** Per-invocation state shared by every command */
export interface CliRuntime {
  /** Base directory for config discovery and relative paths */
  cwd: string;
  /** Set by commands that finish without throwing but still fail */
  exitCode: number;
}
