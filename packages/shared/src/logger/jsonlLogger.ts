import * as fs from 'fs/promises';
import type { DocvaultEvent } from '../types/events';
import { ensureDir } from '../fs/io';
import { formatBindings, isLevelEnabled, type LogLevel, type Logger } from './types';

/**
 * Appends structured events to a JSON Lines file; plain messages go to the console.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly level: LogLevel;

  constructor(filePath: string, bindings: Record<string, unknown> = {}, level: LogLevel = 'info') {
    this.filePath = filePath;
    this.bindings = bindings;
    this.level = level;
  }

  async log(event: DocvaultEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await ensureDir(this.filePath);
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging must not fail an ingestion or a query.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: DocvaultEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    if (isLevelEnabled(this.level, 'debug')) {
      console.debug(formatBindings(this.bindings, message));
    }
  }

  info(message: string): void {
    if (isLevelEnabled(this.level, 'info')) {
      console.info(formatBindings(this.bindings, message));
    }
  }

  warn(message: string): void {
    if (isLevelEnabled(this.level, 'warn')) {
      console.warn(formatBindings(this.bindings, message));
    }
  }

  error(error: Error, message?: string): void {
    if (!isLevelEnabled(this.level, 'error')) {
      return;
    }
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.level);
  }
}
