import type { DocvaultEvent } from '../types/events';
import { formatBindings, isLevelEnabled, type LogLevel, type Logger } from './types';

export interface ConsoleLoggerOptions {
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
  }

  log(event: DocvaultEvent): void {
    if (isLevelEnabled(this.level, 'debug')) {
      console.debug(JSON.stringify(event));
    }
  }

  trace(event: DocvaultEvent, message: string): void {
    if (isLevelEnabled(this.level, 'info')) {
      console.info(message, JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (isLevelEnabled(this.level, 'debug')) {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (isLevelEnabled(this.level, 'info')) {
      console.info(message);
    }
  }

  warn(message: string): void {
    if (isLevelEnabled(this.level, 'warn')) {
      console.warn(message);
    }
  }

  error(error: Error, message?: string): void {
    if (!isLevelEnabled(this.level, 'error')) {
      return;
    }
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: DocvaultEvent) {
    return this.base.log(event);
  }

  trace(event: DocvaultEvent, message: string) {
    return this.base.trace(event, formatBindings(this.bindings, message));
  }

  debug(message: string) {
    return this.base.debug(formatBindings(this.bindings, message));
  }

  info(message: string) {
    return this.base.info(formatBindings(this.bindings, message));
  }

  warn(message: string) {
    return this.base.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? formatBindings(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }
}
