import type { Logger, LogLevel } from './types';
import { LOG_LEVEL_ORDER, formatBindings } from './types';

export interface ConsoleLoggerOptions {
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(message);
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(message);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

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
