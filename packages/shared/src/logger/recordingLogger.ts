import type { Logger, LogLevel } from './types';
import { ScopedLogger } from './consoleLogger';

export interface LogRecord {
  level: LogLevel;
  message: string;
  error?: Error;
}

/**
 * Keeps every record in memory. Children share the parent's record list.
 */
export class RecordingLogger implements Logger {
  readonly records: LogRecord[] = [];

  debug(message: string): void {
    this.records.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.records.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.records.push({ level: 'warn', message });
  }

  error(error: Error, message?: string): void {
    this.records.push({ level: 'error', message: message ?? error.message, error });
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  messages(level?: LogLevel): string[] {
    return this.records.filter((r) => !level || r.level === level).map((r) => r.message);
  }
}
