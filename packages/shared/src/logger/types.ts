/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Interface for logging throughout lambdakit.
 * Every pipeline component receives one instead of writing to the console itself.
 *
 * @example
 * ```typescript
 * logger.info('Building combined layer');
 * logger.warn('No wheel built for lib_common, falling back to source copy');
 * logger.error(new Error('Failed'), 'Dependency install failed');
 *
 * // Create a child logger with additional context
 * const libLogger = logger.child({ lib: 'lib_common' });
 * ```
 */
export interface Logger {
  /** Log a debug message (only shown with --verbose) */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
