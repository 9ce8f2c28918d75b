import { ConsoleLogger, ScopedLogger } from './consoleLogger';
import { RecordingLogger } from './recordingLogger';
export type { Logger, LogLevel, MaybePromise } from './types';
export type { LogRecord } from './recordingLogger';
export type { ConsoleLoggerOptions } from './consoleLogger';

export { ConsoleLogger, ScopedLogger, RecordingLogger };
