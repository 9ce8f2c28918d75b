/**
 * Error codes used throughout lambdakit.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ManifestError'
  | 'BuildError'
  | 'InstallError'
  | 'DependencyInstallError'
  | 'ArchiveError'
  | 'IoError'
  | 'ProcessError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all lambdakit errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('IoError', 'Copy failed', {
 *   cause: originalError,
 *   details: { from: 'libs/lib_common/src', to: 'dist/layers/combined' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect, or names something that does not exist.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a library manifest cannot be read or has an unexpected shape.
 * Recovered locally: the library is skipped by dependency collection.
 */
export class ManifestError extends AppError {
  /** Library whose manifest failed to parse */
  public readonly libraryName: string;

  constructor(libraryName: string, message: string, options: AppErrorOptions = {}) {
    super('ManifestError', `Manifest for "${libraryName}": ${message}`, options);
    this.libraryName = libraryName;
  }
}

/**
 * Error thrown when the external build tool produces no distributable.
 */
export class BuildError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('BuildError', message, options);
  }
}

/**
 * Error thrown when installing a single built artifact fails.
 */
export class InstallError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InstallError', message, options);
  }
}

/**
 * Error thrown when the batched third-party dependency install fails.
 * Fatal for the layer build.
 */
export class DependencyInstallError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('DependencyInstallError', `Dependency installation failed: ${message}`, options);
  }
}

/**
 * Error thrown when writing a zip archive fails.
 */
export class ArchiveError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ArchiveError', `Archive creation failed: ${message}`, options);
  }
}

/**
 * Error thrown when copying files into an output location fails.
 */
export class IoError extends AppError {
  constructor(step: string, message: string, options: AppErrorOptions = {}) {
    super('IoError', `${step} failed: ${message}`, options);
  }
}

/**
 * Error thrown when an external tool cannot be started or a run it reports on
 * exits non-zero. Includes the exit code and captured output when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;
  public readonly stdout: string;
  public readonly stderr: string;

  constructor(
    message: string,
    options: AppErrorOptions & { exitCode?: number; stdout?: string; stderr?: string } = {},
  ) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
    this.stdout = options.stdout ?? '';
    this.stderr = options.stderr ?? '';
  }
}

/**
 * Process exit code for an error raised anywhere in the tool.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
