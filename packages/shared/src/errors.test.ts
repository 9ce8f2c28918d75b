import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  ManifestError,
  BuildError,
  InstallError,
  DependencyInstallError,
  ArchiveError,
  IoError,
  ProcessError,
  exitCodeFor,
  errorMessage,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('IoError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('BuildError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('subclasses', () => {
  it('set their codes and names', () => {
    expect(new ConfigError('x').code).toBe('ConfigError');
    expect(new UsageError('x').code).toBe('UsageError');
    expect(new BuildError('x').code).toBe('BuildError');
    expect(new InstallError('x').code).toBe('InstallError');
    expect(new UsageError('x').name).toBe('UsageError');
  });

  it('ManifestError names the library', () => {
    const error = new ManifestError('lib_common', 'invalid TOML');
    expect(error.code).toBe('ManifestError');
    expect(error.libraryName).toBe('lib_common');
    expect(error.message).toBe('Manifest for "lib_common": invalid TOML');
  });

  it('fatal errors name the failing step', () => {
    expect(new DependencyInstallError('uv exited with code 2').message).toBe(
      'Dependency installation failed: uv exited with code 2',
    );
    expect(new ArchiveError('disk full').message).toBe('Archive creation failed: disk full');
    expect(new IoError('Copying layer contents', 'EACCES').message).toBe(
      'Copying layer contents failed: EACCES',
    );
  });

  it('ProcessError carries exit code and output', () => {
    const error = new ProcessError('failed', { exitCode: 3, stderr: 'boom' });
    expect(error.code).toBe('ProcessError');
    expect(error.exitCode).toBe(3);
    expect(error.stdout).toBe('');
    expect(error.stderr).toBe('boom');
  });
});

describe('exitCodeFor', () => {
  it('uses 2 for user-correctable errors and 1 otherwise', () => {
    expect(exitCodeFor(new ConfigError('x'))).toBe(2);
    expect(exitCodeFor(new UsageError('x'))).toBe(2);
    expect(exitCodeFor(new DependencyInstallError('x'))).toBe(1);
    expect(exitCodeFor(new Error('x'))).toBe(1);
    expect(exitCodeFor('x')).toBe(1);
  });
});

describe('errorMessage', () => {
  it('reads messages from errors and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
