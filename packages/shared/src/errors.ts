import type { PatchDiagnostic } from './types/patch';

/**
 * Error codes used throughout hunkwise.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'PatchFormatError'
  | 'TimeoutError'
  | 'FileSystemError'
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
 * Base error class for all hunkwise errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('FileSystemError', 'Could not read patch', {
 *   cause: originalError,
 *   details: { path: 'fix.diff' }
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
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when patch text is not a well-formed unified diff.
 * Carries every format diagnostic collected while parsing.
 */
export class PatchFormatError extends AppError {
  public readonly diagnostics: readonly PatchDiagnostic[];

  constructor(diagnostics: readonly PatchDiagnostic[], options: AppErrorOptions = {}) {
    const first = diagnostics[0];
    super('PatchFormatError', first ? first.message : 'Patch is not well-formed', {
      ...options,
      details: options.details ?? { diagnostics: diagnostics.map((d) => ({ ...d })) },
    });
    this.diagnostics = diagnostics;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error thrown when reading or writing the target tree fails.
 * Includes the tree-relative path the operation was about.
 */
export class FileSystemError extends AppError {
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('FileSystemError', `${path}: ${message}`, options);
    this.path = path;
  }
}
