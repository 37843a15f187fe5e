/**
 * Custom Error Classes
 *
 * Every failure is fatal to the current run. The category decides the
 * process exit code: configuration problems exit 2, build problems exit 1.
 */

import type { PackagingState } from '../stateMachine.js';

export type ErrorCategory = 'configuration' | 'build';

const EXIT_CODES: Record<ErrorCategory, number> = {
  configuration: 2,
  build: 1,
};

/**
 * Base error class for all relpack errors
 */
export class RelpackError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory = 'build',
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RelpackError';
    this.code = code;
    this.category = category;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  get exitCode(): number {
    return EXIT_CODES[this.category];
  }
}

// =============================================================================
// Configuration errors
// =============================================================================

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends RelpackError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      'configuration',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

export type DirectoryKind = 'source' | 'target' | 'extra';

/**
 * A directory named on the command line is missing
 */
export class DirectoryNotFoundError extends RelpackError {
  constructor(kind: DirectoryKind, path: string, base?: string) {
    super(
      kind === 'extra'
        ? `extra directory "${path}" does not exist in ${base ?? process.cwd()}`
        : `"${path}" ${kind} directory missing.`,
      'DIRECTORY_NOT_FOUND',
      'configuration',
      { kind, path, base }
    );
    this.name = 'DirectoryNotFoundError';
  }
}

export type VersionFailure = 'no-repository' | 'no-tags' | 'empty' | 'path-separator';

export class VersionResolutionError extends RelpackError {
  constructor(sourceDir: string, reason: VersionFailure = 'no-repository', version?: string) {
    super(
      reason === 'no-repository'
        ? 'package version not supplied and no git environment present.'
        : reason === 'no-tags'
          ? `package version not supplied and no git tag found in ${sourceDir}.`
          : reason === 'path-separator'
            ? `package version "${version ?? ''}" must not contain a path separator.`
            : 'package version resolved to an empty string.',
      'VERSION_UNRESOLVED',
      'configuration',
      { sourceDir, reason, version }
    );
    this.name = 'VersionResolutionError';
  }
}

export class MissingConfigurationError extends RelpackError {
  constructor(configName: string) {
    super(
      `Missing required configuration: ${configName}`,
      'MISSING_CONFIGURATION',
      'configuration',
      { configName }
    );
    this.name = 'MissingConfigurationError';
  }
}

// =============================================================================
// Build errors
// =============================================================================

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends RelpackError {
  constructor(
    runId: string,
    fromState: PackagingState,
    toState: PackagingState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      'build',
      { runId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends RelpackError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `${command} failed with exit code ${exitCode}${stderr.trim() ? `: ${stderr.trim().substring(0, 200)}` : ''}`,
      'COMMAND_EXECUTION_ERROR',
      'build',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
  }
}

export class ArchiveCreationError extends RelpackError {
  constructor(archivePath: string, artifactCount: number) {
    super(
      'creation of tarball failed.',
      'ARCHIVE_CREATION_FAILED',
      'build',
      { archivePath, artifactCount }
    );
    this.name = 'ArchiveCreationError';
  }
}

export class ConversionTimeoutError extends RelpackError {
  constructor(document: string, timeoutMs: number) {
    super(
      `Conversion of ${document} timed out after ${timeoutMs}ms`,
      'CONVERSION_TIMEOUT',
      'build',
      { document, timeoutMs }
    );
    this.name = 'ConversionTimeoutError';
  }
}

export class ConversionFailedError extends RelpackError {
  constructor(document: string, message: string, details: Record<string, unknown> = {}) {
    super(
      `Conversion of ${document} failed: ${message}`,
      'CONVERSION_FAILED',
      'build',
      { ...details, document }
    );
    this.name = 'ConversionFailedError';
  }
}

export class PublishError extends RelpackError {
  constructor(archivePath: string, message: string) {
    super(
      `Publishing ${archivePath} failed: ${message}`,
      'PUBLISH_FAILED',
      'build',
      { archivePath }
    );
    this.name = 'PublishError';
  }
}

/**
 * Anything that was not raised as a RelpackError
 */
export class UnexpectedError extends RelpackError {
  constructor(message: string, cause?: unknown) {
    super(message, 'UNEXPECTED_ERROR', 'build', cause instanceof Error ? { cause: cause.name } : undefined);
    this.name = 'UnexpectedError';
  }
}

export function toRelpackError(error: unknown): RelpackError {
  if (error instanceof RelpackError) {
    return error;
  }
  if (error instanceof Error) {
    return new UnexpectedError(error.message, error);
  }
  return new UnexpectedError(String(error));
}
