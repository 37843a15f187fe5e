/**
 * @relpack/core
 * 
 * Core package containing:
 * - Packaging state machine
 * - Error taxonomy
 * - Environment configuration
 * - Shared types
 */

// State machine
export { PackagingStateMachine } from './stateMachine.js';

export type { 
  PackagingState,
  PackagingStateTransition, 
} from './stateMachine.js';

// Types
export {
  DEFAULT_EXCLUDES,
  FIXED_PATTERNS,
} from './types/packaging.js';

export type {
  PackagingOptions,
  PackagingConfig,
  PackageResult,
} from './types/packaging.js';

// Configuration
export {
  loadDotenv,
  parseSettings,
  type RelpackEnv,
  type RelpackSettings,
} from './config/env.js';

// Errors
export { 
  RelpackError,
  ValidationError,
  DirectoryNotFoundError,
  VersionResolutionError,
  MissingConfigurationError,
  StateTransitionError,
  CommandExecutionError,
  ArchiveCreationError,
  ConversionTimeoutError,
  ConversionFailedError,
  PublishError,
  UnexpectedError,
  toRelpackError,
  type ErrorCategory,
  type DirectoryKind,
  type VersionFailure,
} from './errors/index.js';
