/**
 * @relpack/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry logic
 * - Time and size formatting
 * - Logger
 */

// Command execution
export {
  executeCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeStat,
  pathExists,
  isDirectory,
  countEntries,
  removePath,
  calculateFileHash,
  getFileSizeBytes,
  moveFile,
  copyFile,
} from './file.js';

// Retry logic
export { retry, type RetryOptions } from './retry.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatBytes,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
