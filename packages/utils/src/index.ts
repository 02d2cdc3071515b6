/**
 * @eac-fisheye/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry logic
 * - Path and time helpers
 * - Logger
 */

// Command execution
export {
  executeCommand,
  tailLines,
  CommandSpawnError,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  safeStat,
  removeFile,
  withTempDir,
  type FileInfo,
} from './file.js';

// Retry logic
export { retry, backoffDelay, type RetryOptions } from './retry.js';

// Path utilities
export {
  getBasename,
  getExtension,
  siblingPath,
} from './path.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatBytes,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
