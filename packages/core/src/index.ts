/**
 * @eac-fisheye/core
 * 
 * Core package containing:
 * - Error taxonomy
 * - Configuration
 * - External binary checks
 */

// Errors
export {
  ConverterError,
  InvalidDimensionsError,
  InvalidSpecError,
  SourceNotFoundError,
  EngineFailedError,
  OutputValidationError,
  JobTimeoutError,
  JobCancelledError,
  NoInputFilesError,
  EngineUnavailableError,
  isJobFailureKind,
  toJobFailure,
  type FailureKind,
  type JobFailure,
} from './errors/index.js';

// Configuration
export {
  loadConfig,
  getConfig,
  defaultWorkerCount,
  MAX_DEFAULT_WORKERS,
  type ConverterConfig,
  type ConverterEnv,
} from './config/index.js';

// Binaries
export {
  checkBinary,
  hasFilter,
  type BinaryStatus,
} from './config/binaries.js';
