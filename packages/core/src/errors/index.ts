/**
 * Custom Error Classes
 *
 * One class per failure kind. Job-level kinds end up in a JobResult;
 * NoInputFiles and EngineUnavailable are fatal to a whole run.
 */

export type FailureKind =
  | 'InvalidDimensions'
  | 'InvalidSpec'
  | 'SourceNotFound'
  | 'EngineFailed'
  | 'OutputValidationFailed'
  | 'Timeout'
  | 'Cancelled'
  | 'NoInputFiles';

/**
 * Serializable failure record attached to a job outcome
 */
export interface JobFailure {
  kind: FailureKind;
  message: string;
  stderrTail?: string;
  details?: Record<string, unknown>;
}

/**
 * Base error class for all converter errors
 */
export class ConverterError extends Error {
  public readonly code: string;
  public readonly kind: FailureKind | 'EngineUnavailable';
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    kind: FailureKind | 'EngineUnavailable',
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConverterError';
    this.code = code;
    this.kind = kind;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Non-positive or non-integer frame dimensions
 */
export class InvalidDimensionsError extends ConverterError {
  constructor(width: number, height: number) {
    super(
      `Invalid dimensions ${width}x${height}: width and height must be positive integers`,
      'INVALID_DIMENSIONS',
      'InvalidDimensions',
      { width, height }
    );
    this.name = 'InvalidDimensionsError';
  }
}

/**
 * Projection or encoding parameters rejected before the engine runs
 */
export class InvalidSpecError extends ConverterError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Invalid conversion parameters: ${issues.join('; ')}`,
      'INVALID_SPEC',
      'InvalidSpec',
      { issues }
    );
    this.name = 'InvalidSpecError';
    this.issues = issues;
  }
}

/**
 * Source file (or input directory) missing or empty
 */
export class SourceNotFoundError extends ConverterError {
  constructor(path: string, reason: string = 'does not exist') {
    super(
      `Source ${path} ${reason}`,
      'SOURCE_NOT_FOUND',
      'SourceNotFound',
      { path, reason }
    );
    this.name = 'SourceNotFoundError';
  }
}

/**
 * Engine exited with a non-zero status
 */
export class EngineFailedError extends ConverterError {
  public readonly exitCode: number;
  public readonly stderrTail: string;

  constructor(command: string, exitCode: number, stderrTail: string) {
    super(
      `Engine exited with code ${exitCode}`,
      'ENGINE_FAILED',
      'EngineFailed',
      { command, exitCode }
    );
    this.name = 'EngineFailedError';
    this.exitCode = exitCode;
    this.stderrTail = stderrTail;
  }
}

/**
 * Engine reported success but the output does not match expectations
 */
export class OutputValidationError extends ConverterError {
  constructor(outputFile: string, problems: string[]) {
    super(
      `Output validation failed for ${outputFile}: ${problems.join('; ')}`,
      'OUTPUT_VALIDATION_FAILED',
      'OutputValidationFailed',
      { outputFile, problems }
    );
    this.name = 'OutputValidationError';
  }
}

export class JobTimeoutError extends ConverterError {
  constructor(jobId: string, timeoutMs: number) {
    super(
      `Job ${jobId} exceeded its ${timeoutMs}ms timeout`,
      'JOB_TIMEOUT',
      'Timeout',
      { jobId, timeoutMs }
    );
    this.name = 'JobTimeoutError';
  }
}

export class JobCancelledError extends ConverterError {
  constructor(jobId: string) {
    super(
      `Job ${jobId} was cancelled`,
      'JOB_CANCELLED',
      'Cancelled',
      { jobId }
    );
    this.name = 'JobCancelledError';
  }
}

export class NoInputFilesError extends ConverterError {
  constructor(inputDir: string, extensions: readonly string[]) {
    super(
      `No input files (${extensions.join(', ')}) found in ${inputDir}`,
      'NO_INPUT_FILES',
      'NoInputFiles',
      { inputDir, extensions }
    );
    this.name = 'NoInputFilesError';
  }
}

/**
 * The engine binary could not be spawned at all
 */
export class EngineUnavailableError extends ConverterError {
  constructor(binary: string, reason: string) {
    super(
      `Cannot start ${binary}: ${reason}. Install ffmpeg or set FFMPEG_PATH/FFPROBE_PATH.`,
      'ENGINE_UNAVAILABLE',
      'EngineUnavailable',
      { binary, reason }
    );
    this.name = 'EngineUnavailableError';
  }
}

/**
 * Whether a thrown value is a job-level failure (as opposed to a fatal one)
 */
export function isJobFailureKind(kind: ConverterError['kind']): kind is FailureKind {
  return kind !== 'EngineUnavailable';
}

/**
 * Map any thrown value to a JobFailure record
 */
export function toJobFailure(error: unknown): JobFailure {
  if (error instanceof EngineFailedError) {
    return {
      kind: 'EngineFailed',
      message: error.message,
      stderrTail: error.stderrTail,
      details: error.details,
    };
  }

  if (error instanceof ConverterError && isJobFailureKind(error.kind)) {
    return {
      kind: error.kind,
      message: error.message,
      details: error.details,
    };
  }

  // Anything unexpected inside a job is reported as an engine-side failure
  return {
    kind: 'EngineFailed',
    message: error instanceof Error ? error.message : String(error),
  };
}
