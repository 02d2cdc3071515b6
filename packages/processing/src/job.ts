/**
 * Conversion Jobs
 *
 * A ConversionJob is the immutable description of one file's work;
 * a JobResult is its immutable outcome.
 */

import { randomUUID } from 'node:crypto';
import { InvalidSpecError, type JobFailure } from '@eac-fisheye/core';
import type { ChainKind } from './filterGraph.js';
import { resolveEncodingProfile, validateEncodingProfile, type EncodingProfile } from './profiles.js';
import { LRV_MATCH_PROJECTION, validateProjectionSpec, type ProjectionSpec } from './projection.js';

/**
 * convert: projection, plus masking when requested
 * mask-only: masking pass over an already projected dual-fisheye file
 */
export type JobMode = 'convert' | 'mask-only';

export interface ConversionJob {
  readonly id: string;
  readonly sourcePath: string;
  readonly destinationPath: string;
  readonly projection: ProjectionSpec;
  readonly profile: EncodingProfile;
  readonly masking: boolean;
  readonly mode: JobMode;
  readonly durationLimitSeconds?: number;
  readonly timeoutMs?: number;
}

export interface ConversionJobInput {
  id?: string;
  sourcePath: string;
  destinationPath: string;
  projection?: ProjectionSpec;
  profile?: EncodingProfile;
  masking?: boolean;
  mode?: JobMode;
  durationLimitSeconds?: number;
  timeoutMs?: number;
}

export type JobStatus = 'succeeded' | 'failed' | 'cancelled';

export type FindingCode =
  | 'dimension-mismatch'
  | 'missing-audio'
  | 'missing-video'
  | 'empty-output'
  | 'non-zero-exit';

export interface ValidationFinding {
  readonly code: FindingCode;
  readonly message: string;
}

/**
 * One engine invocation
 */
export interface PassRecord {
  readonly kind: ChainKind;
  readonly commandLine: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface JobResult {
  readonly jobId: string;
  readonly sourcePath: string;
  readonly destinationPath: string;
  readonly status: JobStatus;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly elapsedMs: number;
  readonly outputSizeBytes: number | null;
  readonly findings: readonly ValidationFinding[];
  readonly passes: readonly PassRecord[];
  readonly attempts: number;
  readonly failure?: JobFailure;
}

/**
 * Validate and freeze a job description
 */
export function createConversionJob(input: ConversionJobInput): ConversionJob {
  const issues: string[] = [];
  const mode = input.mode ?? 'convert';

  if (input.sourcePath.trim() === '') issues.push('sourcePath: must not be empty');
  if (input.destinationPath.trim() === '') issues.push('destinationPath: must not be empty');
  if (input.sourcePath === input.destinationPath) {
    issues.push('destinationPath: must differ from sourcePath');
  }
  if (
    input.durationLimitSeconds !== undefined &&
    (!Number.isFinite(input.durationLimitSeconds) || input.durationLimitSeconds <= 0)
  ) {
    issues.push(`durationLimitSeconds: must be positive, got ${input.durationLimitSeconds}`);
  }
  if (
    input.timeoutMs !== undefined &&
    (!Number.isInteger(input.timeoutMs) || input.timeoutMs <= 0)
  ) {
    issues.push(`timeoutMs: must be a positive integer, got ${input.timeoutMs}`);
  }
  if (issues.length > 0) {
    throw new InvalidSpecError(issues);
  }

  const projection = input.projection ?? LRV_MATCH_PROJECTION;
  const profile = input.profile ?? resolveEncodingProfile();
  validateProjectionSpec(projection);
  validateEncodingProfile(profile);

  return Object.freeze({
    id: input.id ?? randomUUID(),
    sourcePath: input.sourcePath,
    destinationPath: input.destinationPath,
    projection,
    profile,
    masking: mode === 'mask-only' ? true : input.masking ?? false,
    mode,
    ...(input.durationLimitSeconds !== undefined ? { durationLimitSeconds: input.durationLimitSeconds } : {}),
    ...(input.timeoutMs !== undefined ? { timeoutMs: input.timeoutMs } : {}),
  });
}

export function freezeResult(result: JobResult): JobResult {
  return Object.freeze({
    ...result,
    findings: Object.freeze([...result.findings]),
    passes: Object.freeze([...result.passes]),
  });
}

/**
 * Outcome for a job that never reached the runner
 */
export function createCancelledResult(job: ConversionJob, at: Date = new Date()): JobResult {
  return freezeResult({
    jobId: job.id,
    sourcePath: job.sourcePath,
    destinationPath: job.destinationPath,
    status: 'cancelled',
    startedAt: at,
    finishedAt: at,
    elapsedMs: 0,
    outputSizeBytes: null,
    findings: [],
    passes: [],
    attempts: 0,
    failure: { kind: 'Cancelled', message: `Job ${job.id} was cancelled before it started` },
  });
}
