/**
 * Batch Report
 *
 * Aggregate outcome of a batch run.
 */

import type { FailureKind } from '@eac-fisheye/core';
import type { JobResult } from '@eac-fisheye/processing';

export type BatchStatus = 'completed' | 'completed-with-failures' | 'cancelled';

export interface BatchReport {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly cancelled: number;
  readonly status: BatchStatus;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly elapsedMs: number;
  readonly workerCount: number;
  readonly results: readonly JobResult[]; // completion order, never-started jobs last
}

export interface BatchReportInput {
  results: readonly JobResult[];
  startedAt: Date;
  finishedAt: Date;
  workerCount: number;
  interrupted: boolean;
}

export interface FailedJobSummary {
  sourcePath: string;
  kind: FailureKind;
  message: string;
}

export interface BatchSummary {
  processed: number;             // jobs that actually ran
  averageElapsedMs: number | null;
  failures: FailedJobSummary[];
}

export function buildBatchReport(input: BatchReportInput): BatchReport {
  const count = (status: JobResult['status']): number =>
    input.results.filter((result) => result.status === status).length;

  const succeeded = count('succeeded');
  const failed = count('failed');
  const cancelled = count('cancelled');

  let status: BatchStatus;
  if (input.interrupted) {
    status = 'cancelled';
  } else if (failed > 0 || cancelled > 0) {
    status = 'completed-with-failures';
  } else {
    status = 'completed';
  }

  return Object.freeze({
    total: input.results.length,
    succeeded,
    failed,
    cancelled,
    status,
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    elapsedMs: input.finishedAt.getTime() - input.startedAt.getTime(),
    workerCount: input.workerCount,
    results: Object.freeze([...input.results]),
  });
}

/**
 * Figures for the end-of-run printout
 */
export function summarizeReport(report: BatchReport): BatchSummary {
  const ran = report.results.filter((result) => result.attempts > 0);
  const failures = report.results
    .filter((result) => result.status === 'failed')
    .map((result) => ({
      sourcePath: result.sourcePath,
      kind: result.failure?.kind ?? 'EngineFailed',
      message: result.failure?.message ?? 'unknown failure',
    }));

  return {
    processed: ran.length,
    averageElapsedMs:
      ran.length > 0
        ? ran.reduce((sum, result) => sum + result.elapsedMs, 0) / ran.length
        : null,
    failures,
  };
}
