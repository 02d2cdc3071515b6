/**
 * Batch Scheduler
 *
 * Converts every recognised file in a directory through a bounded
 * worker pool. Outcomes are collected in completion order; cancelling
 * stops new submissions, aborts in-flight jobs and still yields a report.
 */

import { EventEmitter } from 'node:events';
import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { createLogger, ensureDir, getBasename, retry, safeStat, type Logger } from '@eac-fisheye/utils';
import {
  InvalidSpecError,
  NoInputFilesError,
  SourceNotFoundError,
  defaultWorkerCount,
} from '@eac-fisheye/core';
import {
  ConversionJobRunner,
  createCancelledResult,
  createConversionJob,
  resolveEncodingProfile,
  type ConversionJob,
  type ConversionJobRunnerOptions,
  type EncodingProfile,
  type JobProgress,
  type JobResult,
  type ProjectionSpec,
  type RunContext,
} from '@eac-fisheye/processing';
import { buildBatchReport, type BatchReport } from './report.js';
import { WorkerPool } from './workerPool.js';

export const DEFAULT_INPUT_EXTENSIONS: readonly string[] = ['.360'];

/**
 * Anything that can run a ConversionJob; ConversionJobRunner in production
 */
export interface JobRunner {
  run(job: ConversionJob, context?: RunContext): Promise<JobResult>;
}

export interface RetryPolicy {
  maxAttempts: number;      // 1 = no retry
  initialDelayMs?: number;
  maxDelayMs?: number;
}

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
  profile?: EncodingProfile;
  masking?: boolean;
  workerCount?: number;
  projection?: ProjectionSpec;
  timeoutMs?: number;
  durationLimitSeconds?: number;
  retry?: RetryPolicy;
  extensions?: readonly string[];
  signal?: AbortSignal;
  onJobComplete?: (result: JobResult, completed: number, total: number) => void;
}

export interface JobStartEvent {
  job: ConversionJob;
  index: number;
  total: number;
}

export interface JobCompleteEvent {
  result: JobResult;
  completed: number;
  total: number;
}

// Failure kinds worth another attempt
const RETRYABLE_KINDS = new Set(['EngineFailed', 'Timeout']);

class RetryableFailure extends Error {
  readonly result: JobResult;

  constructor(result: JobResult) {
    super(result.failure?.message ?? 'retryable failure');
    this.name = 'RetryableFailure';
    this.result = result;
  }
}

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Regular files in `inputDir` (not recursive) with a recognised extension,
 * sorted by name
 */
export async function discoverInputFiles(
  inputDir: string,
  extensions: readonly string[] = DEFAULT_INPUT_EXTENSIONS
): Promise<string[]> {
  const info = await safeStat(inputDir);
  if (!info) {
    throw new SourceNotFoundError(inputDir);
  }
  if (!info.isDirectory) {
    throw new SourceNotFoundError(inputDir, 'is not a directory');
  }

  const wanted = new Set(extensions.map(normalizeExtension));
  const entries = await readdir(inputDir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    if (!wanted.has(extname(entry.name).toLowerCase())) continue;

    const fullPath = join(inputDir, entry.name);
    if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink()) {
      const target = await safeStat(fullPath);
      if (target?.isFile) files.push(fullPath);
    }
  }

  if (files.length === 0) {
    throw new NoInputFilesError(inputDir, [...wanted]);
  }

  return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * `<outputDir>/<stem>_fisheye.mp4`, or `_fisheye_masked.mp4` when masking
 */
export function deriveDestinationPath(sourcePath: string, outputDir: string, masking: boolean): string {
  const suffix = masking ? '_fisheye_masked' : '_fisheye';
  return join(outputDir, `${getBasename(sourcePath)}${suffix}.mp4`);
}

export class BatchScheduler extends EventEmitter {
  private readonly runner: JobRunner;
  private controller: AbortController | null = null;
  private readonly log: Logger;

  constructor(runner: JobRunner = new ConversionJobRunner()) {
    super();
    this.runner = runner;
    this.log = createLogger({ module: 'batch-scheduler' });
  }

  /**
   * Stop submitting and abort in-flight jobs. run() still resolves.
   */
  cancel(): void {
    if (this.controller && !this.controller.signal.aborted) {
      this.log.info('Cancelling batch');
      this.controller.abort();
    }
  }

  get running(): boolean {
    return this.controller !== null;
  }

  async run(options: BatchOptions): Promise<BatchReport> {
    if (this.controller) {
      throw new Error('Batch already running');
    }

    const workerCount = options.workerCount ?? defaultWorkerCount();
    const pool = new WorkerPool(workerCount);
    const maxAttempts = options.retry?.maxAttempts ?? 1;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new InvalidSpecError([`retry.maxAttempts: must be an integer >= 1, got ${maxAttempts}`]);
    }

    const files = await discoverInputFiles(options.inputDir, options.extensions);
    await ensureDir(options.outputDir);

    const masking = options.masking ?? false;
    const profile = options.profile ?? resolveEncodingProfile();
    const jobs = files.map((sourcePath, index) =>
      createConversionJob({
        id: `${index + 1}-${getBasename(sourcePath)}`,
        sourcePath,
        destinationPath: deriveDestinationPath(sourcePath, options.outputDir, masking),
        projection: options.projection,
        profile,
        masking,
        durationLimitSeconds: options.durationLimitSeconds,
        timeoutMs: options.timeoutMs,
      })
    );

    const controller = new AbortController();
    this.controller = controller;
    const onCallerAbort = (): void => this.cancel();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const forwardProgress = (progress: JobProgress): void => {
      this.emit('job:progress', progress);
    };
    if (this.runner instanceof EventEmitter) {
      this.runner.on('progress', forwardProgress);
    }

    const startedAt = new Date();
    const total = jobs.length;
    const results: JobResult[] = [];
    const started = new Set<string>();
    let fatal: unknown = null;

    this.log.info(
      { inputDir: options.inputDir, outputDir: options.outputDir, total, workerCount, masking },
      'Batch started'
    );

    try {
      await Promise.allSettled(
        jobs.map((job, index) =>
          pool
            .submit(async () => {
              if (controller.signal.aborted) return;

              started.add(job.id);
              this.emit('job:start', { job, index, total } satisfies JobStartEvent);

              const result = await this.runWithRetry(job, maxAttempts, options.retry, controller.signal);
              results.push(result);

              const event: JobCompleteEvent = { result, completed: results.length, total };
              this.emit('job:complete', event);
              options.onJobComplete?.(result, results.length, total);
            })
            .catch((error: unknown) => {
              // EngineUnavailable or a bug: stop everything and rethrow after the drain
              fatal ??= error;
              controller.abort();
            })
        )
      );
    } finally {
      options.signal?.removeEventListener('abort', onCallerAbort);
      if (this.runner instanceof EventEmitter) {
        this.runner.off('progress', forwardProgress);
      }
      this.controller = null;
    }

    if (fatal !== null) {
      this.log.error({ err: fatal }, 'Batch aborted');
      throw fatal;
    }

    const finishedAt = new Date();
    for (const job of jobs) {
      if (!started.has(job.id)) {
        results.push(createCancelledResult(job, finishedAt));
      }
    }

    const report = buildBatchReport({
      results,
      startedAt,
      finishedAt,
      workerCount,
      interrupted: controller.signal.aborted,
    });

    this.log.info(
      {
        total: report.total,
        succeeded: report.succeeded,
        failed: report.failed,
        cancelled: report.cancelled,
        status: report.status,
        elapsedMs: report.elapsedMs,
      },
      'Batch finished'
    );

    return report;
  }

  private async runWithRetry(
    job: ConversionJob,
    maxAttempts: number,
    policy: RetryPolicy | undefined,
    signal: AbortSignal
  ): Promise<JobResult> {
    try {
      return await retry(
        async (attempt) => {
          const result = await this.runner.run(job, { signal, attempt });
          const kind = result.failure?.kind;
          if (attempt < maxAttempts && !signal.aborted && kind !== undefined && RETRYABLE_KINDS.has(kind)) {
            throw new RetryableFailure(result);
          }
          return result;
        },
        {
          maxAttempts,
          initialDelay: policy?.initialDelayMs ?? 1000,
          maxDelay: policy?.maxDelayMs ?? 30000,
          backoffMultiplier: 2,
          signal,
          retryIf: (error) => error instanceof RetryableFailure && !signal.aborted,
          onRetry: (error, attempt) => {
            this.log.warn(
              { jobId: job.id, attempt, error: error instanceof Error ? error.message : String(error) },
              'Retrying job'
            );
          },
        }
      );
    } catch (error) {
      if (error instanceof RetryableFailure) {
        return error.result;
      }
      throw error;
    }
  }
}

export interface BatchDependencies {
  runner?: JobRunner;
  runnerOptions?: ConversionJobRunnerOptions;
}

/**
 * Run one batch with a fresh scheduler
 */
export async function runBatch(
  options: BatchOptions,
  dependencies: BatchDependencies = {}
): Promise<BatchReport> {
  const runner = dependencies.runner ?? new ConversionJobRunner(dependencies.runnerOptions);
  return new BatchScheduler(runner).run(options);
}
