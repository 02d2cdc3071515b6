/**
 * Conversion Job Runner
 *
 * Drives one ConversionJob end to end: pre-flight checks, source probe,
 * one or two engine passes, output validation. Job-level failures come
 * back as a JobResult; only EngineUnavailableError is thrown.
 */

import { EventEmitter } from 'node:events';
import { writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import {
  createLogger,
  ensureDir,
  removeFile,
  safeStat,
  withTempDir,
  type Logger,
} from '@eac-fisheye/utils';
import {
  EngineFailedError,
  EngineUnavailableError,
  InvalidDimensionsError,
  JobCancelledError,
  JobTimeoutError,
  OutputValidationError,
  SourceNotFoundError,
  toJobFailure,
  type FailureKind,
  type JobFailure,
} from '@eac-fisheye/core';
import {
  FFProbeInspector,
  type InspectOptions,
  type MediaInspector,
  type MediaSummary,
} from '@eac-fisheye/media';
import { FFmpegEngine, type MediaEngine } from './engine.js';
import {
  buildMaskingChain,
  buildProjectionChain,
  type ChainKind,
  type CommandSpec,
} from './filterGraph.js';
import {
  freezeResult,
  type ConversionJob,
  type JobResult,
  type JobStatus,
  type PassRecord,
  type ValidationFinding,
} from './job.js';
import { encodeMaskPng, generateMask, type RasterImage } from './mask.js';
import type { ProgressEvent } from './progressParser.js';
import type { Resolution } from './projection.js';

export interface RunContext {
  signal?: AbortSignal;
  attempt?: number; // 1-based, set by the scheduler's retry policy
}

export interface JobProgress {
  jobId: string;
  pass: ChainKind;
  passIndex: number; // 0-based
  passCount: number;
  percent: number | null; // across all passes
  event: ProgressEvent;
}

export interface ConversionJobRunnerOptions {
  engine?: MediaEngine;
  inspector?: MediaInspector;
  ffmpegPath?: string;
  ffprobePath?: string;
  tempDir?: string; // parent for job-scoped temp directories
}

/**
 * Expected width/height ratio of a dual-fisheye frame
 */
export const DUAL_FISHEYE_ASPECT = { min: 1.8, max: 2.2 } as const;

// Failures after which a partial destination is deleted
const DISCARD_OUTPUT_ON: readonly FailureKind[] = ['EngineFailed', 'Timeout', 'Cancelled'];

interface Pass {
  command: CommandSpec;
  durationMs: number;
}

interface JobState {
  job: ConversionJob;
  signal: AbortSignal;
  deadline: number | null;
  passes: PassRecord[];
  findings: ValidationFinding[];
  destinationTouched: boolean;
  expectedResolution: Resolution | null;
  outputSizeBytes: number | null;
}

/**
 * Tie a job-local controller to the caller's signal
 */
function linkSignal(controller: AbortController, parent: AbortSignal | undefined): () => void {
  if (!parent) return () => {};
  if (parent.aborted) {
    controller.abort();
    return () => {};
  }
  const onAbort = (): void => controller.abort();
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}

export class ConversionJobRunner extends EventEmitter {
  private readonly engine: MediaEngine;
  private readonly inspector: MediaInspector;
  private readonly tempParent: string | undefined;
  private readonly activeJobs: Map<string, AbortController> = new Map();
  private readonly log: Logger;

  constructor(options: ConversionJobRunnerOptions = {}) {
    super();
    this.engine = options.engine ?? new FFmpegEngine(options.ffmpegPath);
    this.inspector = options.inspector ?? new FFProbeInspector(options.ffprobePath);
    this.tempParent = options.tempDir;
    this.log = createLogger({ module: 'job-runner' });
  }

  /**
   * Run a job to completion. Never rejects for job-level failures.
   */
  async run(job: ConversionJob, context: RunContext = {}): Promise<JobResult> {
    const startedAt = new Date();
    const attempts = context.attempt ?? 1;
    const controller = new AbortController();
    const unlink = linkSignal(controller, context.signal);
    this.activeJobs.set(job.id, controller);

    const state: JobState = {
      job,
      signal: controller.signal,
      deadline: job.timeoutMs !== undefined ? startedAt.getTime() + job.timeoutMs : null,
      passes: [],
      findings: [],
      destinationTouched: false,
      expectedResolution: null,
      outputSizeBytes: null,
    };

    this.log.info(
      { jobId: job.id, source: job.sourcePath, destination: job.destinationPath, mode: job.mode, attempt: attempts },
      'Job started'
    );

    let status: JobStatus = 'succeeded';
    let failure: JobFailure | undefined;

    try {
      await this.execute(state);
    } catch (error) {
      if (error instanceof EngineUnavailableError) {
        throw error;
      }
      failure = toJobFailure(error);
      status = failure.kind === 'Cancelled' ? 'cancelled' : 'failed';

      if (state.destinationTouched && DISCARD_OUTPUT_ON.includes(failure.kind)) {
        await removeFile(job.destinationPath);
      }
    } finally {
      unlink();
      this.activeJobs.delete(job.id);
    }

    const finishedAt = new Date();
    const result = freezeResult({
      jobId: job.id,
      sourcePath: job.sourcePath,
      destinationPath: job.destinationPath,
      status,
      startedAt,
      finishedAt,
      elapsedMs: finishedAt.getTime() - startedAt.getTime(),
      outputSizeBytes: status === 'succeeded' ? state.outputSizeBytes : null,
      findings: state.findings,
      passes: state.passes,
      attempts,
      ...(failure ? { failure } : {}),
    });

    if (failure) {
      this.log.warn(
        { jobId: job.id, status, kind: failure.kind, elapsedMs: result.elapsedMs },
        failure.message
      );
    } else {
      this.log.info(
        { jobId: job.id, elapsedMs: result.elapsedMs, outputSizeBytes: result.outputSizeBytes },
        'Job succeeded'
      );
    }

    return result;
  }

  /**
   * Abort a running job
   */
  cancel(jobId: string): boolean {
    const controller = this.activeJobs.get(jobId);
    if (!controller) return false;

    this.log.info({ jobId }, 'Cancelling job');
    controller.abort();
    return true;
  }

  /**
   * Get all active jobs
   */
  getActiveJobs(): string[] {
    return Array.from(this.activeJobs.keys());
  }

  private async execute(state: JobState): Promise<void> {
    const { job } = state;

    this.throwIfStopped(state);
    await this.checkSource(job.sourcePath);

    const source = await this.probeSource(state);
    const audioExpected = source ? source.audioStreams.length > 0 : null;

    await ensureDir(dirname(job.destinationPath));

    await withTempDir(
      'eac-fisheye-',
      async (tempDir) => {
        const passes = await this.planPasses(job, source, tempDir);
        for (const [index, pass] of passes.entries()) {
          await this.runPass(state, pass, index, passes.length);
        }
      },
      this.tempParent
    );

    state.outputSizeBytes = await this.validateOutput(state, audioExpected);
  }

  private async checkSource(sourcePath: string): Promise<void> {
    const info = await safeStat(sourcePath);
    if (!info) {
      throw new SourceNotFoundError(sourcePath);
    }
    if (!info.isFile) {
      throw new SourceNotFoundError(sourcePath, 'is not a regular file');
    }
    if (info.size === 0) {
      throw new SourceNotFoundError(sourcePath, 'is empty');
    }
  }

  /**
   * Probe the source. Without a probe, a convert job still runs (no progress
   * percentages, no audio check); a mask-only job cannot size its mask.
   */
  private async probeSource(state: JobState): Promise<MediaSummary | null> {
    const { job } = state;
    try {
      const summary = await this.inspector.inspect(job.sourcePath, this.inspectOptions(state));
      this.throwIfStopped(state);
      return summary;
    } catch (error) {
      this.throwIfStopped(state);
      const message = error instanceof Error ? error.message : String(error);
      if (job.mode === 'mask-only') {
        throw new EngineFailedError(`ffprobe ${job.sourcePath}`, 1, message);
      }
      this.log.warn({ jobId: job.id, source: job.sourcePath, error: message }, 'Source probe failed, continuing');
      return null;
    }
  }

  /**
   * Build every command up front so parameter errors surface before the
   * first engine invocation
   */
  private async planPasses(
    job: ConversionJob,
    source: MediaSummary | null,
    tempDir: string
  ): Promise<Pass[]> {
    const sourceMs = (source?.duration ?? 0) * 1000;
    const limitMs = job.durationLimitSeconds !== undefined ? job.durationLimitSeconds * 1000 : null;
    const expectedMs = limitMs !== null && (sourceMs === 0 || limitMs < sourceMs) ? limitMs : sourceMs;
    const frameRate = source?.video?.frameRate;
    const maskPath = join(tempDir, 'mask.png');

    const writeMask = async (width: number, height: number): Promise<RasterImage> => {
      const mask = generateMask(width, height);
      await writeFile(maskPath, encodeMaskPng(mask));
      return mask;
    };

    if (job.mode === 'mask-only') {
      const video = source?.video;
      if (!video || video.width <= 0 || video.height <= 0) {
        throw new InvalidDimensionsError(video?.width ?? 0, video?.height ?? 0);
      }

      const aspect = video.width / video.height;
      if (aspect < DUAL_FISHEYE_ASPECT.min || aspect > DUAL_FISHEYE_ASPECT.max) {
        this.log.warn(
          { jobId: job.id, width: video.width, height: video.height, aspect: Number(aspect.toFixed(3)) },
          'Source does not look like a side-by-side dual-fisheye video'
        );
      }

      const mask = await writeMask(video.width, video.height);
      const command = buildMaskingChain(mask, job.profile, {
        input: job.sourcePath,
        output: job.destinationPath,
        maskPath,
        durationLimitSeconds: job.durationLimitSeconds,
        frameRate,
      });
      return [{ command, durationMs: expectedMs }];
    }

    if (!job.masking) {
      const command = buildProjectionChain(job.projection, job.profile, {
        input: job.sourcePath,
        output: job.destinationPath,
        durationLimitSeconds: job.durationLimitSeconds,
      });
      return [{ command, durationMs: expectedMs }];
    }

    const projectedPath = join(tempDir, 'projected.mp4');
    const projection = buildProjectionChain(job.projection, job.profile, {
      input: job.sourcePath,
      output: projectedPath,
      durationLimitSeconds: job.durationLimitSeconds,
    });
    const { width, height } = projection.expectedResolution;
    const mask = await writeMask(width, height);
    const masking = buildMaskingChain(mask, job.profile, {
      input: projectedPath,
      output: job.destinationPath,
      maskPath,
      frameRate,
    });

    return [
      { command: projection, durationMs: expectedMs },
      { command: masking, durationMs: expectedMs },
    ];
  }

  /**
   * The job's signal plus whatever remains of its deadline
   */
  private inspectOptions(state: JobState): InspectOptions {
    return {
      signal: state.signal,
      timeoutMs: state.deadline !== null ? Math.max(1, state.deadline - Date.now()) : undefined,
    };
  }

  private throwIfStopped(state: JobState): void {
    if (state.signal.aborted) {
      throw new JobCancelledError(state.job.id);
    }
    if (state.deadline !== null && Date.now() >= state.deadline) {
      throw new JobTimeoutError(state.job.id, state.job.timeoutMs ?? 0);
    }
  }

  private async runPass(state: JobState, pass: Pass, index: number, count: number): Promise<void> {
    const { job } = state;
    this.throwIfStopped(state);

    if (pass.command.outputFile === job.destinationPath) {
      state.destinationTouched = true;
      state.expectedResolution = pass.command.expectedResolution;
    }

    const result = await this.engine.run(pass.command, {
      timeoutMs: state.deadline !== null ? Math.max(1, state.deadline - Date.now()) : undefined,
      signal: state.signal,
      durationMs: pass.durationMs,
      onProgress: (event) => {
        const progress: JobProgress = {
          jobId: job.id,
          pass: pass.command.kind,
          passIndex: index,
          passCount: count,
          percent: event.percent === null ? null : (index * 100 + event.percent) / count,
          event,
        };
        this.emit('progress', progress);
      },
    });

    state.passes.push({
      kind: pass.command.kind,
      commandLine: result.commandLine,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
    });

    if (result.aborted) {
      throw new JobCancelledError(job.id);
    }
    if (result.timedOut) {
      throw new JobTimeoutError(job.id, job.timeoutMs ?? 0);
    }
    if (result.exitCode !== 0) {
      state.findings.push({
        code: 'non-zero-exit',
        message: `${pass.command.kind} pass exited with code ${result.exitCode}`,
      });
      throw new EngineFailedError(result.commandLine, result.exitCode, result.stderrTail);
    }
  }

  /**
   * Check the finished file; returns its size
   */
  private async validateOutput(state: JobState, audioExpected: boolean | null): Promise<number> {
    const { job, findings } = state;
    const expected = state.expectedResolution;

    const info = await safeStat(job.destinationPath);
    if (!info || !info.isFile || info.size === 0) {
      findings.push({ code: 'empty-output', message: `${job.destinationPath} is missing or empty` });
      throw new OutputValidationError(job.destinationPath, findings.map((f) => f.message));
    }

    let output: MediaSummary | null = null;
    try {
      output = await this.inspector.inspect(job.destinationPath, this.inspectOptions(state));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      findings.push({ code: 'missing-video', message: `output could not be probed: ${message}` });
    }
    this.throwIfStopped(state);

    if (output) {
      if (!output.video) {
        findings.push({ code: 'missing-video', message: 'output has no video stream' });
      } else if (
        expected &&
        (output.video.width !== expected.width || output.video.height !== expected.height)
      ) {
        findings.push({
          code: 'dimension-mismatch',
          message: `expected ${expected.width}x${expected.height}, got ${output.video.width}x${output.video.height}`,
        });
      }

      if (audioExpected === true && output.audioStreams.length === 0) {
        findings.push({ code: 'missing-audio', message: 'source has audio but output has none' });
      }
    }

    if (findings.length > 0) {
      throw new OutputValidationError(job.destinationPath, findings.map((f) => f.message));
    }

    return info.size;
  }
}
