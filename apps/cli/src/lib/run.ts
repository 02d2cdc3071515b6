/**
 * Single-File Runs
 *
 * Shared plumbing for convert and mask: spinner, progress text,
 * Ctrl-C handling and exit codes.
 */

import ora from 'ora';
import { ConverterError, getConfig } from '@eac-fisheye/core';
import { FFProbeInspector } from '@eac-fisheye/media';
import {
  ConversionJobRunner,
  createConversionJob,
  formatProgress,
  type ConversionJobInput,
  type JobProgress,
} from '@eac-fisheye/processing';
import {
  printError,
  printJobFailure,
  printJobSuccess,
  printMediaSummary,
  printWarning,
} from './output.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export function describeError(error: unknown): string {
  if (error instanceof ConverterError) {
    return `${error.kind}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Abort the signal handed to `fn` on Ctrl-C
 */
export async function withInterrupt<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  onInterrupt?: () => void
): Promise<{ value: T; interrupted: boolean }> {
  const controller = new AbortController();
  const handler = (): void => {
    onInterrupt?.();
    controller.abort();
  };
  process.once('SIGINT', handler);
  try {
    const value = await fn(controller.signal);
    return { value, interrupted: controller.signal.aborted };
  } finally {
    process.off('SIGINT', handler);
  }
}

export function progressText(label: string, progress: JobProgress): string {
  const pass = progress.passCount > 1
    ? ` [${progress.pass} ${progress.passIndex + 1}/${progress.passCount}]`
    : '';
  const detail = formatProgress(progress.event);
  return `${label}${pass}${detail ? ` ${detail}` : ''}`;
}

/**
 * Probe, run and report one job; returns the process exit code
 */
export async function runSingleJob(label: string, input: ConversionJobInput): Promise<number> {
  const config = getConfig();
  const inspector = new FFProbeInspector(config.mediaTools.ffprobe);

  try {
    printMediaSummary('Source', await inspector.inspect(input.sourcePath));
  } catch (error) {
    printWarning(`Could not probe ${input.sourcePath}: ${describeError(error)}`);
  }
  console.log();

  const spinner = ora(`${label}...`).start();

  try {
    const job = createConversionJob(input);
    const runner = new ConversionJobRunner({ ffmpegPath: config.mediaTools.ffmpeg, inspector });
    runner.on('progress', (progress: JobProgress) => {
      spinner.text = progressText(label, progress);
    });

    const { value: result, interrupted } = await withInterrupt(
      (signal) => runner.run(job, { signal }),
      () => {
        spinner.text = 'Interrupted, stopping ffmpeg...';
      }
    );

    if (result.status === 'succeeded') {
      spinner.succeed(`${label} complete`);
      printJobSuccess(result);
      return EXIT_OK;
    }

    spinner.fail(`${label} ${result.status}`);
    printJobFailure(result);
    return interrupted ? EXIT_INTERRUPTED : EXIT_FAILURE;
  } catch (error) {
    spinner.fail(`${label} failed`);
    printError(describeError(error));
    return EXIT_FAILURE;
  }
}
