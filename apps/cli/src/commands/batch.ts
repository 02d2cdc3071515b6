/**
 * Batch Command
 *
 * Convert every .360 file in a directory with a bounded worker pool.
 * Ctrl-C cancels the batch and still prints what finished.
 */

import { basename, resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import type { Command } from 'commander';
import { getConfig } from '@eac-fisheye/core';
import { ConversionJobRunner, describeProfile } from '@eac-fisheye/processing';
import {
  BatchScheduler,
  summarizeReport,
  type BatchReport,
  type JobCompleteEvent,
} from '@eac-fisheye/batch';
import { formatDuration } from '@eac-fisheye/utils';
import {
  addEncodingOptions,
  applyVerbosity,
  parseInteger,
  parsePositiveNumber,
  resolveTimeoutMs,
  tryResolveProfileFlags,
  type EncodingFlags,
} from '../lib/options.js';
import {
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';
import {
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
  EXIT_OK,
  describeError,
  withInterrupt,
} from '../lib/run.js';

export const MAX_CLI_WORKERS = 8;

interface BatchCommandOptions extends EncodingFlags {
  addMasking?: boolean;
  workers?: number;
  retries?: number;
  timeout?: number;
  json?: boolean;
  verbose?: boolean;
}

export function printBatchSummary(report: BatchReport): void {
  const summary = summarizeReport(report);

  printHeader('Batch Summary');
  printKeyValue('Status', report.status);
  printKeyValue('Files', report.total);
  printKeyValue('Succeeded', chalk.green(report.succeeded));
  printKeyValue('Failed', report.failed > 0 ? chalk.red(report.failed) : report.failed);
  if (report.cancelled > 0) {
    printKeyValue('Cancelled', chalk.yellow(report.cancelled));
  }
  printKeyValue('Workers', report.workerCount);
  printKeyValue('Total time', formatDuration(report.elapsedMs));
  if (summary.averageElapsedMs !== null) {
    printKeyValue('Average per file', formatDuration(summary.averageElapsedMs));
  }

  if (summary.failures.length > 0) {
    console.log();
    console.log(chalk.bold('Failed files:'));
    for (const failure of summary.failures) {
      console.log(`  ${chalk.red('✗')} ${basename(failure.sourcePath)} ${chalk.gray(`(${failure.kind})`)} ${failure.message}`);
    }
  }
}

export function batchExitCode(report: BatchReport, interrupted: boolean): number {
  if (interrupted) return EXIT_INTERRUPTED;
  return report.failed > 0 || report.cancelled > 0 ? EXIT_FAILURE : EXIT_OK;
}

export async function batchCommand(
  inputDir: string,
  outputDir: string,
  options: BatchCommandOptions
): Promise<void> {
  applyVerbosity(options.verbose);
  const config = getConfig();

  const profile = tryResolveProfileFlags(options);
  if (!profile) {
    process.exitCode = EXIT_FAILURE;
    return;
  }

  const workerCount = options.workers ?? Math.min(config.workers, MAX_CLI_WORKERS);
  const masking = options.addMasking ?? false;

  if (!options.json) {
    printHeader('Batch Conversion');
    printKeyValue('Input', resolve(inputDir));
    printKeyValue('Output', resolve(outputDir));
    printKeyValue('Profile', describeProfile(profile));
    printKeyValue('Masking', masking ? 'yes' : 'no');
    printKeyValue('Workers', workerCount);
    console.log();
  }

  const runner = new ConversionJobRunner({
    ffmpegPath: config.mediaTools.ffmpeg,
    ffprobePath: config.mediaTools.ffprobe,
  });
  const scheduler = new BatchScheduler(runner);
  const spinner = ora({ text: 'Starting batch...', isSilent: options.json ?? false }).start();

  scheduler.on('job:complete', ({ result, completed, total }: JobCompleteEvent) => {
    const name = basename(result.sourcePath);
    const line = `[${completed}/${total}] ${name}`;
    if (result.status === 'succeeded') {
      spinner.stopAndPersist({ symbol: chalk.green('✓'), text: `${line} ${chalk.gray(formatDuration(result.elapsedMs))}` });
    } else {
      spinner.stopAndPersist({
        symbol: result.status === 'cancelled' ? chalk.yellow('!') : chalk.red('✗'),
        text: `${line} ${chalk.gray(result.failure?.kind ?? result.status)}`,
      });
    }
    spinner.start(`${completed}/${total} done`);
  });

  try {
    const { value: report, interrupted } = await withInterrupt(
      (signal) =>
        scheduler.run({
          inputDir: resolve(inputDir),
          outputDir: resolve(outputDir),
          profile,
          masking,
          workerCount,
          timeoutMs: resolveTimeoutMs(options.timeout),
          retry: { maxAttempts: (options.retries ?? 0) + 1 },
          extensions: config.inputExtensions,
          signal,
        }),
      () => {
        spinner.text = 'Interrupted, stopping running jobs...';
      }
    );
    spinner.stop();

    if (options.json) {
      printJson(report);
    } else {
      printBatchSummary(report);
      console.log();
      if (report.status === 'completed') {
        printSuccess(`All ${report.total} files converted`);
      } else if (interrupted) {
        printWarning('Batch interrupted');
      } else {
        printError(`${report.failed + report.cancelled} of ${report.total} files did not convert`);
      }
    }

    process.exitCode = batchExitCode(report, interrupted);
  } catch (error) {
    spinner.fail('Batch failed');
    printError(describeError(error));
    process.exitCode = EXIT_FAILURE;
  }
}

export function registerBatch(command: Command): Command {
  return addEncodingOptions(
    command
      .description('Convert every .360 file in a directory')
      .argument('<input_dir>', 'directory of .360 files')
      .argument('<output_dir>', 'destination directory (created if missing)')
  )
    .option('-m, --add-masking', 'also composite the dual-circle mask')
    .option('-w, --workers <count>', `parallel jobs (1-${MAX_CLI_WORKERS})`, parseInteger('Workers', 1, MAX_CLI_WORKERS))
    .option('-r, --retries <count>', 'extra attempts for engine failures and timeouts', parseInteger('Retries', 0, 5))
    .option('-t, --timeout <seconds>', 'per-file time limit', parsePositiveNumber('Timeout'))
    .option('--json', 'print the report as JSON')
    .option('-v, --verbose', 'debug logging')
    .action(batchCommand);
}
