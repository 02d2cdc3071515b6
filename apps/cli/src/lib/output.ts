/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { MediaSummary } from '@eac-fisheye/media';
import type { JobResult } from '@eac-fisheye/processing';
import { formatBytes, formatDuration } from '@eac-fisheye/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

export function printMediaSummary(title: string, summary: MediaSummary): void {
  printHeader(title);
  printKeyValue('File', summary.filePath);
  if (summary.video) {
    printKeyValue('Resolution', `${summary.video.width}x${summary.video.height}`);
    printKeyValue('Codec', summary.video.codec);
    if (summary.video.fps > 0) {
      printKeyValue('Frame rate', `${summary.video.fps.toFixed(2)} fps`);
    }
  }
  if (summary.duration > 0) {
    printKeyValue('Duration', formatDuration(summary.duration * 1000));
  }
  printKeyValue('Audio streams', summary.audioStreams.length);
}

/**
 * Failure kind and detail on stderr
 */
export function printJobFailure(result: JobResult): void {
  const failure = result.failure;
  printError(`${failure?.kind ?? 'Failed'}: ${failure?.message ?? 'unknown failure'}`);

  for (const finding of result.findings) {
    console.error(`  ${chalk.gray('-')} ${finding.code}: ${finding.message}`);
  }
  if (failure?.stderrTail) {
    console.error(chalk.gray(failure.stderrTail));
  }
}

export function printJobSuccess(result: JobResult): void {
  printSuccess(`Wrote ${result.destinationPath}`);
  if (result.outputSizeBytes !== null) {
    printKeyValue('Size', formatBytes(result.outputSizeBytes));
  }
  printKeyValue('Time', formatDuration(result.elapsedMs));
}
