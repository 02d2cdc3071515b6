/**
 * Mask Command
 *
 * Composite the dual-circle mask over an existing dual-fisheye video.
 * --test renders only the first seconds for a quick look.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { getConfig } from '@eac-fisheye/core';
import { siblingPath } from '@eac-fisheye/utils';
import {
  addEncodingOptions,
  applyVerbosity,
  parsePositiveNumber,
  resolveTimeoutMs,
  tryResolveProfileFlags,
  type EncodingFlags,
} from '../lib/options.js';
import { EXIT_FAILURE, runSingleJob } from '../lib/run.js';

interface MaskOptions extends EncodingFlags {
  test?: boolean;
  testDuration?: number;
  timeout?: number;
  verbose?: boolean;
}

/**
 * `<stem>_masked.mp4`, or `<stem>_test_masked.mp4` in test mode, beside the input
 */
export function defaultMaskOutput(input: string, test: boolean): string {
  return siblingPath(input, test ? '_test_masked' : '_masked', 'mp4');
}

export async function maskCommand(
  input: string,
  output: string | undefined,
  options: MaskOptions
): Promise<void> {
  applyVerbosity(options.verbose);

  const profile = tryResolveProfileFlags(options);
  if (!profile) {
    process.exitCode = EXIT_FAILURE;
    return;
  }

  const test = options.test ?? false;
  const sourcePath = resolve(input);
  const durationLimitSeconds = test
    ? options.testDuration ?? getConfig().testDurationSeconds
    : undefined;

  process.exitCode = await runSingleJob(test ? 'Masking (test)' : 'Masking', {
    sourcePath,
    destinationPath: output ? resolve(output) : defaultMaskOutput(sourcePath, test),
    profile,
    mode: 'mask-only',
    durationLimitSeconds,
    timeoutMs: resolveTimeoutMs(options.timeout),
  });
}

export function registerMask(command: Command): Command {
  return addEncodingOptions(
    command
      .description('Apply the dual-circle mask to a dual-fisheye video')
      .argument('<input>', 'dual-fisheye video')
      .argument('[output]', 'output .mp4 (default: <input>_masked.mp4)')
  )
    .option('--test', 'process only the first seconds of the input')
    .option('--test-duration <seconds>', 'length of the --test prefix', parsePositiveNumber('Test duration'))
    .option('-t, --timeout <seconds>', 'kill ffmpeg after this many seconds', parsePositiveNumber('Timeout'))
    .option('-v, --verbose', 'debug logging')
    .action(maskCommand);
}
