/**
 * Convert Command
 *
 * EAC .360 file → 1408x704 dual-fisheye MP4, optionally masked.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import {
  addEncodingOptions,
  applyVerbosity,
  parsePositiveNumber,
  resolveTimeoutMs,
  tryResolveProfileFlags,
  type EncodingFlags,
} from '../lib/options.js';
import { EXIT_FAILURE, runSingleJob } from '../lib/run.js';

interface ConvertOptions extends EncodingFlags {
  mask?: boolean;
  timeout?: number;
  verbose?: boolean;
}

export async function convertCommand(
  input: string,
  output: string,
  options: ConvertOptions
): Promise<void> {
  applyVerbosity(options.verbose);

  const profile = tryResolveProfileFlags(options);
  if (!profile) {
    process.exitCode = EXIT_FAILURE;
    return;
  }

  process.exitCode = await runSingleJob(options.mask ? 'Converting and masking' : 'Converting', {
    sourcePath: resolve(input),
    destinationPath: resolve(output),
    profile,
    masking: options.mask ?? false,
    timeoutMs: resolveTimeoutMs(options.timeout),
  });
}

export function registerConvert(command: Command): Command {
  return addEncodingOptions(
    command
      .description('Convert an EAC 360° video to dual fisheye (1408x704)')
      .argument('<input>', 'input .360 file')
      .argument('<output>', 'output .mp4 file')
  )
    .option('-m, --mask', 'composite the dual-circle mask after converting')
    .option('-t, --timeout <seconds>', 'kill ffmpeg after this many seconds', parsePositiveNumber('Timeout'))
    .option('-v, --verbose', 'debug logging')
    .action(convertCommand);
}
