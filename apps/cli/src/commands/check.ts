/**
 * Check Command
 *
 * Verifies that ffmpeg and ffprobe run and that ffmpeg carries the
 * filters the converter relies on.
 */

import ora from 'ora';
import type { Command } from 'commander';
import { checkBinary, getConfig, hasFilter } from '@eac-fisheye/core';
import { printError, printHeader, printKeyValue, printSuccess } from '../lib/output.js';
import { EXIT_FAILURE, EXIT_OK } from '../lib/run.js';

export const REQUIRED_FILTERS = ['v360', 'alphamerge'] as const;

export async function checkCommand(): Promise<void> {
  const { mediaTools } = getConfig();
  const spinner = ora('Checking media tools...').start();

  const [ffmpeg, ffprobe] = await Promise.all([
    checkBinary('ffmpeg', mediaTools.ffmpeg),
    checkBinary('ffprobe', mediaTools.ffprobe),
  ]);
  const filters = ffmpeg.available
    ? await Promise.all(REQUIRED_FILTERS.map(async (name) => ({ name, present: await hasFilter(mediaTools.ffmpeg, name) })))
    : [];
  spinner.stop();

  printHeader('Installation Check');
  let ok = true;

  for (const status of [ffmpeg, ffprobe]) {
    if (status.available) {
      printSuccess(`${status.name}: ${status.version ?? status.path}`);
    } else {
      ok = false;
      printError(`${status.name} (${status.path}): ${status.error ?? 'not available'}`);
    }
  }

  for (const filter of filters) {
    if (filter.present) {
      printSuccess(`filter ${filter.name}`);
    } else {
      ok = false;
      printError(`filter ${filter.name} missing from ${mediaTools.ffmpeg}`);
    }
  }

  console.log();
  if (!ok) {
    printKeyValue('Hint', 'install a full ffmpeg build or set FFMPEG_PATH / FFPROBE_PATH');
  }
  process.exitCode = ok ? EXIT_OK : EXIT_FAILURE;
}

export function registerCheck(command: Command): Command {
  return command
    .description('Check that ffmpeg, ffprobe and the v360 filter are available')
    .action(checkCommand);
}
