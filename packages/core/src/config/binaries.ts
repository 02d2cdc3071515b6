/**
 * Binary Checks
 *
 * Availability probes for the external media tools.
 */

import { executeCommand, CommandSpawnError } from '@eac-fisheye/utils';

export interface BinaryStatus {
  name: string;
  path: string;
  available: boolean;
  version?: string;
  error?: string;
}

/**
 * Run `<binary> -version` and report the first output line
 */
export async function checkBinary(name: string, path: string): Promise<BinaryStatus> {
  try {
    const result = await executeCommand(path, ['-version'], { timeout: 10000 });
    if (result.exitCode !== 0) {
      return { name, path, available: false, error: `exited with code ${result.exitCode}` };
    }
    const version = result.stdout.split('\n')[0]?.trim();
    return { name, path, available: true, version };
  } catch (error) {
    const message = error instanceof CommandSpawnError ? error.message : String(error);
    return { name, path, available: false, error: message };
  }
}

/**
 * Check whether ffmpeg was built with the given filter (v360, alphamerge, ...)
 */
export async function hasFilter(ffmpegPath: string, filter: string): Promise<boolean> {
  try {
    const result = await executeCommand(ffmpegPath, ['-hide_banner', '-filters'], { timeout: 10000 });
    if (result.exitCode !== 0) return false;
    const pattern = new RegExp(`^\\s*\\S+\\s+${filter}\\s`, 'm');
    return pattern.test(result.stdout);
  } catch {
    return false;
  }
}
