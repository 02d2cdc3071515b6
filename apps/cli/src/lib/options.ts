/**
 * Option Parsing
 *
 * commander argument parsers and the shared encoding/verbosity flags.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { getConfig } from '@eac-fisheye/core';
import { setLogLevel } from '@eac-fisheye/utils';
import { printError } from './output.js';
import {
  CRF_RANGE,
  PROFILE_NAMES,
  X264_PRESETS,
  resolveEncodingProfile,
  type EncodingProfile,
} from '@eac-fisheye/processing';

export interface EncodingFlags {
  quality?: number;
  preset?: string;
  profile?: string;
}

export function parseInteger(name: string, min: number, max?: number): (value: string) => number {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || (max !== undefined && parsed > max)) {
      const range = max !== undefined ? `between ${min} and ${max}` : `>= ${min}`;
      throw new InvalidArgumentError(`${name} must be an integer ${range}.`);
    }
    return parsed;
  };
}

export function parsePositiveNumber(name: string): (value: string) => number {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new InvalidArgumentError(`${name} must be a positive number.`);
    }
    return parsed;
  };
}

/**
 * --quality / --preset / --profile
 */
export function addEncodingOptions(command: Command): Command {
  return command
    .option(
      '-q, --quality <crf>',
      `CRF value (${CRF_RANGE.min}-${CRF_RANGE.max}, lower is better)`,
      parseInteger('CRF', CRF_RANGE.min, CRF_RANGE.max)
    )
    .option('-p, --preset <name>', `x264 preset (${X264_PRESETS.join(', ')})`)
    .option('--profile <name>', `encoding profile (${PROFILE_NAMES.join(', ')})`, 'balanced');
}

export function resolveProfileFlags(flags: EncodingFlags): EncodingProfile {
  return resolveEncodingProfile({
    profile: flags.profile,
    preset: flags.preset,
    crf: flags.quality,
  });
}

/**
 * Like resolveProfileFlags, but reports a bad combination and returns null
 */
export function tryResolveProfileFlags(flags: EncodingFlags): EncodingProfile | null {
  try {
    return resolveProfileFlags(flags);
  } catch (error) {
    printError(error instanceof Error ? error.message : String(error));
    return null;
  }
}

/**
 * warn by default, debug with --verbose, LOG_LEVEL when set explicitly
 */
export function applyVerbosity(verbose: boolean | undefined): void {
  if (verbose) {
    setLogLevel('debug');
  } else if (process.env['LOG_LEVEL']) {
    setLogLevel(getConfig().logLevel);
  } else {
    setLogLevel('warn');
  }
}

/**
 * Seconds flag → milliseconds, falling back to CONVERTER_JOB_TIMEOUT_MS
 */
export function resolveTimeoutMs(timeoutSeconds: number | undefined): number | undefined {
  if (timeoutSeconds !== undefined) {
    return Math.round(timeoutSeconds * 1000);
  }
  return getConfig().jobTimeoutMs;
}
