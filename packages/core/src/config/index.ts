/**
 * Converter Configuration
 *
 * Environment-driven settings, validated with zod.
 * CLI flags override these values per invocation.
 */

import { config as dotenvConfig } from 'dotenv';
import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { InvalidSpecError } from '../errors/index.js';

/**
 * Upper bound for the default worker count; every concurrent job may hold
 * several GB of intermediate frames inside the engine.
 */
export const MAX_DEFAULT_WORKERS = 4;

const optionalInt = (min: number, max?: number) => {
  const base = z.coerce.number().int().min(min);
  return (max === undefined ? base : base.max(max)).optional();
};

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),

  // Conversion settings
  CONVERTER_WORKERS: optionalInt(1, 64),
  CONVERTER_JOB_TIMEOUT_MS: optionalInt(1),
  CONVERTER_TEST_DURATION_SECONDS: z.coerce.number().positive().default(30),
  CONVERTER_INPUT_EXTENSIONS: z.string().default('.360'),
});

export type ConverterEnv = z.input<typeof envSchema>;

export interface ConverterConfig {
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  readonly mediaTools: {
    readonly ffmpeg: string;
    readonly ffprobe: string;
  };
  readonly workers: number;
  readonly jobTimeoutMs: number | undefined;
  readonly testDurationSeconds: number;
  readonly inputExtensions: readonly string[];
}

/**
 * Default worker count: available processing units, capped
 */
export function defaultWorkerCount(): number {
  return Math.max(1, Math.min(availableParallelism(), MAX_DEFAULT_WORKERS));
}

function parseExtensions(raw: string): string[] {
  return raw
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

/**
 * Validate an environment into a frozen config
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConverterConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new InvalidSpecError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const data = parsed.data;

  return Object.freeze({
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    mediaTools: Object.freeze({
      ffmpeg: data.FFMPEG_PATH,
      ffprobe: data.FFPROBE_PATH,
    }),
    workers: data.CONVERTER_WORKERS ?? defaultWorkerCount(),
    jobTimeoutMs: data.CONVERTER_JOB_TIMEOUT_MS,
    testDurationSeconds: data.CONVERTER_TEST_DURATION_SECONDS,
    inputExtensions: Object.freeze(parseExtensions(data.CONVERTER_INPUT_EXTENSIONS)),
  });
}

let cached: ConverterConfig | null = null;

/**
 * Load `.env` from the working directory and return the process config (cached)
 */
export function getConfig(): ConverterConfig {
  if (!cached) {
    dotenvConfig();
    cached = loadConfig(process.env);
  }
  return cached;
}
