import { describe, expect, test } from 'vitest';

import {
  ConverterError,
  EngineFailedError,
  EngineUnavailableError,
  InvalidSpecError,
  JobTimeoutError,
  SourceNotFoundError,
  isJobFailureKind,
  toJobFailure,
} from '../../src/errors/index.js';

describe('error classes', () => {
  test('carry their kind and code', () => {
    const error = new SourceNotFoundError('/videos/missing.360');

    expect(error).toBeInstanceOf(ConverterError);
    expect(error.kind).toBe('SourceNotFound');
    expect(error.code).toBe('SOURCE_NOT_FOUND');
    expect(error.message).toBe('Source /videos/missing.360 does not exist');
  });

  test('InvalidSpecError joins its issues', () => {
    const error = new InvalidSpecError(['crf: too high', 'preset: unknown']);

    expect(error.message).toBe('Invalid conversion parameters: crf: too high; preset: unknown');
    expect(error.issues).toEqual(['crf: too high', 'preset: unknown']);
  });
});

describe('toJobFailure', () => {
  test('keeps the stderr tail of an engine failure', () => {
    const failure = toJobFailure(new EngineFailedError('ffmpeg -i in.360', 1, 'Invalid data found'));

    expect(failure).toEqual({
      kind: 'EngineFailed',
      message: 'Engine exited with code 1',
      stderrTail: 'Invalid data found',
      details: { command: 'ffmpeg -i in.360', exitCode: 1 },
    });
  });

  test('maps a job-level converter error by kind', () => {
    const failure = toJobFailure(new JobTimeoutError('1-clip', 5000));

    expect(failure.kind).toBe('Timeout');
    expect(failure.message).toBe('Job 1-clip exceeded its 5000ms timeout');
  });

  test('reports unexpected values as engine failures', () => {
    expect(toJobFailure(new Error('disk full'))).toEqual({ kind: 'EngineFailed', message: 'disk full' });
    expect(toJobFailure('weird')).toEqual({ kind: 'EngineFailed', message: 'weird' });
  });

  test('EngineUnavailable is not a job-level kind', () => {
    const error = new EngineUnavailableError('ffmpeg', 'ENOENT');

    expect(isJobFailureKind(error.kind)).toBe(false);
    expect(isJobFailureKind('Cancelled')).toBe(true);
  });
});
