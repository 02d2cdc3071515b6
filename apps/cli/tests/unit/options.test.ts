import { InvalidArgumentError } from 'commander';
import { describe, expect, test } from 'vitest';
import { InvalidSpecError } from '@eac-fisheye/core';

import { parseInteger, parsePositiveNumber, resolveProfileFlags } from '../../src/lib/options.js';

describe('parseInteger', () => {
  const workers = parseInteger('Workers', 1, 8);

  test('accepts integers in range', () => {
    expect(workers('1')).toBe(1);
    expect(workers('8')).toBe(8);
  });

  test.each(['0', '9', '2.5', 'four', ''])('rejects %j', (value) => {
    expect(() => workers(value)).toThrow(InvalidArgumentError);
  });

  test('names the range in the message', () => {
    expect(() => workers('9')).toThrow('Workers must be an integer between 1 and 8.');
    expect(() => parseInteger('Retries', 0)('-1')).toThrow('Retries must be an integer >= 0.');
  });
});

describe('parsePositiveNumber', () => {
  const seconds = parsePositiveNumber('Timeout');

  test('accepts fractions', () => {
    expect(seconds('1.5')).toBe(1.5);
  });

  test('rejects zero and garbage', () => {
    expect(() => seconds('0')).toThrow('Timeout must be a positive number.');
    expect(() => seconds('soon')).toThrow(InvalidArgumentError);
  });
});

describe('resolveProfileFlags', () => {
  test('maps --quality to the CRF', () => {
    expect(resolveProfileFlags({ profile: 'balanced', quality: 20 })).toEqual({
      name: 'custom',
      preset: 'medium',
      crf: 20,
    });
  });

  test('keeps a named profile without overrides', () => {
    expect(resolveProfileFlags({ profile: 'fast' })).toEqual({ name: 'fast', preset: 'ultrafast', crf: 28 });
  });

  test('rejects an unknown preset', () => {
    expect(() => resolveProfileFlags({ profile: 'balanced', preset: 'instant' })).toThrow(InvalidSpecError);
  });
});
