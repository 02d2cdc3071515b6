import { describe, expect, test } from 'vitest';
import { InvalidSpecError } from '@eac-fisheye/core';

import {
  ENCODING_PROFILES,
  describeProfile,
  getEncodingProfile,
  resolveEncodingProfile,
} from '../../src/profiles.js';

describe('encoding profiles', () => {
  test('named profiles', () => {
    expect(ENCODING_PROFILES.fast).toEqual({ name: 'fast', preset: 'ultrafast', crf: 28 });
    expect(ENCODING_PROFILES.balanced).toEqual({ name: 'balanced', preset: 'medium', crf: 23 });
    expect(ENCODING_PROFILES.quality).toEqual({ name: 'quality', preset: 'slow', crf: 18 });
  });

  test('balanced is the default', () => {
    expect(getEncodingProfile()).toBe(ENCODING_PROFILES.balanced);
    expect(resolveEncodingProfile()).toEqual(ENCODING_PROFILES.balanced);
  });

  test('unknown profile names are rejected', () => {
    expect(() => getEncodingProfile('turbo')).toThrow(InvalidSpecError);
  });
});

describe('resolveEncodingProfile', () => {
  test('a CRF override keeps the preset and becomes custom', () => {
    expect(resolveEncodingProfile({ profile: 'fast', crf: 20 })).toEqual({
      name: 'custom',
      preset: 'ultrafast',
      crf: 20,
    });
  });

  test('a preset override keeps the CRF', () => {
    expect(resolveEncodingProfile({ preset: 'veryslow' })).toEqual({
      name: 'custom',
      preset: 'veryslow',
      crf: 23,
    });
  });

  test('an override equal to the profile keeps its name', () => {
    expect(resolveEncodingProfile({ profile: 'quality', crf: 18 }).name).toBe('quality');
  });

  test.each([-1, 52, 20.5])('rejects CRF %s', (crf) => {
    expect(() => resolveEncodingProfile({ crf })).toThrow(InvalidSpecError);
  });

  test('accepts the CRF bounds', () => {
    expect(resolveEncodingProfile({ crf: 0 }).crf).toBe(0);
    expect(resolveEncodingProfile({ crf: 51 }).crf).toBe(51);
  });

  test('rejects an unknown preset with the accepted list', () => {
    let issues: string[] = [];
    try {
      resolveEncodingProfile({ preset: 'warp' });
    } catch (error) {
      if (error instanceof InvalidSpecError) issues = error.issues;
    }

    expect(issues).toEqual([
      'preset: unknown x264 preset "warp"; expected one of ultrafast, superfast, veryfast, faster, fast, medium, slow, slower, veryslow',
    ]);
  });
});

test('describeProfile', () => {
  expect(describeProfile(ENCODING_PROFILES.balanced)).toBe('balanced (preset medium, CRF 23)');
});
