import { describe, expect, test } from 'vitest';
import { InvalidSpecError } from '@eac-fisheye/core';

import {
  LRV_MATCH_PROJECTION,
  createProjectionSpec,
  eyeResolution,
  validateProjectionSpec,
} from '../../src/projection.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidSpecError) return error.issues;
    throw error;
  }
  return [];
}

describe('LRV-match projection', () => {
  test('produces a 1408x704 side-by-side frame of two 704x704 eyes', () => {
    expect(LRV_MATCH_PROJECTION.outputResolution).toEqual({ width: 1408, height: 704 });
    expect(eyeResolution(LRV_MATCH_PROJECTION)).toEqual({ width: 704, height: 704 });
    expect(LRV_MATCH_PROJECTION.eyeFov).toEqual({ horizontal: 190, vertical: 190 });
    expect(LRV_MATCH_PROJECTION.yaw).toEqual({ left: -90, right: 90 });
  });

  test('is what createProjectionSpec returns without geometry overrides', () => {
    const spec = createProjectionSpec({ inputResolution: { width: 5952, height: 1920 } });

    expect(spec.mode).toBe('lrv-match');
    expect(spec.outputResolution).toEqual(LRV_MATCH_PROJECTION.outputResolution);
    expect(spec.inputResolution).toEqual({ width: 5952, height: 1920 });
    expect(Object.isFrozen(spec)).toBe(true);
  });
});

describe('createProjectionSpec', () => {
  test('geometry overrides make a custom projection', () => {
    const spec = createProjectionSpec({
      outputResolution: { width: 2048, height: 1024 },
      eyeFov: { horizontal: 200 },
    });

    expect(spec.mode).toBe('custom');
    expect(spec.eyeFov).toEqual({ horizontal: 200, vertical: 190 });
    expect(eyeResolution(spec)).toEqual({ width: 1024, height: 1024 });
  });

  test('rejects a non 2:1 output', () => {
    expect(issuesOf(() => createProjectionSpec({ outputResolution: { width: 1400, height: 704 } }))).toEqual([
      'outputResolution: output aspect must be 2:1, got 1400x704',
    ]);
  });

  test('rejects an odd output height', () => {
    expect(issuesOf(() => createProjectionSpec({ outputResolution: { width: 1406, height: 703 } }))).toEqual([
      'outputResolution.height: output height must be even, got 703',
    ]);
  });

  test('rejects out-of-range angles', () => {
    const issues = issuesOf(() => createProjectionSpec({ eyeFov: { vertical: 0 }, yaw: { right: 270 } }));

    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^eyeFov\.vertical: /);
    expect(issues[1]).toMatch(/^yaw\.right: /);
  });
});

describe('validateProjectionSpec', () => {
  test('lrv-match mode is pinned to 1408x704', () => {
    expect(
      issuesOf(() =>
        validateProjectionSpec({
          ...LRV_MATCH_PROJECTION,
          outputResolution: { width: 2048, height: 1024 },
        })
      )
    ).toEqual(['outputResolution: lrv-match output must be 1408x704']);
  });

  test('rejects a non 2:1 intermediate', () => {
    expect(
      issuesOf(() =>
        validateProjectionSpec({
          ...LRV_MATCH_PROJECTION,
          intermediateResolution: { width: 3840, height: 2160 },
        })
      )
    ).toEqual(['intermediateResolution: equirectangular intermediate must be 2:1, got 3840x2160']);
  });
});
