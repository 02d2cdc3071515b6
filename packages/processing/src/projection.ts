/**
 * Projection Parameters
 *
 * Geometry of the EAC → equirectangular → dual fisheye transform.
 * LRV-match mode reproduces the 1408x704 side-by-side layout of the
 * camera's low-resolution preview files.
 */

import { z } from 'zod';
import { InvalidSpecError } from '@eac-fisheye/core';

export interface Resolution {
  readonly width: number;
  readonly height: number;
}

export interface FieldOfView {
  readonly horizontal: number; // degrees
  readonly vertical: number;   // degrees
}

export type ProjectionMode = 'lrv-match' | 'custom';

export interface ProjectionSpec {
  readonly mode: ProjectionMode;
  readonly inputResolution?: Resolution;
  readonly outputResolution: Resolution;
  readonly eyeFov: FieldOfView; // shared by both eyes
  readonly yaw: { readonly left: number; readonly right: number };
  readonly intermediateResolution: Resolution;
}

export interface ProjectionOverrides {
  inputResolution?: Resolution;
  outputResolution?: Resolution;
  eyeFov?: Partial<FieldOfView>;
  yaw?: Partial<{ left: number; right: number }>;
  intermediateResolution?: Resolution;
}

export const LRV_OUTPUT_RESOLUTION: Resolution = Object.freeze({ width: 1408, height: 704 });

export const LRV_MATCH_PROJECTION: ProjectionSpec = Object.freeze({
  mode: 'lrv-match',
  outputResolution: LRV_OUTPUT_RESOLUTION,
  eyeFov: Object.freeze({ horizontal: 190, vertical: 190 }),
  yaw: Object.freeze({ left: -90, right: 90 }),
  intermediateResolution: Object.freeze({ width: 3840, height: 1920 }),
});

const resolutionSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

const fovSchema = z.number().gt(0).lte(360);
const yawSchema = z.number().gte(-180).lte(180);

const projectionSpecSchema = z
  .object({
    mode: z.enum(['lrv-match', 'custom']),
    inputResolution: resolutionSchema.optional(),
    outputResolution: resolutionSchema,
    eyeFov: z.object({ horizontal: fovSchema, vertical: fovSchema }),
    yaw: z.object({ left: yawSchema, right: yawSchema }),
    intermediateResolution: resolutionSchema,
  })
  .superRefine((spec, ctx) => {
    const { width, height } = spec.outputResolution;
    if (width !== height * 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['outputResolution'],
        message: `output aspect must be 2:1, got ${width}x${height}`,
      });
    }
    // yuv420p needs even frame dimensions, and each eye is height x height
    if (height % 2 !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['outputResolution', 'height'],
        message: `output height must be even, got ${height}`,
      });
    }
    const intermediate = spec.intermediateResolution;
    if (intermediate.width !== intermediate.height * 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['intermediateResolution'],
        message: `equirectangular intermediate must be 2:1, got ${intermediate.width}x${intermediate.height}`,
      });
    }
    if (
      spec.mode === 'lrv-match' &&
      (width !== LRV_OUTPUT_RESOLUTION.width || height !== LRV_OUTPUT_RESOLUTION.height)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['outputResolution'],
        message: `lrv-match output must be ${LRV_OUTPUT_RESOLUTION.width}x${LRV_OUTPUT_RESOLUTION.height}`,
      });
    }
  });

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Throw InvalidSpecError listing every problem with the projection
 */
export function validateProjectionSpec(spec: ProjectionSpec): void {
  const result = projectionSpecSchema.safeParse(spec);
  if (!result.success) {
    throw new InvalidSpecError(formatIssues(result.error));
  }
}

/**
 * Build a validated, frozen projection. Without geometry overrides the
 * result is the LRV-match projection (optionally annotated with the
 * probed input resolution).
 */
export function createProjectionSpec(overrides: ProjectionOverrides = {}): ProjectionSpec {
  const base = LRV_MATCH_PROJECTION;
  const custom =
    overrides.outputResolution !== undefined ||
    overrides.eyeFov !== undefined ||
    overrides.yaw !== undefined ||
    overrides.intermediateResolution !== undefined;

  const spec: ProjectionSpec = {
    mode: custom ? 'custom' : 'lrv-match',
    ...(overrides.inputResolution ? { inputResolution: Object.freeze({ ...overrides.inputResolution }) } : {}),
    outputResolution: Object.freeze({ ...(overrides.outputResolution ?? base.outputResolution) }),
    eyeFov: Object.freeze({ ...base.eyeFov, ...overrides.eyeFov }),
    yaw: Object.freeze({ ...base.yaw, ...overrides.yaw }),
    intermediateResolution: Object.freeze({
      ...(overrides.intermediateResolution ?? base.intermediateResolution),
    }),
  };

  validateProjectionSpec(spec);
  return Object.freeze(spec);
}

/**
 * Per-eye frame size: half the output width by the full output height
 */
export function eyeResolution(spec: ProjectionSpec): Resolution {
  return {
    width: spec.outputResolution.width / 2,
    height: spec.outputResolution.height,
  };
}
