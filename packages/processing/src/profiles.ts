/**
 * Encoding Profiles
 *
 * Named quality/speed trade-offs for the H.264 encode. The x264 preset
 * and the CRF are independent: overriding one leaves the other alone.
 * Audio is always stream-copied, so nothing here touches it.
 */

import { z } from 'zod';
import { InvalidSpecError } from '@eac-fisheye/core';
import { formatIssues } from './projection.js';

export const X264_PRESETS = [
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow',
] as const;

export type X264Preset = (typeof X264_PRESETS)[number];

export const PROFILE_NAMES = ['fast', 'balanced', 'quality'] as const;

export type ProfileName = (typeof PROFILE_NAMES)[number];

const PROFILE_LABELS = [...PROFILE_NAMES, 'custom'] as const;

export interface EncodingProfile {
  readonly name: ProfileName | 'custom';
  readonly preset: X264Preset;
  readonly crf: number;
}

export const CRF_RANGE = { min: 0, max: 51 } as const;

export const ENCODING_PROFILES: Readonly<Record<ProfileName, EncodingProfile>> = Object.freeze({
  fast: Object.freeze({ name: 'fast', preset: 'ultrafast', crf: 28 }),
  balanced: Object.freeze({ name: 'balanced', preset: 'medium', crf: 23 }),
  quality: Object.freeze({ name: 'quality', preset: 'slow', crf: 18 }),
});

export const DEFAULT_PROFILE: ProfileName = 'balanced';

const encodingProfileSchema = z.object({
  name: z.enum(PROFILE_LABELS),
  preset: z.enum(X264_PRESETS, {
    errorMap: (_issue, ctx) => ({
      message: `unknown x264 preset ${JSON.stringify(ctx.data)}; expected one of ${X264_PRESETS.join(', ')}`,
    }),
  }),
  crf: z
    .number()
    .int({ message: 'CRF must be an integer' })
    .min(CRF_RANGE.min, { message: `CRF must be between ${CRF_RANGE.min} and ${CRF_RANGE.max}` })
    .max(CRF_RANGE.max, { message: `CRF must be between ${CRF_RANGE.min} and ${CRF_RANGE.max}` }),
});

export function isProfileName(value: string): value is ProfileName {
  return PROFILE_NAMES.some((name) => name === value);
}

/**
 * Look up a named profile
 */
export function getEncodingProfile(name: string = DEFAULT_PROFILE): EncodingProfile {
  if (!isProfileName(name)) {
    throw new InvalidSpecError([
      `profile: unknown profile ${JSON.stringify(name)}; expected one of ${PROFILE_NAMES.join(', ')}`,
    ]);
  }
  return ENCODING_PROFILES[name];
}

export function validateEncodingProfile(profile: EncodingProfile): void {
  const result = encodingProfileSchema.safeParse(profile);
  if (!result.success) {
    throw new InvalidSpecError(formatIssues(result.error));
  }
}

export interface ProfileSelection {
  profile?: string;
  preset?: string;
  crf?: number;
}

/**
 * Start from a named profile (balanced by default) and apply explicit
 * preset / CRF overrides. The name turns to 'custom' when an override
 * changes the profile's values.
 */
export function resolveEncodingProfile(selection: ProfileSelection = {}): EncodingProfile {
  const base = getEncodingProfile(selection.profile ?? DEFAULT_PROFILE);
  const preset = selection.preset ?? base.preset;
  const crf = selection.crf ?? base.crf;

  const candidate = {
    name: preset === base.preset && crf === base.crf ? base.name : 'custom',
    preset,
    crf,
  };

  const result = encodingProfileSchema.safeParse(candidate);
  if (!result.success) {
    throw new InvalidSpecError(formatIssues(result.error));
  }
  return Object.freeze(result.data);
}

export function describeProfile(profile: EncodingProfile): string {
  return `${profile.name} (preset ${profile.preset}, CRF ${profile.crf})`;
}
