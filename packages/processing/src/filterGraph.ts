/**
 * Filter Graph Builder
 *
 * Describes each engine invocation as data (a CommandSpec of named
 * filter stages) and renders it to an ffmpeg argument list.
 *
 * Projection: EAC → equirectangular → two fisheye eyes → side by side,
 * all inside one -filter_complex.
 * Masking: dual-circle alpha mask composited over a black background.
 */

import { InvalidSpecError } from '@eac-fisheye/core';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import type { RasterImage } from './mask.js';
import { validateEncodingProfile, type EncodingProfile, type X264Preset } from './profiles.js';
import {
  eyeResolution,
  validateProjectionSpec,
  type ProjectionSpec,
  type Resolution,
} from './projection.js';

export interface FilterStage {
  readonly name: string;
  readonly inputs: readonly string[];  // pad labels without brackets
  readonly filters: readonly string[]; // applied in order
  readonly outputs: readonly string[];
}

export type ChainKind = 'projection' | 'masking';

export interface EngineInput {
  readonly path: string;
  readonly durationSeconds?: number;
}

export interface VideoEncoding {
  readonly codec: 'libx264';
  readonly preset: X264Preset;
  readonly crf: number;
  readonly pixelFormat: 'yuv420p';
}

export interface CommandSpec {
  readonly kind: ChainKind;
  readonly inputs: readonly EngineInput[];
  readonly stages: readonly FilterStage[];
  readonly outputLabel: string;
  readonly video: VideoEncoding;
  readonly audio: 'copy';
  readonly movflags: string;
  readonly outputFile: string;
  readonly expectedResolution: Resolution;
}

export interface ChainIO {
  input: string;
  output: string;
  durationLimitSeconds?: number; // truncate the main input
}

export interface MaskingIO extends ChainIO {
  maskPath: string;
  frameRate?: string; // source rate for the background layer
}

export const PROJECTION_OUTPUT_LABEL = 'dual_fisheye';
export const MASKING_OUTPUT_LABEL = 'final';

/**
 * Arguments placed before every input: progress on stdout, no prompts,
 * overwrite the destination
 */
export const ENGINE_GLOBAL_ARGS: readonly string[] = [
  '-hide_banner',
  '-nostdin',
  '-nostats',
  '-progress', 'pipe:1',
  '-y',
];

function validateDurationLimit(durationLimitSeconds: number | undefined): void {
  if (durationLimitSeconds === undefined) return;
  if (!Number.isFinite(durationLimitSeconds) || durationLimitSeconds <= 0) {
    throw new InvalidSpecError([
      `durationLimitSeconds: must be a positive number of seconds, got ${durationLimitSeconds}`,
    ]);
  }
}

function videoEncoding(profile: EncodingProfile): VideoEncoding {
  return { codec: 'libx264', preset: profile.preset, crf: profile.crf, pixelFormat: 'yuv420p' };
}

function mainInput(io: ChainIO): EngineInput {
  return io.durationLimitSeconds === undefined
    ? { path: io.input }
    : { path: io.input, durationSeconds: io.durationLimitSeconds };
}

/**
 * Single-pass EAC → dual fisheye chain
 */
export function buildProjectionChain(
  spec: ProjectionSpec,
  profile: EncodingProfile,
  io: ChainIO
): CommandSpec {
  validateProjectionSpec(spec);
  validateEncodingProfile(profile);
  validateDurationLimit(io.durationLimitSeconds);

  const eye = eyeResolution(spec);
  const intermediate = spec.intermediateResolution;
  const fisheye = (yaw: number): string =>
    'v360=e:fisheye:ih_fov=360:iv_fov=180' +
    `:h_fov=${spec.eyeFov.horizontal}:v_fov=${spec.eyeFov.vertical}` +
    `:w=${eye.width}:h=${eye.height}:yaw=${yaw}`;

  const stages: FilterStage[] = [
    {
      name: 'equirect',
      inputs: ['0:v'],
      filters: [
        'v360=eac:e:ih_fov=360:iv_fov=180',
        `scale=${intermediate.width}x${intermediate.height}`,
        // a pad feeds exactly one consumer, one copy per eye
        'split=2',
      ],
      outputs: ['equirect_left', 'equirect_right'],
    },
    {
      name: 'left_eye',
      inputs: ['equirect_left'],
      filters: [fisheye(spec.yaw.left)],
      outputs: ['left_eye'],
    },
    {
      name: 'right_eye',
      inputs: ['equirect_right'],
      filters: [fisheye(spec.yaw.right)],
      outputs: ['right_eye'],
    },
    {
      name: 'dual_fisheye',
      inputs: ['left_eye', 'right_eye'],
      filters: ['hstack=inputs=2'],
      outputs: [PROJECTION_OUTPUT_LABEL],
    },
  ];

  return {
    kind: 'projection',
    inputs: [mainInput(io)],
    stages,
    outputLabel: PROJECTION_OUTPUT_LABEL,
    video: videoEncoding(profile),
    audio: 'copy',
    movflags: '+faststart',
    outputFile: io.output,
    expectedResolution: { ...spec.outputResolution },
  };
}

/**
 * Composite the mask over a dual-fisheye video. The mask raster sizes the
 * background layer and the expected output.
 */
export function buildMaskingChain(
  mask: RasterImage,
  profile: EncodingProfile,
  io: MaskingIO
): CommandSpec {
  validateEncodingProfile(profile);
  validateDurationLimit(io.durationLimitSeconds);

  const background =
    `color=black:size=${mask.width}x${mask.height}` +
    (io.frameRate ? `:rate=${io.frameRate}` : '');

  const stages: FilterStage[] = [
    { name: 'mask_alpha', inputs: ['1:v'], filters: ['format=gray'], outputs: ['mask'] },
    { name: 'alpha_merge', inputs: ['0:v', 'mask'], filters: ['alphamerge'], outputs: ['masked'] },
    { name: 'background', inputs: [], filters: [background], outputs: ['bg'] },
    {
      name: 'composite',
      inputs: ['bg', 'masked'],
      // color is an endless source; shortest ends the graph with the video
      filters: ['overlay=0:0:format=auto:shortest=1', 'format=yuv420p'],
      outputs: [MASKING_OUTPUT_LABEL],
    },
  ];

  return {
    kind: 'masking',
    inputs: [mainInput(io), { path: io.maskPath }],
    stages,
    outputLabel: MASKING_OUTPUT_LABEL,
    video: videoEncoding(profile),
    audio: 'copy',
    movflags: '+faststart',
    outputFile: io.output,
    expectedResolution: { width: mask.width, height: mask.height },
  };
}

function renderStage(stage: FilterStage): string {
  const pads = (labels: readonly string[]): string => labels.map((label) => `[${label}]`).join('');
  return `${pads(stage.inputs)}${stage.filters.join(',')}${pads(stage.outputs)}`;
}

/**
 * Render stages as a -filter_complex string
 */
export function renderFilterGraph(stages: readonly FilterStage[]): string {
  return stages.map(renderStage).join(';');
}

/**
 * Load a CommandSpec into a builder
 */
export function createCommandBuilder(command: CommandSpec, binary: string = 'ffmpeg'): FFmpegCommandBuilder {
  const builder = new FFmpegCommandBuilder(binary).addGlobalArg(...ENGINE_GLOBAL_ARGS);

  for (const input of command.inputs) {
    builder.addInput(input.path, { duration: input.durationSeconds });
  }

  return builder
    .setComplexFilter(renderFilterGraph(command.stages))
    .mapLabel(command.outputLabel)
    .mapAudio(0)
    .setVideoCodec({
      codec: command.video.codec,
      preset: command.video.preset,
      crf: command.video.crf,
      pixFmt: command.video.pixelFormat,
    })
    .setAudioCodec(command.audio)
    .setOutputOptions({ movflags: command.movflags })
    .setOutput(command.outputFile);
}

/**
 * Full ffmpeg argument list (without the binary)
 */
export function toEngineArgs(command: CommandSpec): string[] {
  return createCommandBuilder(command).build();
}

/**
 * Printable command line for logs and pass records
 */
export function describeCommand(command: CommandSpec, binary: string = 'ffmpeg'): string {
  return createCommandBuilder(command, binary).buildString();
}
