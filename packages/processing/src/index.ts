/**
 * @eac-fisheye/processing
 *
 * Projection and masking filter graphs, the ffmpeg engine seam and the
 * per-file conversion job runner.
 *
 * - Audio is always stream-copied, never re-encoded
 * - Every ffmpeg command line is logged at debug level
 */

// Projection geometry
export {
  LRV_MATCH_PROJECTION,
  LRV_OUTPUT_RESOLUTION,
  createProjectionSpec,
  validateProjectionSpec,
  eyeResolution,
  formatIssues,
  type ProjectionSpec,
  type ProjectionMode,
  type ProjectionOverrides,
  type Resolution,
  type FieldOfView,
} from './projection.js';

// Encoding profiles
export {
  ENCODING_PROFILES,
  DEFAULT_PROFILE,
  PROFILE_NAMES,
  X264_PRESETS,
  CRF_RANGE,
  getEncodingProfile,
  resolveEncodingProfile,
  validateEncodingProfile,
  describeProfile,
  isProfileName,
  type EncodingProfile,
  type ProfileName,
  type ProfileSelection,
  type X264Preset,
} from './profiles.js';

// Mask
export {
  MASK_RADIUS_RATIO,
  MASK_RADIUS_PADDING,
  MASK_INSIDE,
  MASK_OUTSIDE,
  deriveMaskSpec,
  generateMask,
  encodeMaskPng,
  maskValueAt,
  type MaskSpec,
  type RasterImage,
  type Point,
} from './mask.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  quoteArg,
  type VideoCodecOptions,
  type AudioCodec,
  type InputOptions,
  type OutputOptions,
  type StreamMapping,
} from './commandBuilder.js';

// Filter graphs
export {
  ENGINE_GLOBAL_ARGS,
  PROJECTION_OUTPUT_LABEL,
  MASKING_OUTPUT_LABEL,
  buildProjectionChain,
  buildMaskingChain,
  renderFilterGraph,
  createCommandBuilder,
  toEngineArgs,
  describeCommand,
  type FilterStage,
  type CommandSpec,
  type ChainKind,
  type ChainIO,
  type MaskingIO,
  type EngineInput,
  type VideoEncoding,
} from './filterGraph.js';

// Progress parsing
export {
  FFmpegProgressParser,
  formatProgress,
  type ProgressEvent,
  type ProgressStats,
  type ProgressPhase,
} from './progressParser.js';

// Engine
export {
  FFmpegEngine,
  STDERR_TAIL_LINES,
  type MediaEngine,
  type EngineRunOptions,
  type EngineRunResult,
} from './engine.js';

// Jobs
export {
  createConversionJob,
  createCancelledResult,
  freezeResult,
  type ConversionJob,
  type ConversionJobInput,
  type JobMode,
  type JobResult,
  type JobStatus,
  type FindingCode,
  type ValidationFinding,
  type PassRecord,
} from './job.js';

export {
  ConversionJobRunner,
  DUAL_FISHEYE_ASPECT,
  type RunContext,
  type JobProgress,
  type ConversionJobRunnerOptions,
} from './jobRunner.js';
