/**
 * @eac-fisheye/media
 * 
 * Media inspection layer.
 * 
 * Responsibilities:
 * - Probe files with ffprobe
 * - Summarize the streams the converter validates against
 *   (frame size, audio presence, duration)
 */

// Probing
export { FFProbe, type FFProbeResult, type FFProbeStream, type ProbeOptions } from './probes/ffprobe.js';

// Inspection
export {
  FFProbeInspector,
  summarizeProbe,
  parseFrameRate,
  type InspectOptions,
  type MediaInspector,
} from './inspector.js';

// Types
export type {
  VideoStream,
  AudioStream,
  MediaSummary,
} from './types.js';
