/**
 * Media Inspector
 * 
 * Turns raw ffprobe output into a MediaSummary.
 * The converter depends on the MediaInspector interface only,
 * so tests can swap in an in-process fake.
 */

import { FFProbe, type FFProbeResult, type FFProbeStream, type ProbeOptions } from './probes/ffprobe.js';
import type { AudioStream, MediaSummary, VideoStream } from './types.js';

export type InspectOptions = ProbeOptions;

export interface MediaInspector {
  inspect(filePath: string, options?: InspectOptions): Promise<MediaSummary>;
}

export class FFProbeInspector implements MediaInspector {
  private readonly ffprobe: FFProbe;

  constructor(ffprobePath: string = 'ffprobe') {
    this.ffprobe = new FFProbe(ffprobePath);
  }

  async inspect(filePath: string, options: InspectOptions = {}): Promise<MediaSummary> {
    const result = await this.ffprobe.probe(filePath, options);
    return summarizeProbe(filePath, result);
  }
}

/**
 * Parse an ffprobe rational ("30000/1001") or plain number
 */
export function parseFrameRate(value: string | undefined): number {
  if (!value) return 0;
  const [num, den] = value.split('/');
  const numerator = Number(num);
  const denominator = den === undefined ? 1 : Number(den);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return 0;
  }
  return numerator / denominator;
}

function pickFrameRate(stream: FFProbeStream): string | undefined {
  if (parseFrameRate(stream.avg_frame_rate) > 0) return stream.avg_frame_rate;
  if (parseFrameRate(stream.r_frame_rate) > 0) return stream.r_frame_rate;
  return undefined;
}

function toNumber(value: string | undefined): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

function toVideoStream(stream: FFProbeStream): VideoStream {
  return {
    index: stream.index,
    codec: stream.codec_name ?? 'unknown',
    width: stream.width ?? 0,
    height: stream.height ?? 0,
    pixelFormat: stream.pix_fmt,
    fps: parseFrameRate(stream.avg_frame_rate) || parseFrameRate(stream.r_frame_rate),
    frameRate: pickFrameRate(stream),
    duration: toNumber(stream.duration),
  };
}

function toAudioStream(stream: FFProbeStream): AudioStream {
  return {
    index: stream.index,
    codec: stream.codec_name ?? 'unknown',
    sampleRate: toNumber(stream.sample_rate),
    channels: stream.channels ?? 0,
    channelLayout: stream.channel_layout,
  };
}

/**
 * Condense a probe result. The first video stream wins; GoPro .360 files
 * carry two EAC video tracks and the converter maps 0:v the same way.
 */
export function summarizeProbe(filePath: string, result: FFProbeResult): MediaSummary {
  const videoStream = result.streams.find((stream) => stream.codec_type === 'video');
  const video = videoStream ? toVideoStream(videoStream) : null;
  const containerDuration = toNumber(result.format?.duration);

  return {
    filePath,
    format: result.format?.format_name ?? 'unknown',
    duration: video?.duration || containerDuration,
    size: toNumber(result.format?.size),
    video,
    audioStreams: result.streams
      .filter((stream) => stream.codec_type === 'audio')
      .map(toAudioStream),
  };
}
