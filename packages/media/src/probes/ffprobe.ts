/**
 * FFProbe Wrapper
 * 
 * Safe wrapper for ffprobe command execution.
 * Extracts stream and format metadata in JSON format.
 */

import { executeCommand } from '@eac-fisheye/utils';

export interface FFProbeStream {
  index: number;
  codec_name?: string;
  codec_type: 'video' | 'audio' | 'subtitle' | 'data' | 'attachment';
  duration?: string;
  // Video specific
  width?: number;
  height?: number;
  pix_fmt?: string;
  r_frame_rate?: string;
  avg_frame_rate?: string;
  // Audio specific
  sample_rate?: string;
  channels?: number;
  channel_layout?: string;
  tags?: Record<string, string>;
}

export interface FFProbeResult {
  format?: {
    filename: string;
    nb_streams: number;
    format_name: string;
    duration?: string;
    size?: string;
    bit_rate?: string;
    tags?: Record<string, string>;
  };
  streams: FFProbeStream[];
}

export interface ProbeOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

const DEFAULT_PROBE_TIMEOUT_MS = 60000;

export class FFProbe {
  private ffprobePath: string;

  constructor(ffprobePath: string = 'ffprobe') {
    this.ffprobePath = ffprobePath;
  }

  /**
   * Probe a media file and return its streams and format.
   * `timeoutMs` is capped at one minute.
   */
  async probe(filePath: string, options: ProbeOptions = {}): Promise<FFProbeResult> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    const result = await executeCommand(this.ffprobePath, args, {
      timeout: Math.min(options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS, DEFAULT_PROBE_TIMEOUT_MS),
      signal: options.signal,
    });

    if (result.aborted) {
      throw new Error(`ffprobe was aborted for ${filePath}`);
    }
    if (result.timedOut) {
      throw new Error(`ffprobe timed out for ${filePath}`);
    }

    if (result.exitCode !== 0) {
      throw new Error(`ffprobe failed with code ${result.exitCode}: ${result.stderr.trim() || 'no output'}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout);
    } catch {
      throw new Error(`Failed to parse ffprobe output: ${result.stdout.substring(0, 200)}`);
    }

    if (!isProbeResult(parsed)) {
      throw new Error('ffprobe output has no stream list');
    }

    return parsed;
  }
}

function isProbeResult(value: unknown): value is FFProbeResult {
  return typeof value === 'object'
    && value !== null
    && 'streams' in value
    && Array.isArray(value.streams);
}
