/**
 * Media Types
 * 
 * Condensed stream information used to validate conversion inputs and outputs.
 */

export interface VideoStream {
  index: number;
  codec: string;
  width: number;
  height: number;
  pixelFormat?: string;
  fps: number;
  frameRate?: string; // rational as reported, e.g. 30000/1001
  duration: number; // seconds, 0 when unknown
}

export interface AudioStream {
  index: number;
  codec: string;
  sampleRate: number;
  channels: number;
  channelLayout?: string;
}

export interface MediaSummary {
  filePath: string;
  format: string;
  duration: number; // seconds, 0 when unknown
  size: number; // bytes reported by the container
  video: VideoStream | null; // first video stream
  audioStreams: AudioStream[];
}
