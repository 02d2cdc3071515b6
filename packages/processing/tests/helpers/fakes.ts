/**
 * In-process stand-ins for ffmpeg and ffprobe
 */

import { writeFile } from 'node:fs/promises';
import type { InspectOptions, MediaInspector, MediaSummary } from '@eac-fisheye/media';

import type { EngineRunOptions, EngineRunResult, MediaEngine } from '../../src/engine.js';
import type { CommandSpec } from '../../src/filterGraph.js';

export interface EngineCall {
  command: CommandSpec;
  options: EngineRunOptions;
}

export type EngineBehaviour = (
  call: EngineCall,
  index: number
) => Partial<EngineRunResult> | Promise<Partial<EngineRunResult>>;

/**
 * Writes `outputBytes` to the command's output file, then reports
 * whatever the behaviour returns on top of a clean exit
 */
export class FakeEngine implements MediaEngine {
  readonly calls: EngineCall[] = [];
  private readonly behaviour: EngineBehaviour;
  private readonly outputBytes: string;

  constructor(behaviour: EngineBehaviour = () => ({}), outputBytes: string = 'frames') {
    this.behaviour = behaviour;
    this.outputBytes = outputBytes;
  }

  async run(command: CommandSpec, options: EngineRunOptions = {}): Promise<EngineRunResult> {
    const call = { command, options };
    this.calls.push(call);
    await writeFile(command.outputFile, this.outputBytes);
    const outcome = await this.behaviour(call, this.calls.length - 1);

    return {
      exitCode: 0,
      stderrTail: '',
      durationMs: 5,
      timedOut: false,
      aborted: false,
      commandLine: `ffmpeg ${command.kind}`,
      ...outcome,
    };
  }
}

export class FakeInspector implements MediaInspector {
  readonly inspected: string[] = [];
  private readonly summarize: (filePath: string) => MediaSummary;

  constructor(summarize: (filePath: string) => MediaSummary) {
    this.summarize = summarize;
  }

  async inspect(filePath: string): Promise<MediaSummary> {
    this.inspected.push(filePath);
    return this.summarize(filePath);
  }
}

/**
 * Answers after `delayMs` unless the caller's signal or timeout ends it first
 */
export class SlowInspector implements MediaInspector {
  readonly received: InspectOptions[] = [];
  private readonly delayMs: number;

  constructor(delayMs: number) {
    this.delayMs = delayMs;
  }

  inspect(filePath: string, options: InspectOptions = {}): Promise<MediaSummary> {
    this.received.push(options);
    return new Promise((resolve, reject) => {
      const finish = (): void => {
        clearTimeout(answer);
        clearTimeout(expire);
        options.signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = (): void => {
        finish();
        reject(new Error(`ffprobe was aborted for ${filePath}`));
      };
      const answer = setTimeout(() => {
        finish();
        resolve(mediaSummary(filePath));
      }, this.delayMs);
      const expire = options.timeoutMs !== undefined
        ? setTimeout(() => {
            finish();
            reject(new Error(`ffprobe timed out for ${filePath}`));
          }, options.timeoutMs)
        : undefined;
      options.signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

export interface SummaryOptions {
  width?: number;
  height?: number;
  duration?: number;
  audio?: boolean;
  video?: boolean;
  frameRate?: string;
}

export function mediaSummary(filePath: string, options: SummaryOptions = {}): MediaSummary {
  const duration = options.duration ?? 10;
  return {
    filePath,
    format: 'mov,mp4,m4a,3gp,3g2,mj2',
    duration,
    size: 1024,
    video:
      options.video === false
        ? null
        : {
            index: 0,
            codec: 'h264',
            width: options.width ?? 1408,
            height: options.height ?? 704,
            fps: 30,
            frameRate: options.frameRate ?? '30/1',
            duration,
          },
    audioStreams:
      options.audio === false
        ? []
        : [{ index: 1, codec: 'aac', sampleRate: 48000, channels: 2, channelLayout: 'stereo' }],
  };
}
