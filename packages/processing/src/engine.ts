/**
 * FFmpeg Engine
 *
 * Runs one CommandSpec as a scoped ffmpeg subprocess, streaming
 * -progress output through the progress parser. The promise settles
 * only after the child has exited.
 */

import { executeCommand, CommandSpawnError, createLogger, tailLines, type Logger } from '@eac-fisheye/utils';
import { EngineUnavailableError } from '@eac-fisheye/core';
import { describeCommand, toEngineArgs, type CommandSpec } from './filterGraph.js';
import { FFmpegProgressParser, type ProgressEvent } from './progressParser.js';

export interface EngineRunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  durationMs?: number; // expected output duration, for percentages
  onProgress?: (event: ProgressEvent) => void;
}

export interface EngineRunResult {
  exitCode: number;
  stderrTail: string;
  durationMs: number;
  timedOut: boolean;
  aborted: boolean;
  commandLine: string;
}

/**
 * The runner talks to the engine through this seam only
 */
export interface MediaEngine {
  run(command: CommandSpec, options?: EngineRunOptions): Promise<EngineRunResult>;
}

export const STDERR_TAIL_LINES = 20;

export class FFmpegEngine implements MediaEngine {
  private readonly ffmpegPath: string;
  private readonly log: Logger;

  constructor(ffmpegPath: string = 'ffmpeg') {
    this.ffmpegPath = ffmpegPath;
    this.log = createLogger({ module: 'ffmpeg-engine' });
  }

  async run(command: CommandSpec, options: EngineRunOptions = {}): Promise<EngineRunResult> {
    const args = toEngineArgs(command);
    const commandLine = describeCommand(command, this.ffmpegPath);
    this.log.debug({ pass: command.kind, command: commandLine }, 'Running ffmpeg');

    const parser = new FFmpegProgressParser(options.durationMs ?? 0);
    const { onProgress } = options;
    if (onProgress) {
      parser.on('progress', (event: ProgressEvent) => onProgress(event));
    }

    try {
      const result = await executeCommand(this.ffmpegPath, args, {
        timeout: options.timeoutMs,
        signal: options.signal,
        maxOutputSize: 256 * 1024,
        onStdout: (chunk) => parser.parseProgressData(chunk),
      });

      this.log.debug(
        { pass: command.kind, exitCode: result.exitCode, durationMs: result.duration },
        'ffmpeg exited'
      );

      return {
        exitCode: result.exitCode,
        stderrTail: tailLines(result.stderr, STDERR_TAIL_LINES),
        durationMs: result.duration,
        timedOut: result.timedOut,
        aborted: result.aborted,
        commandLine,
      };
    } catch (error) {
      if (error instanceof CommandSpawnError) {
        throw new EngineUnavailableError(this.ffmpegPath, error.code ?? error.message);
      }
      throw error;
    } finally {
      parser.removeAllListeners();
    }
  }
}
