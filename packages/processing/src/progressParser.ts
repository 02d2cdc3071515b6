/**
 * Progress Parser
 *
 * Parses the key=value blocks ffmpeg writes with -progress pipe:1.
 * Each block ends in progress=continue or progress=end, which is when
 * a 'progress' event goes out.
 */

import { EventEmitter } from 'node:events';

export interface ProgressStats {
  frame: number;
  fps: number;
  size: number;   // Bytes
  time: number;   // Milliseconds of output written
  speed: number;  // x realtime
}

export type ProgressPhase = 'starting' | 'running' | 'finalizing' | 'complete';

export interface ProgressEvent {
  stats: ProgressStats;
  percent: number | null;        // null when the duration is unknown
  timeRemainingMs: number | null;
  phase: ProgressPhase;
}

function emptyStats(): ProgressStats {
  return { frame: 0, fps: 0, size: 0, time: 0, speed: 0 };
}

function toNumber(value: string, fallback: number): number {
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export class FFmpegProgressParser extends EventEmitter {
  private durationMs: number;
  private current: ProgressStats = emptyStats();
  private buffer = '';
  private phase: ProgressPhase = 'starting';

  /**
   * @param durationMs - expected output duration, 0 when unknown
   */
  constructor(durationMs: number = 0) {
    super();
    this.durationMs = durationMs;
  }

  /**
   * Parse progress data from ffmpeg -progress pipe:1
   */
  parseProgressData(data: string): void {
    this.buffer += data;

    // Process complete lines
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const line of lines) {
      this.parseProgressLine(line.trim());
    }
  }

  private parseProgressLine(line: string): void {
    const match = line.match(/^(\w+)=(.*)$/);
    if (!match) return;

    const [, key = '', value = ''] = match;

    switch (key) {
      case 'frame':
        this.current.frame = Math.trunc(toNumber(value, this.current.frame));
        break;
      case 'fps':
        this.current.fps = toNumber(value, this.current.fps);
        break;
      case 'total_size':
        this.current.size = Math.trunc(toNumber(value, this.current.size));
        break;
      // both carry microseconds despite the name
      case 'out_time_us':
      case 'out_time_ms':
        this.current.time = toNumber(value, this.current.time * 1000) / 1000;
        break;
      case 'speed':
        this.current.speed = toNumber(value.replace('x', ''), this.current.speed);
        break;
      case 'progress':
        this.updatePhase(value === 'end');
        this.emit('progress', this.createProgressEvent());
        break;
    }
  }

  private percent(): number | null {
    if (this.durationMs <= 0) return null;
    return Math.min(100, (this.current.time / this.durationMs) * 100);
  }

  private updatePhase(ended: boolean): void {
    if (ended) {
      this.phase = 'complete';
      return;
    }

    const progress = this.percent();
    if (progress === null) {
      this.phase = 'running';
    } else if (progress < 5) {
      this.phase = 'starting';
    } else if (progress > 95) {
      this.phase = 'finalizing';
    } else {
      this.phase = 'running';
    }
  }

  private createProgressEvent(): ProgressEvent {
    const percent = this.phase === 'complete' && this.durationMs > 0 ? 100 : this.percent();

    let timeRemainingMs: number | null = null;
    if (percent !== null && this.current.speed > 0) {
      timeRemainingMs = Math.max(0, this.durationMs - this.current.time) / this.current.speed;
    }

    return {
      stats: { ...this.current },
      percent,
      timeRemainingMs,
      phase: this.phase,
    };
  }
}

/**
 * Format progress for display
 */
export function formatProgress(event: ProgressEvent): string {
  const { stats } = event;
  const parts: string[] = [];

  if (event.percent !== null) {
    parts.push(`${event.percent.toFixed(1)}%`);
  }
  if (stats.frame > 0) {
    parts.push(`frame ${stats.frame}`);
  }
  if (stats.fps > 0) {
    parts.push(`${stats.fps.toFixed(1)} fps`);
  }
  if (stats.speed > 0) {
    parts.push(`${stats.speed.toFixed(2)}x`);
  }

  return parts.join(' | ');
}
