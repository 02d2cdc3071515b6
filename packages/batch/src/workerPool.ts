/**
 * Worker Pool
 *
 * Bounded concurrency over async tasks. At most `size` tasks run at
 * once; the rest wait in submission order. Tasks here await ffmpeg
 * subprocesses, so the parallelism lives in the OS processes while
 * bookkeeping stays on the event loop.
 */

import { InvalidSpecError } from '@eac-fisheye/core';

export class WorkerPool {
  readonly size: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new InvalidSpecError([`workerCount: must be an integer >= 1, got ${size}`]);
    }
    this.size = size;
  }

  /**
   * Run `task` once a slot is free
   */
  async submit<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiting.length;
  }

  private acquire(): Promise<void> {
    if (this.active < this.size) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiting.shift();
    if (next) next();
  }
}
