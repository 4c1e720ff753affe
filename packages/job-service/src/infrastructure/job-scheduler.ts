// packages/job-service/src/infrastructure/job-scheduler.ts
// In-process FIFO semaphore bounding how many job workers run at once.
// - Excess jobs wait in arrival order; nothing is rejected for lack of capacity.
// - A waiting job can be withdrawn with cancel() or through its AbortSignal.
import { logger } from './logger.js';

interface Waiter {
  jobId: string;
  enqueuedAt: number;
  resolve: () => void;
  reject: (reason: unknown) => void;
  cleanup: () => void;
}

export class JobCancelledWhileQueuedError extends Error {
  constructor(readonly jobId: string) {
    super(`job ${jobId} was cancelled before a worker slot became free`);
    this.name = 'JobCancelledWhileQueuedError';
  }
}

export class JobScheduler {
  private readonly active = new Set<string>();
  private readonly queue: Waiter[] = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  /**
   * Acquire a slot for the job. Resolves immediately when under the limit,
   * otherwise once every job queued ahead of it has been admitted.
   */
  acquire(jobId: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new JobCancelledWhileQueuedError(jobId));
    }

    if (this.active.size < this.maxConcurrent && this.queue.length === 0) {
      this.active.add(jobId);
      logger.debug('Job slot acquired', {
        event: 'scheduler_acquired',
        jobId,
        active: this.active.size,
        max: this.maxConcurrent,
        waitMs: 0,
      });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.cancel(jobId);
      };
      const waiter: Waiter = {
        jobId,
        enqueuedAt: Date.now(),
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);

      logger.debug('Job queued for a worker slot', {
        event: 'scheduler_queued',
        jobId,
        position: this.queue.length,
      });
    });
  }

  release(jobId: string): void {
    if (!this.active.delete(jobId)) return;
    this.drain();
    logger.debug('Job slot released', { event: 'scheduler_released', jobId });
  }

  /**
   * Withdraw a waiting job. Returns false when the job is not queued
   * (already running, finished, or never seen).
   */
  cancel(jobId: string): boolean {
    const index = this.queue.findIndex((waiter) => waiter.jobId === jobId);
    if (index === -1) return false;

    const [waiter] = this.queue.splice(index, 1);
    if (!waiter) return false;
    waiter.cleanup();
    waiter.reject(new JobCancelledWhileQueuedError(jobId));
    return true;
  }

  isQueued(jobId: string): boolean {
    return this.queue.some((waiter) => waiter.jobId === jobId);
  }

  getStats(): { active: number; queued: number; max: number } {
    return {
      active: this.active.size,
      queued: this.queue.length,
      max: this.maxConcurrent,
    };
  }

  private drain(): void {
    while (this.active.size < this.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) return;
      next.cleanup();
      this.active.add(next.jobId);
      logger.debug('Job slot acquired', {
        event: 'scheduler_acquired',
        jobId: next.jobId,
        active: this.active.size,
        max: this.maxConcurrent,
        waitMs: Date.now() - next.enqueuedAt,
      });
      next.resolve();
    }
  }
}
