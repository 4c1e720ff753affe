// packages/job-service/src/infrastructure/job-reaper.ts
// Retention sweeper: removes terminal jobs whose endTime is older than the TTL.
// A TTL of 0 disables removal entirely.
import { isTerminal } from '../domain/job-model.js';
import type { JobRegistry } from '../domain/job-registry.js';
import { type Logger, logger as rootLogger } from './logger.js';
import { metrics } from './metrics.js';

export interface JobReaperOptions {
  registry: JobRegistry;
  ttlMs: number;
  sweepIntervalMs: number;
  now?: () => Date;
  logger?: Logger;
}

export class JobReaper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(private readonly options: JobReaperOptions) {
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? rootLogger).child({ component: 'job-reaper' });
  }

  /**
   * Remove expired jobs once. Returns the identifiers removed.
   */
  async sweep(): Promise<string[]> {
    if (this.options.ttlMs <= 0) return [];

    const cutoff = this.now().getTime() - this.options.ttlMs;
    const expired = this.options.registry
      .list()
      .filter((job) => isTerminal(job.status) && job.endTime !== null && job.endTime.getTime() <= cutoff)
      .map((job) => job.id);

    const removed: string[] = [];
    for (const id of expired) {
      if (await this.options.registry.remove(id)) {
        removed.push(id);
      }
    }

    if (removed.length > 0) {
      metrics.increment('jobs.reaped', removed.length);
      this.logger.info('Expired jobs removed', { event: 'jobs_reaped', count: removed.length });
    }
    return removed;
  }

  start(): void {
    if (this.timer || this.options.ttlMs <= 0) return;
    this.timer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error(error instanceof Error ? error : String(error), {
          event: 'jobs_reap_failed',
        });
      });
    }, this.options.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
