// packages/job-service/src/domain/job-registry.ts
// In-memory authoritative store for JobRecord.
// - Every mutation of one job runs under that job's lock (KeyedMutex);
//   different jobs never contend.
// - Accepted progress updates go to the ProgressBus and refresh the job's
//   summary in the same critical section; refused ones land in rejectedEvents.
import { randomUUID } from 'node:crypto';

import { JobNotFoundError } from '@setsplit/contracts';

import { KeyedMutex } from '../infrastructure/keyed-mutex.js';
import { type Logger, logger as rootLogger } from '../infrastructure/logger.js';
import { metrics } from '../infrastructure/metrics.js';
import { projectUpdate } from './job-projection.js';
import {
  type JobOptions,
  type JobRecord,
  type JobStatus,
  type ProgressEvent,
  type ProgressUpdate,
  type Tracklist,
  deriveStatus,
} from './job-model.js';
import type { ProgressBus } from './progress-bus.js';

type StoredJob = Omit<JobRecord, 'events'>;

export interface CreateJobParams {
  sourceUrl: string;
  tracklistRaw: string;
  options: JobOptions;
}

export interface JobFilter {
  status?: JobStatus | readonly JobStatus[];
}

export interface AppendContext {
  tracklist?: Tracklist;
}

export type AppendOutcome =
  | { accepted: true; event: ProgressEvent; job: JobRecord }
  | { accepted: false; reason: string; job: JobRecord };

/** Handle passed to `update` mutators; valid only inside the callback. */
export interface JobMutation {
  readonly job: JobRecord;
  append(update: ProgressUpdate, context?: AppendContext): AppendOutcome;
}

export interface JobRegistryOptions {
  bus: ProgressBus;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

export class JobRegistry {
  private readonly jobs = new Map<string, StoredJob>();
  private readonly locks = new KeyedMutex();
  private readonly bus: ProgressBus;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private sequence = 0;

  constructor(options: JobRegistryOptions) {
    this.bus = options.bus;
    this.logger = (options.logger ?? rootLogger).child({ component: 'job-registry' });
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.jobs.size;
  }

  // create.declaration()
  create(params: CreateJobParams): JobRecord {
    let id = this.generateId();
    while (this.jobs.has(id) || this.bus.has(id)) {
      id = this.generateId();
    }

    const job: StoredJob = {
      id,
      sequence: ++this.sequence,
      sourceUrl: params.sourceUrl,
      tracklistRaw: params.tracklistRaw,
      options: { ...params.options },
      status: 'initializing',
      createdAt: this.now(),
      startTime: null,
      endTime: null,
      progress: 0,
      message: 'Job created',
      error: null,
      tracklist: null,
      results: [],
      rejectedEvents: [],
    };

    this.jobs.set(id, job);
    this.bus.open(id);
    this.bus.publish(id, { stage: 'initializing', progress: 0, message: job.message });

    this.logger.info('Job created', { event: 'job_created', jobId: id });
    return this.snapshot(job);
  }

  get(id: string): JobRecord | null {
    const job = this.jobs.get(id);
    return job ? this.snapshot(job) : null;
  }

  list(filter: JobFilter = {}): JobRecord[] {
    const wanted =
      filter.status === undefined
        ? null
        : new Set<JobStatus>(typeof filter.status === 'string' ? [filter.status] : filter.status);

    const result: JobRecord[] = [];
    for (const job of this.jobs.values()) {
      if (wanted && !wanted.has(job.status)) continue;
      result.push(this.snapshot(job));
    }
    return result;
  }

  /**
   * Run `mutator` with exclusive access to one job.
   * Rejects with JobNotFoundError when the job is unknown (or removed while waiting).
   */
  async update<T>(id: string, mutator: (mutation: JobMutation) => T | Promise<T>): Promise<T> {
    if (!this.jobs.has(id)) {
      throw new JobNotFoundError(id);
    }

    return this.locks.runExclusive(id, async () => {
      const stored = this.jobs.get(id);
      if (!stored) {
        throw new JobNotFoundError(id);
      }

      let open = true;
      const current = (): JobRecord => this.snapshot(stored);
      const mutation: JobMutation = {
        get job() {
          return current();
        },
        append: (update, context = {}) => {
          if (!open) {
            throw new Error(`mutation for job ${id} used after its update completed`);
          }
          return this.apply(stored, update, context);
        },
      };

      try {
        return await mutator(mutation);
      } finally {
        open = false;
      }
    });
  }

  appendEvent(id: string, update: ProgressUpdate, context: AppendContext = {}): Promise<AppendOutcome> {
    return this.update(id, (mutation) => mutation.append(update, context));
  }

  async remove(id: string): Promise<boolean> {
    if (!this.jobs.has(id)) return false;
    return this.locks.runExclusive(id, () => {
      const existed = this.jobs.delete(id);
      this.bus.drop(id);
      if (existed) {
        this.logger.debug('Job removed', { event: 'job_removed', jobId: id });
      }
      return existed;
    });
  }

  private apply(stored: StoredJob, update: ProgressUpdate, context: AppendContext): AppendOutcome {
    const timestamp = this.bus.stamp(stored.id);
    const result = projectUpdate(stored, update, { timestamp, tracklist: context.tracklist });

    if (!result.accepted) {
      stored.rejectedEvents.push({
        receivedAt: timestamp,
        status: stored.status,
        reason: result.reason,
        update,
      });
      this.logger.warn('Progress update rejected', {
        event: 'protocol_violation',
        jobId: stored.id,
        status: stored.status,
        stage: update.stage,
        reason: result.reason,
      });
      metrics.increment('jobs.protocol_violation', 1, { stage: update.stage });
      return { accepted: false, reason: result.reason, job: this.snapshot(stored) };
    }

    const previous = stored.status;
    this.bus.append(stored.id, result.event);
    Object.assign(stored, result.next);

    if (previous !== stored.status) {
      this.logger.info('Job state changed', {
        event: 'job_transition',
        jobId: stored.id,
        from: previous,
        to: stored.status,
      });
    }

    return { accepted: true, event: result.event, job: this.snapshot(stored) };
  }

  private snapshot(job: StoredJob): JobRecord {
    const events = this.bus.history(job.id);
    return {
      ...job,
      status: deriveStatus(events),
      options: { ...job.options },
      tracklist: job.tracklist ? structuredClone(job.tracklist) : null,
      results: [...job.results],
      rejectedEvents: job.rejectedEvents.map((rejected) => ({ ...rejected })),
      events,
    };
  }
}
