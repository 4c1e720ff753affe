// packages/job-service/src/application/job-lifecycle-manager.ts
//
// Orchestrates jobs from submission to a terminal state.
// - submit() validates, creates the job and returns before any work starts.
// - Each job gets a handle (AbortController + settled promise); the worker
//   runs once the scheduler grants a slot.
// - Worker updates are applied through the registry, which refuses
//   transitions the state machine does not allow.
// - cancel() is bounded by cancelTimeoutMs whatever the worker does.
import {
  JobServiceError,
  WorkerFaultError,
  type JobStatus,
} from '@setsplit/contracts';

import {
  CANCELLED_ERROR,
  type JobRecord,
  type ProgressEvent,
  type ProgressUpdate,
  type Tracklist,
  isTerminal,
} from '../domain/job-model.js';
import type { AppendOutcome, JobRegistry } from '../domain/job-registry.js';
import { type Page, DEFAULT_PAGE, paginate } from '../domain/paginator.js';
import type { ProgressBus, ProgressSubscription, SubscribeOptions } from '../domain/progress-bus.js';
import { parseTracklist } from '../domain/tracklist.js';
import type { Worker } from '../domain/worker.js';
import { JobCancelledWhileQueuedError, type JobScheduler } from '../infrastructure/job-scheduler.js';
import { type Logger, logger as rootLogger } from '../infrastructure/logger.js';
import { metrics } from '../infrastructure/metrics.js';
import {
  type SubmissionPolicy,
  type SubmitJobRequest,
  type SubmitJobResponse,
  normalizeSubmission,
} from './submit-job.js';

export const CANCELLED_MESSAGE = 'Job cancelled by user';
export const TIMEOUT_MESSAGE = 'processing timed out';
export const INCOMPLETE_RUN_MESSAGE = 'worker exited without reporting completion';

export interface LifecycleSettings extends SubmissionPolicy {
  maxTracks: number;
  cancelTimeoutMs: number;
  workerTimeoutMs: number;
  defaultPageSize: number;
  maxPageSize: number;
}

export interface JobLifecycleManagerDeps {
  registry: JobRegistry;
  bus: ProgressBus;
  scheduler: JobScheduler;
  worker: Worker;
  settings: LifecycleSettings;
  logger?: Logger;
}

export interface ListJobsQuery {
  page?: number;
  pageSize?: number;
  status?: JobStatus;
}

export type CancelResult =
  | { success: true; message: string; jobId: string; timestamp: Date }
  | {
      success: false;
      message: string;
      jobId: string;
      timestamp: Date;
      error: 'not_found' | 'already_terminal';
    };

type AbortReason = 'cancelled' | 'timeout';

interface JobHandle {
  jobId: string;
  controller: AbortController;
  abortReason: AbortReason | null;
  settled: Promise<void>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class JobLifecycleManager {
  private readonly registry: JobRegistry;
  private readonly bus: ProgressBus;
  private readonly scheduler: JobScheduler;
  private readonly worker: Worker;
  private readonly settings: LifecycleSettings;
  private readonly logger: Logger;
  private readonly handles = new Map<string, JobHandle>();
  private shuttingDown = false;

  constructor(deps: JobLifecycleManagerDeps) {
    this.registry = deps.registry;
    this.bus = deps.bus;
    this.scheduler = deps.scheduler;
    this.worker = deps.worker;
    this.settings = deps.settings;
    this.logger = (deps.logger ?? rootLogger).child({ component: 'job-lifecycle' });
  }

  // submit.declaration()
  // Throws InvalidRequestError for invalid input; processing failures end up on the job.
  submit(req: SubmitJobRequest): SubmitJobResponse {
    if (this.shuttingDown) {
      throw new JobServiceError('job service is shutting down', 'shutting_down');
    }

    const submission = normalizeSubmission(req, this.settings);
    const job = this.registry.create(submission);

    const handle: JobHandle = {
      jobId: job.id,
      controller: new AbortController(),
      abortReason: null,
      settled: Promise.resolve(),
    };
    this.handles.set(job.id, handle);
    handle.settled = this.runJob(handle, job)
      .catch((err: unknown) => this.failUnexpectedly(job.id, err))
      .finally(() => {
        this.handles.delete(job.id);
      });

    metrics.increment('jobs.submitted');
    this.logger.info('Job submitted', {
      event: 'job_submitted',
      jobId: job.id,
      fileExtension: job.options.fileExtension,
      maxConcurrentTasks: job.options.maxConcurrentTasks,
    });

    return { jobId: job.id };
  }

  get(jobId: string): JobRecord | null {
    return this.registry.get(jobId);
  }

  list(query: ListJobsQuery = {}): Page<JobRecord> {
    const jobs = this.registry.list(query.status ? { status: query.status } : {});
    return paginate(jobs, {
      page: query.page ?? DEFAULT_PAGE,
      pageSize: query.pageSize ?? this.settings.defaultPageSize,
      maxPageSize: this.settings.maxPageSize,
    });
  }

  history(jobId: string): ProgressEvent[] {
    return this.bus.history(jobId);
  }

  subscribe(jobId: string, options?: SubscribeOptions): ProgressSubscription {
    return this.bus.subscribe(jobId, options);
  }

  // cancel.declaration()
  async cancel(jobId: string): Promise<CancelResult> {
    const job = this.registry.get(jobId);
    if (!job) {
      return this.cancelRefused(jobId, 'not_found', 'Job not found');
    }
    if (isTerminal(job.status)) {
      return this.cancelRefused(jobId, 'already_terminal', `Job already ${job.status}`);
    }

    const log = this.logger.child({ jobId });
    const handle = this.handles.get(jobId);
    if (handle) {
      if (handle.abortReason === null) {
        handle.abortReason = 'cancelled';
      }
      if (this.scheduler.cancel(jobId)) {
        log.debug('Cancelled job while waiting for a worker slot', { event: 'job_dequeued' });
      }
      handle.controller.abort(new Error(CANCELLED_MESSAGE));

      const stopped = await this.waitForSettle(handle, this.settings.cancelTimeoutMs);
      if (!stopped) {
        log.warn('Worker did not stop within the cancel timeout; forcing cancellation', {
          event: 'cancel_forced',
          timeoutMs: this.settings.cancelTimeoutMs,
        });
      }
    }

    let outcome: AppendOutcome | null;
    try {
      outcome = await this.registry.update(jobId, (mutation) =>
        isTerminal(mutation.job.status)
          ? null
          : mutation.append({ stage: 'error', error: CANCELLED_ERROR, message: CANCELLED_MESSAGE }),
      );
    } catch (err) {
      if (err instanceof JobServiceError && err.code === 'not_found') {
        return this.cancelRefused(jobId, 'not_found', 'Job not found');
      }
      throw err;
    }

    if (!outcome || !outcome.accepted) {
      return this.cancelRefused(jobId, 'already_terminal', 'Job finished before it could be cancelled');
    }

    this.recordTerminal(outcome.job);
    log.info('Job cancelled', { event: 'job_cancelled' });
    return { success: true, message: 'Job cancelled', jobId, timestamp: new Date() };
  }

  /** Cancel every job still in flight and wait for their teardown. */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    const ids = [...this.handles.keys()];
    if (ids.length === 0) return;

    this.logger.info('Cancelling active jobs for shutdown', { event: 'shutdown', count: ids.length });
    const results = await Promise.allSettled(ids.map((id) => this.cancel(id)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.error(
          result.reason instanceof Error ? result.reason : String(result.reason),
          { jobId: ids[index], event: 'shutdown_cancel_failed' },
        );
      }
    });
  }

  private async runJob(handle: JobHandle, job: JobRecord): Promise<void> {
    try {
      await this.scheduler.acquire(job.id, handle.controller.signal);
    } catch (err) {
      if (err instanceof JobCancelledWhileQueuedError) return;
      throw err;
    }

    try {
      if (handle.abortReason !== null) return;
      await this.execute(handle, job);
    } finally {
      this.scheduler.release(job.id);
    }
  }

  private async execute(handle: JobHandle, job: JobRecord): Promise<void> {
    const log = this.logger.child({ jobId: job.id });

    let tracklist: Tracklist;
    try {
      tracklist = parseTracklist(job.tracklistRaw, { maxTracks: this.settings.maxTracks });
    } catch (err) {
      log.warn('Tracklist rejected', { event: 'tracklist_invalid', reason: errorMessage(err) });
      await this.append(job.id, { stage: 'error', error: errorMessage(err), message: 'Tracklist could not be parsed' });
      return;
    }

    if (handle.abortReason !== null) return;
    const dispatched = await this.append(job.id, {
      stage: 'downloading',
      progress: 0,
      message: 'Downloading source',
      trackDetails: { totalTracks: tracklist.tracks.length, processedTracks: 0 },
    });
    if (!dispatched.accepted) return;

    let reports: Promise<void> = Promise.resolve();
    const report = (update: ProgressUpdate): Promise<void> => {
      const applied = reports.then(() => this.applyWorkerUpdate(handle, update, tracklist));
      reports = applied;
      return applied;
    };

    const timer = setTimeout(() => {
      if (handle.abortReason !== null) return;
      handle.abortReason = 'timeout';
      log.warn('Worker exceeded its time budget; aborting', {
        event: 'worker_timeout',
        timeoutMs: this.settings.workerTimeoutMs,
      });
      handle.controller.abort(new WorkerFaultError(TIMEOUT_MESSAGE));
    }, this.settings.workerTimeoutMs);

    const startedAt = Date.now();
    const finished = new AbortController();
    const run = Promise.resolve()
      .then(() =>
        this.worker.run({
          jobId: job.id,
          sourceUrl: job.sourceUrl,
          tracklist,
          options: job.options,
          signal: handle.controller.signal,
          report,
        }),
      )
      .then(
        (): string | null => null,
        (err: unknown) => errorMessage(err),
      );

    let fault: string | null;
    try {
      fault = await Promise.race([run, this.abandonAfterAbort(handle, finished.signal)]);
    } finally {
      clearTimeout(timer);
      finished.abort();
    }
    await reports;

    if (handle.abortReason === 'cancelled') return;

    const current = this.registry.get(job.id);
    if (!current || isTerminal(current.status)) return;

    const message =
      handle.abortReason === 'timeout' ? TIMEOUT_MESSAGE : (fault ?? INCOMPLETE_RUN_MESSAGE);
    log.error('Worker failed', {
      event: 'worker_fault',
      reason: message,
      durationMs: Date.now() - startedAt,
    });
    await this.append(job.id, { stage: 'error', error: message, message: 'Processing failed' });
  }

  private async applyWorkerUpdate(
    handle: JobHandle,
    update: ProgressUpdate,
    tracklist: Tracklist,
  ): Promise<void> {
    if (handle.abortReason !== null) {
      this.logger.debug('Dropping worker update received after abort', {
        event: 'worker_update_dropped',
        jobId: handle.jobId,
        stage: update.stage,
        reason: handle.abortReason,
      });
      return;
    }
    try {
      await this.append(handle.jobId, update, tracklist);
    } catch (err) {
      this.logger.error(err instanceof Error ? err : String(err), {
        event: 'worker_update_failed',
        jobId: handle.jobId,
      });
    }
  }

  private async append(jobId: string, update: ProgressUpdate, tracklist?: Tracklist): Promise<AppendOutcome> {
    const outcome = await this.registry.appendEvent(jobId, update, tracklist ? { tracklist } : {});
    if (outcome.accepted && isTerminal(outcome.event.stage)) {
      this.recordTerminal(outcome.job);
    }
    return outcome;
  }

  private recordTerminal(job: JobRecord): void {
    if (job.status === 'complete') {
      metrics.increment('jobs.completed');
    } else if (job.error === CANCELLED_ERROR) {
      metrics.increment('jobs.cancelled');
    } else {
      metrics.increment('jobs.failed');
    }
    if (job.startTime && job.endTime) {
      metrics.timing('jobs.duration', job.endTime.getTime() - job.startTime.getTime(), {
        status: job.status,
      });
    }
    this.logger.info('Job finished', {
      event: 'job_finished',
      jobId: job.id,
      status: job.status,
      error: job.error ?? undefined,
      results: job.results.length,
    });
  }

  private async failUnexpectedly(jobId: string, err: unknown): Promise<void> {
    this.logger.error(err instanceof Error ? err : String(err), {
      event: 'job_run_failed',
      jobId,
    });
    const current = this.registry.get(jobId);
    if (!current || isTerminal(current.status)) return;
    try {
      await this.append(jobId, { stage: 'error', error: errorMessage(err), message: 'Processing failed' });
    } catch (appendErr) {
      this.logger.error(appendErr instanceof Error ? appendErr : String(appendErr), {
        event: 'job_fail_record_failed',
        jobId,
      });
    }
  }

  /**
   * Resolves `cancelTimeoutMs` after the job's signal aborts, so a worker that
   * ignores the signal cannot hold its scheduler slot. Settles early once
   * `finished` aborts.
   */
  private abandonAfterAbort(handle: JobHandle, finished: AbortSignal): Promise<null> {
    const signal = handle.controller.signal;
    return new Promise<null>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = () => {
        timer = setTimeout(() => {
          this.logger.warn('Worker ignored its abort signal; abandoning it', {
            event: 'worker_abandoned',
            jobId: handle.jobId,
          });
          resolve(null);
        }, this.settings.cancelTimeoutMs);
      };
      const onFinished = () => {
        signal.removeEventListener('abort', onAbort);
        clearTimeout(timer);
        resolve(null);
      };

      finished.addEventListener('abort', onFinished, { once: true });
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  private async waitForSettle(handle: JobHandle, timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([handle.settled.then((): boolean => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private cancelRefused(
    jobId: string,
    error: 'not_found' | 'already_terminal',
    message: string,
  ): CancelResult {
    return { success: false, message, jobId, timestamp: new Date(), error };
  }
}
