// packages/job-service/src/domain/worker.ts
//
// Contract between the lifecycle manager and the download/split worker.
// The worker reports updates in order, ends with exactly one terminal update
// (`complete` with every artifact, or `error`), and stops when `signal` aborts.

import type { JobOptions, ProgressUpdate, Tracklist } from './job-model.js';

export interface WorkerTask {
  jobId: string;
  sourceUrl: string;
  tracklist: Tracklist;
  options: JobOptions;
  signal: AbortSignal;
  /**
   * Report one update. Resolves once the update has been applied (or refused);
   * updates are applied in call order whether or not the worker awaits.
   */
  report(update: ProgressUpdate): Promise<void>;
}

export interface Worker {
  run(task: WorkerTask): Promise<void>;
}
