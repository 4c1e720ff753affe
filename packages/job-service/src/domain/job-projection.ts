// packages/job-service/src/domain/job-projection.ts
//
// Folds one progress update into a job's summary fields.
// Pure: the registry applies the result under the job's lock.
import {
  type JobRecord,
  type JobStatus,
  type ProgressEvent,
  type ProgressUpdate,
  type Tracklist,
  canTransition,
  isTerminal,
} from './job-model.js';

export type JobProjection = Pick<
  JobRecord,
  'status' | 'progress' | 'message' | 'error' | 'startTime' | 'endTime' | 'tracklist' | 'results'
>;

export type ProjectionResult =
  | { accepted: true; event: ProgressEvent; next: JobProjection }
  | { accepted: false; reason: string };

export interface ProjectionContext {
  timestamp: Date;
  /** Parsed tracklist to store when the job enters `importing`. */
  tracklist?: Tracklist;
}

export function clampFraction(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value)) return undefined;
  return Math.min(1, Math.max(0, value));
}

// projectUpdate.declaration()
export function projectUpdate(
  job: JobProjection,
  update: ProgressUpdate,
  context: ProjectionContext,
): ProjectionResult {
  const from: JobStatus = job.status;
  const to: JobStatus = update.stage;

  if (isTerminal(from)) {
    return { accepted: false, reason: `job already ${from}; ${to} event ignored` };
  }
  if (!canTransition(from, to)) {
    return { accepted: false, reason: `transition ${from} -> ${to} is not allowed` };
  }

  const progress = clampFraction(update.progress);
  const next: JobProjection = {
    ...job,
    results: [...job.results],
    message: update.message ?? job.message,
  };

  if (from === 'initializing' && to === 'downloading') {
    next.startTime = context.timestamp;
  }

  if (to === 'importing' && from !== 'importing') {
    const tracklist = context.tracklist ?? job.tracklist;
    if (!tracklist) {
      return { accepted: false, reason: 'importing reported before the tracklist was parsed' };
    }
    next.tracklist = tracklist;
  }

  const totalTracks = next.tracklist?.tracks.length ?? update.trackDetails?.totalTracks;

  if (update.artifact !== undefined) {
    if (to !== 'processing') {
      return { accepted: false, reason: `artifact reported during ${to}` };
    }
    if (totalTracks !== undefined && next.results.length >= totalTracks) {
      return {
        accepted: false,
        reason: `artifact would exceed the ${totalTracks} expected tracks`,
      };
    }
    next.results.push(update.artifact);
  }

  if (to === 'complete') {
    if (update.results) {
      if (totalTracks !== undefined && update.results.length > totalTracks) {
        return {
          accepted: false,
          reason: `complete reported ${update.results.length} results for ${totalTracks} tracks`,
        };
      }
      next.results = [...update.results];
    }
    next.progress = 1;
    next.endTime = context.timestamp;
  } else if (to === 'error') {
    next.error = update.error ?? update.message ?? 'unknown error';
    next.endTime = context.timestamp;
  } else if (progress !== undefined && progress > job.progress) {
    // Regressions stay in the event log only.
    next.progress = progress;
  }

  next.status = to;

  const event: ProgressEvent = Object.freeze({
    timestamp: context.timestamp,
    stage: to,
    ...(to === 'complete' ? { progress: 1 } : progress !== undefined ? { progress } : {}),
    ...(update.message !== undefined ? { message: update.message } : {}),
    ...(to === 'error' ? { error: next.error ?? 'unknown error' } : {}),
    ...(update.trackDetails ? { trackDetails: Object.freeze({ ...update.trackDetails }) } : {}),
    ...(update.artifact !== undefined ? { artifact: update.artifact } : {}),
    ...(to === 'complete' ? { results: Object.freeze([...next.results]) } : {}),
    ...(update.data ? { data: update.data } : {}),
  });

  return { accepted: true, event, next };
}
