// packages/job-service/src/domain/job-model.ts

// Job domain model for the job service.
// A job's status always equals the stage of its latest accepted progress event.

import type { JobStatus, ProgressStage } from '@setsplit/contracts';

export type { JobStatus, ProgressStage };

export interface Track {
  artist: string;
  name: string;
  startTime: string;
  endTime: string;
  trackNumber: number;
}

export interface Tracklist {
  artist: string;
  name: string;
  genre?: string;
  year?: number;
  tracks: Track[];
}

export interface TrackDetails {
  currentTrack?: string;
  trackNumber?: number;
  processedTracks?: number;
  totalTracks?: number;
}

export interface ProgressEvent {
  readonly timestamp: Date;
  readonly stage: ProgressStage;
  readonly progress?: number;
  readonly message?: string;
  readonly error?: string;
  readonly trackDetails?: Readonly<TrackDetails>;
  /** Location of the artifact produced by a per-track completion. */
  readonly artifact?: string;
  /** Full ordered artifact list, carried by a `complete` event. */
  readonly results?: readonly string[];
  readonly data?: Uint8Array;
}

// What producers hand in; the bus assigns the timestamp.
export type ProgressUpdate = Omit<ProgressEvent, 'timestamp'>;

export interface JobOptions {
  fileExtension: string;
  maxConcurrentTasks: number;
}

export interface RejectedEvent {
  receivedAt: Date;
  status: JobStatus;
  reason: string;
  update: ProgressUpdate;
}

export interface JobRecord {
  id: string;
  sequence: number;
  sourceUrl: string;
  tracklistRaw: string;
  options: JobOptions;
  status: JobStatus;
  createdAt: Date;
  startTime: Date | null;
  endTime: Date | null;
  progress: number;
  message: string;
  error: string | null;
  tracklist: Tracklist | null;
  results: string[];
  events: ProgressEvent[];
  rejectedEvents: RejectedEvent[];
}

export const CANCELLED_ERROR = 'cancelled';

const NEXT_STATUS: Record<JobStatus, JobStatus | null> = {
  initializing: 'downloading',
  downloading: 'importing',
  importing: 'processing',
  processing: 'complete',
  complete: null,
  error: null,
};

export function isTerminal(status: JobStatus): boolean {
  return status === 'complete' || status === 'error';
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  if (isTerminal(from)) return false;
  if (from === to) return true;
  if (to === 'error') return true;
  return NEXT_STATUS[from] === to;
}

export function deriveStatus(events: readonly ProgressEvent[]): JobStatus {
  return events.at(-1)?.stage ?? 'initializing';
}
