// Wire shapes shared by the job service and its clients.
// Field names follow the public HTTP API (snake_case for job documents,
// camelCase inside progress events).

export type ProgressStage =
  | 'initializing'
  | 'downloading'
  | 'importing'
  | 'processing'
  | 'complete'
  | 'error';

export type JobStatus = ProgressStage;

export interface TrackDto {
  artist: string;
  name: string;
  start_time: string;
  end_time: string;
  track_number: number;
}

/** A track of a completed job with where to fetch its file. */
export interface TrackInfoDto extends TrackDto {
  download_url: string;
  size_bytes: number;
  available: boolean;
}

export interface TracklistDto {
  artist: string;
  name: string;
  genre?: string;
  year?: number;
  tracks: TrackDto[];
}

export interface TrackDetailsDto {
  currentTrack?: string;
  trackNumber?: number;
  processedTracks?: number;
  totalTracks?: number;
}

export interface ProgressUpdateDto {
  stage: ProgressStage;
  progress?: number;
  message?: string;
  error?: string;
  trackDetails?: TrackDetailsDto;
  artifact?: string;
  results?: string[];
  /** Base64 encoded payload. */
  data?: string;
}

export interface ProgressEventDto extends ProgressUpdateDto {
  timestamp: string;
}

/** A worker update the state machine refused; kept for inspection only. */
export interface RejectedEventDto {
  received_at: string;
  status: JobStatus;
  reason: string;
  update: ProgressUpdateDto;
}

export interface JobStatusDto {
  id: string;
  status: JobStatus;
  url: string;
  file_extension: string;
  max_concurrent_tasks: number;
  progress: number;
  message: string;
  error?: string;
  results: string[];
  events: ProgressEventDto[];
  rejected_events: RejectedEventDto[];
  created_at: string;
  start_time?: string;
  end_time?: string;
  tracklist?: TracklistDto;
  total_tracks?: number;
  /** Present once the job is complete. */
  download_all_url?: string;
}

export interface TracksInfoResponseDto {
  job_id: string;
  tracks: TrackInfoDto[];
  total_tracks: number;
  download_all_url: string;
}

export interface JobListResponseDto {
  jobs: JobStatusDto[];
  page: number;
  page_size: number;
  total_jobs: number;
  total_pages: number;
}

export interface ProcessResponseDto {
  message: string;
  jobId: string;
}

export interface CancelResponseDto {
  message: string;
}

export interface HealthResponseDto {
  status: 'ok';
}

export interface ErrorResponseDto {
  error: string;
  message: string;
  code?: string;
  timestamp?: string;
  requestId?: string;
}

export * from './errors.js';
