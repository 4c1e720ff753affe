// packages/job-service/src/application/job-dto.ts
//
// Serializes domain records into the public HTTP/SSE DTOs.
import type {
  JobStatusDto,
  ProgressEventDto,
  ProgressUpdateDto,
  RejectedEventDto,
  TracklistDto,
} from '@setsplit/contracts';

import type {
  JobRecord,
  ProgressEvent,
  ProgressUpdate,
  RejectedEvent,
  Tracklist,
} from '../domain/job-model.js';
import { downloadAllUrl } from './job-artifacts.js';

export function progressUpdateToDto(update: ProgressUpdate): ProgressUpdateDto {
  return {
    stage: update.stage,
    ...(update.progress !== undefined ? { progress: update.progress } : {}),
    ...(update.message !== undefined ? { message: update.message } : {}),
    ...(update.error !== undefined ? { error: update.error } : {}),
    ...(update.trackDetails ? { trackDetails: { ...update.trackDetails } } : {}),
    ...(update.artifact !== undefined ? { artifact: update.artifact } : {}),
    ...(update.results ? { results: [...update.results] } : {}),
    ...(update.data ? { data: Buffer.from(update.data).toString('base64') } : {}),
  };
}

export function progressEventToDto(event: ProgressEvent): ProgressEventDto {
  return { timestamp: event.timestamp.toISOString(), ...progressUpdateToDto(event) };
}

export function rejectedEventToDto(rejected: RejectedEvent): RejectedEventDto {
  return {
    received_at: rejected.receivedAt.toISOString(),
    status: rejected.status,
    reason: rejected.reason,
    update: progressUpdateToDto(rejected.update),
  };
}

export function tracklistToDto(tracklist: Tracklist): TracklistDto {
  return {
    artist: tracklist.artist,
    name: tracklist.name,
    ...(tracklist.genre ? { genre: tracklist.genre } : {}),
    ...(tracklist.year !== undefined ? { year: tracklist.year } : {}),
    tracks: tracklist.tracks.map((track) => ({
      artist: track.artist,
      name: track.name,
      start_time: track.startTime,
      end_time: track.endTime,
      track_number: track.trackNumber,
    })),
  };
}

export function jobRecordToDto(job: JobRecord): JobStatusDto {
  return {
    id: job.id,
    status: job.status,
    url: job.sourceUrl,
    file_extension: job.options.fileExtension,
    max_concurrent_tasks: job.options.maxConcurrentTasks,
    progress: job.progress,
    message: job.message,
    ...(job.error !== null ? { error: job.error } : {}),
    results: [...job.results],
    events: job.events.map(progressEventToDto),
    rejected_events: job.rejectedEvents.map(rejectedEventToDto),
    created_at: job.createdAt.toISOString(),
    ...(job.startTime ? { start_time: job.startTime.toISOString() } : {}),
    ...(job.endTime ? { end_time: job.endTime.toISOString() } : {}),
    ...(job.tracklist
      ? { tracklist: tracklistToDto(job.tracklist), total_tracks: job.tracklist.tracks.length }
      : {}),
    ...(job.status === 'complete' ? { download_all_url: downloadAllUrl(job.id) } : {}),
  };
}
