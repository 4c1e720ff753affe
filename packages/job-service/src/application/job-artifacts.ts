// packages/job-service/src/application/job-artifacts.ts
//
// Locates the track files a completed job produced and names them for download.
// Results and tracklist entries pair up by position; an entry without a
// partner on the other side is not downloadable.
import { stat } from 'node:fs/promises';
import { extname } from 'node:path';

import { lookup as mimeLookup } from 'mime-types';

import {
  type TracksInfoResponseDto,
  ArtifactNotFoundError,
  InvalidRequestError,
} from '@setsplit/contracts';

import type { JobRecord, Track } from '../domain/job-model.js';

export interface TrackArtifact {
  trackNumber: number;
  track: Track;
  path: string;
  /** Download name, e.g. `03-Track Name.mp3`. */
  fileName: string;
  contentType: string;
}

export interface ArchivePlan {
  fileName: string;
  artifacts: TrackArtifact[];
}

const UNSAFE_FILENAME_CHARS = /[/\\:*?"<>|\n\r\t]/g;

export function sanitizeFilename(name: string): string {
  const cleaned = name.replace(UNSAFE_FILENAME_CHARS, '_').replace(/^[ .]+|[ .]+$/g, '');
  return cleaned || 'untitled';
}

export const trackDownloadUrl = (jobId: string, trackNumber: number): string =>
  `/api/jobs/${jobId}/tracks/${trackNumber}/download`;

export const downloadAllUrl = (jobId: string): string => `/api/jobs/${jobId}/download`;

/**
 * Content-Disposition for an attachment. Names outside printable ASCII get an
 * RFC 5987 `filename*` next to an underscored fallback.
 */
export function attachmentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]/g, '_');
  if (fallback === fileName) {
    return `attachment; filename="${fileName}"`;
  }
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

function requireComplete(job: JobRecord): void {
  if (job.status !== 'complete') {
    throw new InvalidRequestError('Job is not completed yet', 'job_not_complete');
  }
}

function pairedArtifacts(job: JobRecord): TrackArtifact[] {
  const tracks = job.tracklist?.tracks ?? [];
  const count = Math.min(job.results.length, tracks.length);

  return tracks.slice(0, count).map((track, index) => {
    const path = job.results[index] ?? '';
    const trackNumber = index + 1;
    const extension = extname(path).slice(1) || job.options.fileExtension;
    return {
      trackNumber,
      track,
      path,
      fileName: `${String(trackNumber).padStart(2, '0')}-${sanitizeFilename(track.name)}.${extension}`,
      contentType: mimeLookup(path) || 'application/octet-stream',
    };
  });
}

/** Size of a regular file, or null when it is missing or unreadable. */
async function fileSize(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : null;
  } catch {
    return null;
  }
}

export async function describeTracks(job: JobRecord): Promise<TracksInfoResponseDto> {
  requireComplete(job);

  const tracks = await Promise.all(
    pairedArtifacts(job).map(async (artifact) => {
      const size = await fileSize(artifact.path);
      return {
        artist: artifact.track.artist,
        name: artifact.track.name,
        start_time: artifact.track.startTime,
        end_time: artifact.track.endTime,
        track_number: artifact.track.trackNumber,
        download_url: trackDownloadUrl(job.id, artifact.trackNumber),
        size_bytes: size ?? 0,
        available: size !== null,
      };
    }),
  );

  return {
    job_id: job.id,
    tracks,
    total_tracks: tracks.length,
    download_all_url: downloadAllUrl(job.id),
  };
}

export async function resolveTrackArtifact(
  job: JobRecord,
  trackNumber: number,
): Promise<TrackArtifact & { sizeBytes: number }> {
  requireComplete(job);

  const artifact = pairedArtifacts(job).find((candidate) => candidate.trackNumber === trackNumber);
  if (!artifact) {
    throw new ArtifactNotFoundError(job.id, 'Track not found');
  }
  const sizeBytes = await fileSize(artifact.path);
  if (sizeBytes === null) {
    throw new ArtifactNotFoundError(job.id, 'Track file not found');
  }
  return { ...artifact, sizeBytes };
}

// Every file is checked before the archive starts streaming; once headers are
// out, a failure can only truncate the body.
export async function planArchive(job: JobRecord): Promise<ArchivePlan> {
  requireComplete(job);

  const artifacts = pairedArtifacts(job);
  if (artifacts.length === 0) {
    throw new ArtifactNotFoundError(job.id, 'No tracks available for download');
  }
  for (const artifact of artifacts) {
    if ((await fileSize(artifact.path)) === null) {
      throw new ArtifactNotFoundError(job.id, `Track file ${artifact.trackNumber} not found`);
    }
  }

  const artist = sanitizeFilename(job.tracklist?.artist ?? '');
  const name = sanitizeFilename(job.tracklist?.name ?? '');
  return { fileName: `${artist} - ${name}.zip`, artifacts };
}
