import { describe, expect, it } from 'vitest';

import { jobRecordToDto, progressEventToDto } from '../src/application/job-dto.js';
import type { JobRecord } from '../src/domain/job-model.js';

/**
 * Intent:
 * - Pin the public job document shape: snake_case fields, ISO timestamps,
 *   optional fields omitted rather than null.
 */

const created = new Date('2026-03-01T10:00:00.000Z');
const started = new Date('2026-03-01T10:00:01.000Z');
const ended = new Date('2026-03-01T10:05:00.000Z');

function baseJob(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    id: 'job-1',
    sequence: 1,
    sourceUrl: 'https://example.com/set.mp3',
    tracklistRaw: '1. A - X 00:00',
    options: { fileExtension: 'mp3', maxConcurrentTasks: 4 },
    status: 'initializing',
    createdAt: created,
    startTime: null,
    endTime: null,
    progress: 0,
    message: 'Job created',
    error: null,
    tracklist: null,
    results: [],
    events: [{ timestamp: created, stage: 'initializing', progress: 0, message: 'Job created' }],
    rejectedEvents: [],
    ...overrides,
  };
}

describe('application/job-dto', () => {
  it('omits unset optional fields on a fresh job', () => {
    expect(jobRecordToDto(baseJob())).toEqual({
      id: 'job-1',
      status: 'initializing',
      url: 'https://example.com/set.mp3',
      file_extension: 'mp3',
      max_concurrent_tasks: 4,
      progress: 0,
      message: 'Job created',
      results: [],
      events: [
        {
          timestamp: '2026-03-01T10:00:00.000Z',
          stage: 'initializing',
          progress: 0,
          message: 'Job created',
        },
      ],
      rejected_events: [],
      created_at: '2026-03-01T10:00:00.000Z',
    });
  });

  it('includes timing, error and tracklist once known', () => {
    const dto = jobRecordToDto(
      baseJob({
        status: 'error',
        startTime: started,
        endTime: ended,
        error: 'cancelled',
        tracklist: {
          artist: 'DJ Test',
          name: 'Live',
          year: 2024,
          tracks: [{ artist: 'A', name: 'X', startTime: '00:00', endTime: '03:30', trackNumber: 1 }],
        },
      }),
    );

    expect(dto.start_time).toBe('2026-03-01T10:00:01.000Z');
    expect(dto.end_time).toBe('2026-03-01T10:05:00.000Z');
    expect(dto.error).toBe('cancelled');
    expect(dto.download_all_url).toBeUndefined();
    expect(dto.total_tracks).toBe(1);
    expect(dto.tracklist).toEqual({
      artist: 'DJ Test',
      name: 'Live',
      year: 2024,
      tracks: [{ artist: 'A', name: 'X', start_time: '00:00', end_time: '03:30', track_number: 1 }],
    });
  });

  it('exposes refused updates with their reason', () => {
    const dto = jobRecordToDto(
      baseJob({
        status: 'complete',
        rejectedEvents: [
          {
            receivedAt: ended,
            status: 'complete',
            reason: 'job already complete; downloading event ignored',
            update: { stage: 'downloading', progress: 0.1 },
          },
        ],
      }),
    );

    expect(dto.rejected_events).toEqual([
      {
        received_at: '2026-03-01T10:05:00.000Z',
        status: 'complete',
        reason: 'job already complete; downloading event ignored',
        update: { stage: 'downloading', progress: 0.1 },
      },
    ]);
    expect(dto.download_all_url).toBe('/api/jobs/job-1/download');
  });

  it('encodes event payloads as base64 and copies track details', () => {
    const dto = progressEventToDto({
      timestamp: ended,
      stage: 'processing',
      progress: 0.5,
      artifact: '/out/1.mp3',
      trackDetails: { currentTrack: 'X', trackNumber: 1, processedTracks: 1, totalTracks: 2 },
      data: new Uint8Array([104, 105]),
    });

    expect(dto).toEqual({
      timestamp: '2026-03-01T10:05:00.000Z',
      stage: 'processing',
      progress: 0.5,
      artifact: '/out/1.mp3',
      trackDetails: { currentTrack: 'X', trackNumber: 1, processedTracks: 1, totalTracks: 2 },
      data: 'aGk=',
    });
  });
});
