import { describe, expect, it } from 'vitest';

import { InvalidRequestError } from '@setsplit/contracts';

import { type SubmissionPolicy, normalizeSubmission } from '../src/application/submit-job.js';

const policy: SubmissionPolicy = {
  defaultFileExtension: 'mp3',
  allowedFileExtensions: ['mp3', 'm4a', 'wav', 'flac', 'aiff'],
  defaultMaxConcurrentTasks: 4,
  maxAllowedConcurrentTasks: 10,
};

const valid = { sourceUrl: 'https://example.com/set.mp3', tracklistRaw: 'A - X 00:00' };

describe('application/submit-job - normalizeSubmission', () => {
  it('applies service defaults when options are absent', () => {
    expect(normalizeSubmission(valid, policy)).toEqual({
      sourceUrl: 'https://example.com/set.mp3',
      tracklistRaw: 'A - X 00:00',
      options: { fileExtension: 'mp3', maxConcurrentTasks: 4 },
    });
  });

  it('normalizes the file extension', () => {
    const result = normalizeSubmission({ ...valid, fileExtension: '.FLAC' }, policy);
    expect(result.options.fileExtension).toBe('flac');
  });

  it('rejects extensions outside the allowed list', () => {
    expect(() => normalizeSubmission({ ...valid, fileExtension: 'exe' }, policy)).toThrow(
      'fileExtension must be one of mp3, m4a, wav, flac, aiff',
    );
  });

  it('clamps maxConcurrentTasks and treats non-positive values as the default', () => {
    expect(normalizeSubmission({ ...valid, maxConcurrentTasks: 50 }, policy).options.maxConcurrentTasks).toBe(10);
    expect(normalizeSubmission({ ...valid, maxConcurrentTasks: 0 }, policy).options.maxConcurrentTasks).toBe(4);
    expect(normalizeSubmission({ ...valid, maxConcurrentTasks: -3 }, policy).options.maxConcurrentTasks).toBe(4);
    expect(normalizeSubmission({ ...valid, maxConcurrentTasks: 2 }, policy).options.maxConcurrentTasks).toBe(2);
  });

  it('rejects non-integer maxConcurrentTasks', () => {
    try {
      normalizeSubmission({ ...valid, maxConcurrentTasks: 2.5 }, policy);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRequestError);
      expect(error instanceof InvalidRequestError && error.code).toBe('invalid_max_concurrent_tasks');
    }
  });

  it('requires a non-blank source URL and tracklist', () => {
    expect(() => normalizeSubmission({ ...valid, sourceUrl: '   ' }, policy)).toThrow('sourceUrl is required');
    expect(() => normalizeSubmission({ ...valid, tracklistRaw: '\n' }, policy)).toThrow('tracklist is required');
  });
});
