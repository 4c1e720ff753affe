// packages/job-service/src/application/submit-job.ts
//
// Validation and normalization of job submissions.
// - Required inputs must be non-blank.
// - Options fall back to the service defaults; out-of-range values are clamped
//   or refused with an InvalidRequestError carrying a specific code.
import { InvalidRequestError } from '@setsplit/contracts';

import type { JobOptions } from '../domain/job-model.js';

export interface SubmitJobRequest {
  sourceUrl: string;
  tracklistRaw: string;
  fileExtension?: string;
  maxConcurrentTasks?: number;
}

export interface SubmitJobResponse {
  jobId: string;
}

export interface SubmissionPolicy {
  defaultFileExtension: string;
  allowedFileExtensions: readonly string[];
  defaultMaxConcurrentTasks: number;
  maxAllowedConcurrentTasks: number;
}

export interface NormalizedSubmission {
  sourceUrl: string;
  tracklistRaw: string;
  options: JobOptions;
}

function normalizeFileExtension(value: string | undefined, policy: SubmissionPolicy): string {
  if (value === undefined || value.trim() === '') {
    return policy.defaultFileExtension;
  }
  const ext = value.trim().replace(/^\./, '').toLowerCase();
  if (!policy.allowedFileExtensions.includes(ext)) {
    throw new InvalidRequestError(
      `fileExtension must be one of ${policy.allowedFileExtensions.join(', ')}`,
      'invalid_file_extension',
    );
  }
  return ext;
}

function normalizeMaxConcurrentTasks(value: number | undefined, policy: SubmissionPolicy): number {
  if (value === undefined) {
    return policy.defaultMaxConcurrentTasks;
  }
  if (!Number.isInteger(value)) {
    throw new InvalidRequestError(
      'maxConcurrentTasks must be an integer when provided',
      'invalid_max_concurrent_tasks',
    );
  }
  if (value <= 0) {
    return policy.defaultMaxConcurrentTasks;
  }
  return Math.min(value, policy.maxAllowedConcurrentTasks);
}

// normalizeSubmission.declaration()
// Throws InvalidRequestError; never touches job state.
export function normalizeSubmission(
  req: SubmitJobRequest,
  policy: SubmissionPolicy,
): NormalizedSubmission {
  const sourceUrl = typeof req.sourceUrl === 'string' ? req.sourceUrl.trim() : '';
  if (!sourceUrl) {
    throw new InvalidRequestError('sourceUrl is required', 'source_url_required');
  }

  if (typeof req.tracklistRaw !== 'string' || req.tracklistRaw.trim().length === 0) {
    throw new InvalidRequestError('tracklist is required', 'tracklist_required');
  }

  return {
    sourceUrl,
    tracklistRaw: req.tracklistRaw,
    options: {
      fileExtension: normalizeFileExtension(req.fileExtension, policy),
      maxConcurrentTasks: normalizeMaxConcurrentTasks(req.maxConcurrentTasks, policy),
    },
  };
}
