// packages/job-service/src/infrastructure/worker-protocol.ts
//
// Line-delimited JSON spoken with an external worker process.
// stdin:  one `task` object.
// stdout: one progress update per line.
import { z } from 'zod';

import type { JobOptions, ProgressUpdate, Tracklist } from '../domain/job-model.js';

export interface WorkerTaskMessage {
  type: 'task';
  jobId: string;
  sourceUrl: string;
  tracklist: Tracklist;
  fileExtension: JobOptions['fileExtension'];
  maxConcurrentTasks: JobOptions['maxConcurrentTasks'];
}

const stageSchema = z.enum([
  'initializing',
  'downloading',
  'importing',
  'processing',
  'complete',
  'error',
]);

const trackDetailsSchema = z.object({
  currentTrack: z.string().nullish(),
  trackNumber: z.number().int().nullish(),
  processedTracks: z.number().int().nonnegative().nullish(),
  totalTracks: z.number().int().nonnegative().nullish(),
});

export const workerUpdateSchema = z.object({
  stage: stageSchema,
  progress: z.number().finite().nullish(),
  message: z.string().nullish(),
  error: z.string().nullish(),
  trackDetails: trackDetailsSchema.nullish(),
  artifact: z.string().min(1).nullish(),
  results: z.array(z.string()).nullish(),
  data: z.string().base64().nullish(),
});

export type WorkerUpdateLine = z.infer<typeof workerUpdateSchema>;

export type ParsedLine = { ok: true; update: ProgressUpdate } | { ok: false; reason: string };

export function encodeTask(message: WorkerTaskMessage): string {
  return `${JSON.stringify(message)}\n`;
}

export function parseWorkerLine(line: string): ParsedLine {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return { ok: false, reason: 'not JSON' };
  }

  const parsed = workerUpdateSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      ok: false,
      reason: issue ? `${issue.path.join('.') || 'line'}: ${issue.message}` : 'invalid update',
    };
  }
  return { ok: true, update: toProgressUpdate(parsed.data) };
}

function toProgressUpdate(line: WorkerUpdateLine): ProgressUpdate {
  const details = line.trackDetails;
  return {
    stage: line.stage,
    ...(line.progress != null ? { progress: line.progress } : {}),
    ...(line.message != null ? { message: line.message } : {}),
    ...(line.error != null ? { error: line.error } : {}),
    ...(details
      ? {
          trackDetails: {
            ...(details.currentTrack != null ? { currentTrack: details.currentTrack } : {}),
            ...(details.trackNumber != null ? { trackNumber: details.trackNumber } : {}),
            ...(details.processedTracks != null ? { processedTracks: details.processedTracks } : {}),
            ...(details.totalTracks != null ? { totalTracks: details.totalTracks } : {}),
          },
        }
      : {}),
    ...(line.artifact != null ? { artifact: line.artifact } : {}),
    ...(line.results != null ? { results: line.results } : {}),
    ...(line.data != null ? { data: new Uint8Array(Buffer.from(line.data, 'base64')) } : {}),
  };
}
