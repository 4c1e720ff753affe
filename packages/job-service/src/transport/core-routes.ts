// packages/job-service/src/transport/core-routes.ts
//
// Public HTTP API:
// - GET  /health
// - POST /api/process            -> submit a job (202)
// - GET  /api/jobs               -> paginated listing
// - GET  /api/jobs/:jobId        -> job status
// - POST /api/jobs/:jobId/cancel -> cancel a job
// - GET  /api/jobs/:jobId/events -> Server-Sent Events progress stream
// - GET  /api/jobs/:jobId/tracks -> download info for a completed job
// - GET  /api/jobs/:jobId/tracks/:trackNumber/download -> one track file
// - GET  /api/jobs/:jobId/download -> ZIP of every track
import { once } from 'node:events';
import { createReadStream } from 'node:fs';

import archiver from 'archiver';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import {
  type CancelResponseDto,
  type HealthResponseDto,
  type JobListResponseDto,
  type ProcessResponseDto,
  JobAlreadyTerminalError,
  JobNotFoundError,
  SubscriberOverflowError,
} from '@setsplit/contracts';

import {
  attachmentDisposition,
  describeTracks,
  planArchive,
  resolveTrackArtifact,
} from '../application/job-artifacts.js';
import { jobRecordToDto, progressEventToDto } from '../application/job-dto.js';
import type { JobLifecycleManager } from '../application/job-lifecycle-manager.js';
import type { JobServiceConfig } from '../config/env.js';
import { logger } from '../infrastructure/logger.js';
import { logRequest, resolveRoutePath } from './route-helpers.js';

export interface CoreRouteOptions {
  manager: JobLifecycleManager;
  config: JobServiceConfig;
}

const processBodySchema = z.object({
  url: z
    .string({ required_error: 'url is required', invalid_type_error: 'url must be a string' })
    .trim()
    .min(1, 'url is required'),
  tracklist: z.preprocess(
    (value) => (value !== null && typeof value === 'object' ? JSON.stringify(value) : value),
    z
      .string({
        required_error: 'tracklist is required',
        invalid_type_error: 'tracklist must be a string or a JSON object',
      })
      .min(1, 'tracklist is required'),
  ),
  file_extension: z.string().nullish(),
  max_concurrent_tasks: z.number().int().nullish(),
});

const listQuerySchema = z.object({
  page: z.coerce.number().int().optional(),
  pageSize: z.coerce.number().int().optional(),
  page_size: z.coerce.number().int().optional(),
  status: z.enum(['initializing', 'downloading', 'importing', 'processing', 'complete', 'error']).optional(),
});

const jobParamsSchema = z.object({
  jobId: z.string().min(1),
});

const trackParamsSchema = jobParamsSchema.extend({
  trackNumber: z.string().regex(/^\d+$/, 'Invalid track number').transform(Number),
});

const eventsQuerySchema = z.object({
  replay: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1'),
});

const sseFrame = (name: string, data: unknown): string =>
  `event: ${name}\ndata: ${JSON.stringify(data)}\n\n`;

export function registerCoreRoutes(app: FastifyInstance, options: CoreRouteOptions): void {
  const { manager, config } = options;

  const requireJob = (jobId: string) => {
    const job = manager.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  };

  app.get('/health', async (): Promise<HealthResponseDto> => ({ status: 'ok' }));

  app.post('/api/process', async (request, reply) => {
    const body = processBodySchema.parse(request.body ?? {});

    const { jobId } = manager.submit({
      sourceUrl: body.url,
      tracklistRaw: body.tracklist,
      fileExtension: body.file_extension ?? undefined,
      maxConcurrentTasks: body.max_concurrent_tasks ?? undefined,
    });

    logRequest(request, 'POST /api/process', 202, { jobId });
    const response: ProcessResponseDto = { message: 'Processing started', jobId };
    return reply.code(202).send(response);
  });

  app.get('/api/jobs', async (request) => {
    const query = listQuerySchema.parse(request.query ?? {});
    const page = manager.list({
      page: query.page,
      pageSize: query.pageSize ?? query.page_size,
      status: query.status,
    });

    logRequest(request, 'GET /api/jobs', 200, { page: page.page, totalJobs: page.totalJobs });
    const response: JobListResponseDto = {
      jobs: page.items.map(jobRecordToDto),
      page: page.page,
      page_size: page.pageSize,
      total_jobs: page.totalJobs,
      total_pages: page.totalPages,
    };
    return response;
  });

  app.get('/api/jobs/:jobId', async (request) => {
    const { jobId } = jobParamsSchema.parse(request.params);
    const job = requireJob(jobId);

    logRequest(request, 'GET /api/jobs/:jobId', 200, { jobId, jobState: job.status });
    return jobRecordToDto(job);
  });

  app.post('/api/jobs/:jobId/cancel', async (request) => {
    const { jobId } = jobParamsSchema.parse(request.params);
    const result = await manager.cancel(jobId);

    if (!result.success) {
      if (result.error === 'not_found') {
        throw new JobNotFoundError(jobId);
      }
      throw new JobAlreadyTerminalError(jobId, manager.get(jobId)?.status ?? 'finished');
    }

    logRequest(request, 'POST /api/jobs/:jobId/cancel', 200, { jobId });
    const response: CancelResponseDto = { message: result.message };
    return response;
  });

  app.get('/api/jobs/:jobId/events', async (request, reply) => {
    const { jobId } = jobParamsSchema.parse(request.params);
    const { replay } = eventsQuerySchema.parse(request.query ?? {});
    const routePath = resolveRoutePath(request, 'GET /api/jobs/:jobId/events');

    requireJob(jobId);
    const subscription = manager.subscribe(jobId, { replay });

    reply.raw.setHeader('Content-Type', 'text/event-stream');
    reply.raw.setHeader('Cache-Control', 'no-cache');
    reply.raw.setHeader('Connection', 'keep-alive');
    reply.raw.setHeader('X-Accel-Buffering', 'no');
    reply.raw.flushHeaders?.();
    reply.hijack();

    reply.raw.write(': connected\n\n');
    logger.info('SSE client connected', {
      event: 'job_events_sse_connected',
      route: routePath,
      jobId,
      replay,
    });

    let closed = false;
    // Aborted when the client leaves or the subscription fails, so a write
    // stalled on a slow client stops waiting for 'drain'.
    const abandoned = new AbortController();
    const heartbeat = setInterval(() => {
      if (!closed) reply.raw.write(':\n\n');
    }, config.http.sseHeartbeatMs);

    const cleanup = () => {
      if (closed) return;
      closed = true;
      clearInterval(heartbeat);
      abandoned.abort();
      subscription.close();
      logger.info('SSE client disconnected', {
        event: 'job_events_sse_disconnected',
        route: routePath,
        jobId,
      });
    };

    // The next event is pulled only once the socket has taken the previous
    // one, so a slow client fills its subscription buffer instead.
    const send = async (name: string, data: unknown): Promise<void> => {
      if (closed) return;
      if (!reply.raw.write(sseFrame(name, data))) {
        await once(reply.raw, 'drain', { signal: abandoned.signal });
      }
    };

    subscription.onDetach(() => {
      if (subscription.error) abandoned.abort();
    });
    reply.raw.on('close', cleanup);
    reply.raw.on('error', cleanup);

    const pump = async () => {
      for await (const event of subscription) {
        await send('progress', progressEventToDto(event));
      }
      await send('end', { jobId });
    };

    void pump()
      .catch((error: unknown) => {
        const failure = subscription.error ?? error;
        if (failure instanceof SubscriberOverflowError) {
          logger.warn('SSE client fell behind; disconnecting', {
            event: 'job_events_sse_overflow',
            route: routePath,
            jobId,
          });
          if (!closed) {
            reply.raw.write(sseFrame('error', { error: 'subscriber_overflow', message: failure.message }));
          }
          return;
        }
        if (closed) return;
        logger.error(error instanceof Error ? error : String(error), {
          event: 'job_events_sse_failed',
          route: routePath,
          jobId,
        });
      })
      .finally(() => {
        cleanup();
        reply.raw.end();
      });
  });

  app.get('/api/jobs/:jobId/tracks', async (request) => {
    const { jobId } = jobParamsSchema.parse(request.params);
    const response = await describeTracks(requireJob(jobId));

    logRequest(request, 'GET /api/jobs/:jobId/tracks', 200, { jobId, totalTracks: response.total_tracks });
    return response;
  });

  app.get('/api/jobs/:jobId/tracks/:trackNumber/download', async (request, reply) => {
    const { jobId, trackNumber } = trackParamsSchema.parse(request.params);
    const artifact = await resolveTrackArtifact(requireJob(jobId), trackNumber);

    logRequest(request, 'GET /api/jobs/:jobId/tracks/:trackNumber/download', 200, {
      jobId,
      trackNumber,
      sizeBytes: artifact.sizeBytes,
    });
    return reply
      .type(artifact.contentType)
      .header('Content-Disposition', attachmentDisposition(artifact.fileName))
      .header('Content-Length', artifact.sizeBytes)
      .send(createReadStream(artifact.path));
  });

  app.get('/api/jobs/:jobId/download', async (request, reply) => {
    const { jobId } = jobParamsSchema.parse(request.params);
    const plan = await planArchive(requireJob(jobId));

    // Entries are stored uncompressed.
    const archive = archiver('zip', { store: true });
    archive.on('warning', (warning) => {
      logger.warn('Track archive warning', {
        event: 'job_archive_warning',
        jobId,
        code: warning.code,
        reason: warning.message,
      });
    });
    for (const artifact of plan.artifacts) {
      archive.file(artifact.path, { name: artifact.fileName });
    }
    void archive.finalize().catch((error: unknown) => {
      logger.error(error instanceof Error ? error : String(error), {
        event: 'job_archive_failed',
        jobId,
      });
    });

    logRequest(request, 'GET /api/jobs/:jobId/download', 200, {
      jobId,
      trackCount: plan.artifacts.length,
    });
    return reply
      .type('application/zip')
      .header('Content-Disposition', attachmentDisposition(plan.fileName))
      .send(archive);
  });
}
