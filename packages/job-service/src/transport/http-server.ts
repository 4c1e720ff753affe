// packages/job-service/src/transport/http-server.ts
//
// Fastify HTTP server in front of the job lifecycle manager.
// createHttpServer() takes ready-made services so tests can inject a fake
// worker; startHttpServer() wires the process-backed worker from config.
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';

import Fastify, { type FastifyInstance } from 'fastify';

import { loadEnvFiles } from '@setsplit/shared-infrastructure';

import { JobLifecycleManager } from '../application/job-lifecycle-manager.js';
import { type JobServiceConfig, loadConfig, requireWorkerCommand } from '../config/env.js';
import { JobRegistry } from '../domain/job-registry.js';
import { ProgressBus } from '../domain/progress-bus.js';
import type { Worker } from '../domain/worker.js';
import { JobReaper } from '../infrastructure/job-reaper.js';
import { JobScheduler } from '../infrastructure/job-scheduler.js';
import { logger } from '../infrastructure/logger.js';
import { ProcessWorker } from '../infrastructure/process-worker.js';
import { registerCoreRoutes } from './core-routes.js';
import { registerErrorHandler } from './error-handler.js';

export interface JobServices {
  config: JobServiceConfig;
  bus: ProgressBus;
  registry: JobRegistry;
  scheduler: JobScheduler;
  manager: JobLifecycleManager;
  reaper: JobReaper;
}

// buildJobServices.declaration()
export function buildJobServices(config: JobServiceConfig, worker: Worker): JobServices {
  const bus = new ProgressBus({ subscriberBufferSize: config.jobs.subscriberBufferSize });
  const registry = new JobRegistry({ bus });
  const scheduler = new JobScheduler(config.jobs.maxConcurrentJobs);
  const manager = new JobLifecycleManager({
    registry,
    bus,
    scheduler,
    worker,
    settings: {
      defaultFileExtension: config.jobs.defaultFileExtension,
      allowedFileExtensions: config.jobs.allowedFileExtensions,
      defaultMaxConcurrentTasks: config.jobs.defaultMaxConcurrentTasks,
      maxAllowedConcurrentTasks: config.jobs.maxAllowedConcurrentTasks,
      maxTracks: config.jobs.maxTracks,
      cancelTimeoutMs: config.jobs.cancelTimeoutMs,
      workerTimeoutMs: config.jobs.workerTimeoutMs,
      defaultPageSize: config.pagination.defaultPageSize,
      maxPageSize: config.pagination.maxPageSize,
    },
  });
  const reaper = new JobReaper({
    registry,
    ttlMs: config.retention.ttlMs,
    sweepIntervalMs: config.retention.sweepIntervalMs,
  });

  return { config, bus, registry, scheduler, manager, reaper };
}

export async function createHttpServer(services: JobServices): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    genReqId: () => `req_${randomUUID()}`,
  });

  registerErrorHandler(app);
  registerCoreRoutes(app, { manager: services.manager, config: services.config });

  await app.ready();
  return app;
}

// startHttpServer.declaration()
export async function startHttpServer(): Promise<void> {
  loadEnvFiles();
  const config = loadConfig();
  const worker = new ProcessWorker({
    command: requireWorkerCommand(config),
    args: config.worker.args,
    killGraceMs: config.worker.killGraceMs,
  });
  const services = buildJobServices(config, worker);
  const app = await createHttpServer(services);

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { event: 'http_server_stopping', signal });
    services.reaper.stop();
    await services.manager.shutdown();
    await app.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, (received) => {
      shutdown(received).catch((error: unknown) => {
        logger.error(error instanceof Error ? error : String(error), {
          event: 'http_server_stop_failed',
        });
        process.exit(1);
      });
    });
  }

  try {
    await app.listen({
      port: config.http.port,
      host: config.http.host,
    });
    services.reaper.start();
    logger.info('HTTP server listening', {
      event: 'http_server_started',
      port: config.http.port,
      maxConcurrentJobs: config.jobs.maxConcurrentJobs,
    });
  } catch (error: unknown) {
    logger.error(error instanceof Error ? error : String(error), {
      event: 'http_server_start_failed',
    });
    process.exit(1);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startHttpServer().catch((error: unknown) => {
    logger.error(error instanceof Error ? error : String(error), {
      event: 'http_server_start_failed',
    });
    process.exit(1);
  });
}
