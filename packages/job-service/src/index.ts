export * from './application/job-artifacts.js';
export * from './application/job-dto.js';
export * from './application/job-lifecycle-manager.js';
export * from './application/submit-job.js';
export * from './config/env.js';
export * from './domain/job-model.js';
export * from './domain/job-registry.js';
export * from './domain/paginator.js';
export * from './domain/progress-bus.js';
export * from './domain/tracklist.js';
export * from './domain/worker.js';
export * from './infrastructure/job-reaper.js';
export * from './infrastructure/job-scheduler.js';
export * from './infrastructure/process-worker.js';
export * from './infrastructure/worker-protocol.js';
export { buildJobServices, createHttpServer, startHttpServer } from './transport/http-server.js';
