// packages/job-service/src/config/env.ts
// Centralized environment-based configuration for the job service.
// - Every setting has a default that works for a local run.
// - Only throws when values contradict each other or are out of range.
import { ConfigurationError } from '@setsplit/contracts';
import { readInt, readList, readString } from '@setsplit/shared-infrastructure';

export type NodeEnv = 'development' | 'test' | 'production';

export interface JobServiceConfig {
  nodeEnv: NodeEnv;
  http: {
    port: number;
    host: string;
    sseHeartbeatMs: number;
  };
  jobs: {
    maxConcurrentJobs: number;
    defaultMaxConcurrentTasks: number;
    maxAllowedConcurrentTasks: number;
    defaultFileExtension: string;
    allowedFileExtensions: string[];
    maxTracks: number;
    cancelTimeoutMs: number;
    workerTimeoutMs: number;
    subscriberBufferSize: number;
  };
  pagination: {
    defaultPageSize: number;
    maxPageSize: number;
  };
  worker: {
    command?: string;
    args: string[];
    killGraceMs: number;
  };
  retention: {
    ttlMs: number;
    sweepIntervalMs: number;
  };
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'test', 'production'];

function readNodeEnv(): NodeEnv {
  const value = readString('NODE_ENV', 'development');
  const match = NODE_ENVS.find((env) => env === value);
  if (!match) {
    throw new ConfigurationError(`NODE_ENV must be one of ${NODE_ENVS.join(', ')}, got "${value}"`);
  }
  return match;
}

function positive(name: string, value: number): number {
  if (value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function nonNegative(name: string, value: number): number {
  if (value < 0) {
    throw new ConfigurationError(`${name} must not be negative, got ${value}`);
  }
  return value;
}

// loadConfig.declaration()
export function loadConfig(): JobServiceConfig {
  const nodeEnv = readNodeEnv();

  const httpPort = readInt('HTTP_PORT', 8000);
  if (httpPort < 0 || httpPort > 65535) {
    throw new ConfigurationError(`HTTP_PORT out of range: ${httpPort}`);
  }

  const maxAllowedConcurrentTasks = positive(
    'MAX_ALLOWED_CONCURRENT_TASKS',
    readInt('MAX_ALLOWED_CONCURRENT_TASKS', 10),
  );
  const defaultMaxConcurrentTasks = positive(
    'DEFAULT_MAX_CONCURRENT_TASKS',
    readInt('DEFAULT_MAX_CONCURRENT_TASKS', 4),
  );
  if (defaultMaxConcurrentTasks > maxAllowedConcurrentTasks) {
    throw new ConfigurationError(
      'DEFAULT_MAX_CONCURRENT_TASKS must not exceed MAX_ALLOWED_CONCURRENT_TASKS',
    );
  }

  const allowedFileExtensions = readList('ALLOWED_FILE_EXTENSIONS', [
    'mp3',
    'm4a',
    'wav',
    'flac',
    'aiff',
  ]).map((ext) => ext.replace(/^\./, '').toLowerCase());
  const defaultFileExtension = (readString('DEFAULT_FILE_EXTENSION', 'mp3') ?? 'mp3')
    .replace(/^\./, '')
    .toLowerCase();
  if (!allowedFileExtensions.includes(defaultFileExtension)) {
    throw new ConfigurationError(
      `DEFAULT_FILE_EXTENSION "${defaultFileExtension}" is not in ALLOWED_FILE_EXTENSIONS`,
    );
  }

  const maxPageSize = positive('MAX_PAGE_SIZE', readInt('MAX_PAGE_SIZE', 100));
  const defaultPageSize = positive('DEFAULT_PAGE_SIZE', readInt('DEFAULT_PAGE_SIZE', 10));
  if (defaultPageSize > maxPageSize) {
    throw new ConfigurationError('DEFAULT_PAGE_SIZE must not exceed MAX_PAGE_SIZE');
  }

  return {
    nodeEnv,
    http: {
      port: httpPort,
      host: readString('HTTP_HOST', '0.0.0.0') ?? '0.0.0.0',
      sseHeartbeatMs: positive('SSE_HEARTBEAT_MS', readInt('SSE_HEARTBEAT_MS', 25_000)),
    },
    jobs: {
      maxConcurrentJobs: positive('MAX_CONCURRENT_JOBS', readInt('MAX_CONCURRENT_JOBS', 4)),
      defaultMaxConcurrentTasks,
      maxAllowedConcurrentTasks,
      defaultFileExtension,
      allowedFileExtensions,
      maxTracks: positive('MAX_TRACKS', readInt('MAX_TRACKS', 100)),
      cancelTimeoutMs: positive('CANCEL_TIMEOUT_MS', readInt('CANCEL_TIMEOUT_MS', 5_000)),
      workerTimeoutMs: positive('WORKER_TIMEOUT_MS', readInt('WORKER_TIMEOUT_MS', 45 * 60_000)),
      subscriberBufferSize: positive(
        'SUBSCRIBER_BUFFER_SIZE',
        readInt('SUBSCRIBER_BUFFER_SIZE', 256),
      ),
    },
    pagination: {
      defaultPageSize,
      maxPageSize,
    },
    worker: {
      command: readString('WORKER_COMMAND'),
      args: (readString('WORKER_ARGS') ?? '').split(/\s+/).filter(Boolean),
      killGraceMs: nonNegative('WORKER_KILL_GRACE_MS', readInt('WORKER_KILL_GRACE_MS', 5_000)),
    },
    retention: {
      ttlMs: nonNegative('JOB_RETENTION_MS', readInt('JOB_RETENTION_MS', 24 * 60 * 60_000)),
      sweepIntervalMs: positive(
        'JOB_RETENTION_SWEEP_MS',
        readInt('JOB_RETENTION_SWEEP_MS', 10 * 60_000),
      ),
    },
  };
}

/** The worker command is only needed by the server entry point. */
export function requireWorkerCommand(config: JobServiceConfig): string {
  if (!config.worker.command) {
    throw new ConfigurationError('WORKER_COMMAND is required to start the job service');
  }
  return config.worker.command;
}
