// packages/job-service/src/infrastructure/process-worker.ts
// Worker backed by an external executable.
// - Writes the task as one JSON line on stdin, reads updates line by line from stdout.
// - Malformed lines are logged and skipped.
// - On abort: SIGTERM, then SIGKILL once the grace period runs out.
// - Non-zero exit rejects with the exit code and the tail of stderr.
import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';

import { WorkerFaultError } from '@setsplit/contracts';

import type { Worker, WorkerTask } from '../domain/worker.js';
import { type Logger, logger as rootLogger } from './logger.js';
import { encodeTask, parseWorkerLine } from './worker-protocol.js';

const STDERR_TAIL_CHARS = 2_000;

export interface ProcessWorkerOptions {
  command: string;
  args?: string[];
  killGraceMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class ProcessWorker implements Worker {
  private readonly logger: Logger;

  constructor(private readonly options: ProcessWorkerOptions) {
    this.logger = options.logger ?? rootLogger;
  }

  run(task: WorkerTask): Promise<void> {
    const log = this.logger.child({ jobId: task.jobId, component: 'process-worker' });

    if (task.signal.aborted) {
      return Promise.reject(new WorkerFaultError('worker aborted before start'));
    }

    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.options.command, this.options.args ?? [], {
        cwd: this.options.cwd,
        env: this.options.env ?? process.env,
        stdio: ['pipe', 'pipe', 'pipe'],
      });
      log.debug('Worker process spawned', { event: 'worker_spawned', pid: child.pid });

      const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
      let settled = false;
      let stderrTail = '';
      let killTimer: ReturnType<typeof setTimeout> | undefined;

      const onAbort = () => {
        log.info('Stopping worker process', { event: 'worker_stopping', pid: child.pid });
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          log.warn('Worker process ignored SIGTERM; killing', { event: 'worker_killed', pid: child.pid });
          child.kill('SIGKILL');
        }, this.options.killGraceMs);
      };

      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        task.signal.removeEventListener('abort', onAbort);
        clearTimeout(killTimer);
        lines.close();
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      lines.on('line', (line) => {
        const trimmed = line.trim();
        if (!trimmed) return;

        const parsed = parseWorkerLine(trimmed);
        if (!parsed.ok) {
          log.warn('Ignoring malformed worker output', {
            event: 'worker_output_invalid',
            reason: parsed.reason,
          });
          return;
        }
        task.report(parsed.update).catch((err: unknown) => {
          log.error(err instanceof Error ? err : String(err), { event: 'worker_report_failed' });
        });
      });

      child.stderr.on('data', (chunk: Buffer) => {
        stderrTail = (stderrTail + chunk.toString()).slice(-STDERR_TAIL_CHARS);
      });

      child.stdin.on('error', (err) => {
        log.debug('Worker stdin closed early', { event: 'worker_stdin_error', reason: err.message });
      });

      child.on('error', (err) => {
        log.error(err, { event: 'worker_spawn_failed' });
        settle(new WorkerFaultError(`failed to start worker: ${err.message}`, { cause: err }));
      });

      child.on('close', (code, signal) => {
        if (task.signal.aborted) {
          settle(new WorkerFaultError(`worker stopped after abort (${signal ?? `code ${code}`})`));
          return;
        }
        if (code === 0) {
          settle();
          return;
        }

        const parts = [`worker exited with ${code !== null ? `code ${code}` : `signal ${signal}`}`];
        const tail = stderrTail.trim();
        if (tail) parts.push(tail);
        settle(new WorkerFaultError(parts.join(': ')));
      });

      task.signal.addEventListener('abort', onAbort, { once: true });

      child.stdin.end(
        encodeTask({
          type: 'task',
          jobId: task.jobId,
          sourceUrl: task.sourceUrl,
          tracklist: task.tracklist,
          fileExtension: task.options.fileExtension,
          maxConcurrentTasks: task.options.maxConcurrentTasks,
        }),
      );
    });
  }
}
