import { describe, expect, it } from 'vitest';

import { JobCancelledWhileQueuedError, JobScheduler } from '../src/infrastructure/job-scheduler.js';

/**
 * Intent:
 * - Bound concurrent workers; admit waiting jobs strictly in arrival order.
 * - Let a waiting job leave the queue without ever taking a slot.
 */
describe('infrastructure/job-scheduler', () => {
  it('refuses a non-positive limit', () => {
    expect(() => new JobScheduler(0)).toThrow('maxConcurrent must be a positive integer, got 0');
  });

  it('admits jobs up to the limit and queues the rest in FIFO order', async () => {
    const scheduler = new JobScheduler(1);
    const admitted: string[] = [];

    await scheduler.acquire('a');
    admitted.push('a');
    const b = scheduler.acquire('b').then(() => admitted.push('b'));
    const c = scheduler.acquire('c').then(() => admitted.push('c'));

    expect(scheduler.getStats()).toEqual({ active: 1, queued: 2, max: 1 });
    expect(scheduler.isQueued('b')).toBe(true);

    scheduler.release('a');
    await b;
    expect(admitted).toEqual(['a', 'b']);
    expect(scheduler.getStats()).toEqual({ active: 1, queued: 1, max: 1 });

    scheduler.release('b');
    await c;
    expect(admitted).toEqual(['a', 'b', 'c']);
  });

  it('withdraws a queued job on cancel', async () => {
    const scheduler = new JobScheduler(1);
    await scheduler.acquire('a');
    const waiting = scheduler.acquire('b');

    expect(scheduler.cancel('b')).toBe(true);
    await expect(waiting).rejects.toBeInstanceOf(JobCancelledWhileQueuedError);
    expect(scheduler.cancel('b')).toBe(false);
    expect(scheduler.cancel('a')).toBe(false);
    expect(scheduler.getStats()).toEqual({ active: 1, queued: 0, max: 1 });
  });

  it('withdraws a queued job when its signal aborts', async () => {
    const scheduler = new JobScheduler(1);
    await scheduler.acquire('a');
    const controller = new AbortController();
    const waiting = scheduler.acquire('b', controller.signal);

    controller.abort();

    await expect(waiting).rejects.toThrow('job b was cancelled before a worker slot became free');
    expect(scheduler.isQueued('b')).toBe(false);
  });

  it('rejects an already aborted acquire without queueing', async () => {
    const scheduler = new JobScheduler(2);
    const controller = new AbortController();
    controller.abort();

    await expect(scheduler.acquire('a', controller.signal)).rejects.toBeInstanceOf(
      JobCancelledWhileQueuedError,
    );
    expect(scheduler.getStats()).toEqual({ active: 0, queued: 0, max: 2 });
  });

  it('ignores releases for jobs that never held a slot', () => {
    const scheduler = new JobScheduler(1);
    scheduler.release('ghost');
    expect(scheduler.getStats().active).toBe(0);
  });
});
