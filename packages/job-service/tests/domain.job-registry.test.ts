import { describe, expect, it } from 'vitest';

import { JobNotFoundError } from '@setsplit/contracts';

import type { Tracklist } from '../src/domain/job-model.js';
import { JobRegistry } from '../src/domain/job-registry.js';
import { ProgressBus } from '../src/domain/progress-bus.js';

/**
 * Intent:
 * - The registry is the only writer of job state; its snapshots are copies.
 * - Updates on one job are serialized, different jobs never wait on each other.
 * - Refused updates are kept aside and never reach the event log.
 */

const tracklist: Tracklist = {
  artist: 'Various',
  name: 'Test Set',
  tracks: [{ artist: 'A', name: 'X', startTime: '00:00', endTime: '03:30', trackNumber: 1 }],
};

function createRegistry() {
  let next = 0;
  const bus = new ProgressBus({ subscriberBufferSize: 16 });
  const registry = new JobRegistry({ bus, generateId: () => `job-${++next}` });
  return { bus, registry };
}

function submitOne(registry: JobRegistry) {
  return registry.create({
    sourceUrl: 'https://example.com/set.mp3',
    tracklistRaw: 'A - X 00:00',
    options: { fileExtension: 'mp3', maxConcurrentTasks: 4 },
  });
}

describe('domain/job-registry', () => {
  it('creates jobs in initializing with a single initial event', () => {
    const { registry } = createRegistry();

    const job = submitOne(registry);

    expect(job.id).toBe('job-1');
    expect(job.sequence).toBe(1);
    expect(job.status).toBe('initializing');
    expect(job.results).toEqual([]);
    expect(job.startTime).toBeNull();
    expect(job.events).toHaveLength(1);
    expect(job.events[0]).toMatchObject({ stage: 'initializing', progress: 0, message: 'Job created' });
    expect(submitOne(registry).sequence).toBe(2);
  });

  it('returns snapshots that cannot change stored state', () => {
    const { registry } = createRegistry();
    const job = submitOne(registry);

    job.results.push('/tmp/injected.mp3');
    job.options.fileExtension = 'wav';

    const reloaded = registry.get(job.id);
    expect(reloaded?.results).toEqual([]);
    expect(reloaded?.options.fileExtension).toBe('mp3');
    expect(registry.get('missing')).toBeNull();
  });

  it('applies accepted updates to the projection and the log', async () => {
    const { registry } = createRegistry();
    const { id } = submitOne(registry);

    await registry.appendEvent(id, { stage: 'downloading', progress: 0.2 });
    const outcome = await registry.appendEvent(id, { stage: 'importing' }, { tracklist });

    expect(outcome.accepted).toBe(true);
    expect(outcome.job.status).toBe('importing');
    expect(outcome.job.progress).toBe(0.2);
    expect(outcome.job.tracklist?.tracks).toHaveLength(1);
    expect(outcome.job.startTime).toBeInstanceOf(Date);
    expect(outcome.job.events.map((e) => e.stage)).toEqual(['initializing', 'downloading', 'importing']);
  });

  it('keeps status complete when a late downloading update arrives', async () => {
    const { registry } = createRegistry();
    const { id } = submitOne(registry);

    await registry.appendEvent(id, { stage: 'downloading' });
    await registry.appendEvent(id, { stage: 'importing' }, { tracklist });
    await registry.appendEvent(id, { stage: 'processing' });
    await registry.appendEvent(id, { stage: 'processing', artifact: '/out/01.mp3' });
    await registry.appendEvent(id, { stage: 'complete' });

    const late = await registry.appendEvent(id, { stage: 'downloading' });

    expect(late).toMatchObject({ accepted: false, reason: 'job already complete; downloading event ignored' });
    const job = registry.get(id);
    expect(job?.status).toBe('complete');
    expect(job?.events.at(-1)?.stage).toBe('complete');
    expect(job?.rejectedEvents).toHaveLength(1);
    expect(job?.rejectedEvents[0]).toMatchObject({
      status: 'complete',
      reason: 'job already complete; downloading event ignored',
      update: { stage: 'downloading' },
    });
  });

  it('reports the stage of the last logged event as the status', async () => {
    const { registry } = createRegistry();
    const { id } = submitOne(registry);

    const skipped = await registry.appendEvent(id, { stage: 'processing' });
    expect(skipped.accepted).toBe(false);
    expect(skipped.job.status).toBe('initializing');

    const statuses: string[] = [];
    for (const stage of ['downloading', 'error'] as const) {
      const outcome = await registry.appendEvent(id, { stage, error: 'boom' });
      statuses.push(outcome.job.status);
      expect(outcome.job.status).toBe(outcome.job.events.at(-1)?.stage);
    }
    expect(statuses).toEqual(['downloading', 'error']);
  });

  it('fails updates for unknown jobs', async () => {
    const { registry } = createRegistry();

    await expect(registry.update('missing', () => undefined)).rejects.toBeInstanceOf(JobNotFoundError);
    await expect(registry.appendEvent('missing', { stage: 'downloading' })).rejects.toThrow(
      'job not found: missing',
    );
  });

  it('serializes updates on the same job but not across jobs', async () => {
    const { registry } = createRegistry();
    const first = submitOne(registry);
    const second = submitOne(registry);
    const order: string[] = [];

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const slow = registry.update(first.id, async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const queued = registry.update(first.id, () => {
      order.push('first:queued');
    });
    const other = registry.update(second.id, () => {
      order.push('second');
    });

    await other;
    expect(order).toEqual(['first:start', 'second']);

    release();
    await Promise.all([slow, queued]);
    expect(order).toEqual(['first:start', 'second', 'first:end', 'first:queued']);
  });

  it('lists jobs with an optional status filter', async () => {
    const { registry } = createRegistry();
    const a = submitOne(registry);
    submitOne(registry);
    await registry.appendEvent(a.id, { stage: 'error', error: 'boom' });

    expect(registry.list()).toHaveLength(2);
    expect(registry.list({ status: 'error' }).map((job) => job.id)).toEqual([a.id]);
    expect(registry.list({ status: ['initializing', 'downloading'] })).toHaveLength(1);
  });

  it('removes a job together with its progress log', async () => {
    const { bus, registry } = createRegistry();
    const { id } = submitOne(registry);

    await expect(registry.remove(id)).resolves.toBe(true);
    await expect(registry.remove(id)).resolves.toBe(false);
    expect(registry.get(id)).toBeNull();
    expect(bus.has(id)).toBe(false);
    expect(registry.size).toBe(0);
  });
});
