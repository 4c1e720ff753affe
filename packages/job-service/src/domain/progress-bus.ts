// packages/job-service/src/domain/progress-bus.ts
//
// Per-job append-only progress log with live fan-out.
// Each subscriber owns a bounded buffer; a subscriber that falls behind is
// disconnected with SubscriberOverflowError while producers and other
// subscribers carry on. Jobs never share a log or a subscriber set.

import { JobNotFoundError, ProtocolViolationError, SubscriberOverflowError } from '@setsplit/contracts';

import { type Logger, logger as rootLogger } from '../infrastructure/logger.js';
import { metrics } from '../infrastructure/metrics.js';
import { type ProgressEvent, type ProgressUpdate, isTerminal } from './job-model.js';

export interface ProgressBusOptions {
  subscriberBufferSize: number;
  logger?: Logger;
  now?: () => Date;
}

export interface SubscribeOptions {
  /** Deliver the job's history before live events. */
  replay?: boolean;
  signal?: AbortSignal;
}

interface JobLog {
  events: ProgressEvent[];
  subscribers: Set<ProgressSubscription>;
  closed: boolean;
}

type Waiter = {
  resolve: (result: IteratorResult<ProgressEvent, undefined>) => void;
  reject: (error: Error) => void;
};

export class ProgressSubscription implements AsyncIterable<ProgressEvent> {
  private readonly buffer: ProgressEvent[] = [];
  private waiter: Waiter | null = null;
  private ended = false;
  private failure: Error | null = null;
  private readonly detachListeners: Array<() => void> = [];

  constructor(
    readonly jobId: string,
    private readonly capacity: number,
  ) {}

  /** Queue an event; returns false when the buffer is already full. */
  offer(event: ProgressEvent): boolean {
    if (this.ended) return true;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.resolve({ done: false, value: event });
      return true;
    }
    if (this.buffer.length >= this.capacity) {
      return false;
    }
    this.buffer.push(event);
    return true;
  }

  /** Queue history without counting it against the live buffer. */
  preload(events: readonly ProgressEvent[]): void {
    this.buffer.push(...events);
  }

  /** Runs once the subscription ends, fails or is closed. */
  onDetach(listener: () => void): void {
    if (this.ended) {
      listener();
      return;
    }
    this.detachListeners.push(listener);
  }

  /** Producer side: no more events will arrive. */
  end(): void {
    this.finish(null);
  }

  fail(error: Error): void {
    this.finish(error);
  }

  /** Consumer side: stop listening and discard anything still buffered. */
  close(): void {
    this.buffer.length = 0;
    this.finish(null);
  }

  /** Why the stream stopped early, if it did. */
  get error(): Error | null {
    return this.failure;
  }

  next(): Promise<IteratorResult<ProgressEvent, undefined>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ done: false, value: event });
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }

  private finish(error: Error | null): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = error;

    for (const listener of this.detachListeners.splice(0)) {
      listener();
    }

    const waiter = this.waiter;
    this.waiter = null;
    if (!waiter) return;
    if (error) {
      waiter.reject(error);
    } else {
      waiter.resolve({ done: true, value: undefined });
    }
  }
}

export class ProgressBus {
  private readonly logs = new Map<string, JobLog>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: ProgressBusOptions) {
    this.logger = (options.logger ?? rootLogger).child({ component: 'progress-bus' });
    this.now = options.now ?? (() => new Date());
  }

  open(jobId: string): void {
    if (this.logs.has(jobId)) return;
    this.logs.set(jobId, { events: [], subscribers: new Set(), closed: false });
  }

  has(jobId: string): boolean {
    return this.logs.has(jobId);
  }

  /**
   * Stamp a timestamp that never goes backwards within the job's log.
   */
  stamp(jobId: string): Date {
    const now = this.now();
    const last = this.logs.get(jobId)?.events.at(-1)?.timestamp;
    return last && last.getTime() > now.getTime() ? new Date(last.getTime()) : now;
  }

  /** Append a bare update, stamping it with the log's clock. */
  publish(jobId: string, update: ProgressUpdate): ProgressEvent {
    return this.append(jobId, Object.freeze({ ...update, timestamp: this.stamp(jobId) }));
  }

  append(jobId: string, stored: ProgressEvent): ProgressEvent {
    const log = this.requireLog(jobId);
    if (log.closed) {
      throw new ProtocolViolationError(`job ${jobId} already terminal; ${stored.stage} not appended`);
    }

    log.events.push(stored);

    for (const subscriber of log.subscribers) {
      if (subscriber.offer(stored)) continue;

      subscriber.fail(new SubscriberOverflowError(jobId, this.options.subscriberBufferSize));
      this.logger.warn('Progress subscriber overflowed; disconnecting', {
        event: 'subscriber_overflow',
        jobId,
        capacity: this.options.subscriberBufferSize,
      });
      metrics.increment('progress.subscriber_overflow');
    }

    if (isTerminal(stored.stage)) {
      log.closed = true;
      for (const subscriber of [...log.subscribers]) {
        subscriber.end();
      }
      log.subscribers.clear();
    }

    return stored;
  }

  subscribe(jobId: string, options: SubscribeOptions = {}): ProgressSubscription {
    const log = this.requireLog(jobId);
    const subscription = new ProgressSubscription(jobId, this.options.subscriberBufferSize);

    if (options.replay) {
      subscription.preload(log.events);
    }

    if (log.closed) {
      const terminal = log.events.at(-1);
      if (!options.replay && terminal) {
        subscription.preload([terminal]);
      }
      subscription.end();
      return subscription;
    }

    const signal = options.signal;
    const onAbort = () => subscription.close();

    log.subscribers.add(subscription);
    subscription.onDetach(() => {
      log.subscribers.delete(subscription);
      signal?.removeEventListener('abort', onAbort);
    });

    if (signal) {
      if (signal.aborted) {
        subscription.close();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    return subscription;
  }

  history(jobId: string): ProgressEvent[] {
    return [...this.requireLog(jobId).events];
  }

  subscriberCount(jobId: string): number {
    return this.logs.get(jobId)?.subscribers.size ?? 0;
  }

  /** Forget a job's log; live subscribers see end-of-stream. */
  drop(jobId: string): void {
    const log = this.logs.get(jobId);
    if (!log) return;
    for (const subscriber of [...log.subscribers]) {
      subscriber.end();
    }
    this.logs.delete(jobId);
  }

  private requireLog(jobId: string): JobLog {
    const log = this.logs.get(jobId);
    if (!log) {
      throw new JobNotFoundError(jobId);
    }
    return log;
  }
}
