/**
 * Polling watch.
 *
 * The REST API has no change notifications, so a watch re-lists the resource
 * every poll interval and diffs the result against the previous poll.
 * Ordering and latency are best-effort, bounded by the poll interval.
 * @module managers/watch
 */

import { SlurmError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { sleep } from '../transport/retry.js';
import type { WatchEvent, WatchEventType, WatchStream } from '../types/index.js';

/** Default poll interval in milliseconds. */
export const DEFAULT_POLL_INTERVAL = 5000;

/** Default event buffer size. */
export const DEFAULT_BUFFER_SIZE = 100;

interface Consumer<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: Error) => void;
}

/**
 * Bounded async queue. Producers wait while it is full; consumers wait while
 * it is empty.
 */
export class EventQueue<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly consumers: Consumer<T>[] = [];
  private readonly producers: Array<() => void> = [];
  private closed = false;
  private failure: Error | null = null;

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw SlurmError.validation('buffer size must be at least 1');
    }
  }

  /**
   * Adds an item, waiting for room if the queue is full.
   * @returns false if the queue was closed.
   */
  async push(item: T): Promise<boolean> {
    for (;;) {
      if (this.closed) {
        return false;
      }
      const consumer = this.consumers.shift();
      if (consumer) {
        consumer.resolve({ value: item, done: false });
        return true;
      }
      if (this.buffer.length < this.capacity) {
        this.buffer.push(item);
        return true;
      }
      await new Promise<void>((resolve) => this.producers.push(resolve));
    }
  }

  /**
   * Takes the next item; resolves done once the queue is closed and drained.
   */
  next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      this.producers.shift()?.();
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      const failure = this.failure;
      this.failure = null;
      return failure ? Promise.reject(failure) : Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => this.consumers.push({ resolve, reject }));
  }

  /**
   * Closes the queue and discards buffered items.
   */
  close(): void {
    this.buffer.length = 0;
    this.finish();
  }

  /**
   * Closes the queue with an error, delivered after buffered items.
   */
  fail(error: Error): void {
    if (this.closed) {
      return;
    }
    const consumer = this.consumers.shift();
    if (consumer) {
      consumer.reject(error);
    } else {
      this.failure = error;
    }
    this.finish();
  }

  /** Number of buffered items. */
  get size(): number {
    return this.buffer.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private finish(): void {
    this.closed = true;
    for (const consumer of this.consumers.splice(0)) {
      consumer.resolve({ value: undefined, done: true });
    }
    for (const producer of this.producers.splice(0)) {
      producer();
    }
  }
}

/**
 * Polling watch options.
 */
export interface PollingWatchOptions<T> {
  /** Lists the current state of the resource. */
  list: (signal: AbortSignal) => Promise<T[]>;
  /** Identity of an item. */
  key: (item: T) => string;
  resource: string;
  logger: Logger;
  pollInterval?: number;
  bufferSize?: number;
  emitInitial?: boolean;
}

/**
 * Closable event stream fed by a polling loop.
 */
export class PollingWatch<T> implements WatchStream<T> {
  private readonly queue: EventQueue<WatchEvent<T>>;
  private readonly controller = new AbortController();
  private readonly onParentAbort = (): void => this.close();
  /** Settles when the polling loop has stopped. */
  readonly finished: Promise<void>;

  constructor(
    private readonly parent: AbortSignal,
    private readonly options: PollingWatchOptions<T>
  ) {
    this.queue = new EventQueue(options.bufferSize ?? DEFAULT_BUFFER_SIZE);
    parent.addEventListener('abort', this.onParentAbort, { once: true });
    this.finished = this.run().then(
      () => this.stop(),
      (error: unknown) => this.stop(error)
    );
  }

  close(): void {
    this.controller.abort();
    this.queue.close();
  }

  [Symbol.asyncIterator](): AsyncIterator<WatchEvent<T>> {
    return this.queue[Symbol.asyncIterator]();
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;
    const interval = this.options.pollInterval ?? DEFAULT_POLL_INTERVAL;
    let previous: Map<string, T> | null = this.options.emitInitial ? new Map() : null;

    while (!signal.aborted) {
      const items = await this.options.list(signal);
      const current = new Map(items.map((item) => [this.options.key(item), item]));

      if (previous) {
        for (const event of diff(previous, current)) {
          if (!(await this.queue.push(event))) {
            return;
          }
        }
      }
      previous = current;

      await sleep(interval, signal);
    }
  }

  private stop(error?: unknown): void {
    this.parent.removeEventListener('abort', this.onParentAbort);
    if (error === undefined || this.controller.signal.aborted) {
      this.queue.close();
      return;
    }
    const failure = error instanceof Error ? error : new Error(String(error));
    this.options.logger.warn('watch poll failed', {
      resource: this.options.resource,
      error: failure.message,
    });
    this.queue.fail(failure);
  }
}

function* diff<T>(previous: Map<string, T>, current: Map<string, T>): Generator<WatchEvent<T>> {
  const timestamp = Date.now();
  const event = (type: WatchEventType, object: T): WatchEvent<T> => ({ type, object, timestamp });

  for (const [key, item] of current) {
    const before = previous.get(key);
    if (before === undefined) {
      yield event('added', item);
    } else if (JSON.stringify(before) !== JSON.stringify(item)) {
      yield event('modified', item);
    }
  }
  for (const [key, item] of previous) {
    if (!current.has(key)) {
      yield event('deleted', item);
    }
  }
}
