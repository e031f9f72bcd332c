/**
 * Retry with exponential backoff for transient transport failures.
 *
 * Retries network errors, timeouts and gateway responses (502/503/504).
 * Cancellation is never retried and interrupts the backoff sleep.
 *
 * @module transport/retry
 */

import { SlurmError, SlurmErrorKind } from '../errors/index.js';
import type { RetryConfig } from '../config/index.js';
import { DEFAULT_RETRY_CONFIG } from '../config/index.js';

/** Statuses worth another attempt. */
export const RETRYABLE_STATUSES: readonly number[] = [502, 503, 504];

/**
 * Settings accepted by the retry executor.
 */
export interface RetryExecutorOptions extends Partial<RetryConfig> {
  /** Maximum retries after the first attempt. */
  maxRetries?: number;
  /** Replaces the timer-based sleep (tests). */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Replaces Math.random for jitter (tests). */
  random?: () => number;
}

/**
 * Decides whether a returned value warrants another attempt.
 */
export type RetryDecision<T> = (result: T) => boolean;

/**
 * Retry executor with exponential backoff.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly maxRetries: number;
  private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(options: RetryExecutorOptions = {}) {
    this.config = {
      initialBackoff: options.initialBackoff ?? DEFAULT_RETRY_CONFIG.initialBackoff,
      maxBackoff: options.maxBackoff ?? DEFAULT_RETRY_CONFIG.maxBackoff,
      multiplier: options.multiplier ?? DEFAULT_RETRY_CONFIG.multiplier,
      jitter: options.jitter ?? DEFAULT_RETRY_CONFIG.jitter,
      enabled: options.enabled ?? DEFAULT_RETRY_CONFIG.enabled,
    };
    this.maxRetries = this.config.enabled ? (options.maxRetries ?? 3) : 0;
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Executes `fn`, retrying when it throws a retryable error or when
   * `retryResult` says a returned value should be retried.
   *
   * @returns The first accepted result, or the last result once retries run out.
   * @throws The error from the last failed attempt.
   */
  async execute<T>(
    fn: () => Promise<T>,
    options: { signal?: AbortSignal; retryResult?: RetryDecision<T> } = {}
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      const last = attempt >= this.maxRetries;
      try {
        const result = await fn();
        if (last || !options.retryResult || !options.retryResult(result)) {
          return result;
        }
      } catch (error) {
        if (last || !isRetryableError(error)) {
          throw error;
        }
      }
      await this.sleepFn(this.calculateDelay(attempt), options.signal);
    }
  }

  /**
   * Calculates the delay for a retry attempt.
   */
  calculateDelay(attempt: number): number {
    const baseDelay = this.config.initialBackoff * Math.pow(this.config.multiplier, attempt);
    const cappedDelay = Math.min(baseDelay, this.config.maxBackoff);

    if (this.config.jitter > 0) {
      const jitter = cappedDelay * this.config.jitter * (this.random() * 2 - 1);
      return Math.max(0, Math.round(cappedDelay + jitter));
    }

    return Math.round(cappedDelay);
  }

  /**
   * Maximum retries after the first attempt.
   */
  getMaxRetries(): number {
    return this.maxRetries;
  }
}

/**
 * Determines if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof SlurmError) {
    return error.kind === SlurmErrorKind.Network || error.kind === SlurmErrorKind.Timeout;
  }
  return false;
}

/**
 * Sleeps for `ms` milliseconds; rejects with a Cancelled error if `signal`
 * aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(SlurmError.cancelled());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(SlurmError.cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
