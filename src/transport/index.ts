/**
 * HTTP transport layer for the Slurm REST API.
 *
 * Transports report every HTTP status as a response; only network failures,
 * timeouts and cancellation are thrown.
 */

import { fetch } from 'undici';
import { SlurmError, SlurmErrorKind } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { RetryExecutor, RETRYABLE_STATUSES } from './retry.js';

export { RetryExecutor, RETRYABLE_STATUSES, isRetryableError, sleep } from './retry.js';
export type { RetryExecutorOptions, RetryDecision } from './retry.js';

/**
 * HTTP method
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * HTTP request options
 */
export interface RequestOptions {
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * HTTP response. `data` is the parsed JSON body, or null when there is none.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  data: unknown;
}

/**
 * Transport interface
 */
export interface HttpTransport {
  request(url: string, options: RequestOptions): Promise<HttpResponse>;
}

/**
 * Default fetch-based transport
 */
export class FetchTransport implements HttpTransport {
  private defaultHeaders: Record<string, string>;
  private defaultTimeout: number;
  private logger: Logger;

  constructor(options: {
    defaultHeaders?: Record<string, string>;
    defaultTimeout?: number;
    logger?: Logger;
  } = {}) {
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.defaultTimeout = options.defaultTimeout ?? 30000;
    this.logger = options.logger ?? new NoopLogger();
  }

  async request(url: string, options: RequestOptions): Promise<HttpResponse> {
    const timeout = options.timeout ?? this.defaultTimeout;
    const callerSignal = options.signal;

    if (callerSignal?.aborted) {
      throw SlurmError.cancelled();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onCallerAbort = (): void => controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.defaultHeaders,
      ...options.headers,
    };

    let body: string | undefined;
    if (options.body !== undefined) {
      headers['Content-Type'] = headers['Content-Type'] ?? 'application/json';
      body = JSON.stringify(options.body);
    }

    try {
      const response = await fetch(url, {
        method: options.method,
        headers,
        body,
        signal: controller.signal,
      });

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });

      const text = await response.text();
      const data = parseBody(text, response.status);

      this.logger.debug('HTTP response', { method: options.method, url, status: response.status });

      return {
        status: response.status,
        headers: responseHeaders,
        data,
      };
    } catch (error) {
      if (error instanceof SlurmError) {
        throw error;
      }
      if (callerSignal?.aborted) {
        throw SlurmError.cancelled();
      }
      if (timedOut) {
        throw SlurmError.timeout(`Request timeout after ${timeout}ms`);
      }
      if (error instanceof Error) {
        throw SlurmError.network(error.message, error);
      }
      throw SlurmError.network('Unknown network error');
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

function parseBody(text: string, status: number): unknown {
  if (text.trim() === '') {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    // A proxy in front of slurmrestd may answer errors with HTML.
    if (status >= 200 && status < 300) {
      throw new SlurmError(SlurmErrorKind.InvalidResponse, 'response body is not valid JSON', {
        statusCode: status,
        cause: error instanceof Error ? error : undefined,
      });
    }
    return null;
  }
}

/** Methods safe to send again after a gateway error or a lost response. */
export const IDEMPOTENT_METHODS: readonly HttpMethod[] = ['GET', 'DELETE'];

/**
 * Transport decorator that retries transient failures of idempotent
 * requests. Other methods are sent once.
 */
export class RetryingTransport implements HttpTransport {
  private inner: HttpTransport;
  private executor: RetryExecutor;
  private logger: Logger;

  constructor(inner: HttpTransport, executor: RetryExecutor, logger: Logger = new NoopLogger()) {
    this.inner = inner;
    this.executor = executor;
    this.logger = logger;
  }

  request(url: string, options: RequestOptions): Promise<HttpResponse> {
    if (!IDEMPOTENT_METHODS.includes(options.method)) {
      return this.inner.request(url, options);
    }
    let attempt = 0;
    return this.executor.execute(
      () => {
        if (attempt > 0) {
          this.logger.debug('Retrying request', { method: options.method, url, attempt });
        }
        attempt++;
        return this.inner.request(url, options);
      },
      {
        signal: options.signal,
        retryResult: (response) => RETRYABLE_STATUSES.includes(response.status),
      }
    );
  }
}
