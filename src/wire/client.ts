/**
 * Versioned wire client for slurmrestd.
 *
 * Builds `/slurm/{version}/...` and `/slurmdb/{version}/...` URLs, attaches
 * authentication headers and hands the request to the transport. HTTP
 * statuses are returned, never thrown; the response adapter classifies them.
 * @module wire/client
 */

import type { TokenProvider } from '../auth/index.js';
import { buildAuthHeaders } from '../auth/index.js';
import type { HttpMethod, HttpTransport } from '../transport/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';

/**
 * API family: controller (`slurm`) or accounting database (`slurmdb`).
 */
export type ApiFamily = 'slurm' | 'slurmdb';

/**
 * Query parameters; undefined and empty values are dropped.
 */
export type QueryParams = Record<string, string | number | undefined>;

/**
 * One wire request.
 */
export interface WireRequest {
  method: HttpMethod;
  api: ApiFamily;
  /** Path below the version prefix, starting with "/". */
  path: string;
  query?: QueryParams;
  body?: unknown;
}

/**
 * Raw wire response.
 */
export interface WireResponse {
  status: number;
  data: unknown;
}

/**
 * What adapters need from a wire client.
 */
export interface SlurmWireClient {
  request(signal: AbortSignal, request: WireRequest): Promise<WireResponse>;
}

/**
 * Wire client options.
 */
export interface WireClientOptions {
  baseUrl: string;
  version: string;
  transport: HttpTransport;
  token?: TokenProvider;
  userName?: string;
  userAgent?: string;
  timeout?: number;
  logger?: Logger;
}

/**
 * Wire client bound to one API version.
 */
export class WireClient implements SlurmWireClient {
  private readonly baseUrl: string;
  private readonly version: string;
  private readonly transport: HttpTransport;
  private readonly token?: TokenProvider;
  private readonly userName?: string;
  private readonly userAgent?: string;
  private readonly timeout?: number;
  private readonly logger: Logger;

  constructor(options: WireClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.version = options.version;
    this.transport = options.transport;
    this.token = options.token;
    this.userName = options.userName;
    this.userAgent = options.userAgent;
    this.timeout = options.timeout;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Builds the absolute URL of a request.
   */
  url(api: ApiFamily, path: string, query?: QueryParams): string {
    let url = `${this.baseUrl}/${api}/${this.version}${path}`;
    if (query) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined && value !== '') {
          params.append(key, String(value));
        }
      }
      const qs = params.toString();
      if (qs) {
        url += `?${qs}`;
      }
    }
    return url;
  }

  async request(signal: AbortSignal, request: WireRequest): Promise<WireResponse> {
    const url = this.url(request.api, request.path, request.query);
    const headers = await buildAuthHeaders(this.token, this.userName);
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }

    this.logger.debug('slurm request', { method: request.method, url, version: this.version });

    const response = await this.transport.request(url, {
      method: request.method,
      headers,
      body: request.body,
      timeout: this.timeout,
      signal,
    });

    return { status: response.status, data: response.data };
  }
}
