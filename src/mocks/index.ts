/**
 * Mocks for testing Slurm REST integrations.
 */

import type { HttpResponse, HttpTransport, RequestOptions } from '../transport/index.js';
import type { SlurmWireClient, WireRequest, WireResponse } from '../wire/client.js';
import { WireClient } from '../wire/client.js';
import { StaticTokenProvider } from '../auth/index.js';

/**
 * Mock response configuration
 */
export interface MockResponse {
  data: unknown;
  status?: number;
  headers?: Record<string, string>;
  delay?: number;
}

/**
 * Mock request matcher
 */
export interface MockMatcher {
  url?: string | RegExp;
  method?: string;
}

/**
 * Recorded transport call
 */
export interface MockCall {
  url: string;
  options: RequestOptions;
}

interface MockEntry {
  matcher: MockMatcher;
  responses: MockResponse[];
}

/**
 * Mock HTTP transport for testing.
 *
 * A matcher given several responses replays them in order; the last one
 * then repeats.
 */
export class MockHttpTransport implements HttpTransport {
  private mocks: MockEntry[] = [];
  private calls: MockCall[] = [];
  private defaultResponse: MockResponse = { data: {}, status: 200, headers: {} };

  /**
   * Add mock responses
   */
  mock(matcher: MockMatcher | string, ...responses: MockResponse[]): this {
    const normalized = typeof matcher === 'string' ? { url: matcher } : matcher;
    this.mocks.push({ matcher: normalized, responses });
    return this;
  }

  /**
   * Set default response
   */
  setDefaultResponse(response: MockResponse): this {
    this.defaultResponse = response;
    return this;
  }

  /**
   * Get all calls made
   */
  getCalls(): MockCall[] {
    return this.calls;
  }

  /**
   * Get calls matching a URL
   */
  getCallsTo(url: string | RegExp): MockCall[] {
    return this.calls.filter((call) =>
      typeof url === 'string' ? call.url.includes(url) : url.test(call.url)
    );
  }

  /**
   * Clear all mocks and calls
   */
  reset(): this {
    this.mocks = [];
    this.calls = [];
    return this;
  }

  async request(url: string, options: RequestOptions): Promise<HttpResponse> {
    this.calls.push({ url, options });

    const entry = this.mocks.find(({ matcher }) => matches(matcher, url, options));
    const response = entry ? next(entry) : this.defaultResponse;

    if (response.delay) {
      await new Promise((resolve) => setTimeout(resolve, response.delay));
    }

    return {
      status: response.status ?? 200,
      headers: response.headers ?? {},
      data: response.data,
    };
  }
}

function matches(matcher: MockMatcher, url: string, options: RequestOptions): boolean {
  if (matcher.url !== undefined) {
    const hit = typeof matcher.url === 'string' ? url.includes(matcher.url) : matcher.url.test(url);
    if (!hit) return false;
  }
  return !matcher.method || matcher.method === options.method;
}

function next(entry: MockEntry): MockResponse {
  const response = entry.responses.length > 1 ? entry.responses.shift() : entry.responses[0];
  return response ?? { data: null, status: 200 };
}

/**
 * Wire client that records requests and fails if any is issued.
 */
export class ForbiddenWireClient implements SlurmWireClient {
  readonly requests: WireRequest[] = [];

  async request(_signal: AbortSignal, request: WireRequest): Promise<WireResponse> {
    this.requests.push(request);
    throw new Error(`unexpected wire call: ${request.method} ${request.path}`);
  }
}

/**
 * Mock base URL used by test clients.
 */
export const MOCK_BASE_URL = 'http://slurm.test:6820';

/**
 * Builds a wire client for `version` over a mock transport.
 */
export function createMockWireClient(
  version: string,
  transport: MockHttpTransport = new MockHttpTransport()
): { client: WireClient; transport: MockHttpTransport } {
  const client = new WireClient({
    baseUrl: MOCK_BASE_URL,
    version,
    transport,
    token: new StaticTokenProvider('test-secret'),
    userName: 'tester',
  });
  return { client, transport };
}
