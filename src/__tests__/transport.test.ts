/**
 * Tests for the HTTP transport and retry executor.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  FetchTransport,
  RetryExecutor,
  RetryingTransport,
  isRetryableError,
  sleep,
} from '../transport/index.js';
import { SlurmError, SlurmErrorKind } from '../errors/index.js';
import { MockHttpTransport } from '../mocks/index.js';

const fetchMock = vi.hoisted(() => vi.fn());

vi.mock('undici', () => ({ fetch: fetchMock }));

function fakeResponse(status: number, text: string, headers: Record<string, string> = {}) {
  return {
    status,
    headers: new Headers(headers),
    text: async () => text,
  };
}

describe('RetryExecutor', () => {
  const noJitter = { jitter: 0, sleep: async () => {} };

  describe('calculateDelay', () => {
    it('should back off exponentially', () => {
      const executor = new RetryExecutor(noJitter);
      expect(executor.calculateDelay(0)).toBe(500);
      expect(executor.calculateDelay(1)).toBe(1000);
      expect(executor.calculateDelay(2)).toBe(2000);
    });

    it('should cap the delay', () => {
      const executor = new RetryExecutor({ ...noJitter, maxBackoff: 1500 });
      expect(executor.calculateDelay(2)).toBe(1500);
    });

    it('should spread the delay by the jitter factor', () => {
      const low = new RetryExecutor({ jitter: 0.1, random: () => 0 });
      const high = new RetryExecutor({ jitter: 0.1, random: () => 1 });
      expect(low.calculateDelay(0)).toBe(450);
      expect(high.calculateDelay(0)).toBe(550);
    });
  });

  it('should report no retries when disabled', () => {
    expect(new RetryExecutor({ enabled: false, maxRetries: 5 }).getMaxRetries()).toBe(0);
    expect(new RetryExecutor({ maxRetries: 2 }).getMaxRetries()).toBe(2);
  });

  it('should retry network errors until success', async () => {
    const delays: number[] = [];
    const executor = new RetryExecutor({
      jitter: 0,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(SlurmError.network('reset'))
      .mockRejectedValueOnce(SlurmError.timeout('slow'))
      .mockResolvedValueOnce('ok');

    await expect(executor.execute(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([500, 1000]);
  });

  it('should not retry validation errors', async () => {
    const executor = new RetryExecutor(noJitter);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(SlurmError.validation('bad'));

    await expect(executor.execute(fn)).rejects.toThrow('bad');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should give up after the last retry', async () => {
    const executor = new RetryExecutor({ ...noJitter, maxRetries: 2 });
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(SlurmError.network('down'));

    await expect(executor.execute(fn)).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should return the last result once retries run out', async () => {
    const executor = new RetryExecutor({ ...noJitter, maxRetries: 1 });
    const fn = vi.fn<() => Promise<number>>().mockResolvedValue(503);

    await expect(executor.execute(fn, { retryResult: (status) => status === 503 })).resolves.toBe(503);
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('isRetryableError', () => {
  it('should retry only network and timeout errors', () => {
    expect(isRetryableError(SlurmError.network('reset'))).toBe(true);
    expect(isRetryableError(SlurmError.timeout('slow'))).toBe(true);
    expect(isRetryableError(SlurmError.cancelled())).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});

describe('sleep', () => {
  it('should reject when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(1000, controller.signal)).rejects.toMatchObject({
      kind: SlurmErrorKind.Cancelled,
    });
  });

  it('should reject when the signal aborts during the wait', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ kind: SlurmErrorKind.Cancelled });
  });
});

describe('RetryingTransport', () => {
  it('should retry gateway statuses', async () => {
    const inner = new MockHttpTransport().mock(
      '/ping',
      { status: 503, data: null },
      { status: 200, data: { pings: [] } }
    );
    const transport = new RetryingTransport(
      inner,
      new RetryExecutor({ jitter: 0, sleep: async () => {} })
    );

    const response = await transport.request('http://slurm.test/slurm/v0.0.42/ping', {
      method: 'GET',
    });

    expect(response.status).toBe(200);
    expect(inner.getCalls()).toHaveLength(2);
  });

  it('should not retry client errors', async () => {
    const inner = new MockHttpTransport().mock('/job/1', { status: 404, data: null });
    const transport = new RetryingTransport(
      inner,
      new RetryExecutor({ jitter: 0, sleep: async () => {} })
    );

    const response = await transport.request('http://slurm.test/slurm/v0.0.42/job/1', {
      method: 'GET',
    });

    expect(response.status).toBe(404);
    expect(inner.getCalls()).toHaveLength(1);
  });

  it('should send a POST once even on a gateway status', async () => {
    const inner = new MockHttpTransport().mock(
      '/job/submit',
      { status: 503, data: null },
      { status: 200, data: { job_id: 12 } }
    );
    const transport = new RetryingTransport(
      inner,
      new RetryExecutor({ jitter: 0, sleep: async () => {} })
    );

    const response = await transport.request('http://slurm.test/slurm/v0.0.42/job/submit', {
      method: 'POST',
      body: { job: { name: 'hostcheck' } },
    });

    expect(response.status).toBe(503);
    expect(inner.getCalls()).toHaveLength(1);
  });

  it('should retry a DELETE', async () => {
    const inner = new MockHttpTransport().mock(
      '/job/12',
      { status: 502, data: null },
      { status: 200, data: {} }
    );
    const transport = new RetryingTransport(
      inner,
      new RetryExecutor({ jitter: 0, sleep: async () => {} })
    );

    const response = await transport.request('http://slurm.test/slurm/v0.0.42/job/12', {
      method: 'DELETE',
    });

    expect(response.status).toBe(200);
    expect(inner.getCalls()).toHaveLength(2);
  });
});

describe('FetchTransport', () => {
  it('should send JSON and parse the JSON response', async () => {
    fetchMock.mockResolvedValueOnce(
      fakeResponse(200, '{"job_id":12}', { 'Content-Type': 'application/json' })
    );
    const transport = new FetchTransport({ defaultHeaders: { 'User-Agent': 'test' } });

    const response = await transport.request('http://slurm.test/slurm/v0.0.42/job/submit', {
      method: 'POST',
      headers: { Authorization: 'Bearer test-secret' },
      body: { job: { name: 'hostcheck' } },
    });

    expect(response).toEqual({
      status: 200,
      headers: { 'content-type': 'application/json' },
      data: { job_id: 12 },
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://slurm.test/slurm/v0.0.42/job/submit');
    expect(init.method).toBe('POST');
    expect(init.body).toBe('{"job":{"name":"hostcheck"}}');
    expect(init.headers).toEqual({
      Accept: 'application/json',
      'User-Agent': 'test',
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
  });

  it('should return null data for an empty body', async () => {
    fetchMock.mockResolvedValueOnce(fakeResponse(404, ''));
    const response = await new FetchTransport().request('http://slurm.test/x', { method: 'GET' });
    expect(response.status).toBe(404);
    expect(response.data).toBeNull();
  });

  it('should ignore a non-JSON error body', async () => {
    fetchMock.mockResolvedValueOnce(fakeResponse(502, '<html>Bad Gateway</html>'));
    const response = await new FetchTransport().request('http://slurm.test/x', { method: 'GET' });
    expect(response.status).toBe(502);
    expect(response.data).toBeNull();
  });

  it('should reject a non-JSON success body', async () => {
    fetchMock.mockResolvedValueOnce(fakeResponse(200, 'not json'));
    await expect(
      new FetchTransport().request('http://slurm.test/x', { method: 'GET' })
    ).rejects.toMatchObject({
      kind: SlurmErrorKind.InvalidResponse,
      message: 'response body is not valid JSON',
    });
  });

  it('should map fetch failures to network errors', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    await expect(
      new FetchTransport().request('http://slurm.test/x', { method: 'GET' })
    ).rejects.toMatchObject({ kind: SlurmErrorKind.Network, message: 'fetch failed' });
  });

  it('should not call fetch with an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      new FetchTransport().request('http://slurm.test/x', {
        method: 'GET',
        signal: controller.signal,
      })
    ).rejects.toMatchObject({ kind: SlurmErrorKind.Cancelled });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should time out a slow request', async () => {
    fetchMock.mockImplementationOnce(
      (_url: string, init: { signal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          init.signal.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    await expect(
      new FetchTransport({ defaultTimeout: 10 }).request('http://slurm.test/x', { method: 'GET' })
    ).rejects.toMatchObject({
      kind: SlurmErrorKind.Timeout,
      message: 'Request timeout after 10ms',
    });
  });

  it('should report caller cancellation during the request', async () => {
    const controller = new AbortController();
    fetchMock.mockImplementationOnce(
      (_url: string, init: { signal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          init.signal.addEventListener('abort', () => reject(new Error('aborted')));
          controller.abort();
        })
    );

    await expect(
      new FetchTransport().request('http://slurm.test/x', {
        method: 'GET',
        signal: controller.signal,
      })
    ).rejects.toMatchObject({ kind: SlurmErrorKind.Cancelled });
  });
});
