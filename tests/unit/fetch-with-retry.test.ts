import { afterEach, describe, expect, it, vi } from 'vitest';
import { delayFor, fetchWithRetry, isRetryableFetchError, isRetryableStatus } from '../../src/utils/fetch-with-retry.js';

function networkError(code: string): TypeError {
  return new TypeError('fetch failed', { cause: { code } });
}

describe('fetchWithRetry', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('retries a retryable status and returns the eventual success', async () => {
    const fetchMock = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await fetchWithRetry('https://hooks.test/notify', { method: 'POST' }, 'notify', [0]);

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('returns a non-retryable status without retrying', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('bad', { status: 400 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await fetchWithRetry('https://hooks.test/notify', {}, 'notify', [0, 0]);

    expect(response.status).toBe(400);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('returns the last retryable response once attempts run out', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response('busy', { status: 502 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await fetchWithRetry('https://hooks.test/notify', {}, 'notify', [0, 0]);

    expect(response.status).toBe(502);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('retries transient network errors', async () => {
    const fetchMock = vi.fn<typeof fetch>()
      .mockRejectedValueOnce(networkError('ECONNRESET'))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await fetchWithRetry('https://hooks.test/notify', {}, 'notify', [0]);

    expect(response.status).toBe(200);
  });

  it('rethrows errors that are not transient', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockRejectedValue(new Error('boom')));

    await expect(fetchWithRetry('https://hooks.test/notify', {}, 'notify', [0])).rejects.toThrow('boom');
  });
});

describe('retry classification', () => {
  it('treats throttling and server errors as retryable', () => {
    expect([408, 425, 429, 500, 503].map(isRetryableStatus)).toEqual([true, true, true, true, true]);
    expect([400, 401, 404].map(isRetryableStatus)).toEqual([false, false, false]);
  });

  it('recognizes network error codes', () => {
    expect(isRetryableFetchError(networkError('ETIMEDOUT'))).toBe(true);
    expect(isRetryableFetchError(new Error('fetch failed'))).toBe(false);
  });

  it('reuses the last delay once the schedule runs out', () => {
    expect(delayFor(1, [500, 1500])).toBe(500);
    expect(delayFor(3, [500, 1500])).toBe(1500);
    expect(delayFor(1, [])).toBe(0);
  });
});
