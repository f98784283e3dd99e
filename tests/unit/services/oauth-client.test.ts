/**
 * Unit tests for BrokerageOAuthClient.
 */

import { describe, it, expect, vi } from 'vitest';
import { BrokerageOAuthClient } from '../../../src/services/tokens/oauth-client.js';
import { RefreshRejectedError, RefreshTransientError } from '../../../src/utils/errors.js';

function createClient(fetchImpl: typeof fetch, requestTimeoutMs?: number): BrokerageOAuthClient {
  return new BrokerageOAuthClient({
    clientId: 'test-client-id',
    clientSecret: 'test-client-secret',
    callbackUrl: 'https://admin.test/admin/brokerage/callback',
    baseUrl: 'https://broker.test/',
    requestTimeoutMs,
    fetchImpl,
  });
}

/** A token endpoint that never answers; only the request signal ends the call. */
function hangingFetch(): typeof fetch {
  return (_input, init) => new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) {
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('BrokerageOAuthClient', () => {
  it('builds the consent URL with client id, redirect and state', () => {
    const client = createClient(vi.fn<typeof fetch>());

    const url = new URL(client.buildAuthorizationUrl('state-123'));

    expect(url.origin + url.pathname).toBe('https://broker.test/v1/oauth/authorize');
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('client_id')).toBe('test-client-id');
    expect(url.searchParams.get('redirect_uri')).toBe('https://admin.test/admin/brokerage/callback');
    expect(url.searchParams.get('state')).toBe('state-123');
  });

  it('posts a refresh_token grant with basic auth and parses the grant', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse(200, { access_token: 'a1', refresh_token: 'r1', expires_in: 1800, token_type: 'Bearer' })
    );
    const client = createClient(fetchImpl);

    const grant = await client.exchangeRefreshToken('old-refresh');

    expect(grant).toEqual({ accessToken: 'a1', refreshToken: 'r1', expiresInSeconds: 1800 });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://broker.test/v1/oauth/token');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('grant_type=refresh_token&refresh_token=old-refresh');
    const expectedBasic = Buffer.from('test-client-id:test-client-secret').toString('base64');
    expect(init?.headers).toMatchObject({ Authorization: `Basic ${expectedBasic}` });
  });

  it('posts an authorization_code grant with the redirect uri', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse(200, { access_token: 'a1', refresh_token: 'r1', expires_in: 1800 })
    );

    await createClient(fetchImpl).exchangeAuthorizationCode('code-abc');

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(init?.body).toBe(
      'grant_type=authorization_code&code=code-abc&redirect_uri=https%3A%2F%2Fadmin.test%2Fadmin%2Fbrokerage%2Fcallback'
    );
  });

  it('classifies network failures as transient', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    await expect(createClient(fetchImpl).exchangeRefreshToken('r')).rejects.toBeInstanceOf(RefreshTransientError);
  });

  it('classifies 503 as transient and keeps the status', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('busy', { status: 503 }));

    const error = await createClient(fetchImpl).exchangeRefreshToken('r').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RefreshTransientError);
    expect(error).toMatchObject({ status: 503, recoverable: true });
  });

  it('classifies 400 invalid_grant as rejected', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(400, { error: 'invalid_grant' }));

    const error = await createClient(fetchImpl).exchangeRefreshToken('r').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RefreshRejectedError);
    expect(error).toMatchObject({ status: 400, code: 'REFRESH_REJECTED' });
  });

  it('rejects a 200 response without the expected fields', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(200, { access_token: 'a1' }));

    await expect(createClient(fetchImpl).exchangeRefreshToken('r')).rejects.toBeInstanceOf(RefreshRejectedError);
  });

  it('aborts a hung token request and classifies it as transient', async () => {
    const startedAt = Date.now();

    const error = await createClient(hangingFetch(), 50).exchangeRefreshToken('r').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RefreshTransientError);
    expect(error).toMatchObject({ message: 'OAuth token request timed out after 50ms', recoverable: true });
    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });

  it('rejects a 200 response whose body is not JSON', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>', { status: 200 }));

    await expect(createClient(fetchImpl).exchangeRefreshToken('r')).rejects.toBeInstanceOf(RefreshRejectedError);
  });
});
