/**
 * @fileoverview Brokerage OAuth endpoint client.
 *
 * Exchanges authorization codes (admin re-auth) and refresh tokens (token
 * lifecycle) for token grants. Each call makes a single attempt; retry
 * policy belongs to the caller. Failures are classified so the caller knows
 * which are worth retrying:
 * - network errors, timeouts and 408/425/429/5xx → RefreshTransientError
 * - any other non-2xx (invalid, revoked or rotated grant) → RefreshRejectedError
 */

import { RefreshRejectedError, RefreshTransientError } from '../../utils/errors.js';
import { getErrorCode, isRetryableStatus } from '../../utils/fetch-with-retry.js';

/** Token grant returned by the OAuth endpoint. */
export interface TokenGrant {
  accessToken: string;
  refreshToken: string;
  expiresInSeconds: number;
}

/**
 * The narrow contract the token lifecycle depends on. Tests substitute a
 * scripted implementation.
 */
export interface TokenExchanger {
  exchangeRefreshToken(refreshToken: string): Promise<TokenGrant>;
}

export interface BrokerageOAuthOptions {
  clientId: string;
  clientSecret: string;
  callbackUrl: string;
  /** e.g. https://api.schwabapi.com */
  baseUrl: string;
  /** Abort a token request that has not answered within this time */
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export const DEFAULT_TOKEN_REQUEST_TIMEOUT_MS = 5000;

function parseGrant(body: unknown): TokenGrant {
  if (
    typeof body === 'object' &&
    body !== null &&
    'access_token' in body &&
    'refresh_token' in body &&
    'expires_in' in body &&
    typeof body.access_token === 'string' &&
    typeof body.refresh_token === 'string' &&
    typeof body.expires_in === 'number'
  ) {
    return {
      accessToken: body.access_token,
      refreshToken: body.refresh_token,
      expiresInSeconds: body.expires_in,
    };
  }
  throw new RefreshRejectedError('OAuth endpoint returned an unexpected token response', 200);
}

export class BrokerageOAuthClient implements TokenExchanger {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: BrokerageOAuthOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private get tokenUrl(): string {
    return `${this.options.baseUrl.replace(/\/$/, '')}/v1/oauth/token`;
  }

  /**
   * URL the operator is redirected to for interactive consent.
   */
  buildAuthorizationUrl(state: string): string {
    const params = new URLSearchParams({
      response_type: 'code',
      client_id: this.options.clientId,
      redirect_uri: this.options.callbackUrl,
      state,
    });
    return `${this.options.baseUrl.replace(/\/$/, '')}/v1/oauth/authorize?${params.toString()}`;
  }

  async exchangeAuthorizationCode(code: string): Promise<TokenGrant> {
    return this.requestGrant(new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.options.callbackUrl,
    }));
  }

  async exchangeRefreshToken(refreshToken: string): Promise<TokenGrant> {
    return this.requestGrant(new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    }));
  }

  private async requestGrant(form: URLSearchParams): Promise<TokenGrant> {
    const basic = Buffer
      .from(`${this.options.clientId}:${this.options.clientSecret}`)
      .toString('base64');

    const timeoutMs = this.options.requestTimeoutMs ?? DEFAULT_TOKEN_REQUEST_TIMEOUT_MS;
    const signal = AbortSignal.timeout(timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(this.tokenUrl, {
        method: 'POST',
        headers: {
          Authorization: `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: form.toString(),
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw new RefreshTransientError(`OAuth token request timed out after ${timeoutMs}ms`);
      }
      const code = getErrorCode(error);
      throw new RefreshTransientError(
        `OAuth token request failed: ${error instanceof Error ? error.message : String(error)}${code ? ` (${code})` : ''}`
      );
    }

    if (!response.ok) {
      const detail = await response.text().catch((readError: unknown) =>
        `<unreadable body: ${readError instanceof Error ? readError.message : String(readError)}>`
      );
      const message = `OAuth token request returned HTTP ${response.status}: ${detail.slice(0, 200)}`;
      if (isRetryableStatus(response.status)) {
        throw new RefreshTransientError(message, response.status);
      }
      throw new RefreshRejectedError(message, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (signal.aborted) {
        throw new RefreshTransientError(`OAuth token request timed out after ${timeoutMs}ms`);
      }
      throw new RefreshRejectedError(
        `OAuth endpoint returned an unreadable token response: ${error instanceof Error ? error.message : String(error)}`,
        response.status
      );
    }
    return parseGrant(body);
  }
}
