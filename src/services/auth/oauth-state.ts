/**
 * @fileoverview Encrypted, single-use state for the brokerage OAuth redirect.
 *
 * The state parameter is iv + authTag + AES-256-GCM ciphertext, base64url
 * encoded. It names the account being re-authorized, expires after ten
 * minutes, and carries a nonce that the callback consumes exactly once.
 */

import crypto from 'crypto';
import { createLogger } from '../../utils/observability/index.js';
import type { NonceStore } from './oauth-state-nonce.js';

const logger = createLogger({ domain: 'admin-reauth' });

const STATE_ALGORITHM = 'aes-256-gcm';
const STATE_IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
export const STATE_EXPIRY_MS = 10 * 60 * 1000;

export interface OAuthState {
  accountKey: string;
  nonce: string;
  exp: number;
}

function parseState(json: string): OAuthState | null {
  const parsed: unknown = JSON.parse(json);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'accountKey' in parsed &&
    'nonce' in parsed &&
    'exp' in parsed &&
    typeof parsed.accountKey === 'string' &&
    typeof parsed.nonce === 'string' &&
    parsed.nonce.length > 0 &&
    typeof parsed.exp === 'number'
  ) {
    return { accountKey: parsed.accountKey, nonce: parsed.nonce, exp: parsed.exp };
  }
  return null;
}

export class OAuthStateCodec {
  private readonly key: Buffer;

  constructor(
    hexKey: string,
    private readonly nonces: NonceStore,
    private readonly now: () => number = () => Date.now()
  ) {
    if (!/^[0-9a-fA-F]{64}$/.test(hexKey)) {
      throw new Error('OAUTH_STATE_ENCRYPTION_KEY must be a 64-character hex string');
    }
    this.key = Buffer.from(hexKey, 'hex');
  }

  /** Mint a state value and register its nonce. */
  issue(accountKey: string): string {
    const payload: OAuthState = {
      accountKey,
      nonce: crypto.randomBytes(16).toString('base64url'),
      exp: this.now() + STATE_EXPIRY_MS,
    };

    const iv = crypto.randomBytes(STATE_IV_LENGTH);
    const cipher = crypto.createCipheriv(STATE_ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([
      cipher.update(JSON.stringify(payload), 'utf8'),
      cipher.final(),
    ]);

    this.nonces.register(payload.nonce, payload.exp);
    return Buffer.concat([iv, cipher.getAuthTag(), encrypted]).toString('base64url');
  }

  /**
   * Decrypt, check expiry and consume the nonce.
   * @returns the state if valid and unused, otherwise null
   */
  redeem(state: string): OAuthState | null {
    let payload: OAuthState | null;
    try {
      const combined = Buffer.from(state, 'base64url');
      const iv = combined.subarray(0, STATE_IV_LENGTH);
      const authTag = combined.subarray(STATE_IV_LENGTH, STATE_IV_LENGTH + AUTH_TAG_LENGTH);
      const encrypted = combined.subarray(STATE_IV_LENGTH + AUTH_TAG_LENGTH);

      const decipher = crypto.createDecipheriv(STATE_ALGORITHM, this.key, iv);
      decipher.setAuthTag(authTag);
      payload = parseState(
        Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8')
      );
    } catch (error) {
      logger.warn('oauth_state_invalid', {
        reason: 'decrypt_failed',
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    if (!payload) {
      logger.warn('oauth_state_invalid', { reason: 'malformed' });
      return null;
    }

    const now = this.now();
    if (payload.exp < now) {
      logger.warn('oauth_state_invalid', { reason: 'expired' });
      return null;
    }
    if (!this.nonces.consume(payload.nonce, now)) {
      logger.warn('oauth_state_invalid', { reason: 'replayed' });
      return null;
    }
    return payload;
  }
}
