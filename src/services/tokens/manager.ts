/**
 * @fileoverview Token lifecycle manager for the shared brokerage credential.
 *
 * Serves unexpired access tokens to every brokerage call and refreshes the
 * credential before it lapses. Any number of replicas (trading and admin
 * services) may run a manager against the same store; coordination happens
 * only through the store's conditional writes:
 *
 * 1. A replica that sees a stale token claims the refresh lease at the
 *    version it read. Only the lease holder talks to the OAuth endpoint, so
 *    a rotate-on-use refresh token is consumed at most once.
 * 2. Replicas that fail to claim wait until the version advances and adopt
 *    the winner's credential, without an exchange of their own.
 * 3. The holder persists with compareAndSwap(version). If the lease lapsed
 *    and someone else wrote first, the write is rejected and the holder
 *    adopts the stored credential instead.
 *
 * Every exchange is bounded by the client's request timeout, and the holder
 * does not start a retry that could outlast its lease.
 *
 * State per account: UNSEEDED → LIVE → (REFRESHING) → LIVE → … → REFRESH_EXPIRED.
 * REFRESHING is the lease; callers only ever see a token or an error.
 */

import crypto from 'crypto';
import os from 'os';
import {
  AlreadySeededError,
  AppError,
  CredentialUnavailableError,
  RefreshTokenExpiredError,
  RefreshTransientError,
  errorMessage,
} from '../../utils/errors.js';
import { delayFor, sleep as defaultSleep } from '../../utils/fetch-with-retry.js';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import type { Credential, CredentialInput, CredentialStore } from '../credentials/types.js';
import type { TokenExchanger, TokenGrant } from './oauth-client.js';

export interface TokenLifecycleOptions {
  store: CredentialStore;
  exchanger: TokenExchanger;
  /** Refresh when the access token has this much life left or less */
  refreshMarginMs: number;
  /** How long a loaded credential is trusted before re-reading the store */
  cacheTtlMs: number;
  /** Reflected lifetime of a newly issued refresh token */
  refreshTokenLifetimeMs: number;
  /** Backoff between transient OAuth failures; attempts = delays + 1 */
  retryDelaysMs: readonly number[];
  leaseMs: number;
  leasePollMs: number;
  /** Upper bound on one OAuth exchange (enforced by the exchanger) */
  exchangeTimeoutMs?: number;
  /** Status reports flag the refresh token when less than this remains */
  refreshWarningMs?: number;
  /** Identity of this replica in the refresh lease */
  holderId?: string;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: AppLogger;
}

export interface SeedOptions {
  /** Replace a credential whose refresh token is still valid */
  force?: boolean;
}

/** Read-only freshness report for status endpoints. Never contains secrets. */
export type CredentialStatus =
  | { accountKey: string; exists: false }
  | {
    accountKey: string;
    exists: true;
    version: number;
    issuedAt: number;
    accessExpiresAt: number;
    refreshExpiresAt: number;
    accessTokenValid: boolean;
    refreshTokenExpired: boolean;
    refreshTokenExpiresSoon: boolean;
    refreshing: boolean;
    updatedAt: number;
  };

const MAX_SEED_ATTEMPTS = 3;

/**
 * Build a credential from a fresh token grant.
 *
 * When the endpoint hands back the same refresh token, its original expiry
 * carries over; a rotated refresh token starts a new lifetime.
 */
export function credentialFromGrant(
  grant: TokenGrant,
  now: number,
  refreshTokenLifetimeMs: number,
  previous?: Pick<Credential, 'refreshToken' | 'refreshExpiresAt'>
): CredentialInput {
  const sameRefreshToken = previous !== undefined && previous.refreshToken === grant.refreshToken;
  return {
    accessToken: grant.accessToken,
    refreshToken: grant.refreshToken,
    issuedAt: now,
    accessExpiresAt: now + grant.expiresInSeconds * 1000,
    refreshExpiresAt: sameRefreshToken && previous
      ? previous.refreshExpiresAt
      : now + refreshTokenLifetimeMs,
  };
}

function defaultHolderId(): string {
  return `${os.hostname()}:${process.pid}:${crypto.randomUUID().slice(0, 8)}`;
}

export class TokenLifecycleManager {
  private readonly store: CredentialStore;
  private readonly exchanger: TokenExchanger;
  private readonly holderId: string;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: AppLogger;

  private cached: { credential: Credential; loadedAt: number } | null = null;
  private inFlightRefresh: Promise<Credential> | null = null;

  constructor(private readonly options: TokenLifecycleOptions) {
    this.store = options.store;
    this.exchanger = options.exchanger;
    this.holderId = options.holderId ?? defaultHolderId();
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = (options.logger ?? createLogger()).child({
      domain: 'token-lifecycle',
      accountKey: options.store.accountKey,
    });
  }

  get accountKey(): string {
    return this.store.accountKey;
  }

  /**
   * Return an access token with more than the safety margin of life left,
   * refreshing first when needed.
   *
   * @throws CredentialUnavailableError before the first admin seed
   * @throws RefreshTokenExpiredError once the refresh token has lapsed
   */
  async getValidToken(): Promise<string> {
    const now = this.now();
    const cached = this.cached;
    if (
      cached &&
      now - cached.loadedAt < this.options.cacheTtlMs &&
      this.isAccessFresh(cached.credential, now)
    ) {
      this.assertRefreshable(cached.credential, now);
      return cached.credential.accessToken;
    }

    const stored = await this.loadUsable();
    if (this.isAccessFresh(stored, this.now())) {
      return stored.accessToken;
    }

    const refreshed = await this.refresh(stored.version);
    return refreshed.accessToken;
  }

  /**
   * Exchange the refresh token for a new pair and persist it.
   *
   * Concurrent calls in this process share one refresh. Across processes,
   * a caller that finds the stored version already past `observedVersion`
   * (or loses the lease) adopts the stored credential instead of exchanging.
   * The refresh is not tied to any caller: once started it runs to
   * completion and is persisted even if every waiter has gone away.
   */
  refresh(observedVersion?: number): Promise<Credential> {
    if (!this.inFlightRefresh) {
      this.inFlightRefresh = this.refreshOnce(observedVersion).finally(() => {
        this.inFlightRefresh = null;
      });
    }
    return this.inFlightRefresh;
  }

  /**
   * Install a credential obtained through the interactive OAuth flow.
   *
   * @throws AlreadySeededError if a credential with a live refresh token
   *   exists and `force` is not set
   */
  async seed(credential: CredentialInput, options: SeedOptions = {}): Promise<Credential> {
    for (let attempt = 1; attempt <= MAX_SEED_ATTEMPTS; attempt++) {
      const current = await this.store.load();
      if (current && !options.force && current.refreshExpiresAt > this.now()) {
        throw new AlreadySeededError(this.accountKey, current.version);
      }

      const result = await this.store.compareAndSwap(current?.version ?? 0, credential);
      if (result.ok) {
        this.remember(result.credential);
        this.logger.info('credential_seeded', {
          version: result.credential.version,
          replaced: current !== null,
          forced: options.force === true,
          refreshExpiresAt: new Date(result.credential.refreshExpiresAt).toISOString(),
        });
        return result.credential;
      }

      this.logger.warn('credential_seed_conflict', { attempt });
    }

    throw new AppError(
      `Could not seed credential for account "${this.accountKey}" after ${MAX_SEED_ATTEMPTS} concurrent-write conflicts`,
      'CREDENTIAL_WRITE_CONFLICT',
      true
    );
  }

  /**
   * Report credential freshness without exposing tokens.
   */
  async describe(): Promise<CredentialStatus> {
    const credential = await this.store.load();
    if (!credential) {
      return { accountKey: this.accountKey, exists: false };
    }

    const now = this.now();
    const lease = await this.store.currentLease();
    const warningMs = this.options.refreshWarningMs ?? 0;
    const refreshTokenExpired = credential.refreshExpiresAt <= now;
    return {
      accountKey: this.accountKey,
      exists: true,
      version: credential.version,
      issuedAt: credential.issuedAt,
      accessExpiresAt: credential.accessExpiresAt,
      refreshExpiresAt: credential.refreshExpiresAt,
      accessTokenValid: credential.accessExpiresAt > now,
      refreshTokenExpired,
      refreshTokenExpiresSoon: !refreshTokenExpired && credential.refreshExpiresAt - now <= warningMs,
      refreshing: lease !== null && lease.expiresAt > now,
      updatedAt: credential.updatedAt,
    };
  }

  /** Drop the process-local cache so the next call re-reads the store. */
  invalidateCache(): void {
    this.cached = null;
  }

  private isAccessFresh(credential: Credential, now: number): boolean {
    return credential.accessExpiresAt - now > this.options.refreshMarginMs;
  }

  private assertRefreshable(credential: Credential, now: number): void {
    if (credential.refreshExpiresAt <= now) {
      throw new RefreshTokenExpiredError(this.accountKey, credential.refreshExpiresAt);
    }
  }

  private remember(credential: Credential): void {
    this.cached = { credential, loadedAt: this.now() };
  }

  private async loadUsable(): Promise<Credential> {
    const credential = await this.store.load();
    if (!credential) {
      this.cached = null;
      throw new CredentialUnavailableError(this.accountKey);
    }
    this.assertRefreshable(credential, this.now());
    this.remember(credential);
    return credential;
  }

  private async refreshOnce(observedVersion?: number): Promise<Credential> {
    let basis = observedVersion;

    for (;;) {
      const current = await this.loadUsable();
      basis ??= current.version;

      // Check-then-refresh: someone already moved past what the caller saw.
      if (current.version > basis) {
        this.logger.debug('token_refresh_adopted', { version: current.version });
        return current;
      }

      const now = this.now();
      if (this.isAccessFresh(current, now)) {
        this.logger.debug('token_refresh_not_needed', { version: current.version });
        return current;
      }

      const leaseExpiresAt = now + this.options.leaseMs;
      const claimed = await this.store.claimRefreshLease(
        current.version,
        this.holderId,
        leaseExpiresAt,
        now
      );

      if (!claimed) {
        const adopted = await this.waitForRefresh(current.version);
        if (adopted) {
          return adopted;
        }
        // Lease lapsed without a write; compete again from the same basis.
        continue;
      }

      return this.refreshAsLeaseHolder(current, leaseExpiresAt);
    }
  }

  private async refreshAsLeaseHolder(current: Credential, leaseExpiresAt: number): Promise<Credential> {
    const startedAt = this.now();
    let grant: TokenGrant;
    try {
      grant = await this.exchangeWithRetry(current.refreshToken, leaseExpiresAt);
    } catch (error) {
      await this.store.releaseRefreshLease(this.holderId);
      const latest = await this.store.load();
      if (latest && latest.version > current.version) {
        // Another replica rotated the token while our lease had lapsed.
        this.remember(latest);
        return latest;
      }
      this.logger.error('token_refresh_failed', {
        error: errorMessage(error),
        errorCode: error instanceof AppError ? error.code : undefined,
        version: current.version,
      });
      throw error;
    }

    const next = credentialFromGrant(
      grant,
      this.now(),
      this.options.refreshTokenLifetimeMs,
      current
    );
    const result = await this.store.compareAndSwap(current.version, next);

    if (result.ok) {
      this.remember(result.credential);
      this.logger.info('token_refreshed', {
        version: result.credential.version,
        durationMs: this.now() - startedAt,
        accessExpiresAt: new Date(result.credential.accessExpiresAt).toISOString(),
      });
      return result.credential;
    }

    this.logger.warn('token_refresh_race_lost', {
      expectedVersion: current.version,
      storedVersion: result.current?.version,
    });
    if (!result.current) {
      throw new CredentialUnavailableError(this.accountKey);
    }
    this.remember(result.current);
    return result.current;
  }

  /**
   * Wait for the lease holder to publish a newer version.
   * Returns null if the lease lapses (or is released) without a write.
   */
  private async waitForRefresh(basisVersion: number): Promise<Credential | null> {
    for (;;) {
      await this.sleep(this.options.leasePollMs);

      const latest = await this.loadUsable();
      if (latest.version > basisVersion) {
        this.logger.debug('token_refresh_adopted', { version: latest.version });
        return latest;
      }

      const lease = await this.store.currentLease();
      if (!lease || lease.expiresAt <= this.now()) {
        return null;
      }
    }
  }

  private async exchangeWithRetry(refreshToken: string, leaseExpiresAt: number): Promise<TokenGrant> {
    const delays = this.options.retryDelaysMs;
    const totalAttempts = delays.length + 1;
    const exchangeTimeoutMs = this.options.exchangeTimeoutMs ?? 0;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.exchanger.exchangeRefreshToken(refreshToken);
      } catch (error) {
        if (!(error instanceof RefreshTransientError) || attempt >= totalAttempts) {
          throw error;
        }
        const waitMs = delayFor(attempt, delays);
        // Another replica may claim the lease once it lapses.
        if (this.now() + waitMs + exchangeTimeoutMs >= leaseExpiresAt) {
          this.logger.warn('token_refresh_retry_abandoned', {
            error: error.message,
            attempt,
            leaseRemainingMs: leaseExpiresAt - this.now(),
          });
          throw error;
        }
        this.logger.warn('token_refresh_retry', {
          error: error.message,
          attempt,
          totalAttempts,
          retryInMs: waitMs,
        });
        await this.sleep(waitMs);
      }
    }
  }
}
