/**
 * @fileoverview Credential store interface for the shared brokerage OAuth token.
 *
 * One row per account key. Every write is version-checked so any number of
 * service replicas can share the row without a distributed lock.
 * Implementations handle encryption - callers work with plain credentials.
 */

/**
 * The token pair and its validity window. Timestamps are Unix milliseconds.
 */
export interface CredentialInput {
  accessToken: string;
  refreshToken: string;
  /** When the current access token was issued */
  issuedAt: number;
  accessExpiresAt: number;
  /** Refresh tokens expire ~7 days after issuance (brokerage policy) */
  refreshExpiresAt: number;
}

/**
 * A persisted credential. `version` increments on every successful write.
 */
export interface Credential extends CredentialInput {
  accountKey: string;
  version: number;
  updatedAt: number;
}

/** Outcome of a version-checked write. */
export type CompareAndSwapResult =
  | { ok: true; credential: Credential }
  | { ok: false; current: Credential | null };

/**
 * Holder of the refresh critical section, if any. While a lease is live only
 * its holder may exchange the refresh token.
 */
export interface RefreshLease {
  holder: string;
  expiresAt: number;
}

/**
 * Interface for credential storage backends.
 *
 * Note: Methods return Promises for interface flexibility, but the SQLite
 * implementation (better-sqlite3) is synchronous. The async signature
 * allows swapping to a networked backend without changing callers.
 */
export interface CredentialStore {
  readonly accountKey: string;

  /** Point-in-time read. Null when the account has never been seeded. */
  load(): Promise<Credential | null>;

  /**
   * Write `next` as version `expectedVersion + 1` only if the stored version
   * is still `expectedVersion` (0 means "no row yet"). Clears any lease.
   */
  compareAndSwap(expectedVersion: number, next: CredentialInput): Promise<CompareAndSwapResult>;

  /**
   * Take the refresh lease if the version is unchanged and no other holder
   * has a live lease. Does not change the version.
   */
  claimRefreshLease(
    expectedVersion: number,
    holder: string,
    leaseExpiresAt: number,
    now: number
  ): Promise<boolean>;

  /** Drop the lease if `holder` still owns it. */
  releaseRefreshLease(holder: string): Promise<void>;

  /** Current lease, for status reporting. */
  currentLease(): Promise<RefreshLease | null>;
}
