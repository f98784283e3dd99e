/**
 * @fileoverview In-memory credential store for testing.
 *
 * No encryption - stores credentials in plain memory. Multiple manager
 * instances sharing one MemoryCredentialStore behave like replicas sharing
 * one database row.
 */

import type {
  CompareAndSwapResult,
  Credential,
  CredentialInput,
  CredentialStore,
  RefreshLease,
} from './types.js';

export class MemoryCredentialStore implements CredentialStore {
  private row: Credential | null = null;
  private lease: RefreshLease | null = null;

  /** Number of successful writes, for assertions in tests. */
  writes = 0;

  constructor(readonly accountKey: string = 'default') {}

  async load(): Promise<Credential | null> {
    return this.row ? { ...this.row } : null;
  }

  async compareAndSwap(
    expectedVersion: number,
    next: CredentialInput
  ): Promise<CompareAndSwapResult> {
    const currentVersion = this.row?.version ?? 0;
    if (currentVersion !== expectedVersion) {
      return { ok: false, current: await this.load() };
    }

    this.row = {
      ...next,
      accountKey: this.accountKey,
      version: expectedVersion + 1,
      updatedAt: Date.now(),
    };
    this.lease = null;
    this.writes++;
    return { ok: true, credential: { ...this.row } };
  }

  async claimRefreshLease(
    expectedVersion: number,
    holder: string,
    leaseExpiresAt: number,
    now: number
  ): Promise<boolean> {
    if ((this.row?.version ?? 0) !== expectedVersion) {
      return false;
    }
    if (this.lease && this.lease.holder !== holder && this.lease.expiresAt > now) {
      return false;
    }
    this.lease = { holder, expiresAt: leaseExpiresAt };
    return true;
  }

  async releaseRefreshLease(holder: string): Promise<void> {
    if (this.lease?.holder === holder) {
      this.lease = null;
    }
  }

  async currentLease(): Promise<RefreshLease | null> {
    return this.lease ? { ...this.lease } : null;
  }

  /** Clear all state. Useful for test cleanup. */
  clear(): void {
    this.row = null;
    this.lease = null;
    this.writes = 0;
  }
}
