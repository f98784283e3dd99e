/**
 * @fileoverview Credential store factory.
 *
 * Returns the appropriate credential store based on configuration.
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { CredentialStore } from './types.js';
import { SqliteCredentialStore } from './sqlite.js';
import { MemoryCredentialStore } from './memory.js';

export type {
  CompareAndSwapResult,
  Credential,
  CredentialInput,
  CredentialStore,
  RefreshLease,
} from './types.js';
export { MemoryCredentialStore } from './memory.js';
export { SqliteCredentialStore } from './sqlite.js';

let instance: CredentialStore | null = null;

/**
 * Get the credential store instance.
 *
 * Returns a singleton based on CREDENTIAL_STORE_PROVIDER config:
 * - 'sqlite': SQLite with encryption (default; the file is shared by all replicas)
 * - 'memory': In-memory store (for tests only)
 */
export function getCredentialStore(): CredentialStore {
  if (instance) {
    return instance;
  }

  if (config.credentials.provider === 'memory') {
    instance = new MemoryCredentialStore(config.brokerage.accountKey);
    return instance;
  }

  if (!config.credentials.encryptionKey) {
    throw new Error(
      'CREDENTIAL_ENCRYPTION_KEY is required for sqlite credential store'
    );
  }
  instance = new SqliteCredentialStore(
    config.credentials.sqlitePath,
    config.credentials.encryptionKey,
    config.brokerage.accountKey
  );
  return instance;
}

/**
 * Close and reset the credential store instance.
 * Useful for tests to get a fresh store.
 */
export function resetCredentialStore(): void {
  if (instance instanceof SqliteCredentialStore) {
    instance.close();
  }
  instance = null;
}
