/**
 * @fileoverview One-time OAuth state nonces for the admin re-auth flow.
 *
 * A callback URL can only be redeemed once; replays and stale links fail.
 */

import type Database from 'better-sqlite3';
import config from '../../config.js';
import { openDatabase } from '../storage/sqlite.js';

export interface NonceStore {
  register(nonce: string, expiresAt: number): void;
  /** Single-use: returns false if missing, expired or already consumed. */
  consume(nonce: string, now: number): boolean;
  close(): void;
}

export class MemoryNonceStore implements NonceStore {
  private readonly map = new Map<string, number>();

  register(nonce: string, expiresAt: number): void {
    this.map.set(nonce, expiresAt);
  }

  consume(nonce: string, now: number): boolean {
    for (const [key, expiresAt] of this.map.entries()) {
      if (expiresAt < now) this.map.delete(key);
    }
    return this.map.delete(nonce);
  }

  close(): void {
    this.map.clear();
  }
}

export class SqliteNonceStore implements NonceStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS oauth_state_nonces (
        nonce TEXT PRIMARY KEY,
        expires_at INTEGER NOT NULL,
        created_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_oauth_state_nonces_expires
        ON oauth_state_nonces(expires_at);
    `);
  }

  register(nonce: string, expiresAt: number): void {
    this.db
      .prepare(
        `INSERT INTO oauth_state_nonces (nonce, expires_at, created_at)
         VALUES (?, ?, ?)
         ON CONFLICT(nonce) DO UPDATE SET expires_at = excluded.expires_at`
      )
      .run(nonce, expiresAt, Date.now());
  }

  consume(nonce: string, now: number): boolean {
    this.db.prepare('DELETE FROM oauth_state_nonces WHERE expires_at < ?').run(now);
    // Deleting is the redemption; a concurrent second callback sees changes = 0.
    const result = this.db
      .prepare('DELETE FROM oauth_state_nonces WHERE nonce = ? AND expires_at >= ?')
      .run(nonce, now);
    return result.changes === 1;
  }

  close(): void {
    this.db.close();
  }
}

let store: NonceStore | null = null;

export function getNonceStore(): NonceStore {
  if (store) return store;

  store = config.credentials.provider === 'memory'
    ? new MemoryNonceStore()
    : new SqliteNonceStore(config.credentials.sqlitePath);
  return store;
}

/**
 * Close and reset store.
 */
export function closeNonceStore(): void {
  if (!store) return;
  store.close();
  store = null;
}
