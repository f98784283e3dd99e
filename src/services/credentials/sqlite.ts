/**
 * @fileoverview SQLite credential store with AES-256-GCM encryption.
 *
 * The token pair is encrypted at rest using the CREDENTIAL_ENCRYPTION_KEY,
 * each write with a fresh IV. Version, expiry and lease columns stay in
 * plaintext so conditional updates and status checks never need the key.
 */

import type Database from 'better-sqlite3';
import crypto from 'crypto';
import { openDatabase } from '../storage/sqlite.js';
import type {
  CompareAndSwapResult,
  Credential,
  CredentialInput,
  CredentialStore,
  RefreshLease,
} from './types.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;

/**
 * Database row shape for the brokerage_credentials table.
 */
interface CredentialRow {
  account_key: string;
  encrypted_data: Buffer;
  iv: Buffer;
  auth_tag: Buffer;
  issued_at: number;
  access_expires_at: number;
  refresh_expires_at: number;
  version: number;
  refresh_lease_holder: string | null;
  refresh_lease_expires_at: number | null;
  updated_at: number;
}

interface TokenPayload {
  accessToken: string;
  refreshToken: string;
}

function parseTokenPayload(json: string): TokenPayload {
  const parsed: unknown = JSON.parse(json);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'accessToken' in parsed &&
    'refreshToken' in parsed &&
    typeof parsed.accessToken === 'string' &&
    typeof parsed.refreshToken === 'string'
  ) {
    return { accessToken: parsed.accessToken, refreshToken: parsed.refreshToken };
  }
  throw new Error('Stored credential payload is malformed');
}

/**
 * SQLite credential store with AES-256-GCM encryption.
 */
export class SqliteCredentialStore implements CredentialStore {
  private db: Database.Database;
  private encryptionKey: Buffer;

  /**
   * @param dbPath Path to SQLite database file (shared by all replicas)
   * @param encryptionKey 32-byte hex string for AES-256 encryption
   */
  constructor(
    dbPath: string,
    encryptionKey: string,
    readonly accountKey: string = 'default'
  ) {
    if (!/^[0-9a-fA-F]{64}$/.test(encryptionKey)) {
      throw new Error(
        'CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string (32 bytes)'
      );
    }
    this.encryptionKey = Buffer.from(encryptionKey, 'hex');
    this.db = openDatabase(dbPath);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS brokerage_credentials (
        account_key TEXT PRIMARY KEY,
        encrypted_data BLOB NOT NULL,
        iv BLOB NOT NULL,
        auth_tag BLOB NOT NULL,
        issued_at INTEGER NOT NULL,
        access_expires_at INTEGER NOT NULL,
        refresh_expires_at INTEGER NOT NULL,
        version INTEGER NOT NULL,
        refresh_lease_holder TEXT,
        refresh_lease_expires_at INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
  }

  private encrypt(data: string): { encrypted: Buffer; iv: Buffer; authTag: Buffer } {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.encryptionKey, iv);
    const encrypted = Buffer.concat([
      cipher.update(data, 'utf8'),
      cipher.final(),
    ]);
    return { encrypted, iv, authTag: cipher.getAuthTag() };
  }

  private decrypt(encrypted: Buffer, iv: Buffer, authTag: Buffer): string {
    const decipher = crypto.createDecipheriv(ALGORITHM, this.encryptionKey, iv);
    decipher.setAuthTag(authTag);
    return Buffer.concat([
      decipher.update(encrypted),
      decipher.final(),
    ]).toString('utf8');
  }

  private readRow(): CredentialRow | undefined {
    return this.db
      .prepare<[string], CredentialRow>(
        `SELECT account_key, encrypted_data, iv, auth_tag, issued_at, access_expires_at,
                refresh_expires_at, version, refresh_lease_holder, refresh_lease_expires_at, updated_at
         FROM brokerage_credentials WHERE account_key = ?`
      )
      .get(this.accountKey);
  }

  private rowToCredential(row: CredentialRow): Credential {
    let tokens: TokenPayload;
    try {
      tokens = parseTokenPayload(this.decrypt(row.encrypted_data, row.iv, row.auth_tag));
    } catch (error) {
      throw new Error(
        `Stored credential for account "${row.account_key}" could not be decrypted; check CREDENTIAL_ENCRYPTION_KEY`,
        { cause: error }
      );
    }

    return {
      accountKey: row.account_key,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      issuedAt: row.issued_at,
      accessExpiresAt: row.access_expires_at,
      refreshExpiresAt: row.refresh_expires_at,
      version: row.version,
      updatedAt: row.updated_at,
    };
  }

  async load(): Promise<Credential | null> {
    const row = this.readRow();
    return row ? this.rowToCredential(row) : null;
  }

  async compareAndSwap(
    expectedVersion: number,
    next: CredentialInput
  ): Promise<CompareAndSwapResult> {
    const payload: TokenPayload = {
      accessToken: next.accessToken,
      refreshToken: next.refreshToken,
    };
    const { encrypted, iv, authTag } = this.encrypt(JSON.stringify(payload));
    const now = Date.now();

    // Each statement is atomic in SQLite; the WHERE / OR IGNORE clause is the
    // optimistic concurrency check.
    const result = expectedVersion === 0
      ? this.db
        .prepare(
          `INSERT OR IGNORE INTO brokerage_credentials
             (account_key, encrypted_data, iv, auth_tag, issued_at, access_expires_at,
              refresh_expires_at, version, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`
        )
        .run(
          this.accountKey, encrypted, iv, authTag,
          next.issuedAt, next.accessExpiresAt, next.refreshExpiresAt, now, now
        )
      : this.db
        .prepare(
          `UPDATE brokerage_credentials SET
             encrypted_data = ?, iv = ?, auth_tag = ?,
             issued_at = ?, access_expires_at = ?, refresh_expires_at = ?,
             version = version + 1,
             refresh_lease_holder = NULL, refresh_lease_expires_at = NULL,
             updated_at = ?
           WHERE account_key = ? AND version = ?`
        )
        .run(
          encrypted, iv, authTag,
          next.issuedAt, next.accessExpiresAt, next.refreshExpiresAt,
          now, this.accountKey, expectedVersion
        );

    if (result.changes === 1) {
      return {
        ok: true,
        credential: {
          ...next,
          accountKey: this.accountKey,
          version: expectedVersion + 1,
          updatedAt: now,
        },
      };
    }
    return { ok: false, current: await this.load() };
  }

  async claimRefreshLease(
    expectedVersion: number,
    holder: string,
    leaseExpiresAt: number,
    now: number
  ): Promise<boolean> {
    const result = this.db
      .prepare(
        `UPDATE brokerage_credentials SET
           refresh_lease_holder = ?, refresh_lease_expires_at = ?
         WHERE account_key = ? AND version = ?
           AND (refresh_lease_holder IS NULL
                OR refresh_lease_holder = ?
                OR refresh_lease_expires_at <= ?)`
      )
      .run(holder, leaseExpiresAt, this.accountKey, expectedVersion, holder, now);
    return result.changes === 1;
  }

  async releaseRefreshLease(holder: string): Promise<void> {
    this.db
      .prepare(
        `UPDATE brokerage_credentials SET
           refresh_lease_holder = NULL, refresh_lease_expires_at = NULL
         WHERE account_key = ? AND refresh_lease_holder = ?`
      )
      .run(this.accountKey, holder);
  }

  async currentLease(): Promise<RefreshLease | null> {
    const row = this.readRow();
    if (!row || row.refresh_lease_holder === null || row.refresh_lease_expires_at === null) {
      return null;
    }
    return { holder: row.refresh_lease_holder, expiresAt: row.refresh_lease_expires_at };
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}
