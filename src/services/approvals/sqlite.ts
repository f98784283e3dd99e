/**
 * @fileoverview SQLite approval store.
 *
 * Lives in the same database file as the credential store so every replica
 * sees the same requests. Status transitions are single conditional UPDATEs.
 */

import type Database from 'better-sqlite3';
import { openDatabase } from '../storage/sqlite.js';
import {
  isApprovalStatus,
  type ActionDescriptor,
  type ApprovalRequest,
  type ApprovalStatus,
  type ApprovalStore,
  type TerminalStatus,
} from './types.js';

interface ApprovalRow {
  id: string;
  tool: string;
  arguments: string;
  requested_by: string;
  created_at: number;
  expires_at: number;
  status: string;
  decided_by: string | null;
  decided_at: number | null;
}

const SELECT_COLUMNS = `id, tool, arguments, requested_by, created_at, expires_at, status, decided_by, decided_at`;

function parseArguments(json: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

function rowToRequest(row: ApprovalRow): ApprovalRequest {
  if (!isApprovalStatus(row.status)) {
    throw new Error(`Approval request ${row.id} has unknown status "${row.status}"`);
  }
  const action: ActionDescriptor = { tool: row.tool, arguments: parseArguments(row.arguments) };
  return {
    id: row.id,
    action,
    requestedBy: row.requested_by,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    status: row.status,
    decidedBy: row.decided_by,
    decidedAt: row.decided_at,
  };
}

export class SqliteApprovalStore implements ApprovalStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS approval_requests (
        id TEXT PRIMARY KEY,
        tool TEXT NOT NULL,
        arguments TEXT NOT NULL,
        requested_by TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL,
        status TEXT NOT NULL,
        decided_by TEXT,
        decided_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_approval_requests_pending
        ON approval_requests(status, expires_at);
      CREATE INDEX IF NOT EXISTS idx_approval_requests_created
        ON approval_requests(created_at);
    `);
  }

  async create(request: ApprovalRequest): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO approval_requests
           (id, tool, arguments, requested_by, created_at, expires_at, status, decided_by, decided_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        request.id,
        request.action.tool,
        JSON.stringify(request.action.arguments),
        request.requestedBy,
        request.createdAt,
        request.expiresAt,
        request.status,
        request.decidedBy,
        request.decidedAt
      );
  }

  async get(id: string): Promise<ApprovalRequest | null> {
    const row = this.db
      .prepare<[string], ApprovalRow>(`SELECT ${SELECT_COLUMNS} FROM approval_requests WHERE id = ?`)
      .get(id);
    return row ? rowToRequest(row) : null;
  }

  async compareAndSwapStatus(
    id: string,
    expected: ApprovalStatus,
    next: TerminalStatus,
    decidedBy: string | null,
    decidedAt: number
  ): Promise<boolean> {
    const result = this.db
      .prepare(
        `UPDATE approval_requests SET status = ?, decided_by = ?, decided_at = ?
         WHERE id = ? AND status = ?`
      )
      .run(next, decidedBy, decidedAt, id, expected);
    return result.changes === 1;
  }

  async listExpiredPending(now: number, limit: number): Promise<ApprovalRequest[]> {
    return this.db
      .prepare<[number, number], ApprovalRow>(
        `SELECT ${SELECT_COLUMNS} FROM approval_requests
         WHERE status = 'PENDING' AND expires_at <= ?
         ORDER BY expires_at ASC LIMIT ?`
      )
      .all(now, limit)
      .map(rowToRequest);
  }

  async listRecent(limit: number): Promise<ApprovalRequest[]> {
    return this.db
      .prepare<[number], ApprovalRow>(
        `SELECT ${SELECT_COLUMNS} FROM approval_requests ORDER BY created_at DESC LIMIT ?`
      )
      .all(limit)
      .map(rowToRequest);
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}
