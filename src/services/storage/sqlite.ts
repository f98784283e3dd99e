/**
 * @fileoverview Shared SQLite connection setup.
 *
 * Every replica opens the same database file. WAL mode plus a busy timeout
 * lets concurrent processes read while one writes; correctness across
 * replicas comes from the conditional writes in each store, not from locks.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

const BUSY_TIMEOUT_MS = 5000;

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  return db;
}
