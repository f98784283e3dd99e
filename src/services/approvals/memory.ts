/**
 * @fileoverview In-memory approval store for testing.
 */

import type { ApprovalRequest, ApprovalStatus, ApprovalStore, TerminalStatus } from './types.js';

export class MemoryApprovalStore implements ApprovalStore {
  private readonly rows = new Map<string, ApprovalRequest>();

  async create(request: ApprovalRequest): Promise<void> {
    if (this.rows.has(request.id)) {
      throw new Error(`Approval request ${request.id} already exists`);
    }
    this.rows.set(request.id, { ...request });
  }

  async get(id: string): Promise<ApprovalRequest | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async compareAndSwapStatus(
    id: string,
    expected: ApprovalStatus,
    next: TerminalStatus,
    decidedBy: string | null,
    decidedAt: number
  ): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.status !== expected) {
      return false;
    }
    this.rows.set(id, { ...row, status: next, decidedBy, decidedAt });
    return true;
  }

  async listExpiredPending(now: number, limit: number): Promise<ApprovalRequest[]> {
    return [...this.rows.values()]
      .filter((row) => row.status === 'PENDING' && row.expiresAt <= now)
      .sort((a, b) => a.expiresAt - b.expiresAt)
      .slice(0, limit)
      .map((row) => ({ ...row }));
  }

  async listRecent(limit: number): Promise<ApprovalRequest[]> {
    return [...this.rows.values()]
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit)
      .map((row) => ({ ...row }));
  }

  /** Clear all requests. Useful for test cleanup. */
  clear(): void {
    this.rows.clear();
  }
}
