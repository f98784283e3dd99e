/**
 * @fileoverview Approval request model, store contract and decision transport contract.
 */

export const APPROVAL_STATUSES = ['PENDING', 'APPROVED', 'DENIED', 'EXPIRED', 'CANCELLED'] as const;

export type ApprovalStatus = (typeof APPROVAL_STATUSES)[number];

export type TerminalStatus = Exclude<ApprovalStatus, 'PENDING'>;

/** What a human decides through the transport. */
export type Decision = 'approve' | 'deny';

/**
 * Serializable description of the mutating action awaiting approval.
 * Opaque to the gate: only rendered for the human.
 */
export interface ActionDescriptor {
  tool: string;
  arguments: Record<string, unknown>;
}

export interface ApprovalRequest {
  id: string;
  action: ActionDescriptor;
  requestedBy: string;
  createdAt: number;
  expiresAt: number;
  status: ApprovalStatus;
  decidedBy: string | null;
  decidedAt: number | null;
}

export function isApprovalStatus(value: unknown): value is ApprovalStatus {
  return typeof value === 'string' && APPROVAL_STATUSES.some((status) => status === value);
}

export function isTerminal(status: ApprovalStatus): status is TerminalStatus {
  return status !== 'PENDING';
}

/**
 * Durable persistence for approval requests.
 *
 * compareAndSwapStatus is the only mutation after create; it succeeds only
 * if the row is still in `expected`, which makes every terminal transition
 * happen exactly once no matter how many replicas race.
 */
export interface ApprovalStore {
  create(request: ApprovalRequest): Promise<void>;
  get(id: string): Promise<ApprovalRequest | null>;
  compareAndSwapStatus(
    id: string,
    expected: ApprovalStatus,
    next: TerminalStatus,
    decidedBy: string | null,
    decidedAt: number
  ): Promise<boolean>;
  /** PENDING requests whose expiresAt is at or before `now`. */
  listExpiredPending(now: number, limit: number): Promise<ApprovalRequest[]>;
  /** Most recent first. */
  listRecent(limit: number): Promise<ApprovalRequest[]>;
}

/**
 * Out-of-band channel that shows a request to a human. Decisions come back
 * through ApprovalGate.recordDecision (e.g. the signed webhook route).
 */
export interface DecisionTransport {
  readonly name: string;
  notify(request: ApprovalRequest): Promise<void>;
  /** Optional follow-up once the request reaches a terminal status. */
  resolved?(request: ApprovalRequest): Promise<void>;
}
