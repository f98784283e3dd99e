/**
 * @fileoverview Human-in-the-loop approval gate for mutating brokerage actions.
 *
 * Requester side: requestApproval() persists a PENDING request and notifies
 * the transport; awaitDecision() suspends until the request turns terminal.
 * Transport side: recordDecision() applies a human's decision. The two sides
 * meet only through the store's conditional status write, so the decision
 * can land on a different replica from the one that is waiting.
 *
 * Every terminal transition (decision, timeout, cancellation, sweep) goes
 * through compareAndSwapStatus(PENDING → X); whichever writer observes
 * PENDING first wins and all others become no-ops.
 */

import crypto from 'crypto';
import {
  AlreadyDecidedError,
  AppError,
  ApprovalNotFoundError,
  UnauthorizedApproverError,
  errorMessage,
} from '../../utils/errors.js';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import {
  isTerminal,
  type ActionDescriptor,
  type ApprovalRequest,
  type ApprovalStore,
  type Decision,
  type DecisionTransport,
  type TerminalStatus,
} from './types.js';

/** setTimeout cannot schedule further out than ~24.8 days; stay well inside it. */
const MAX_TIMEOUT_MS = 24 * 60 * 60 * 1000;
const DEFAULT_SWEEP_BATCH = 100;

export interface ApprovalGateOptions {
  store: ApprovalStore;
  transport: DecisionTransport;
  /** Identities whose decisions are accepted; any one of them may decide. */
  approvers: readonly string[];
  defaultTimeoutMs: number;
  /** Fallback store poll while waiting, for decisions recorded on other replicas */
  pollIntervalMs: number;
  /** Operator switch: authorize() approves without asking anyone. */
  bypass?: boolean;
  now?: () => number;
  idFactory?: () => string;
  logger?: AppLogger;
}

export interface RequestApprovalOptions {
  requestedBy?: string;
  timeoutMs?: number;
}

export interface AwaitDecisionOptions {
  /** Aborting cancels the request (if still pending) and ends the wait. */
  signal?: AbortSignal;
}

export type AuthorizeOptions = RequestApprovalOptions & AwaitDecisionOptions;

export interface AuthorizationResult {
  status: TerminalStatus;
  /** null when the gate is bypassed and no request was recorded */
  approvalId: string | null;
  bypassed: boolean;
}

type Waiter = (status: TerminalStatus) => void;

export class ApprovalGate {
  private readonly store: ApprovalStore;
  private readonly transport: DecisionTransport;
  private readonly approvers: ReadonlySet<string>;
  private readonly now: () => number;
  private readonly idFactory: () => string;
  private readonly logger: AppLogger;
  private readonly waiters = new Map<string, Set<Waiter>>();

  constructor(private readonly options: ApprovalGateOptions) {
    this.store = options.store;
    this.transport = options.transport;
    this.approvers = new Set(options.approvers);
    this.now = options.now ?? (() => Date.now());
    this.idFactory = options.idFactory ?? (() => crypto.randomUUID());
    this.logger = (options.logger ?? createLogger()).child({ domain: 'approval-gate' });
  }

  get bypassed(): boolean {
    return this.options.bypass === true;
  }

  get transportName(): string {
    return this.transport.name;
  }

  /**
   * Persist a new PENDING request and notify the transport in the background.
   * A failed notification is logged; the request stays resolvable.
   */
  async requestApproval(
    action: ActionDescriptor,
    options: RequestApprovalOptions = {}
  ): Promise<ApprovalRequest> {
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
      throw new AppError(
        `Approval timeout must be between 1 and ${MAX_TIMEOUT_MS} ms, got ${timeoutMs}`,
        'INVALID_APPROVAL_TIMEOUT',
        false,
        { timeoutMs }
      );
    }

    const createdAt = this.now();
    const request: ApprovalRequest = {
      id: this.idFactory(),
      action,
      requestedBy: options.requestedBy ?? 'assistant',
      createdAt,
      expiresAt: createdAt + timeoutMs,
      status: 'PENDING',
      decidedBy: null,
      decidedAt: null,
    };

    await this.store.create(request);
    this.logger.info('approval_requested', {
      approvalId: request.id,
      tool: action.tool,
      requestedBy: request.requestedBy,
      timeoutMs,
    });

    void this.notify(request);
    return request;
  }

  /**
   * Wait until the request is decided, expires or is cancelled.
   *
   * Resolves with the terminal status; never rejects for DENIED/EXPIRED.
   * After an abort this always resolves CANCELLED, even if a decision
   * slipped in first, so the caller never acts on a wait it abandoned.
   *
   * @throws ApprovalNotFoundError for an unknown id
   */
  async awaitDecision(id: string, options: AwaitDecisionOptions = {}): Promise<TerminalStatus> {
    const request = await this.store.get(id);
    if (!request) {
      throw new ApprovalNotFoundError(id);
    }
    if (isTerminal(request.status)) {
      return request.status;
    }

    const { signal } = options;
    if (signal?.aborted) {
      return this.cancel(request);
    }

    return new Promise<TerminalStatus>((resolve, reject) => {
      let settled = false;

      const finish = (outcome: Promise<TerminalStatus>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        clearInterval(pollTimer);
        this.removeWaiter(id, onWake);
        signal?.removeEventListener('abort', onAbort);
        outcome.then(resolve, reject);
      };

      const onWake: Waiter = (status) => finish(Promise.resolve(status));
      const onAbort = (): void => finish(this.cancel(request));

      this.addWaiter(id, onWake);
      signal?.addEventListener('abort', onAbort, { once: true });

      const timeoutTimer = setTimeout(
        () => finish(this.expire(request)),
        Math.max(0, request.expiresAt - this.now())
      );

      const pollTimer = setInterval(() => {
        void this.pollOnce(id, onWake);
      }, this.options.pollIntervalMs);
    });
  }

  /**
   * Apply a human decision. Succeeds only while the request is PENDING.
   *
   * @throws UnauthorizedApproverError if `decidedBy` is not a configured approver
   * @throws ApprovalNotFoundError for an unknown id
   * @throws AlreadyDecidedError if the request is terminal or past its deadline
   */
  async recordDecision(id: string, decision: Decision, decidedBy: string): Promise<ApprovalRequest> {
    if (!this.approvers.has(decidedBy)) {
      this.logger.warn('approval_unauthorized_decider', { approvalId: id, decidedBy, decision });
      throw new UnauthorizedApproverError(id, decidedBy);
    }

    const request = await this.store.get(id);
    if (!request) {
      throw new ApprovalNotFoundError(id);
    }
    if (isTerminal(request.status)) {
      throw new AlreadyDecidedError(id, request.status);
    }

    // A decision after the deadline loses to the timeout even if no waiter
    // or sweeper has written EXPIRED yet.
    if (this.now() >= request.expiresAt) {
      const status = await this.expire(request);
      this.logger.info('approval_decision_too_late', { approvalId: id, decidedBy, decision, status });
      throw new AlreadyDecidedError(id, status);
    }

    const next: TerminalStatus = decision === 'approve' ? 'APPROVED' : 'DENIED';
    const decided = await this.transition(request, next, decidedBy);
    if (!decided) {
      const status = await this.readTerminalStatus(id);
      this.logger.info('approval_decision_lost_race', { approvalId: id, decidedBy, decision, status });
      throw new AlreadyDecidedError(id, status);
    }
    return decided;
  }

  /**
   * Gate an action: request approval and wait for the outcome.
   * In bypass mode nothing is recorded and APPROVED is returned at once.
   */
  async authorize(action: ActionDescriptor, options: AuthorizeOptions = {}): Promise<AuthorizationResult> {
    if (this.bypassed) {
      this.logger.warn('approval_bypassed', { tool: action.tool, requestedBy: options.requestedBy });
      return { status: 'APPROVED', approvalId: null, bypassed: true };
    }

    const request = await this.requestApproval(action, options);
    const status = await this.awaitDecision(request.id, { signal: options.signal });
    return { status, approvalId: request.id, bypassed: false };
  }

  /**
   * Expire PENDING requests past their deadline that no waiter is watching
   * (e.g. the requesting replica went away). Returns how many this call expired.
   */
  async expireStale(limit: number = DEFAULT_SWEEP_BATCH): Promise<number> {
    const stale = await this.store.listExpiredPending(this.now(), limit);
    let expired = 0;
    for (const request of stale) {
      if (await this.transition(request, 'EXPIRED', null)) {
        expired++;
      }
    }
    return expired;
  }

  private async expire(request: ApprovalRequest): Promise<TerminalStatus> {
    const expired = await this.transition(request, 'EXPIRED', null);
    return expired ? 'EXPIRED' : this.readTerminalStatus(request.id);
  }

  private async cancel(request: ApprovalRequest): Promise<TerminalStatus> {
    await this.transition(request, 'CANCELLED', null);
    return 'CANCELLED';
  }

  /**
   * Conditional PENDING → next write. On success, wakes local waiters and
   * tells the transport; returns null when another writer got there first.
   */
  private async transition(
    request: ApprovalRequest,
    next: TerminalStatus,
    decidedBy: string | null
  ): Promise<ApprovalRequest | null> {
    const decidedAt = this.now();
    const won = await this.store.compareAndSwapStatus(request.id, 'PENDING', next, decidedBy, decidedAt);
    if (!won) {
      return null;
    }

    const updated: ApprovalRequest = { ...request, status: next, decidedBy, decidedAt };
    this.logger.info('approval_resolved', {
      approvalId: request.id,
      tool: request.action.tool,
      status: next,
      decidedBy,
      durationMs: decidedAt - request.createdAt,
    });
    this.wake(request.id, next);
    void this.announceResolved(updated);
    return updated;
  }

  private async readTerminalStatus(id: string): Promise<TerminalStatus> {
    const current = await this.store.get(id);
    if (!current) {
      throw new ApprovalNotFoundError(id);
    }
    if (!isTerminal(current.status)) {
      throw new AppError(
        `Approval request ${id} is still PENDING after a rejected transition`,
        'APPROVAL_STATE_INCONSISTENT',
        true,
        { approvalId: id }
      );
    }
    return current.status;
  }

  private async pollOnce(id: string, onWake: Waiter): Promise<void> {
    try {
      const current = await this.store.get(id);
      if (current && isTerminal(current.status)) {
        onWake(current.status);
      }
    } catch (error) {
      this.logger.warn('approval_poll_failed', { approvalId: id, error: errorMessage(error) });
    }
  }

  private async notify(request: ApprovalRequest): Promise<void> {
    try {
      await this.transport.notify(request);
      this.logger.debug('approval_notified', { approvalId: request.id, transport: this.transport.name });
    } catch (error) {
      this.logger.error('approval_notify_failed', {
        approvalId: request.id,
        transport: this.transport.name,
        error: errorMessage(error),
      });
    }
  }

  private async announceResolved(request: ApprovalRequest): Promise<void> {
    if (!this.transport.resolved) return;
    try {
      await this.transport.resolved(request);
    } catch (error) {
      this.logger.warn('approval_resolution_notice_failed', {
        approvalId: request.id,
        transport: this.transport.name,
        error: errorMessage(error),
      });
    }
  }

  private addWaiter(id: string, waiter: Waiter): void {
    const set = this.waiters.get(id) ?? new Set<Waiter>();
    set.add(waiter);
    this.waiters.set(id, set);
  }

  private removeWaiter(id: string, waiter: Waiter): void {
    const set = this.waiters.get(id);
    if (!set) return;
    set.delete(waiter);
    if (set.size === 0) {
      this.waiters.delete(id);
    }
  }

  private wake(id: string, status: TerminalStatus): void {
    const set = this.waiters.get(id);
    if (!set) return;
    for (const waiter of [...set]) {
      waiter(status);
    }
  }
}
