/**
 * @fileoverview Typed error conditions for token lifecycle and approval gating.
 *
 * Every failure the core can surface is a distinct AppError subclass with a
 * stable `code`, so HTTP handlers and tool wrappers can branch on it without
 * matching message text.
 */

import type { ApprovalStatus } from '../services/approvals/types.js';

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

// ---------------------------------------------------------------------------
// Credential lifecycle
// ---------------------------------------------------------------------------

/** No credential has been seeded yet; an operator must complete re-auth. */
export class CredentialUnavailableError extends AppError {
  constructor(public readonly accountKey: string) {
    super(
      `No brokerage credential stored for account "${accountKey}". Complete the admin re-authentication flow.`,
      'CREDENTIAL_UNAVAILABLE',
      false,
      { accountKey }
    );
    this.name = 'CredentialUnavailableError';
  }
}

/** The refresh token is past its expiry; terminal until re-auth. */
export class RefreshTokenExpiredError extends AppError {
  constructor(
    public readonly accountKey: string,
    public readonly refreshExpiresAt: number
  ) {
    super(
      `Refresh token for account "${accountKey}" expired at ${new Date(refreshExpiresAt).toISOString()}. Complete the admin re-authentication flow.`,
      'REFRESH_TOKEN_EXPIRED',
      false,
      { accountKey, refreshExpiresAt }
    );
    this.name = 'RefreshTokenExpiredError';
  }
}

/** Network or upstream availability failure talking to the OAuth endpoint. */
export class RefreshTransientError extends AppError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'REFRESH_TRANSIENT_ERROR', true, status === undefined ? undefined : { status });
    this.name = 'RefreshTransientError';
  }
}

/** The OAuth endpoint refused the grant (invalid, revoked or rotated token). */
export class RefreshRejectedError extends AppError {
  constructor(message: string, public readonly status: number) {
    super(message, 'REFRESH_REJECTED', false, { status });
    this.name = 'RefreshRejectedError';
  }
}

/** Seeding was attempted while a usable credential already exists. */
export class AlreadySeededError extends AppError {
  constructor(public readonly accountKey: string, public readonly version: number) {
    super(
      `Account "${accountKey}" already has a live credential (version ${version}); pass force to replace it`,
      'ALREADY_SEEDED',
      false,
      { accountKey, version }
    );
    this.name = 'AlreadySeededError';
  }
}

// ---------------------------------------------------------------------------
// Approval gating
// ---------------------------------------------------------------------------

export class ApprovalNotFoundError extends AppError {
  constructor(public readonly approvalId: string) {
    super(`Approval request ${approvalId} not found`, 'APPROVAL_NOT_FOUND', false, { approvalId });
    this.name = 'ApprovalNotFoundError';
  }
}

export class ApprovalExpiredError extends AppError {
  constructor(public readonly approvalId: string) {
    super(
      `Approval request ${approvalId} expired without a decision`,
      'APPROVAL_EXPIRED',
      false,
      { approvalId }
    );
    this.name = 'ApprovalExpiredError';
  }
}

export class ApprovalDeniedError extends AppError {
  constructor(public readonly approvalId: string) {
    super(`Approval request ${approvalId} was denied`, 'APPROVAL_DENIED', false, { approvalId });
    this.name = 'ApprovalDeniedError';
  }
}

export class ApprovalCancelledError extends AppError {
  constructor(public readonly approvalId: string) {
    super(
      `Approval request ${approvalId} was cancelled by the caller`,
      'APPROVAL_CANCELLED',
      false,
      { approvalId }
    );
    this.name = 'ApprovalCancelledError';
  }
}

/** A decision came from an identity that is not a configured approver. */
export class UnauthorizedApproverError extends AppError {
  constructor(public readonly approvalId: string, public readonly decidedBy: string) {
    super(
      `"${decidedBy}" is not permitted to decide approval request ${approvalId}`,
      'UNAUTHORIZED_APPROVER',
      false,
      { approvalId, decidedBy }
    );
    this.name = 'UnauthorizedApproverError';
  }
}

/** The request already reached a terminal status; the transition was a no-op. */
export class AlreadyDecidedError extends AppError {
  constructor(
    public readonly approvalId: string,
    public readonly currentStatus: ApprovalStatus
  ) {
    super(
      `Approval request ${approvalId} is already ${currentStatus}`,
      'ALREADY_DECIDED',
      false,
      { approvalId, currentStatus }
    );
    this.name = 'AlreadyDecidedError';
  }
}

/**
 * Describe an unknown thrown value for log payloads.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
