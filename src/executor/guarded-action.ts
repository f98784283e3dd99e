/**
 * @fileoverview Calling convention for brokerage actions.
 *
 * Mutating actions go through executeGuarded(): approval first, then a
 * fresh token, then the call. Read-only actions only need a token and go
 * through withBrokerageToken().
 */

import {
  ApprovalCancelledError,
  ApprovalDeniedError,
  ApprovalExpiredError,
} from '../utils/errors.js';
import { createLogger, type AppLogger } from '../utils/observability/index.js';
import type { ApprovalGate, AuthorizeOptions } from '../services/approvals/index.js';
import type { ActionDescriptor } from '../services/approvals/types.js';

/** Anything that can hand out a currently valid access token. */
export interface TokenSource {
  getValidToken(): Promise<string>;
}

/** The actual brokerage call, given a bearer token. */
export type ActionExecutor<T> = (accessToken: string) => Promise<T>;

export interface GuardedActionDeps {
  gate: ApprovalGate;
  tokens: TokenSource;
  logger?: AppLogger;
}

export interface GuardedActionResult<T> {
  result: T;
  /** null when the gate is bypassed */
  approvalId: string | null;
}

const defaultLogger = createLogger({ domain: 'guarded-action' });

/**
 * Run a mutating brokerage action once a human has approved it.
 *
 * @throws ApprovalDeniedError, ApprovalExpiredError or ApprovalCancelledError
 *   when the request ends without approval; the executor is not called
 */
export async function executeGuarded<T>(
  action: ActionDescriptor,
  executor: ActionExecutor<T>,
  deps: GuardedActionDeps,
  options: AuthorizeOptions = {}
): Promise<GuardedActionResult<T>> {
  const logger = deps.logger ?? defaultLogger;
  const { status, approvalId, bypassed } = await deps.gate.authorize(action, options);

  // approvalId is only null in bypass mode, which always approves.
  const id = approvalId ?? 'bypass';
  switch (status) {
    case 'APPROVED':
      break;
    case 'DENIED':
      throw new ApprovalDeniedError(id);
    case 'EXPIRED':
      throw new ApprovalExpiredError(id);
    case 'CANCELLED':
      throw new ApprovalCancelledError(id);
  }

  if (options.signal?.aborted) {
    throw new ApprovalCancelledError(id);
  }

  const accessToken = await deps.tokens.getValidToken();
  logger.info('guarded_action_executing', { approvalId, tool: action.tool, bypassed });
  const result = await executor(accessToken);
  return { result, approvalId };
}

/**
 * Run a read-only brokerage call with a valid token.
 */
export async function withBrokerageToken<T>(
  tokens: TokenSource,
  executor: ActionExecutor<T>
): Promise<T> {
  return executor(await tokens.getValidToken());
}
