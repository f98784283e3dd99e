/**
 * @fileoverview Log-only decision transport.
 *
 * Used when no chat webhook is configured: the pending request is written to
 * the structured log, and an operator decides through the signed callback.
 */

import { createLogger, type AppLogger } from '../../../utils/observability/index.js';
import type { ApprovalRequest, DecisionTransport } from '../types.js';

export class LogTransport implements DecisionTransport {
  readonly name = 'log';
  private readonly logger: AppLogger;

  constructor(logger: AppLogger = createLogger()) {
    this.logger = logger.child({ domain: 'approval-transport' });
  }

  async notify(request: ApprovalRequest): Promise<void> {
    this.logger.warn('approval_pending', {
      approvalId: request.id,
      tool: request.action.tool,
      arguments: request.action.arguments,
      requestedBy: request.requestedBy,
      expiresAt: new Date(request.expiresAt).toISOString(),
    });
  }

  async resolved(request: ApprovalRequest): Promise<void> {
    this.logger.info('approval_closed', {
      approvalId: request.id,
      status: request.status,
      decidedBy: request.decidedBy,
    });
  }
}
