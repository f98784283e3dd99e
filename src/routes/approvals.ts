/**
 * @fileoverview Approval routes: decision callback and read-only lookups.
 *
 * The decision callback is how a transport (chat bot, shortcut, script)
 * reports a human's answer. It is served by the trading role. Requests carry
 *
 *   X-Approval-Timestamp: <ms since epoch>
 *   X-Approval-Signature: sha256=<hex HMAC-SHA256 of "<id>.<timestamp>.<raw body>">
 *
 * so a signature is valid for one approval request and a bounded window.
 *
 * Lookups expose stored action arguments and are served by the admin role only.
 */

import express, { Router, type Request, type Response } from 'express';
import crypto from 'crypto';
import { ApprovalNotFoundError, UnauthorizedApproverError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import type { ApprovalGate, ApprovalStore, Decision } from '../services/approvals/index.js';
import { sendError } from './http-errors.js';

const webhookLogger = createLogger({ domain: 'approval-webhook' });
const logger = createLogger({ domain: 'approvals-api' });

export const SIGNATURE_HEADER = 'x-approval-signature';
export const TIMESTAMP_HEADER = 'x-approval-timestamp';
export const DEFAULT_SIGNATURE_TOLERANCE_MS = 5 * 60 * 1000;
const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 100;

interface DecisionBody {
  id: string;
  decision: Decision;
  decidedBy: string;
}

/** Compute the signature header value for one decision callback. */
export function signDecision(
  secret: string,
  approvalId: string,
  timestamp: string,
  rawBody: string | Buffer
): string {
  const digest = crypto
    .createHmac('sha256', secret)
    .update(`${approvalId}.${timestamp}.`)
    .update(rawBody)
    .digest('hex');
  return `sha256=${digest}`;
}

export type SignatureCheck = 'ok' | 'missing_timestamp' | 'stale_timestamp' | 'bad_signature';

export function verifyDecisionSignature(params: {
  secret: string;
  approvalId: string;
  rawBody: Buffer;
  timestamp: string | undefined;
  signature: string | undefined;
  now: number;
  toleranceMs: number;
}): SignatureCheck {
  const { timestamp, signature } = params;
  if (!timestamp || !/^\d+$/.test(timestamp)) {
    return 'missing_timestamp';
  }
  if (Math.abs(params.now - Number(timestamp)) > params.toleranceMs) {
    return 'stale_timestamp';
  }
  if (!signature) {
    return 'bad_signature';
  }
  const expected = Buffer.from(signDecision(params.secret, params.approvalId, timestamp, params.rawBody));
  const provided = Buffer.from(signature);
  if (expected.length !== provided.length || !crypto.timingSafeEqual(expected, provided)) {
    return 'bad_signature';
  }
  return 'ok';
}

function parseDecisionBody(rawBody: Buffer): DecisionBody | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString('utf8'));
  } catch {
    return null;
  }
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'id' in parsed &&
    'decision' in parsed &&
    'decidedBy' in parsed &&
    typeof parsed.id === 'string' &&
    (parsed.decision === 'approve' || parsed.decision === 'deny') &&
    typeof parsed.decidedBy === 'string' &&
    parsed.decidedBy.trim().length > 0
  ) {
    return { id: parsed.id, decision: parsed.decision, decidedBy: parsed.decidedBy.trim() };
  }
  return null;
}

function parseLimit(raw: unknown): number {
  const parsed = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (!Number.isInteger(parsed) || parsed < 1) return DEFAULT_LIST_LIMIT;
  return Math.min(parsed, MAX_LIST_LIMIT);
}

export interface DecisionRouterDeps {
  gate: ApprovalGate;
  /** Unset only in bypass mode, where the callback is disabled. */
  webhookSecret: string | undefined;
  /** How far X-Approval-Timestamp may drift from the server clock. */
  signatureToleranceMs?: number;
}

export function createDecisionRouter(deps: DecisionRouterDeps): Router {
  const router = Router();
  const toleranceMs = deps.signatureToleranceMs ?? DEFAULT_SIGNATURE_TOLERANCE_MS;

  /**
   * POST /approvals/:id/decision
   * Body: { "id": "<approval id>", "decision": "approve" | "deny", "decidedBy": "<approver id>" }
   */
  router.post(
    '/approvals/:id/decision',
    express.raw({ type: '*/*', limit: '16kb' }),
    async (req: Request, res: Response) => {
      const approvalId = req.params.id;
      const secret = deps.webhookSecret;
      if (!secret) {
        res.status(503).json({ error: 'decision callback disabled' });
        return;
      }

      const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const check = verifyDecisionSignature({
        secret,
        approvalId,
        rawBody,
        timestamp: req.get(TIMESTAMP_HEADER),
        signature: req.get(SIGNATURE_HEADER),
        now: Date.now(),
        toleranceMs,
      });
      if (check !== 'ok') {
        webhookLogger.warn('decision_signature_rejected', { approvalId, reason: check });
        res.status(401).json({ error: 'invalid signature' });
        return;
      }

      const body = parseDecisionBody(rawBody);
      if (!body) {
        res.status(400).json({
          error: 'body must be {"id":string,"decision":"approve"|"deny","decidedBy":string}',
        });
        return;
      }
      if (body.id !== approvalId) {
        webhookLogger.warn('decision_id_mismatch', { approvalId });
        res.status(400).json({ error: 'body id does not match the request path' });
        return;
      }

      try {
        const decided = await deps.gate.recordDecision(approvalId, body.decision, body.decidedBy);
        webhookLogger.info('decision_recorded', {
          approvalId,
          decision: body.decision,
          decidedBy: body.decidedBy,
          status: decided.status,
        });
        res.json({
          id: decided.id,
          status: decided.status,
          decidedBy: decided.decidedBy,
          decidedAt: decided.decidedAt,
        });
      } catch (error) {
        if (error instanceof UnauthorizedApproverError) {
          // Nothing about the request is echoed to an unknown decider.
          res.status(403).json({ error: 'decision rejected' });
          return;
        }
        sendError(res, error, webhookLogger);
      }
    }
  );

  return router;
}

export interface ApprovalLookupRouterDeps {
  approvals: Pick<ApprovalStore, 'get' | 'listRecent'>;
}

export function createApprovalLookupRouter(deps: ApprovalLookupRouterDeps): Router {
  const router = Router();

  /**
   * GET /approvals/:id
   */
  router.get('/approvals/:id', async (req: Request, res: Response) => {
    try {
      const request = await deps.approvals.get(req.params.id);
      if (!request) {
        throw new ApprovalNotFoundError(req.params.id);
      }
      res.json(request);
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  /**
   * GET /approvals?limit=20
   * Most recent first.
   */
  router.get('/approvals', async (req: Request, res: Response) => {
    try {
      const approvals = await deps.approvals.listRecent(parseLimit(req.query.limit));
      res.json({ approvals });
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  return router;
}
