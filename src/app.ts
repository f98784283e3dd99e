/**
 * @fileoverview Express app factory for both service roles.
 *
 * trading: status + signed approval decision callback.
 * admin:   status + brokerage re-authentication + approval lookups.
 *
 * Kept separate from index.ts so tests can build an app without listening.
 */

import express from 'express';
import { createAdminRouter, type AdminRouterDeps } from './admin/index.js';
import { createApprovalLookupRouter, createDecisionRouter } from './routes/approvals.js';
import { createStatusRouter } from './routes/status.js';
import type { ApprovalGate, ApprovalStore } from './services/approvals/index.js';
import type { TokenLifecycleManager } from './services/tokens/index.js';
import { createRequestId, withLogContext } from './utils/observability/index.js';

export interface TradingAppDeps {
  role: 'trading';
  tokens: TokenLifecycleManager;
  gate: ApprovalGate;
  webhookSecret: string | undefined;
  signatureToleranceMs?: number;
}

export interface AdminAppDeps extends AdminRouterDeps {
  role: 'admin';
  approvals: Pick<ApprovalStore, 'get' | 'listRecent'>;
}

export type AppDeps = TradingAppDeps | AdminAppDeps;

export function createApp(deps: AppDeps): express.Application {
  const app = express();
  app.disable('x-powered-by');

  app.use((req, _res, next) => {
    withLogContext({ requestId: createRequestId(), role: deps.role, path: req.path }, next);
  });

  if (deps.role === 'trading') {
    app.use(createStatusRouter({ role: 'trading', tokens: deps.tokens, gate: deps.gate }));
    app.use(createDecisionRouter({
      gate: deps.gate,
      webhookSecret: deps.webhookSecret,
      signatureToleranceMs: deps.signatureToleranceMs,
    }));
  } else {
    app.use(createStatusRouter({ role: 'admin', tokens: deps.tokens }));
    app.use(createAdminRouter(deps));
    app.use(createApprovalLookupRouter({ approvals: deps.approvals }));
  }

  app.use((_req, res) => {
    res.status(404).json({ error: 'not found' });
  });

  return app;
}
