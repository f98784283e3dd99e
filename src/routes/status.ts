/**
 * @fileoverview Read-only health and status endpoints.
 */

import { Router, type Request, type Response } from 'express';
import type { ServiceRole } from '../config.js';
import { credentialLabel } from '../admin/pages.js';
import { createLogger } from '../utils/observability/index.js';
import type { ApprovalGate } from '../services/approvals/index.js';
import type { TokenLifecycleManager } from '../services/tokens/index.js';
import { sendError } from './http-errors.js';

const logger = createLogger({ domain: 'status' });

export interface StatusRouterDeps {
  role: ServiceRole;
  tokens: TokenLifecycleManager;
  gate?: ApprovalGate;
}

export function createStatusRouter(deps: StatusRouterDeps): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', role: deps.role, timestamp: new Date().toISOString() });
  });

  router.get('/status', async (_req: Request, res: Response) => {
    try {
      const credential = await deps.tokens.describe();
      res.json({
        role: deps.role,
        credential: { status: credentialLabel(credential), ...credential },
        approvals: deps.gate
          ? { bypass: deps.gate.bypassed, transport: deps.gate.transportName }
          : null,
      });
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  return router;
}
