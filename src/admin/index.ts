/**
 * @fileoverview Admin routes: brokerage re-authentication and dashboard.
 *
 * Served only by the admin role. A successful callback seeds the shared
 * credential with force, superseding whatever the trading replicas hold.
 *
 * Routes:
 * - GET /admin - Credential status dashboard
 * - GET /admin/brokerage/auth - Redirect to the brokerage consent page
 * - GET /admin/brokerage/callback - OAuth callback; exchanges code and seeds
 * - GET /admin/status - Credential status as JSON
 */

import { Router, type Request, type Response } from 'express';
import { AppError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import type { OAuthStateCodec } from '../services/auth/oauth-state.js';
import {
  credentialFromGrant,
  type BrokerageOAuthClient,
  type TokenGrant,
  type TokenLifecycleManager,
} from '../services/tokens/index.js';
import { credentialLabel, dashboardHtml, errorHtml, successHtml } from './pages.js';

const logger = createLogger({ domain: 'admin-reauth' });

export interface AdminRouterDeps {
  tokens: TokenLifecycleManager;
  oauth: Pick<BrokerageOAuthClient, 'buildAuthorizationUrl' | 'exchangeAuthorizationCode'>;
  stateCodec: OAuthStateCodec;
  refreshTokenLifetimeMs: number;
  now?: () => number;
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createAdminRouter(deps: AdminRouterDeps): Router {
  const router = Router();
  const now = deps.now ?? (() => Date.now());

  router.get('/admin', async (_req: Request, res: Response) => {
    try {
      res.type('html').send(dashboardHtml(await deps.tokens.describe()));
    } catch (error) {
      logger.error('admin_dashboard_failed', { error: errorMessage(error) });
      res.status(500).send(errorHtml('Could not read the credential store.'));
    }
  });

  router.get('/admin/status', async (_req: Request, res: Response) => {
    try {
      const credential = await deps.tokens.describe();
      res.json({
        service: 'brokerage-token',
        status: credentialLabel(credential),
        credential,
      });
    } catch (error) {
      logger.error('admin_status_failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'credential store unavailable' });
    }
  });

  router.get('/admin/brokerage/auth', (_req: Request, res: Response) => {
    const state = deps.stateCodec.issue(deps.tokens.accountKey);
    logger.info('reauth_started', {});
    res.redirect(deps.oauth.buildAuthorizationUrl(state));
  });

  router.get('/admin/brokerage/callback', async (req: Request, res: Response) => {
    const declined = queryString(req, 'error');
    if (declined) {
      logger.info('reauth_declined', { reason: declined });
      res.status(400).send(errorHtml('Authorization was declined at the brokerage.'));
      return;
    }

    const code = queryString(req, 'code');
    const state = queryString(req, 'state');
    if (!code || !state) {
      logger.warn('reauth_callback_rejected', { reason: 'missing_parameters', hasCode: !!code, hasState: !!state });
      res.status(400).send(errorHtml('Missing code or state parameter'));
      return;
    }

    const redeemed = deps.stateCodec.redeem(state);
    if (!redeemed || redeemed.accountKey !== deps.tokens.accountKey) {
      res.status(400).send(errorHtml('Invalid or expired link. Start the re-authentication again.'));
      return;
    }

    let grant: TokenGrant;
    try {
      grant = await deps.oauth.exchangeAuthorizationCode(code);
    } catch (error) {
      logger.error('reauth_exchange_failed', {
        error: errorMessage(error),
        errorCode: error instanceof AppError ? error.code : undefined,
      });
      res.status(502).send(errorHtml('The brokerage did not accept the authorization code. Please try again.'));
      return;
    }

    try {
      const seeded = await deps.tokens.seed(
        credentialFromGrant(grant, now(), deps.refreshTokenLifetimeMs),
        { force: true }
      );
      logger.info('reauth_completed', { version: seeded.version });
      res.send(successHtml(seeded.version));
    } catch (error) {
      logger.error('reauth_seed_failed', {
        error: errorMessage(error),
        errorCode: error instanceof AppError ? error.code : undefined,
      });
      res.status(500).send(errorHtml('Failed to store the new credential. Please try again.'));
    }
  });

  return router;
}
