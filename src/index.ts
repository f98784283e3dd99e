/**
 * @fileoverview Server entry point.
 *
 * SERVICE_ROLE selects which surface this process exposes. Both roles share
 * the same credential store; only the trading role runs the approval gate
 * and its background expiry sweep.
 */

import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();

import { createApp, type AppDeps } from './app.js';
import { createApprovalSweeper, getApprovalGate, getApprovalStore, resetApprovalGate } from './services/approvals/index.js';
import { closeNonceStore, getNonceStore } from './services/auth/oauth-state-nonce.js';
import { OAuthStateCodec } from './services/auth/oauth-state.js';
import { resetCredentialStore } from './services/credentials/index.js';
import { getBrokerageOAuthClient, getTokenManager, resetTokenManager } from './services/tokens/index.js';
import type { Poller } from './utils/poller.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability();

const logger = createLogger({ domain: 'server', role: config.role });

const tokens = getTokenManager();
let sweeper: Poller | null = null;
let deps: AppDeps;

if (config.role === 'trading') {
  const gate = getApprovalGate();
  sweeper = createApprovalSweeper(gate, config.approvals.sweepIntervalMs);
  deps = {
    role: 'trading',
    tokens,
    gate,
    webhookSecret: config.approvals.webhookSecret,
    signatureToleranceMs: config.approvals.signatureToleranceMs,
  };
  if (gate.bypassed) {
    logger.warn('approval_bypass_active', { message: 'Mutating actions will run without human approval' });
  }
} else {
  deps = {
    role: 'admin',
    tokens,
    oauth: getBrokerageOAuthClient(),
    stateCodec: new OAuthStateCodec(config.oauth.stateEncryptionKey ?? '', getNonceStore()),
    refreshTokenLifetimeMs: config.tokens.refreshTokenLifetimeMs,
    approvals: getApprovalStore(),
  };
}

const app = createApp(deps);

const server = app.listen(config.port, () => {
  logger.info('server_started', { port: config.port, env: config.nodeEnv, baseUrl: config.baseUrl });

  // Debug: log presence of critical settings (not values)
  logger.info('config_check', {
    hasCredentialEncryptionKey: !!config.credentials.encryptionKey,
    hasOAuthStateEncryptionKey: !!config.oauth.stateEncryptionKey,
    hasWebhookSecret: !!config.approvals.webhookSecret,
    hasDiscordWebhook: !!config.discord.webhookUrl,
    approverCount: config.approvals.approvers.length,
    storeProvider: config.credentials.provider,
  });

  sweeper?.start();
});

let isShuttingDown = false;

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_started', { signal });

  // Stop background work first, waiting for an in-flight sweep
  await sweeper?.stop();

  const forceExitTimer = setTimeout(() => {
    logger.warn('shutdown_forced', { message: 'Force exiting after shutdown timeout' });
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    // Then close database connections
    resetApprovalGate();
    closeNonceStore();
    resetTokenManager();
    resetCredentialStore();
    logger.info('server_closed', {});
    process.exit(0);
  });
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
