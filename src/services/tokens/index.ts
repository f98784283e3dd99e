/**
 * @fileoverview Token lifecycle wiring.
 *
 * Builds the process-wide TokenLifecycleManager from configuration.
 */

import config from '../../config.js';
import { getCredentialStore } from '../credentials/index.js';
import { BrokerageOAuthClient } from './oauth-client.js';
import { TokenLifecycleManager } from './manager.js';

export { TokenLifecycleManager, credentialFromGrant } from './manager.js';
export type { CredentialStatus, SeedOptions, TokenLifecycleOptions } from './manager.js';
export { BrokerageOAuthClient } from './oauth-client.js';
export type { TokenExchanger, TokenGrant } from './oauth-client.js';

let oauthClient: BrokerageOAuthClient | null = null;
let manager: TokenLifecycleManager | null = null;

export function getBrokerageOAuthClient(): BrokerageOAuthClient {
  if (oauthClient) {
    return oauthClient;
  }
  oauthClient = new BrokerageOAuthClient({
    clientId: config.brokerage.clientId ?? '',
    clientSecret: config.brokerage.clientSecret ?? '',
    callbackUrl: config.brokerage.callbackUrl,
    baseUrl: config.brokerage.baseUrl,
    requestTimeoutMs: config.tokens.refreshRequestTimeoutMs,
  });
  return oauthClient;
}

export function getTokenManager(): TokenLifecycleManager {
  if (manager) {
    return manager;
  }
  manager = new TokenLifecycleManager({
    store: getCredentialStore(),
    exchanger: getBrokerageOAuthClient(),
    refreshMarginMs: config.tokens.refreshMarginMs,
    cacheTtlMs: config.tokens.cacheTtlMs,
    refreshTokenLifetimeMs: config.tokens.refreshTokenLifetimeMs,
    retryDelaysMs: config.tokens.refreshRetryDelaysMs,
    leaseMs: config.tokens.refreshLeaseMs,
    leasePollMs: config.tokens.refreshLeasePollMs,
    exchangeTimeoutMs: config.tokens.refreshRequestTimeoutMs,
    refreshWarningMs: config.tokens.refreshWarningMs,
  });
  return manager;
}

export function resetTokenManager(): void {
  manager = null;
  oauthClient = null;
}
