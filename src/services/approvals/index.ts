/**
 * @fileoverview Approval store and gate factories.
 *
 * Singleton pattern - returns the same instances on repeated calls.
 */

import config from '../../config.js';
import { ApprovalGate } from './gate.js';
import { MemoryApprovalStore } from './memory.js';
import { SqliteApprovalStore } from './sqlite.js';
import { DiscordWebhookTransport } from './transports/discord-webhook.js';
import { LogTransport } from './transports/log.js';
import type { ApprovalStore, DecisionTransport } from './types.js';

export * from './types.js';
export { ApprovalGate } from './gate.js';
export type {
  ApprovalGateOptions,
  AuthorizationResult,
  AuthorizeOptions,
  AwaitDecisionOptions,
  RequestApprovalOptions,
} from './gate.js';
export { MemoryApprovalStore } from './memory.js';
export { SqliteApprovalStore } from './sqlite.js';
export { createApprovalSweeper } from './sweeper.js';
export { DiscordWebhookTransport, buildPendingEmbed, buildResolvedEmbed } from './transports/discord-webhook.js';
export { LogTransport } from './transports/log.js';

let storeInstance: ApprovalStore | null = null;
let gateInstance: ApprovalGate | null = null;

/**
 * Get the approval store instance.
 *
 * - 'sqlite': shares the credential database file (default)
 * - 'memory': In-memory store (for tests only)
 */
export function getApprovalStore(): ApprovalStore {
  if (storeInstance) {
    return storeInstance;
  }
  storeInstance = config.approvals.provider === 'memory'
    ? new MemoryApprovalStore()
    : new SqliteApprovalStore(config.credentials.sqlitePath);
  return storeInstance;
}

/** Discord when a webhook URL is configured, otherwise the log. */
export function createDecisionTransport(): DecisionTransport {
  if (config.discord.webhookUrl) {
    return new DiscordWebhookTransport(config.discord.webhookUrl, config.baseUrl);
  }
  return new LogTransport();
}

export function getApprovalGate(): ApprovalGate {
  if (gateInstance) {
    return gateInstance;
  }
  gateInstance = new ApprovalGate({
    store: getApprovalStore(),
    transport: createDecisionTransport(),
    approvers: config.approvals.approvers,
    defaultTimeoutMs: config.approvals.defaultTimeoutMs,
    pollIntervalMs: config.approvals.pollIntervalMs,
    bypass: config.approvals.bypass,
  });
  return gateInstance;
}

/**
 * Close and reset the approval instances.
 * Useful for tests to get a fresh store.
 */
export function resetApprovalGate(): void {
  if (storeInstance instanceof SqliteApprovalStore) {
    storeInstance.close();
  }
  storeInstance = null;
  gateInstance = null;
}
