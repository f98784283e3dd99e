/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. Both service
 * roles (trading and admin) read the same config; each validates only what
 * it needs.
 *
 * Policy knobs (margins, timeouts, retry delays) are explicit named values so
 * operators can tune them without code changes.
 *
 * @see .env.example for the full list of variables
 */

import 'dotenv/config';

export type ServiceRole = 'trading' | 'admin';
export type StoreProvider = 'sqlite' | 'memory';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const DAY = 24 * 60 * MINUTE;

// ---------------------------------------------------------------------------
// Config helpers (required vs optional intent is explicit)
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key] || undefined;
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional boolean env var. Accepts 1/true/yes (case-insensitive). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return defaultValue;
  return ['1', 'true', 'yes'].includes(raw.toLowerCase());
}

/** Read a comma-separated list, dropping blanks. */
function optionalList(key: string): string[] {
  return (process.env[key] ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Read a comma-separated list of integers (e.g. retry delays). */
function optionalIntList(key: string, defaultValue: number[]): number[] {
  const items = optionalList(key);
  return items.length > 0 ? items.map((item) => parseInt(item, 10)) : defaultValue;
}

function storeProvider(key: string, defaultValue: StoreProvider): StoreProvider {
  return process.env[key] === 'memory' ? 'memory' : process.env[key] === 'sqlite' ? 'sqlite' : defaultValue;
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

const role: ServiceRole = process.env.SERVICE_ROLE === 'admin' ? 'admin' : 'trading';

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 8080),
  nodeEnv: optional('NODE_ENV', 'development'),
  role,
  rawRole: optional('SERVICE_ROLE', 'trading'),
  baseUrl: optional('BASE_URL', 'http://localhost:8080'),

  /** Brokerage OAuth application */
  brokerage: {
    clientId: required('BROKERAGE_CLIENT_ID'),
    clientSecret: required('BROKERAGE_CLIENT_SECRET'),
    callbackUrl: optional('BROKERAGE_CALLBACK_URL', 'http://localhost:8080/admin/brokerage/callback'),
    baseUrl: optional('BROKERAGE_BASE_URL', 'https://api.schwabapi.com'),
    accountKey: optional('BROKERAGE_ACCOUNT_KEY', 'default'),
  },

  /** Shared durable store (credentials and approval requests) */
  credentials: {
    provider: storeProvider('CREDENTIAL_STORE_PROVIDER', 'sqlite'),
    sqlitePath: dbPath('CREDENTIAL_STORE_SQLITE_PATH', '/app/data/trading-guard.db', './data/trading-guard.db'),
    encryptionKey: required('CREDENTIAL_ENCRYPTION_KEY'),
  },

  oauth: {
    stateEncryptionKey: required('OAUTH_STATE_ENCRYPTION_KEY'),
  },

  /** Token lifecycle policy */
  tokens: {
    refreshMarginMs: optionalInt('TOKEN_REFRESH_MARGIN_MS', 60 * SECOND),
    cacheTtlMs: optionalInt('TOKEN_CACHE_TTL_MS', 5 * MINUTE),
    refreshTokenLifetimeMs: optionalInt('REFRESH_TOKEN_LIFETIME_MS', 7 * DAY),
    refreshRetryDelaysMs: optionalIntList('TOKEN_REFRESH_RETRY_DELAYS_MS', [500, 1500, 4000]),
    refreshLeaseMs: optionalInt('TOKEN_REFRESH_LEASE_MS', 30 * SECOND),
    refreshLeasePollMs: optionalInt('TOKEN_REFRESH_LEASE_POLL_MS', 250),
    refreshRequestTimeoutMs: optionalInt('TOKEN_REFRESH_REQUEST_TIMEOUT_MS', 5 * SECOND),
    /** Status pages warn when the refresh token has less than this left. */
    refreshWarningMs: optionalInt('REFRESH_TOKEN_WARNING_MS', DAY),
  },

  /** Approval gate policy */
  approvals: {
    provider: storeProvider('APPROVAL_STORE_PROVIDER', 'sqlite'),
    approvers: optionalList('APPROVAL_APPROVERS'),
    defaultTimeoutMs: optionalInt('APPROVAL_TIMEOUT_MS', 10 * MINUTE),
    pollIntervalMs: optionalInt('APPROVAL_POLL_INTERVAL_MS', 2 * SECOND),
    sweepIntervalMs: optionalInt('APPROVAL_SWEEP_INTERVAL_MS', 30 * SECOND),
    webhookSecret: required('APPROVAL_WEBHOOK_SECRET'),
    /** Accepted drift of X-Approval-Timestamp on decision callbacks */
    signatureToleranceMs: optionalInt('APPROVAL_SIGNATURE_TOLERANCE_MS', 5 * MINUTE),
    /** Operator switch: skip human approval entirely. */
    bypass: optionalBool('APPROVAL_BYPASS', false),
  },

  discord: {
    webhookUrl: process.env.DISCORD_WEBHOOK_URL || undefined,
  },
};

export type AppConfig = typeof config;

const HEX_KEY_PATTERN = /^[0-9a-fA-F]{64}$/;

/** Longest a refresh can hold the lease: every attempt timing out plus every delay. */
export function refreshWorstCaseMs(tokens: AppConfig['tokens']): number {
  const delays = tokens.refreshRetryDelaysMs;
  const attempts = delays.length + 1;
  return attempts * tokens.refreshRequestTimeoutMs + delays.reduce((sum, delay) => sum + delay, 0);
}

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(cfg: AppConfig = config): void {
  const errors: string[] = [];

  if (cfg.rawRole !== 'trading' && cfg.rawRole !== 'admin') {
    errors.push(`SERVICE_ROLE must be "trading" or "admin", got "${cfg.rawRole}"`);
  }

  if (!cfg.brokerage.clientId) errors.push('BROKERAGE_CLIENT_ID is required');
  if (!cfg.brokerage.clientSecret) errors.push('BROKERAGE_CLIENT_SECRET is required');

  if (cfg.credentials.provider === 'sqlite') {
    if (!cfg.credentials.encryptionKey) {
      errors.push('CREDENTIAL_ENCRYPTION_KEY is required');
    } else if (!HEX_KEY_PATTERN.test(cfg.credentials.encryptionKey)) {
      errors.push('CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string (32 bytes)');
    }
  }

  if (cfg.role === 'admin') {
    if (!cfg.oauth.stateEncryptionKey || !HEX_KEY_PATTERN.test(cfg.oauth.stateEncryptionKey)) {
      errors.push('OAUTH_STATE_ENCRYPTION_KEY must be a 64-character hex string for the admin role');
    }
  }

  if (cfg.role === 'trading' && !cfg.approvals.bypass) {
    if (cfg.approvals.approvers.length === 0) {
      errors.push('APPROVAL_APPROVERS must list at least one approver unless APPROVAL_BYPASS=true');
    }
    if (!cfg.approvals.webhookSecret) {
      errors.push('APPROVAL_WEBHOOK_SECRET is required unless APPROVAL_BYPASS=true');
    }
  }

  // Numeric bounds
  if (!Number.isInteger(cfg.port) || cfg.port < 1 || cfg.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${cfg.port}`);
  }
  if (!(cfg.tokens.refreshMarginMs >= 0)) {
    errors.push(`TOKEN_REFRESH_MARGIN_MS must be >= 0, got ${cfg.tokens.refreshMarginMs}`);
  }
  if (!(cfg.tokens.refreshLeaseMs >= 1000)) {
    errors.push(`TOKEN_REFRESH_LEASE_MS must be >= 1000, got ${cfg.tokens.refreshLeaseMs}`);
  }
  if (!(cfg.tokens.refreshLeasePollMs >= 10)) {
    errors.push(`TOKEN_REFRESH_LEASE_POLL_MS must be >= 10, got ${cfg.tokens.refreshLeasePollMs}`);
  }
  if (cfg.tokens.refreshRetryDelaysMs.some((delay) => !(delay >= 0))) {
    errors.push('TOKEN_REFRESH_RETRY_DELAYS_MS must be a comma-separated list of non-negative integers');
  }
  if (!(cfg.tokens.refreshRequestTimeoutMs >= 100)) {
    errors.push(`TOKEN_REFRESH_REQUEST_TIMEOUT_MS must be >= 100, got ${cfg.tokens.refreshRequestTimeoutMs}`);
  }
  // The lease holder must finish every attempt before another replica can claim the lease.
  const refreshBudgetMs = refreshWorstCaseMs(cfg.tokens);
  if (!(refreshBudgetMs < cfg.tokens.refreshLeaseMs)) {
    errors.push(
      `TOKEN_REFRESH_LEASE_MS (${cfg.tokens.refreshLeaseMs}) must exceed attempts x TOKEN_REFRESH_REQUEST_TIMEOUT_MS + retry delays (${refreshBudgetMs})`
    );
  }
  if (!(cfg.approvals.defaultTimeoutMs >= 1000)) {
    errors.push(`APPROVAL_TIMEOUT_MS must be >= 1000, got ${cfg.approvals.defaultTimeoutMs}`);
  }
  if (!(cfg.approvals.pollIntervalMs >= 100)) {
    errors.push(`APPROVAL_POLL_INTERVAL_MS must be >= 100, got ${cfg.approvals.pollIntervalMs}`);
  }
  if (!(cfg.approvals.sweepIntervalMs >= 1000)) {
    errors.push(`APPROVAL_SWEEP_INTERVAL_MS must be >= 1000, got ${cfg.approvals.sweepIntervalMs}`);
  }
  if (!(cfg.approvals.signatureToleranceMs >= 1000)) {
    errors.push(`APPROVAL_SIGNATURE_TOLERANCE_MS must be >= 1000, got ${cfg.approvals.signatureToleranceMs}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'error',
      event: 'config_validation_failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
