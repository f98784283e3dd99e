import { afterEach, describe, expect, it, vi } from 'vitest';

const BASE_ENV: Record<string, string | undefined> = {
  NODE_ENV: 'test',
  SERVICE_ROLE: 'trading',
  BROKERAGE_CLIENT_ID: 'test-client-id',
  BROKERAGE_CLIENT_SECRET: 'test-client-secret',
  CREDENTIAL_STORE_PROVIDER: 'sqlite',
  CREDENTIAL_ENCRYPTION_KEY: '0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef',
  OAUTH_STATE_ENCRYPTION_KEY: 'abcdef0123456789abcdef0123456789abcdef0123456789abcdef0123456789',
  APPROVAL_APPROVERS: 'alice',
  APPROVAL_WEBHOOK_SECRET: 'test-secret',
  APPROVAL_BYPASS: undefined,
  APPROVAL_TIMEOUT_MS: undefined,
  TOKEN_REFRESH_RETRY_DELAYS_MS: undefined,
  TOKEN_REFRESH_REQUEST_TIMEOUT_MS: undefined,
  TOKEN_REFRESH_LEASE_MS: undefined,
  APPROVAL_SIGNATURE_TOLERANCE_MS: undefined,
  PORT: undefined,
};

const ORIGINAL_ENV = new Map<string, string | undefined>(
  Object.keys(BASE_ENV).map((key) => [key, process.env[key]])
);

async function importConfigWith(overrides: Record<string, string | undefined>) {
  vi.resetModules();

  for (const [key, value] of Object.entries({ ...BASE_ENV, ...overrides })) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  return import('../../src/config.js');
}

describe('config', () => {
  afterEach(() => {
    for (const [key, original] of ORIGINAL_ENV) {
      if (original === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = original;
      }
    }
    vi.resetModules();
  });

  it('accepts a complete trading configuration', async () => {
    const { validateConfig } = await importConfigWith({});

    expect(() => validateConfig()).not.toThrow();
  });

  it('applies named policy defaults', async () => {
    const { default: config } = await importConfigWith({});

    expect(config.tokens.refreshMarginMs).toBe(60_000);
    expect(config.tokens.refreshRetryDelaysMs).toEqual([500, 1500, 4000]);
    expect(config.approvals.defaultTimeoutMs).toBe(600_000);
    expect(config.approvals.approvers).toEqual(['alice']);
    expect(config.approvals.bypass).toBe(false);
  });

  it('parses approver and retry lists', async () => {
    const { default: config } = await importConfigWith({
      APPROVAL_APPROVERS: ' alice, bob ,,',
      TOKEN_REFRESH_RETRY_DELAYS_MS: '100,200',
    });

    expect(config.approvals.approvers).toEqual(['alice', 'bob']);
    expect(config.tokens.refreshRetryDelaysMs).toEqual([100, 200]);
  });

  it('requires approvers and a webhook secret for trading unless bypassed', async () => {
    const { validateConfig } = await importConfigWith({
      APPROVAL_APPROVERS: undefined,
      APPROVAL_WEBHOOK_SECRET: undefined,
    });

    expect(() => validateConfig()).toThrow('APPROVAL_APPROVERS must list at least one approver');
    expect(() => validateConfig()).toThrow('APPROVAL_WEBHOOK_SECRET is required');
  });

  it('allows a trading service without approvers in bypass mode', async () => {
    const { validateConfig, default: config } = await importConfigWith({
      APPROVAL_APPROVERS: undefined,
      APPROVAL_WEBHOOK_SECRET: undefined,
      APPROVAL_BYPASS: 'true',
    });

    expect(config.approvals.bypass).toBe(true);
    expect(() => validateConfig()).not.toThrow();
  });

  it('rejects a malformed credential encryption key', async () => {
    const { validateConfig } = await importConfigWith({ CREDENTIAL_ENCRYPTION_KEY: 'not-hex' });

    expect(() => validateConfig()).toThrow('CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string');
  });

  it('requires the OAuth state key for the admin role', async () => {
    const { validateConfig } = await importConfigWith({
      SERVICE_ROLE: 'admin',
      OAUTH_STATE_ENCRYPTION_KEY: undefined,
    });

    expect(() => validateConfig()).toThrow('OAUTH_STATE_ENCRYPTION_KEY must be a 64-character hex string');
  });

  it('rejects an unknown service role', async () => {
    const { validateConfig } = await importConfigWith({ SERVICE_ROLE: 'worker' });

    expect(() => validateConfig()).toThrow('SERVICE_ROLE must be "trading" or "admin", got "worker"');
  });

  it('keeps the worst-case refresh inside the lease by default', async () => {
    const { default: config, refreshWorstCaseMs } = await importConfigWith({});

    expect(config.tokens.refreshRequestTimeoutMs).toBe(5_000);
    expect(refreshWorstCaseMs(config.tokens)).toBe(26_000);
  });

  it('rejects a request timeout that lets a refresh outlast the lease', async () => {
    const { validateConfig } = await importConfigWith({ TOKEN_REFRESH_REQUEST_TIMEOUT_MS: '8000' });

    expect(() => validateConfig()).toThrow(
      'TOKEN_REFRESH_LEASE_MS (30000) must exceed attempts x TOKEN_REFRESH_REQUEST_TIMEOUT_MS + retry delays (38000)'
    );
  });

  it('rejects an approval timeout below one second', async () => {
    const { validateConfig } = await importConfigWith({ APPROVAL_TIMEOUT_MS: '500' });

    expect(() => validateConfig()).toThrow('APPROVAL_TIMEOUT_MS must be >= 1000, got 500');
  });

  it('defaults the decision signature window to five minutes', async () => {
    const { default: config } = await importConfigWith({});

    expect(config.approvals.signatureToleranceMs).toBe(300_000);
  });

  it('rejects a decision signature window below one second', async () => {
    const { validateConfig } = await importConfigWith({ APPROVAL_SIGNATURE_TOLERANCE_MS: '0' });

    expect(() => validateConfig()).toThrow('APPROVAL_SIGNATURE_TOLERANCE_MS must be >= 1000, got 0');
  });
});
