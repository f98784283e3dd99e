import { afterEach, describe, expect, it, vi } from 'vitest';

describe('service factories', () => {
  afterEach(() => {
    vi.doUnmock('../../src/config.js');
    vi.resetModules();
  });

  it('builds one gate and one token manager per process', async () => {
    const approvals = await import('../../src/services/approvals/index.js');
    const tokens = await import('../../src/services/tokens/index.js');

    const gate = approvals.getApprovalGate();
    const manager = tokens.getTokenManager();

    expect(approvals.getApprovalGate()).toBe(gate);
    expect(tokens.getTokenManager()).toBe(manager);
    expect(gate.transportName).toBe('log');
    expect(gate.bypassed).toBe(false);
    expect(manager.accountKey).toBe('default');

    approvals.resetApprovalGate();
    tokens.resetTokenManager();

    expect(approvals.getApprovalGate()).not.toBe(gate);
    expect(tokens.getTokenManager()).not.toBe(manager);
  });

  it('selects the Discord transport when a webhook URL is configured', async () => {
    vi.resetModules();
    vi.doMock('../../src/config.js', () => ({
      default: {
        baseUrl: 'https://guard.test',
        discord: { webhookUrl: 'https://discord.test/api/webhooks/1/placeholder' },
      },
    }));

    const { createDecisionTransport } = await import('../../src/services/approvals/index.js');

    expect(createDecisionTransport().name).toBe('discord-webhook');
  });
});
