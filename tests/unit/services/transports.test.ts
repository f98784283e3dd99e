/**
 * Unit tests for the decision transports.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  DiscordWebhookTransport,
  buildPendingEmbed,
  buildResolvedEmbed,
} from '../../../src/services/approvals/transports/discord-webhook.js';
import type { ApprovalRequest } from '../../../src/services/approvals/types.js';

const CREATED = Date.UTC(2026, 0, 5, 15, 0, 0);

const request: ApprovalRequest = {
  id: 'approval-1',
  action: { tool: 'place_equity_order', arguments: { symbol: 'SPY', quantity: 10 } },
  requestedBy: 'claude-desktop',
  createdAt: CREATED,
  expiresAt: CREATED + 600_000,
  status: 'PENDING',
  decidedBy: null,
  decidedAt: null,
};

describe('Discord embeds', () => {
  it('describes a pending request with its decision endpoint', () => {
    const embed = buildPendingEmbed(request, 'https://trading.test');

    expect(embed.title).toBe('Approval required: place_equity_order');
    expect(embed.description).toBe('Decide with POST https://trading.test/approvals/approval-1/decision');
    expect(embed.color).toBe(0xf1c40f);
    expect(embed.fields).toEqual([
      { name: 'Arguments', value: '```json\n{\n  "symbol": "SPY",\n  "quantity": 10\n}\n```' },
      { name: 'Request', value: 'approval-1', inline: true },
      { name: 'Requested by', value: 'claude-desktop', inline: true },
      { name: 'Expires', value: `<t:${(CREATED + 600_000) / 1000}:R>`, inline: true },
    ]);
    expect(embed.timestamp).toBe('2026-01-05T15:00:00.000Z');
  });

  it('describes a resolved request with the decider', () => {
    const embed = buildResolvedEmbed({ ...request, status: 'APPROVED', decidedBy: 'alice', decidedAt: CREATED + 5_000 });

    expect(embed.title).toBe('place_equity_order: APPROVED by alice');
    expect(embed.color).toBe(0x2ecc71);
    expect(embed.timestamp).toBe('2026-01-05T15:00:05.000Z');
  });

  it('omits the decider for an expired request', () => {
    const embed = buildResolvedEmbed({ ...request, status: 'EXPIRED', decidedAt: CREATED + 600_000 });

    expect(embed.title).toBe('place_equity_order: EXPIRED');
  });
});

describe('DiscordWebhookTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the pending embed to the webhook', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 204 }));
    vi.stubGlobal('fetch', fetchMock);
    const transport = new DiscordWebhookTransport('https://discord.test/api/webhooks/1/abc', 'https://trading.test', []);

    await transport.notify(request);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://discord.test/api/webhooks/1/abc');
    expect(init?.method).toBe('POST');
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      embeds: [{ title: 'Approval required: place_equity_order' }],
      allowed_mentions: { parse: [] },
    });
  });

  it('throws when the webhook rejects the message', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(new Response('bad', { status: 400 })));
    const transport = new DiscordWebhookTransport('https://discord.test/api/webhooks/1/abc', 'https://trading.test', []);

    await expect(transport.notify(request)).rejects.toThrow('Discord webhook returned 400');
  });
});
