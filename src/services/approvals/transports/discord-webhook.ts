/**
 * @fileoverview Discord incoming-webhook decision transport.
 *
 * Posts an embed describing the pending action. Approvers answer through the
 * signed decision callback (POST /approvals/:id/decision), typically from a
 * bot or shortcut that holds the webhook secret.
 */

import { fetchWithRetry } from '../../../utils/fetch-with-retry.js';
import { safeSnippet } from '../../../utils/observability/index.js';
import type { ApprovalRequest, ApprovalStatus, DecisionTransport } from '../types.js';

const STATUS_COLORS: Record<ApprovalStatus, number> = {
  PENDING: 0xf1c40f,
  APPROVED: 0x2ecc71,
  DENIED: 0xe74c3c,
  EXPIRED: 0x95a5a6,
  CANCELLED: 0x95a5a6,
};

// Discord rejects embed field values over 1024 characters.
const MAX_FIELD_LENGTH = 1000;

export interface DiscordEmbed {
  title: string;
  description?: string;
  color: number;
  fields: Array<{ name: string; value: string; inline?: boolean }>;
  timestamp: string;
}

function discordTimestamp(epochMs: number): string {
  return `<t:${Math.floor(epochMs / 1000)}:R>`;
}

/** Build the embed announcing a pending request. */
export function buildPendingEmbed(request: ApprovalRequest, callbackBaseUrl: string): DiscordEmbed {
  const args = safeSnippet(JSON.stringify(request.action.arguments, null, 2), MAX_FIELD_LENGTH - 12);
  return {
    title: `Approval required: ${request.action.tool}`,
    description: `Decide with POST ${callbackBaseUrl}/approvals/${request.id}/decision`,
    color: STATUS_COLORS.PENDING,
    fields: [
      { name: 'Arguments', value: `\`\`\`json\n${args}\n\`\`\`` },
      { name: 'Request', value: request.id, inline: true },
      { name: 'Requested by', value: request.requestedBy, inline: true },
      { name: 'Expires', value: discordTimestamp(request.expiresAt), inline: true },
    ],
    timestamp: new Date(request.createdAt).toISOString(),
  };
}

/** Build the follow-up embed once a request is terminal. */
export function buildResolvedEmbed(request: ApprovalRequest): DiscordEmbed {
  const by = request.decidedBy ? ` by ${request.decidedBy}` : '';
  return {
    title: `${request.action.tool}: ${request.status}${by}`,
    color: STATUS_COLORS[request.status],
    fields: [{ name: 'Request', value: request.id, inline: true }],
    timestamp: new Date(request.decidedAt ?? request.createdAt).toISOString(),
  };
}

export class DiscordWebhookTransport implements DecisionTransport {
  readonly name = 'discord-webhook';

  constructor(
    private readonly webhookUrl: string,
    private readonly callbackBaseUrl: string,
    private readonly retryDelaysMs: readonly number[] = [250, 750]
  ) {}

  async notify(request: ApprovalRequest): Promise<void> {
    await this.post(buildPendingEmbed(request, this.callbackBaseUrl), 'discord_notify');
  }

  async resolved(request: ApprovalRequest): Promise<void> {
    await this.post(buildResolvedEmbed(request), 'discord_resolved');
  }

  private async post(embed: DiscordEmbed, operation: string): Promise<void> {
    const response = await fetchWithRetry(
      this.webhookUrl,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ embeds: [embed], allowed_mentions: { parse: [] } }),
      },
      operation,
      this.retryDelaysMs
    );
    if (!response.ok) {
      throw new Error(`Discord webhook returned ${response.status}`);
    }
  }
}
