/**
 * Integration tests for brokerage re-authentication and approval lookups on the admin role.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { createAdminTestApp } from '../helpers/app.js';
import { credentialAt } from '../helpers/fakes.js';
import type { ApprovalRequest } from '../../src/services/approvals/types.js';

describe('admin routes', () => {
  let ctx: ReturnType<typeof createAdminTestApp>;

  beforeEach(() => {
    ctx = createAdminTestApp();
  });

  async function startReauth(): Promise<string> {
    const response = await request(ctx.app).get('/admin/brokerage/auth');
    expect(response.status).toBe(302);
    const state = new URL(response.headers.location).searchParams.get('state');
    expect(state).toBeTruthy();
    return state ?? '';
  }

  describe('GET /admin/brokerage/auth', () => {
    it('redirects to the brokerage consent page with an encrypted state', async () => {
      const response = await request(ctx.app).get('/admin/brokerage/auth');

      expect(response.status).toBe(302);
      expect(response.headers.location).toMatch(/^https:\/\/broker\.test\/v1\/oauth\/authorize\?state=[A-Za-z0-9_-]+$/);
    });
  });

  describe('GET /admin/brokerage/callback', () => {
    it('exchanges the code and seeds the shared credential', async () => {
      const state = await startReauth();

      const response = await request(ctx.app).get('/admin/brokerage/callback').query({ code: 'code-1', state });

      expect(response.status).toBe(200);
      expect(response.text).toContain('Credential stored as version 1.');
      expect(ctx.oauth.codes).toEqual(['code-1']);
      expect(await ctx.tokens.getValidToken()).toBe('access-for-code-1');
    });

    it('supersedes a credential the trading replicas still hold', async () => {
      await ctx.tokens.seed(credentialAt(Date.now(), 30 * 60 * 1000));
      const state = await startReauth();

      const response = await request(ctx.app).get('/admin/brokerage/callback').query({ code: 'code-2', state });

      expect(response.status).toBe(200);
      expect(response.text).toContain('Credential stored as version 2.');
      expect((await ctx.credentials.load())?.refreshToken).toBe('refresh-for-code-2');
    });

    it('rejects a replayed state', async () => {
      const state = await startReauth();
      await request(ctx.app).get('/admin/brokerage/callback').query({ code: 'code-1', state });

      const replay = await request(ctx.app).get('/admin/brokerage/callback').query({ code: 'code-1', state });

      expect(replay.status).toBe(400);
      expect(replay.text).toContain('Invalid or expired link. Start the re-authentication again.');
      expect(ctx.oauth.codes).toEqual(['code-1']);
    });

    it('rejects a missing code or state', async () => {
      const response = await request(ctx.app).get('/admin/brokerage/callback').query({ code: 'code-1' });

      expect(response.status).toBe(400);
      expect(response.text).toContain('Missing code or state parameter');
    });

    it('rejects a forged state', async () => {
      const response = await request(ctx.app)
        .get('/admin/brokerage/callback')
        .query({ code: 'code-1', state: 'forged-state' });

      expect(response.status).toBe(400);
      expect(ctx.oauth.codes).toEqual([]);
    });

    it('reports a declined consent', async () => {
      const response = await request(ctx.app).get('/admin/brokerage/callback').query({ error: 'access_denied' });

      expect(response.status).toBe(400);
      expect(response.text).toContain('Authorization was declined at the brokerage.');
    });

    it('returns 502 when the code exchange fails', async () => {
      ctx.oauth.failure = new Error('invalid_grant');
      const state = await startReauth();

      const response = await request(ctx.app).get('/admin/brokerage/callback').query({ code: 'code-1', state });

      expect(response.status).toBe(502);
      expect(await ctx.credentials.load()).toBeNull();
    });
  });

  describe('GET /admin/status', () => {
    it('reports Missing before seeding and Valid after', async () => {
      const before = await request(ctx.app).get('/admin/status');
      expect(before.body).toEqual({
        service: 'brokerage-token',
        status: 'Missing',
        credential: { accountKey: 'default', exists: false },
      });

      await ctx.tokens.seed(credentialAt(Date.now(), 30 * 60 * 1000));
      const after = await request(ctx.app).get('/admin/status');

      expect(after.body.status).toBe('Valid');
      expect(after.body.credential).toMatchObject({ exists: true, version: 1, refreshTokenExpired: false });
    });
  });

  describe('GET /admin', () => {
    it('renders the credential label', async () => {
      const response = await request(ctx.app).get('/admin');

      expect(response.status).toBe(200);
      expect(response.type).toBe('text/html');
      expect(response.text).toContain('Brokerage credential: <span class="Missing">Missing</span>');
    });
  });

  describe('approval lookups', () => {
    function storedRequest(id: string, createdAt: number): ApprovalRequest {
      return {
        id,
        action: { tool: 'place_order', arguments: { symbol: 'AAPL', quantity: 10, side: 'buy' } },
        requestedBy: 'rebalancer',
        createdAt,
        expiresAt: createdAt + 60_000,
        status: 'PENDING',
        decidedBy: null,
        decidedAt: null,
      };
    }

    it('returns a stored request', async () => {
      const stored = storedRequest('req-1', 1_000);
      await ctx.approvals.create(stored);

      const response = await request(ctx.app).get('/approvals/req-1');

      expect(response.status).toBe(200);
      expect(response.body).toEqual(stored);
    });

    it('returns 404 for an unknown request', async () => {
      const response = await request(ctx.app).get('/approvals/missing-id');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: 'Approval request missing-id not found',
        code: 'APPROVAL_NOT_FOUND',
      });
    });

    it('lists requests newest first and honours the limit', async () => {
      await ctx.approvals.create(storedRequest('req-1', 1_000));
      await ctx.approvals.create(storedRequest('req-2', 2_000));
      await ctx.approvals.create(storedRequest('req-3', 3_000));

      const all = await request(ctx.app).get('/approvals');
      const limited = await request(ctx.app).get('/approvals?limit=2');

      expect(all.status).toBe(200);
      expect(all.body.approvals.map((a: ApprovalRequest) => a.id)).toEqual(['req-3', 'req-2', 'req-1']);
      expect(limited.body.approvals.map((a: ApprovalRequest) => a.id)).toEqual(['req-3', 'req-2']);
    });
  });

  it('does not serve the decision callback', async () => {
    const response = await request(ctx.app)
      .post('/approvals/req-1/decision')
      .set('Content-Type', 'application/json')
      .send('{}');

    expect(response.status).toBe(404);
  });
});
