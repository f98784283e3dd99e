/**
 * @fileoverview HTML for the admin dashboard and re-auth result pages.
 */

import type { CredentialStatus } from '../services/tokens/index.js';

export type CredentialLabel = 'Valid' | 'Expired' | 'Missing';

export function credentialLabel(status: CredentialStatus): CredentialLabel {
  if (!status.exists) return 'Missing';
  return status.refreshTokenExpired ? 'Expired' : 'Valid';
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      min-height: 100vh;
      margin: 0;
      background: #f5f5f5;
    }
    .card {
      background: white;
      padding: 2rem;
      border-radius: 12px;
      box-shadow: 0 2px 8px rgba(0,0,0,0.1);
      text-align: center;
      max-width: 480px;
    }
    h1 { margin: 0 0 0.5rem; color: #1a1a1a; }
    p { color: #666; margin: 0 0 1rem; }
    dl { text-align: left; color: #333; }
    dt { font-weight: 600; }
    dd { margin: 0 0 0.5rem; }
    .Valid { color: #1e8449; }
    .Expired, .Missing { color: #c0392b; }
    .btn {
      display: inline-block;
      background: #2c3e50;
      color: white;
      padding: 0.75rem 1.5rem;
      border-radius: 8px;
      text-decoration: none;
      font-weight: 500;
    }
  </style>
</head>
<body>
  <div class="card">
${body}
  </div>
</body>
</html>`;
}

function iso(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

export function dashboardHtml(status: CredentialStatus): string {
  const label = credentialLabel(status);
  const details = status.exists
    ? `
    <dl>
      <dt>Version</dt><dd>${status.version}</dd>
      <dt>Access token expires</dt><dd>${iso(status.accessExpiresAt)}</dd>
      <dt>Refresh token expires</dt><dd>${iso(status.refreshExpiresAt)}${status.refreshTokenExpiresSoon ? ' (soon)' : ''}</dd>
      <dt>Last updated</dt><dd>${iso(status.updatedAt)}</dd>
    </dl>`
    : '<p>No credential has been stored yet.</p>';

  return page('Brokerage credential', `
    <h1>Brokerage credential: <span class="${label}">${label}</span></h1>
    <p>Account <code>${escapeHtml(status.accountKey)}</code></p>${details}
    <a class="btn" href="/admin/brokerage/auth">Re-authenticate</a>`);
}

export function successHtml(version: number): string {
  return page('Connected', `
    <h1>Brokerage connected</h1>
    <p>Credential stored as version ${version}. You can close this page.</p>
    <a class="btn" href="/admin">Back to dashboard</a>`);
}

export function errorHtml(message: string): string {
  return page('Error', `
    <h1>Something Went Wrong</h1>
    <p>${escapeHtml(message)}</p>
    <a class="btn" href="/admin">Back to dashboard</a>`);
}
