#!/usr/bin/env npx tsx
/**
 * Local decision CLI.
 *
 * Signs and posts an approve/deny decision to a running trading service,
 * the same way a chat integration would.
 *
 * Usage:
 *   npm run decide -- <approval-id> approve --as alice
 *   npm run decide -- <approval-id> deny --as alice
 */

import 'dotenv/config';
import { signDecision } from '../src/routes/approvals.js';

const BASE_URL = process.env.BASE_URL || 'http://localhost:8080';

interface Options {
  id: string;
  decision: 'approve' | 'deny';
  decidedBy: string;
}

function printHelp(): void {
  console.log(`
Usage: npm run decide -- <approval-id> <approve|deny> --as <approver>

Environment:
  BASE_URL                 Trading service URL (default: http://localhost:8080)
  APPROVAL_WEBHOOK_SECRET  Shared HMAC secret
`);
}

function parseArgs(args: string[]): Options | null {
  const positional: string[] = [];
  let decidedBy = process.env.APPROVAL_APPROVERS?.split(',')[0]?.trim() ?? '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--as') {
      decidedBy = args[++i] ?? decidedBy;
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (arg !== undefined && !arg.startsWith('-')) {
      positional.push(arg);
    }
  }

  const [id, decision] = positional;
  if (!id || (decision !== 'approve' && decision !== 'deny') || !decidedBy) {
    return null;
  }
  return { id, decision, decidedBy };
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (!options) {
    printHelp();
    process.exit(1);
  }

  const secret = process.env.APPROVAL_WEBHOOK_SECRET;
  if (!secret) {
    console.error('APPROVAL_WEBHOOK_SECRET is not set');
    process.exit(1);
  }

  const body = JSON.stringify({ id: options.id, decision: options.decision, decidedBy: options.decidedBy });
  const timestamp = String(Date.now());
  const response = await fetch(`${BASE_URL}/approvals/${encodeURIComponent(options.id)}/decision`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'X-Approval-Timestamp': timestamp,
      'X-Approval-Signature': signDecision(secret, options.id, timestamp, body),
    },
    body,
  });

  console.log(`${response.status} ${await response.text()}`);
  if (!response.ok) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
