/**
 * Global test setup for Vitest.
 *
 * This file runs before all tests. It configures the test environment
 * and sets up mock cleanup between tests.
 */

import { afterEach, beforeEach, vi } from 'vitest';

// Set test environment variables before any imports
process.env.NODE_ENV = 'test';
process.env.SERVICE_ROLE = 'trading';
process.env.BASE_URL = 'http://localhost:8080';
process.env.BROKERAGE_CLIENT_ID = 'test-client-id';
process.env.BROKERAGE_CLIENT_SECRET = 'test-client-secret';
process.env.BROKERAGE_BASE_URL = 'https://broker.test';
process.env.BROKERAGE_CALLBACK_URL = 'http://localhost:8080/admin/brokerage/callback';
process.env.CREDENTIAL_STORE_PROVIDER = 'memory';
process.env.APPROVAL_STORE_PROVIDER = 'memory';
process.env.CREDENTIAL_ENCRYPTION_KEY = '0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef';
process.env.OAUTH_STATE_ENCRYPTION_KEY = 'abcdef0123456789abcdef0123456789abcdef0123456789abcdef0123456789';
process.env.APPROVAL_APPROVERS = 'alice';
process.env.APPROVAL_WEBHOOK_SECRET = 'test-secret';

// Reset mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
});

afterEach(() => {
  vi.useRealTimers();
});
