import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, withLogContext } from '../../../src/utils/observability/index.js';

const envSnapshot = { ...process.env };

afterEach(() => {
  process.env = { ...envSnapshot };
  vi.restoreAllMocks();
});

function captureLines(stream: NodeJS.WriteStream): Record<string, unknown>[] {
  const lines: Record<string, unknown>[] = [];
  vi.spyOn(stream, 'write').mockImplementation((chunk: string | Uint8Array) => {
    const parsed: Record<string, unknown> = JSON.parse(String(chunk));
    lines.push(parsed);
    return true;
  });
  return lines;
}

describe('observability logger', () => {
  it('writes redacted JSON logs to local file in development', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trading-guard-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'development';
    process.env.LOG_LEVEL = 'info';
    process.env.APP_LOG_FILE = logFile;

    const logger = createLogger({ domain: 'unit-test' });
    captureLines(process.stdout);

    await withLogContext({ requestId: 'req_test_123' }, async () => {
      logger.info('test_event', {
        accountNumber: '12345678',
        refreshToken: 'refresh-test',
        body: 'grant_type=refresh_token',
      });
    });

    await vi.waitFor(() => {
      expect(fs.existsSync(logFile)).toBe(true);
      const content = fs.readFileSync(logFile, 'utf-8');
      expect(content.trim().length).toBeGreaterThan(0);
    }, { timeout: 1000 });

    const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
    const payload: Record<string, unknown> = JSON.parse(lines[0]);

    expect(payload.event).toBe('test_event');
    expect(payload.level).toBe('info');
    expect(payload.domain).toBe('unit-test');
    expect(payload.requestId).toBe('req_test_123');
    expect(payload.accountNumber).toBe('***5678');
    expect(payload.refreshToken).toBe('[REDACTED]');
    expect(payload.body).toBe('[REDACTED_TEXT len=24]');
  });

  it('does not write local file sink in production by default', () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trading-guard-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'production';
    process.env.APP_LOG_FILE = logFile;

    captureLines(process.stdout);
    const logger = createLogger({ domain: 'unit-test' });
    logger.info('prod_event', { ok: true });

    expect(fs.existsSync(logFile)).toBe(false);
  });

  it('drops records below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    const stdout = captureLines(process.stdout);
    const stderr = captureLines(process.stderr);
    const logger = createLogger({ domain: 'unit-test' });

    logger.info('quiet_event');
    logger.warn('loud_event');

    expect(stdout).toEqual([]);
    expect(stderr.map((line) => line.event)).toEqual(['loud_event']);
  });

  it('only emits allowlisted fields for restricted domains', () => {
    process.env.LOG_LEVEL = 'info';
    const stdout = captureLines(process.stdout);
    const logger = createLogger({ domain: 'approval-webhook' });

    logger.info('decision_received', {
      approvalId: 'apr-1',
      decision: 'approve',
      decidedBy: 'alice',
      arguments: { symbol: 'AAPL' },
      remoteAddress: '10.0.0.1',
    });

    expect(stdout).toHaveLength(1);
    const { timestamp, ...rest } = stdout[0];
    expect(typeof timestamp).toBe('string');
    expect(rest).toEqual({
      level: 'info',
      event: 'decision_received',
      domain: 'approval-webhook',
      approvalId: 'apr-1',
      decision: 'approve',
      decidedBy: 'alice',
    });
  });

  it('merges child context over the parent', () => {
    process.env.LOG_LEVEL = 'info';
    const stdout = captureLines(process.stdout);
    const logger = createLogger({ domain: 'tokens', holderId: 'a' }).child({ holderId: 'b' });

    logger.info('child_event');

    expect(stdout[0]).toMatchObject({ domain: 'tokens', holderId: 'b', event: 'child_event' });
  });
});
