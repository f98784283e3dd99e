/**
 * @fileoverview Background expiry of abandoned approval requests.
 *
 * A waiter expires its own request on time. This sweep covers requests
 * whose requesting replica died mid-wait, so nothing stays PENDING forever.
 */

import { createIntervalPoller, type Poller } from '../../utils/poller.js';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import type { ApprovalGate } from './gate.js';

export function createApprovalSweeper(
  gate: ApprovalGate,
  intervalMs: number,
  logger: AppLogger = createLogger({ domain: 'approval-sweeper' })
): Poller {
  return createIntervalPoller(
    'approval-sweeper',
    async () => {
      const expired = await gate.expireStale();
      if (expired > 0) {
        logger.info('approval_sweep_expired', { count: expired });
      }
    },
    intervalMs,
    logger
  );
}
