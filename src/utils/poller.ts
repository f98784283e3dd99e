/**
 * @fileoverview Interval poller for background maintenance work.
 *
 * Runs a task on a fixed interval without overlapping executions, and lets
 * shutdown wait for an in-flight run to finish.
 */

import { createLogger, type AppLogger } from './observability/index.js';

export interface Poller {
  /** Start the polling loop */
  start(): void;
  /** Stop the polling loop and wait for any in-flight operation to complete */
  stop(): Promise<void>;
  isRunning(): boolean;
}

/**
 * Create an interval-based poller.
 *
 * @param name - Label used in log events
 * @param task - Function to call on each interval
 * @param intervalMs - Polling interval in milliseconds
 */
export function createIntervalPoller(
  name: string,
  task: () => Promise<void>,
  intervalMs: number,
  logger: AppLogger = createLogger({ domain: 'poller' })
): Poller {
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;

  return {
    start(): void {
      if (intervalId !== null) {
        logger.debug('poller_already_running', { poller: name });
        return;
      }

      logger.info('poller_started', { poller: name, intervalMs });

      // Run immediately on start, then on interval
      void runSafe();

      intervalId = setInterval(() => {
        void runSafe();
      }, intervalMs);
    },

    async stop(): Promise<void> {
      if (intervalId === null) {
        return;
      }

      clearInterval(intervalId);
      intervalId = null;

      if (inFlight) {
        await inFlight;
      }

      logger.info('poller_stopped', { poller: name });
    },

    isRunning(): boolean {
      return intervalId !== null;
    },
  };

  /**
   * Wrapper to prevent overlapping executions and catch errors.
   */
  async function runSafe(): Promise<void> {
    if (inFlight) {
      logger.debug('poller_skip_overlap', { poller: name });
      return;
    }

    inFlight = (async () => {
      try {
        await task();
      } catch (error) {
        logger.error('poller_error', {
          poller: name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    })();

    try {
      await inFlight;
    } finally {
      inFlight = null;
    }
  }
}
