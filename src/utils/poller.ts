/**
 * @fileoverview Interval polling abstraction for background jobs.
 */

import { createLogger } from './observability/index.js';

const log = createLogger({ domain: 'poller' });

/**
 * Interface for job polling implementations.
 */
export interface Poller {
  /** Start the polling loop */
  start(): void;
  /** Stop the polling loop and wait for any in-flight run to complete */
  stop(): Promise<void>;
  /** Check if the poller is running */
  isRunning(): boolean;
}

/**
 * Create an interval-based poller.
 *
 * Runs immediately on start, then every `intervalMs`. A run that is still
 * in flight when the next tick fires causes that tick to be skipped.
 */
export function createIntervalPoller(
  run: () => Promise<void>,
  intervalMs: number = 60000,
  name = 'poller'
): Poller {
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;

  async function runSafe(): Promise<void> {
    try {
      await run();
    } catch (error) {
      log.error('poller_error', {
        poller: name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  function tick(): void {
    if (inFlight) {
      log.debug('poller_skip_overlap', { poller: name });
      return;
    }
    inFlight = runSafe().finally(() => {
      inFlight = null;
    });
  }

  return {
    start(): void {
      if (intervalId !== null) {
        log.info('poller_already_running', { poller: name });
        return;
      }

      log.info('poller_started', { poller: name, intervalMs });
      tick();
      intervalId = setInterval(tick, intervalMs);
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

      log.info('poller_stopped', { poller: name });
    },

    isRunning(): boolean {
      return intervalId !== null;
    },
  };
}
