/**
 * Unit tests for the interval poller.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createIntervalPoller } from '../../src/utils/poller.js';

describe('createIntervalPoller', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs immediately and then on every interval', async () => {
    const run = vi.fn().mockResolvedValue(undefined);
    const poller = createIntervalPoller(run, 1000, 'test');

    poller.start();
    expect(run).toHaveBeenCalledTimes(1);
    expect(poller.isRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(2000);
    expect(run).toHaveBeenCalledTimes(3);

    await poller.stop();
    expect(poller.isRunning()).toBe(false);
  });

  it('skips ticks while a run is still in flight', async () => {
    let finish: () => void = () => {};
    const run = vi.fn(() => new Promise<void>((resolve) => { finish = resolve; }));
    const poller = createIntervalPoller(run, 1000, 'test');

    poller.start();
    await vi.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(1);

    finish();
    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(2);

    finish();
    await poller.stop();
  });

  it('keeps polling after a failed run', async () => {
    const run = vi.fn()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValue(undefined);
    const poller = createIntervalPoller(run, 1000, 'test');

    poller.start();
    await vi.advanceTimersByTimeAsync(1000);

    expect(run).toHaveBeenCalledTimes(2);
    await poller.stop();
  });

  it('waits for the in-flight run when stopping', async () => {
    let finished = false;
    const run = vi.fn(async () => {
      await new Promise((resolve) => setTimeout(resolve, 500));
      finished = true;
    });
    const poller = createIntervalPoller(run, 1000, 'test');

    poller.start();
    const stopping = poller.stop();
    await vi.advanceTimersByTimeAsync(500);
    await stopping;

    expect(finished).toBe(true);
  });

  it('ignores a second start', () => {
    const run = vi.fn().mockResolvedValue(undefined);
    const poller = createIntervalPoller(run, 1000, 'test');

    poller.start();
    poller.start();

    expect(run).toHaveBeenCalledTimes(1);
    return poller.stop();
  });
});
