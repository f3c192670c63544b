/**
 * Unit tests for Google client and retry helpers.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  getGoogleClient,
  isRetryableError,
  resetGoogleClient,
  withRetry,
} from '../../../src/domains/incident-watcher/providers/google-auth.js';

describe('getGoogleClient', () => {
  beforeEach(() => {
    resetGoogleClient();
  });

  it('creates one client carrying the configured refresh token', () => {
    const client = getGoogleClient();

    expect(client.credentials.refresh_token).toBe('test-refresh-token');
    expect(getGoogleClient()).toBe(client);
  });
});

describe('isRetryableError', () => {
  it('retries rate limits and server errors only', () => {
    expect(isRetryableError({ code: 429 })).toBe(true);
    expect(isRetryableError({ code: 503 })).toBe(true);
    expect(isRetryableError({ code: 404 })).toBe(false);
    expect(isRetryableError(new Error('boom'))).toBe(false);
    expect(isRetryableError(null)).toBe(false);
  });
});

describe('withRetry', () => {
  it('retries retryable failures and returns the eventual result', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce({ code: 500 })
      .mockRejectedValueOnce({ code: 429 })
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, 'Test', 0)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('gives up after the retry budget', async () => {
    const fn = vi.fn().mockRejectedValue({ code: 503 });

    await expect(withRetry(fn, 'Test', 0)).rejects.toEqual({ code: 503 });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry other failures', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('bad request'));

    await expect(withRetry(fn, 'Test', 0)).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
