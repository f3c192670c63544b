/**
 * @fileoverview Google OAuth client and retry helpers for Gmail and Sheets.
 *
 * The watcher acts as a single mailbox owner, so credentials come from a
 * long-lived refresh token in the environment; google-auth-library refreshes
 * the access token on demand.
 */

import { OAuth2Client } from 'google-auth-library';
import config from '../../../config.js';
import { AppError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';

const log = createLogger({ domain: 'google-auth' });

/** Retry configuration for Google API calls. */
const MAX_RETRIES = 2;
const RETRY_DELAY_MS = 1000;

let client: OAuth2Client | null = null;

/**
 * Get the shared OAuth2 client.
 *
 * @throws AppError (GOOGLE_CREDENTIALS_MISSING) when the client id, secret
 *   or refresh token is not configured
 */
export function getGoogleClient(): OAuth2Client {
  if (client) return client;

  const { clientId, clientSecret, refreshToken } = config.google;
  if (!clientId || !clientSecret || !refreshToken) {
    throw new AppError('Google OAuth credentials are not configured', 'GOOGLE_CREDENTIALS_MISSING');
  }

  client = new OAuth2Client(clientId, clientSecret);
  client.setCredentials({ refresh_token: refreshToken });
  return client;
}

/**
 * Drop the cached client (used by tests to avoid cross-test pollution).
 */
export function resetGoogleClient(): void {
  client = null;
}

function errorCode(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

/**
 * Check if an error is retryable (429 or 5xx).
 */
export function isRetryableError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && (code === 429 || (code >= 500 && code < 600));
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a Google API call, retrying 429/5xx responses with linear backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  serviceName = 'Google',
  delayMs = RETRY_DELAY_MS
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt < MAX_RETRIES && isRetryableError(error)) {
        log.warn('google_api_retry', {
          service: serviceName,
          attempt: attempt + 1,
          maxRetries: MAX_RETRIES,
        });
        await sleep(delayMs * (attempt + 1));
      } else {
        throw error;
      }
    }
  }
  throw lastError;
}
