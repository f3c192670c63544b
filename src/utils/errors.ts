/**
 * @fileoverview Standardized error handling utilities.
 *
 * - AppError: base class for application-specific errors
 * - ConfigurationError: catalog or pattern problems found at load time
 * - safeExecute: returns result objects instead of throwing
 */

import { createLogger } from './observability/index.js';

const log = createLogger({ domain: 'errors' });

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** A single problem found while validating configuration. */
export type ValidationError = {
  field: string;
  message: string;
};

/**
 * Raised when catalog data or field patterns cannot be used.
 * Never raised for message content.
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    code: string,
    public readonly problems: ValidationError[] = []
  ) {
    super(message, code, false, { problems });
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Execute an async function and return a Result object.
 * Use for per-item work where one failure must not abort the batch.
 */
export async function safeExecute<T>(
  fn: () => Promise<T>,
  context: string
): Promise<Result<T>> {
  try {
    return { success: true, data: await fn() };
  } catch (error) {
    log.error('operation_failed', { context, error: errorMessage(error) });
    return { success: false, error: errorMessage(error) };
  }
}
