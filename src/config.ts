/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. Catalog content
 * (companies, keywords, field patterns) is not configuration in this sense:
 * it lives in JSON files under CATALOG_DIR and is read by the catalog store.
 *
 * @see .env.example for the supported environment variables
 */

import 'dotenv/config';
import type { LogLevel } from './utils/observability/types.js';

// ---------------------------------------------------------------------------
// Config helpers — make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Return a path that differs between dev and production. */
function dataPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function logLevel(key: string, defaultValue: LogLevel): LogLevel {
  const raw = process.env[key]?.toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? defaultValue;
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),
  logLevel: logLevel('LOG_LEVEL', 'info'),

  /** Directory holding the catalog JSON files */
  catalogDir: dataPath('CATALOG_DIR', '/app/config', './config'),

  /** SQLite file that remembers which messages were already reported */
  processedDbPath: dataPath('PROCESSED_DB_PATH', '/app/data/processed.db', './data/processed.db'),

  /** Inbox watcher configuration */
  incidentWatcher: {
    enabled: optionalBool('INCIDENT_WATCHER_ENABLED', true),
    intervalMs: optionalInt('INCIDENT_WATCHER_INTERVAL_MS', 60000),
    batchSize: optionalInt('INCIDENT_WATCHER_BATCH_SIZE', 20),
    query: optional('INCIDENT_WATCHER_QUERY', 'in:inbox'),
    lookbackDays: optionalInt('INCIDENT_WATCHER_LOOKBACK_DAYS', 1),
  },

  /** Google OAuth client used for Gmail and Sheets */
  google: {
    clientId: required('GOOGLE_CLIENT_ID'),
    clientSecret: required('GOOGLE_CLIENT_SECRET'),
    refreshToken: required('GOOGLE_REFRESH_TOKEN'),
    spreadsheetId: required('REPORT_SPREADSHEET_ID'),
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  // Google credentials are only needed when the watcher talks to Gmail/Sheets
  if (config.incidentWatcher.enabled) {
    if (!config.google.clientId) errors.push('GOOGLE_CLIENT_ID is required when the watcher is enabled');
    if (!config.google.clientSecret) errors.push('GOOGLE_CLIENT_SECRET is required when the watcher is enabled');
    if (!config.google.refreshToken) errors.push('GOOGLE_REFRESH_TOKEN is required when the watcher is enabled');
    if (!config.google.spreadsheetId) errors.push('REPORT_SPREADSHEET_ID is required when the watcher is enabled');
  }

  // Numeric bounds
  if (config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (config.incidentWatcher.intervalMs < 10000) {
    errors.push(`INCIDENT_WATCHER_INTERVAL_MS must be >= 10000, got ${config.incidentWatcher.intervalMs}`);
  }
  if (config.incidentWatcher.batchSize < 1 || config.incidentWatcher.batchSize > 100) {
    errors.push(`INCIDENT_WATCHER_BATCH_SIZE must be 1-100, got ${config.incidentWatcher.batchSize}`);
  }
  if (config.incidentWatcher.lookbackDays < 1) {
    errors.push(`INCIDENT_WATCHER_LOOKBACK_DAYS must be >= 1, got ${config.incidentWatcher.lookbackDays}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
