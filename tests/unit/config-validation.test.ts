import { afterEach, describe, expect, it, vi } from 'vitest';

const SNAPSHOT_KEYS = [
  'NODE_ENV',
  'PORT',
  'CATALOG_DIR',
  'INCIDENT_WATCHER_ENABLED',
  'INCIDENT_WATCHER_INTERVAL_MS',
  'INCIDENT_WATCHER_BATCH_SIZE',
  'INCIDENT_WATCHER_LOOKBACK_DAYS',
  'GOOGLE_CLIENT_ID',
  'GOOGLE_CLIENT_SECRET',
  'GOOGLE_REFRESH_TOKEN',
  'REPORT_SPREADSHEET_ID',
];

const ORIGINAL_ENV = new Map<string, string | undefined>(
  SNAPSHOT_KEYS.map((key) => [key, process.env[key]])
);

async function importConfigWith(overrides: Record<string, string | undefined>) {
  vi.resetModules();

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  return import('../../src/config.js');
}

describe('validateConfig', () => {
  afterEach(() => {
    for (const key of SNAPSHOT_KEYS) {
      const original = ORIGINAL_ENV.get(key);
      if (original === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = original;
      }
    }
    vi.resetModules();
    vi.restoreAllMocks();
  });

  it('passes with the test environment', async () => {
    const { validateConfig } = await importConfigWith({});
    expect(() => validateConfig()).not.toThrow();
  });

  it('does not require Google credentials when the watcher is disabled', async () => {
    const { validateConfig } = await importConfigWith({
      INCIDENT_WATCHER_ENABLED: 'false',
      GOOGLE_CLIENT_ID: undefined,
      GOOGLE_REFRESH_TOKEN: undefined,
    });
    expect(() => validateConfig()).not.toThrow();
  });

  it('requires Google credentials when the watcher is enabled', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { validateConfig } = await importConfigWith({
      INCIDENT_WATCHER_ENABLED: 'true',
      GOOGLE_REFRESH_TOKEN: undefined,
      REPORT_SPREADSHEET_ID: undefined,
    });

    expect(() => validateConfig()).toThrow(
      'Configuration validation failed:\n' +
        '  - GOOGLE_REFRESH_TOKEN is required when the watcher is enabled\n' +
        '  - REPORT_SPREADSHEET_ID is required when the watcher is enabled'
    );
  });

  it('rejects out-of-range watcher settings', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { validateConfig } = await importConfigWith({
      INCIDENT_WATCHER_INTERVAL_MS: '500',
      INCIDENT_WATCHER_BATCH_SIZE: '0',
    });

    expect(() => validateConfig()).toThrow(/INCIDENT_WATCHER_INTERVAL_MS must be >= 10000, got 500/);
    expect(() => validateConfig()).toThrow(/INCIDENT_WATCHER_BATCH_SIZE must be 1-100, got 0/);
  });

  it('reads watcher defaults', async () => {
    const { default: config } = await importConfigWith({
      INCIDENT_WATCHER_INTERVAL_MS: undefined,
      INCIDENT_WATCHER_BATCH_SIZE: undefined,
    });

    expect(config.incidentWatcher.intervalMs).toBe(60000);
    expect(config.incidentWatcher.batchSize).toBe(20);
    expect(config.incidentWatcher.query).toBe('in:inbox');
  });
});
