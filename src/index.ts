/**
 * @fileoverview Express server entry point for the incident mail extractor.
 *
 * Serves the health and extraction endpoints and runs the inbox watcher in
 * the background.
 */

import express from 'express';
import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();
import extractRouter from './routes/extract.js';
import { healthHandler } from './routes/health.js';
import { startIncidentWatcher, stopIncidentWatcher } from './domains/incident-watcher/runtime/index.js';
import { closeLogSinks, createLogger } from './utils/observability/index.js';

const log = createLogger({ domain: 'server' });

const app = express();

app.use(express.json({ limit: '1mb' }));

// Health check endpoint
app.get('/health', healthHandler);

// Extraction routes
app.use(extractRouter);

const server = app.listen(config.port, () => {
  log.info('server_started', { port: config.port, env: config.nodeEnv });

  log.info('config_check', {
    catalogDir: config.catalogDir,
    watcherEnabled: config.incidentWatcher.enabled,
    hasGoogleClientId: !!config.google.clientId,
    hasGoogleRefreshToken: !!config.google.refreshToken,
    hasSpreadsheetId: !!config.google.spreadsheetId,
  });

  // Start the watcher after the server is ready
  startIncidentWatcher();
});

let isShuttingDown = false;

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  log.info('shutdown_signal_received', { signal });

  // Stop the poller first, waiting for an in-flight run
  await stopIncidentWatcher();

  const forceExitTimer = setTimeout(() => {
    log.warn('shutdown_forced');
    closeLogSinks();
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    log.info('server_closed');
    closeLogSinks();
    process.exit(0);
  });
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
