import fs from 'fs';
import http from 'http';
import dotenv from 'dotenv';
import { createApp } from './app';
import { openDatabase, closeDatabase } from './db';
import { StoreRegistry } from './stores';
import { AlertEngine } from './services/engine';
import { INotificationDelivery, WebhookDelivery } from './services/dispatch';
import { ReceiverKind } from './services/registry';
import { HttpTelemetrySource } from './services/evaluation';
import { loadSettings, ENV_VARS } from './services/settings/EngineSettings';
import { ConfigError } from './utils/errors';
import logger from './utils/logger';

dotenv.config();

async function start() {
  const settings = loadSettings();

  if (!settings.telemetryUrl) {
    throw new Error(`${ENV_VARS.telemetryUrl} must be set`);
  }

  const db = openDatabase(settings.databasePath);
  const stores = StoreRegistry.create(db);

  const engine = new AlertEngine({
    telemetry: new HttpTelemetrySource(settings.telemetryUrl),
    deliveries: new Map<ReceiverKind, INotificationDelivery>([['webhook', new WebhookDelivery()]]),
    stores,
    scheduler: { poolSize: settings.workerPoolSize, tickMs: settings.schedulerTickMs },
    dispatch: {
      timeoutMs: settings.dispatchTimeoutMs,
      backoff: {
        baseDelayMs: settings.retryBaseDelayMs,
        maxDelayMs: settings.retryMaxDelayMs,
        maxAttempts: settings.retryMaxAttempts,
      },
    },
    telemetryTimeoutMs: settings.telemetryTimeoutMs,
    errorThreshold: settings.evaluationErrorThreshold,
    notificationRetentionHours: settings.notificationRetentionHours,
  });

  const readConfig = () => fs.promises.readFile(settings.configPath, 'utf8');

  const loaded = engine.loadConfigText(await readConfig());
  if (!loaded.ok) {
    throw new ConfigError(loaded.error);
  }

  engine.start();

  const app = createApp({ engine, db, readConfig });
  const server: http.Server = app.listen(settings.port, () => {
    logger.info({ port: settings.port }, 'server started');
  });

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('shutting down');

    await engine.shutdown();

    // Close database connection
    closeDatabase(db);

    server.close(() => {
      logger.info('server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds if server doesn't close gracefully
    // Use unref() so this timer doesn't keep the process alive
    const forceExitTimer = setTimeout(() => {
      logger.warn('forcing exit after timeout');
      process.exit(0);
    }, 10000);
    forceExitTimer.unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

start().catch((error) => {
  const issues = error instanceof ConfigError
    ? error.issues.map(issue => ({ field: issue.field, message: issue.message }))
    : undefined;
  logger.fatal({ err: error, issues }, 'failed to start server');
  process.exit(1);
});
