import express, { Express } from 'express';
import type { Database } from 'better-sqlite3';
import type { Logger } from 'pino';
import type { AlertEngine } from './services/engine';
import { createHealthRouter } from './routes/health';
import { createAlertsRouter } from './routes/alerts';
import { createRulesRouter } from './routes/rules';
import { createDiagnosticsRouter } from './routes/diagnostics';
import { createConfigRouter, ConfigReader } from './routes/config';
import { createRequestLogger } from './middleware/requestLogger';
import { errorHandler } from './utils/errors';
import defaultLogger from './utils/logger';

export interface AppDependencies {
  engine: AlertEngine;
  db: Database;
  readConfig: ConfigReader;
  logger?: Logger;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(express.json({ limit: '100kb' }));

  // Request logging (after body parsing, before routes)
  app.use(createRequestLogger({ logger: deps.logger ?? defaultLogger }));

  app.use('/api/health', createHealthRouter(deps.engine, deps.db));
  app.use('/api/alerts', createAlertsRouter(deps.engine));
  app.use('/api/rules', createRulesRouter(deps.engine));
  app.use('/api/diagnostics', createDiagnosticsRouter(deps.engine));
  app.use('/api/config', createConfigRouter(deps.engine, deps.readConfig));

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
