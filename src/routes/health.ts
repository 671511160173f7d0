import { Router, Request, Response } from 'express';
import type { Database } from 'better-sqlite3';
import { isDatabaseHealthy } from '../db';
import type { AlertEngine } from '../services/engine';

export function createHealthRouter(engine: AlertEngine, db: Database): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const databaseOk = isDatabaseHealthy(db);
    const status = engine.getStatus();

    res.status(databaseOk ? 200 : 503).json({
      status: databaseOk ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      database: databaseOk ? 'connected' : 'error',
      engine: status,
    });
  });

  return router;
}
