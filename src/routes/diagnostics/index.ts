import { Router, Request, Response } from 'express';
import type { AlertEngine } from '../../services/engine';
import { sendErrorResponse } from '../../utils/errors';

/**
 * Degraded rules and the active configuration version.
 */
export function createDiagnosticsRouter(engine: AlertEngine): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    try {
      const config = engine.getConfigVersion();
      res.json({
        config: config ? { version: config.version, loadedAt: config.loadedAt } : null,
        degraded: engine.listDegraded(),
        status: engine.getStatus(),
      });
    } catch (error) {
      sendErrorResponse(res, error, 'getting diagnostics');
    }
  });

  return router;
}
