import { Router, Request, Response } from 'express';
import type { AlertEngine } from '../../services/engine';
import { ConfigError, NotFoundError, sendErrorResponse } from '../../utils/errors';

/** Reads the configuration file's current text. */
export type ConfigReader = () => Promise<string>;

export function createConfigRouter(engine: AlertEngine, readConfig: ConfigReader): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    try {
      const config = engine.getConfigVersion();
      if (!config) {
        throw new NotFoundError('Configuration');
      }
      res.json({
        version: config.version,
        loadedAt: config.loadedAt,
        ruleIds: config.rules.map(rule => rule.id),
        actionGroupIds: config.actionGroups.map(group => group.id),
        escalations: Object.fromEntries(config.escalations),
        passThrough: config.passThrough,
      });
    } catch (error) {
      sendErrorResponse(res, error, 'getting configuration');
    }
  });

  // All or nothing: a rejected document leaves the active version in place
  router.post('/reload', async (_req: Request, res: Response) => {
    try {
      const text = await readConfig();
      const result = engine.reloadText(text);
      if (!result.ok) {
        throw new ConfigError(result.error);
      }
      res.json(result.value);
    } catch (error) {
      sendErrorResponse(res, error, 'reloading configuration');
    }
  });

  return router;
}
