import { Request, Response } from 'express';
import type { AlertEngine } from '../../services/engine';
import { NotFoundError, sendErrorResponse } from '../../utils/errors';

/**
 * Every instance of the rule, oldest first. Removed rules keep their history.
 */
export function getAlertHistory(engine: AlertEngine) {
  return (req: Request, res: Response): void => {
    try {
      const { ruleId } = req.params;
      const instances = engine.getInstanceHistory(ruleId);
      if (instances.length === 0) {
        throw new NotFoundError(`Rule ${ruleId}`);
      }

      const limit = Math.min(Math.max(parseInt(String(req.query.limit)) || 50, 1), 250);
      res.json({ ruleId, instances: instances.slice(-limit), total: instances.length, limit });
    } catch (error) {
      sendErrorResponse(res, error, 'getting alert history');
    }
  };
}
