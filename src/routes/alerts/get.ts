import { Request, Response } from 'express';
import type { AlertEngine } from '../../services/engine';
import { NotFoundError, sendErrorResponse } from '../../utils/errors';

export function getAlert(engine: AlertEngine) {
  return (req: Request, res: Response): void => {
    try {
      const { ruleId } = req.params;
      const instance = engine.getAlertInstance(ruleId);
      if (!instance) {
        throw new NotFoundError(`Rule ${ruleId}`);
      }
      res.json(instance);
    } catch (error) {
      sendErrorResponse(res, error, 'getting alert');
    }
  };
}
