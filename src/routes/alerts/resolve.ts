import { Request, Response } from 'express';
import type { AlertEngine } from '../../services/engine';
import { sendErrorResponse } from '../../utils/errors';

export function resolveAlert(engine: AlertEngine) {
  return (req: Request, res: Response): void => {
    try {
      res.json(engine.manualResolve(req.params.ruleId));
    } catch (error) {
      sendErrorResponse(res, error, 'resolving alert');
    }
  };
}
