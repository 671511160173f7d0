import { Request, Response } from 'express';
import type { AlertEngine } from '../../services/engine';
import { sendErrorResponse } from '../../utils/errors';

export function listFiringAlerts(engine: AlertEngine) {
  return (_req: Request, res: Response): void => {
    try {
      res.json({ alerts: engine.listFiring() });
    } catch (error) {
      sendErrorResponse(res, error, 'listing firing alerts');
    }
  };
}
