import { Request, Response } from 'express';
import type { AlertEngine } from '../../services/engine';
import { sendErrorResponse } from '../../utils/errors';

/**
 * Run one evaluation now and return the rule's instance afterwards.
 */
export function evaluateRule(engine: AlertEngine) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const instance = await engine.evaluateNow(req.params.ruleId);
      res.json(instance);
    } catch (error) {
      sendErrorResponse(res, error, 'evaluating rule');
    }
  };
}
