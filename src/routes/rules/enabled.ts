import { Request, Response } from 'express';
import type { AlertEngine } from '../../services/engine';
import { sendErrorResponse, ValidationError } from '../../utils/errors';

export function setRuleEnabled(engine: AlertEngine) {
  return (req: Request, res: Response): void => {
    try {
      const enabled: unknown = req.body?.enabled;
      if (typeof enabled !== 'boolean') {
        throw new ValidationError('enabled must be a boolean', 'enabled');
      }

      const rule = engine.setRuleEnabled(req.params.ruleId, enabled);
      res.json({ ruleId: rule.id, enabled: rule.enabled });
    } catch (error) {
      sendErrorResponse(res, error, 'updating rule');
    }
  };
}
