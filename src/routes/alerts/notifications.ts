import { Request, Response } from 'express';
import type { AlertEngine } from '../../services/engine';
import { NotFoundError, sendErrorResponse } from '../../utils/errors';

/**
 * Notification attempts for the rule's current episode. Empty until it fires.
 */
export function listAlertNotifications(engine: AlertEngine) {
  return (req: Request, res: Response): void => {
    try {
      const { ruleId } = req.params;
      const instance = engine.getAlertInstance(ruleId);
      if (!instance) {
        throw new NotFoundError(`Rule ${ruleId}`);
      }

      const attempts = instance.correlationId
        ? engine.getNotificationAttempts(instance.correlationId)
        : [];
      res.json({ ruleId, correlationId: instance.correlationId, attempts });
    } catch (error) {
      sendErrorResponse(res, error, 'listing alert notifications');
    }
  };
}
