import logger from '../../../utils/logger';
import { Result, ok } from '../../../utils/result';
import { DeliveryError } from '../../../utils/errors';
import { receiverKey } from '../../registry/receivers';
import { Receiver } from '../../registry/types';
import { INotificationDelivery, NotificationPayload } from '../types';

/**
 * Default delivery: writes each notification to the log and reports success.
 * Stands in for the real email/SMS/role transports, which live outside the engine.
 */
export class LoggingDelivery implements INotificationDelivery {
  async deliver(receiver: Receiver, payload: NotificationPayload): Promise<Result<void, DeliveryError>> {
    logger.info(
      {
        receiver: receiverKey(receiver),
        receiverName: receiver.name,
        ruleId: payload.ruleId,
        eventType: payload.eventType,
        severity: payload.severity,
        idempotencyKey: payload.idempotencyKey,
      },
      'notification delivered',
    );
    return ok(undefined);
  }
}
