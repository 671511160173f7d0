import logger from '../../../utils/logger';
import { DeliveryError, errorMessage } from '../../../utils/errors';
import { Result, err, ok } from '../../../utils/result';
import { Receiver } from '../../registry/types';
import { INotificationDelivery, NotificationPayload } from '../types';

interface CommonSchemaPayload {
  schemaId: 'commonAlertSchema';
  data: {
    essentials: {
      alertId: string;
      alertRule: string;
      severity: string;
      monitorCondition: 'Fired' | 'Resolved';
      firedDateTime: string;
      description?: string;
    };
    alertContext: {
      ruleId: string;
      eventType: string;
      idempotencyKey: string;
      url?: string;
    };
  };
}

/** 408 and 429 are worth retrying; any other 4xx is not. */
function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

/**
 * POSTs notifications to webhook receivers. Receivers with `useCommonSchema`
 * get the common alert envelope, others the flat notification payload.
 */
export class WebhookDelivery implements INotificationDelivery {
  private appBaseUrl: string;

  constructor(appBaseUrl?: string) {
    this.appBaseUrl = (appBaseUrl || process.env.APP_BASE_URL || '').replace(/\/+$/, '');
  }

  async deliver(
    receiver: Receiver,
    payload: NotificationPayload,
    signal?: AbortSignal,
  ): Promise<Result<void, DeliveryError>> {
    if (receiver.kind !== 'webhook') {
      return err(new DeliveryError(`WebhookDelivery cannot deliver to ${receiver.kind} receivers`, false));
    }

    const body = receiver.useCommonSchema ? this.buildCommonSchema(payload) : payload;

    let response: Response;
    try {
      response = await fetch(receiver.uri, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Idempotency-Key': payload.idempotencyKey,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      return err(new DeliveryError(`Webhook request failed: ${errorMessage(error)}`));
    }

    if (response.ok) {
      return ok(undefined);
    }

    const text = await response.text().catch(() => '');
    logger.debug({ receiver: receiver.name, status: response.status }, 'webhook rejected notification');
    return err(new DeliveryError(
      `Webhook returned ${response.status}: ${text}`,
      isTransientStatus(response.status),
    ));
  }

  private buildCommonSchema(payload: NotificationPayload): CommonSchemaPayload {
    const result: CommonSchemaPayload = {
      schemaId: 'commonAlertSchema',
      data: {
        essentials: {
          alertId: payload.correlationId,
          alertRule: payload.ruleName,
          severity: `Sev${payload.severity}`,
          monitorCondition: payload.eventType === 'Resolved' ? 'Resolved' : 'Fired',
          firedDateTime: payload.timestamp,
        },
        alertContext: {
          ruleId: payload.ruleId,
          eventType: payload.eventType,
          idempotencyKey: payload.idempotencyKey,
        },
      },
    };

    if (payload.severityLabel) {
      result.data.essentials.description = `${payload.severityLabel}: ${payload.eventType}`;
    }
    if (this.appBaseUrl) {
      result.data.alertContext.url = `${this.appBaseUrl}/api/alerts/${payload.ruleId}`;
    }

    return result;
  }
}
