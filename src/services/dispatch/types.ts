import { DeliveryError } from '../../utils/errors';
import { Result } from '../../utils/result';
import { AlertState, TransitionType } from '../alerts/types';
import { Receiver, Severity } from '../registry/types';

export type NotificationStatus = 'Pending' | 'Sent' | 'Failed' | 'GivenUp';

export const TERMINAL_STATUSES: readonly NotificationStatus[] = ['Sent', 'GivenUp'];

/**
 * Normalized body handed to every delivery collaborator.
 */
export interface NotificationPayload {
  correlationId: string;
  ruleId: string;
  ruleName: string;
  severity: Severity;
  severityLabel: string;
  state: AlertState;
  eventType: TransitionType;
  timestamp: string;
  /** `correlationId:eventType:notificationSeq`, stable across retries. */
  idempotencyKey: string;
}

export interface NotificationAttempt {
  id: string;
  correlationId: string;
  ruleId: string;
  eventType: TransitionType;
  receiver: Receiver;
  receiverKey: string;
  /** Deliveries tried so far. */
  attemptNumber: number;
  status: NotificationStatus;
  nextRetryAt: string | null;
  lastError: string | null;
  payload: NotificationPayload;
  createdAt: string;
  updatedAt: string;
}

/**
 * Hands a notification to its receiver. Transport is out of scope for the
 * engine; implementations report success or a DeliveryError.
 */
export interface INotificationDelivery {
  deliver(
    receiver: Receiver,
    payload: NotificationPayload,
    signal?: AbortSignal,
  ): Promise<Result<void, DeliveryError>>;
}

export enum DispatchEventType {
  SENT = 'notification:sent',
  RETRY_SCHEDULED = 'notification:retry_scheduled',
  GIVEN_UP = 'notification:given_up',
}

export interface GivenUpEvent {
  attempt: NotificationAttempt;
  error: string;
}

export interface PendingRetry {
  timer: NodeJS.Timeout;
  attemptId: string;
}
