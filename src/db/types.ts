import { AlertState, TransitionType } from '../services/alerts/types';
import { NotificationStatus } from '../services/dispatch/types';

export interface AlertInstanceRow {
  id: string;
  rule_id: string;
  sequence: number;
  state: AlertState;
  consecutive_breaches: number;
  consecutive_clears: number;
  first_breach_at: string | null;
  fired_at: string | null;
  resolved_at: string | null;
  last_evaluated_at: string | null;
  correlation_id: string | null;
  last_notified_at: string | null;
}

export interface NotificationAttemptRow {
  id: string;
  correlation_id: string;
  rule_id: string;
  event_type: TransitionType;
  /** JSON-encoded Receiver */
  receiver: string;
  receiver_key: string;
  attempt_number: number;
  status: NotificationStatus;
  next_retry_at: string | null;
  last_error: string | null;
  /** JSON-encoded NotificationPayload */
  payload: string;
  created_at: string;
  updated_at: string;
}
