import { NotificationAttempt } from '../../services/dispatch/types';

export interface INotificationAttemptStore {
  /** Insert or update by attempt id. */
  save(attempt: NotificationAttempt): void;
  findByCorrelationId(correlationId: string): NotificationAttempt[];
  /** Attempts that are not Sent or GivenUp yet. */
  findUnfinished(): NotificationAttempt[];
  /** Delete Sent and GivenUp attempts last updated before `timestamp`. */
  deleteTerminalOlderThan(timestamp: string): number;
  count(): number;
}
