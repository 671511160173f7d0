import { Database } from 'better-sqlite3';
import { NotificationAttemptRow } from '../../db/types';
import { NotificationAttempt, NotificationPayload } from '../../services/dispatch/types';
import { Receiver } from '../../services/registry/types';
import { INotificationAttemptStore } from '../interfaces/INotificationAttemptStore';

function toAttempt(row: NotificationAttemptRow): NotificationAttempt {
  const receiver: Receiver = JSON.parse(row.receiver);
  const payload: NotificationPayload = JSON.parse(row.payload);

  return {
    id: row.id,
    correlationId: row.correlation_id,
    ruleId: row.rule_id,
    eventType: row.event_type,
    receiver,
    receiverKey: row.receiver_key,
    attemptNumber: row.attempt_number,
    status: row.status,
    nextRetryAt: row.next_retry_at,
    lastError: row.last_error,
    payload,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class NotificationAttemptStore implements INotificationAttemptStore {
  constructor(private db: Database) {}

  save(attempt: NotificationAttempt): void {
    this.db
      .prepare(`
        INSERT INTO notification_attempts (
          id, correlation_id, rule_id, event_type, receiver, receiver_key, attempt_number,
          status, next_retry_at, last_error, payload, created_at, updated_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          attempt_number = excluded.attempt_number,
          status = excluded.status,
          next_retry_at = excluded.next_retry_at,
          last_error = excluded.last_error,
          updated_at = excluded.updated_at
      `)
      .run(
        attempt.id,
        attempt.correlationId,
        attempt.ruleId,
        attempt.eventType,
        JSON.stringify(attempt.receiver),
        attempt.receiverKey,
        attempt.attemptNumber,
        attempt.status,
        attempt.nextRetryAt,
        attempt.lastError,
        JSON.stringify(attempt.payload),
        attempt.createdAt,
        attempt.updatedAt,
      );
  }

  findByCorrelationId(correlationId: string): NotificationAttempt[] {
    const rows = this.db
      .prepare('SELECT * FROM notification_attempts WHERE correlation_id = ? ORDER BY created_at ASC, rowid ASC')
      .all(correlationId) as NotificationAttemptRow[];
    return rows.map(toAttempt);
  }

  findUnfinished(): NotificationAttempt[] {
    const rows = this.db
      .prepare(`
        SELECT * FROM notification_attempts
        WHERE status IN ('Pending', 'Failed')
        ORDER BY created_at ASC, rowid ASC
      `)
      .all() as NotificationAttemptRow[];
    return rows.map(toAttempt);
  }

  deleteTerminalOlderThan(timestamp: string): number {
    const result = this.db
      .prepare(`
        DELETE FROM notification_attempts
        WHERE status IN ('Sent', 'GivenUp') AND updated_at < ?
      `)
      .run(timestamp);
    return result.changes;
  }

  count(): number {
    const row = this.db
      .prepare('SELECT COUNT(*) as count FROM notification_attempts')
      .get() as { count: number };
    return row.count;
  }
}
