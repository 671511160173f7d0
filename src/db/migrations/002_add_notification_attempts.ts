import { Database } from 'better-sqlite3';

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE notification_attempts (
      id TEXT PRIMARY KEY,
      correlation_id TEXT NOT NULL,
      rule_id TEXT NOT NULL,
      event_type TEXT NOT NULL CHECK (event_type IN ('Fired', 'StillFiring', 'Resolved')),
      receiver TEXT NOT NULL,
      receiver_key TEXT NOT NULL,
      attempt_number INTEGER NOT NULL DEFAULT 0,
      status TEXT NOT NULL CHECK (status IN ('Pending', 'Sent', 'Failed', 'GivenUp')),
      next_retry_at TEXT,
      last_error TEXT,
      payload TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX idx_notification_attempts_correlation_id ON notification_attempts(correlation_id);
    CREATE INDEX idx_notification_attempts_status_updated ON notification_attempts(status, updated_at);
  `);
}

export function down(db: Database): void {
  db.exec(`
    DROP TABLE IF EXISTS notification_attempts;
  `);
}
