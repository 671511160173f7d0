import { Database } from 'better-sqlite3';

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE alert_instances (
      id TEXT PRIMARY KEY,
      rule_id TEXT NOT NULL,
      sequence INTEGER NOT NULL,
      state TEXT NOT NULL CHECK (state IN ('Pending', 'Firing', 'Resolved')),
      consecutive_breaches INTEGER NOT NULL DEFAULT 0,
      consecutive_clears INTEGER NOT NULL DEFAULT 0,
      first_breach_at TEXT,
      fired_at TEXT,
      resolved_at TEXT,
      last_evaluated_at TEXT,
      correlation_id TEXT,
      last_notified_at TEXT,
      UNIQUE (rule_id, sequence)
    );

    CREATE INDEX idx_alert_instances_rule_id ON alert_instances(rule_id);
    CREATE INDEX idx_alert_instances_correlation_id ON alert_instances(correlation_id);
  `);
}

export function down(db: Database): void {
  db.exec(`
    DROP TABLE IF EXISTS alert_instances;
  `);
}
