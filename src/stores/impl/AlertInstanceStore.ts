import { Database } from 'better-sqlite3';
import { AlertInstanceRow } from '../../db/types';
import { AlertInstance } from '../../services/alerts/types';
import { IAlertInstanceStore } from '../interfaces/IAlertInstanceStore';

function toInstance(row: AlertInstanceRow): AlertInstance {
  return {
    id: row.id,
    ruleId: row.rule_id,
    sequence: row.sequence,
    state: row.state,
    consecutiveBreaches: row.consecutive_breaches,
    consecutiveClears: row.consecutive_clears,
    firstBreachAt: row.first_breach_at,
    firedAt: row.fired_at,
    resolvedAt: row.resolved_at,
    lastEvaluatedAt: row.last_evaluated_at,
    correlationId: row.correlation_id,
    lastNotifiedAt: row.last_notified_at,
  };
}

export class AlertInstanceStore implements IAlertInstanceStore {
  constructor(private db: Database) {}

  save(instance: AlertInstance): void {
    this.db
      .prepare(`
        INSERT INTO alert_instances (
          id, rule_id, sequence, state, consecutive_breaches, consecutive_clears,
          first_breach_at, fired_at, resolved_at, last_evaluated_at, correlation_id, last_notified_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          state = excluded.state,
          consecutive_breaches = excluded.consecutive_breaches,
          consecutive_clears = excluded.consecutive_clears,
          first_breach_at = excluded.first_breach_at,
          fired_at = excluded.fired_at,
          resolved_at = excluded.resolved_at,
          last_evaluated_at = excluded.last_evaluated_at,
          correlation_id = excluded.correlation_id,
          last_notified_at = excluded.last_notified_at
      `)
      .run(
        instance.id,
        instance.ruleId,
        instance.sequence,
        instance.state,
        instance.consecutiveBreaches,
        instance.consecutiveClears,
        instance.firstBreachAt,
        instance.firedAt,
        instance.resolvedAt,
        instance.lastEvaluatedAt,
        instance.correlationId,
        instance.lastNotifiedAt,
      );
  }

  findById(id: string): AlertInstance | undefined {
    const row = this.db
      .prepare('SELECT * FROM alert_instances WHERE id = ?')
      .get(id) as AlertInstanceRow | undefined;
    return row ? toInstance(row) : undefined;
  }

  findByRuleId(ruleId: string): AlertInstance[] {
    const rows = this.db
      .prepare('SELECT * FROM alert_instances WHERE rule_id = ? ORDER BY sequence ASC')
      .all(ruleId) as AlertInstanceRow[];
    return rows.map(toInstance);
  }

  findLatestPerRule(): AlertInstance[] {
    const rows = this.db
      .prepare(`
        SELECT ai.* FROM alert_instances ai
        JOIN (
          SELECT rule_id, MAX(sequence) AS max_sequence
          FROM alert_instances
          GROUP BY rule_id
        ) latest ON ai.rule_id = latest.rule_id AND ai.sequence = latest.max_sequence
        ORDER BY ai.rule_id ASC
      `)
      .all() as AlertInstanceRow[];
    return rows.map(toInstance);
  }

  count(): number {
    const row = this.db
      .prepare('SELECT COUNT(*) as count FROM alert_instances')
      .get() as { count: number };
    return row.count;
  }
}
