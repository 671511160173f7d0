import { Database } from 'better-sqlite3';
import { NotFoundError } from '../utils/errors';
import logger from '../utils/logger';
import * as initialSchema from './migrations/001_initial_schema';
import * as notificationAttempts from './migrations/002_add_notification_attempts';

interface SchemaStep {
  up(db: Database): void;
  down(db: Database): void;
}

interface Migration extends SchemaStep {
  id: string;
  name: string;
}

export interface MigrationStatus {
  id: string;
  name: string;
  applied: boolean;
}

function step(id: string, name: string, schema: SchemaStep): Migration {
  return { id, name, up: schema.up, down: schema.down };
}

/** Applied in order; ids sort lexically. */
const MIGRATIONS: readonly Migration[] = [
  step('001', 'initial_schema', initialSchema),
  step('002', 'add_notification_attempts', notificationAttempts),
];

function appliedIds(db: Database): Set<string> {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
  const rows = db.prepare('SELECT id FROM _migrations').all() as { id: string }[];
  return new Set(rows.map(row => row.id));
}

/**
 * Apply every migration not recorded in `_migrations`, each in its own
 * transaction together with its bookkeeping row.
 * @returns ids applied by this call
 */
export function runMigrations(db: Database): string[] {
  const applied = appliedIds(db);
  const record = db.prepare('INSERT INTO _migrations (id, name) VALUES (?, ?)');
  const ran: string[] = [];

  for (const migration of MIGRATIONS.filter(m => !applied.has(m.id))) {
    logger.info({ id: migration.id, name: migration.name }, 'applying migration');
    db.transaction(() => {
      migration.up(db);
      record.run(migration.id, migration.name);
    })();
    ran.push(migration.id);
  }

  return ran;
}

/**
 * Undo applied migrations newest first. With `targetId`, stops after undoing
 * that migration, so `targetId` and everything after it are removed; without
 * it, the whole schema goes.
 * @throws NotFoundError when `targetId` names no known migration
 * @returns ids rolled back by this call
 */
export function rollbackMigration(db: Database, targetId?: string): string[] {
  if (targetId !== undefined && !MIGRATIONS.some(m => m.id === targetId)) {
    throw new NotFoundError(`Migration ${targetId}`);
  }

  const applied = appliedIds(db);
  const forget = db.prepare('DELETE FROM _migrations WHERE id = ?');
  const undone: string[] = [];

  const newestFirst = [...MIGRATIONS].reverse();
  for (const migration of newestFirst) {
    if (targetId !== undefined && migration.id < targetId) break;
    if (!applied.has(migration.id)) continue;

    logger.info({ id: migration.id, name: migration.name }, 'reverting migration');
    db.transaction(() => {
      migration.down(db);
      forget.run(migration.id);
    })();
    undone.push(migration.id);
  }

  return undone;
}

export function getMigrationStatus(db: Database): MigrationStatus[] {
  const applied = appliedIds(db);
  return MIGRATIONS.map(({ id, name }) => ({ id, name, applied: applied.has(id) }));
}
