import fs from 'fs';
import path from 'path';
import Database, { Database as DatabaseType } from 'better-sqlite3';
import logger from '../utils/logger';
import { runMigrations } from './migrate';

/**
 * Open (creating if needed) the history database and bring its schema up to
 * date. `:memory:` is accepted for tests.
 */
export function openDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);

  // Enable WAL mode for better concurrent performance
  db.pragma('journal_mode = WAL');

  runMigrations(db);

  logger.info({ path: dbPath }, 'database initialized');
  return db;
}

export function closeDatabase(db: DatabaseType): void {
  if (db.open) {
    db.close();
    logger.info('database connection closed');
  }
}

/**
 * Cheap liveness probe for the health endpoint.
 */
export function isDatabaseHealthy(db: DatabaseType): boolean {
  try {
    db.prepare('SELECT 1').get();
    return true;
  } catch {
    return false;
  }
}

export { runMigrations, getMigrationStatus, rollbackMigration } from './migrate';
