#!/usr/bin/env node
/**
 * Alerting CLI
 *
 * Usage:
 *   alert-engine validate <file>    - Check a configuration document
 *   alert-engine migrate            - Run pending migrations
 *   alert-engine rollback [id]      - Rollback migrations (optionally to a specific id)
 *   alert-engine status             - Show migration status
 *
 * Database commands use DATABASE_PATH.
 */

import fs from 'fs';
import Database from 'better-sqlite3';
import dotenv from 'dotenv';
import { validateConfig } from './services/config';
import { loadSettings } from './services/settings/EngineSettings';
import { openDatabase, closeDatabase, rollbackMigration, getMigrationStatus } from './db';
import { ValidationError, errorMessage } from './utils/errors';

export type Print = (line: string) => void;

const USAGE = `
Alerting CLI

Commands:
  validate <file>      Check a configuration document and list every issue
  migrate              Run pending migrations
  rollback [id]        Rollback migrations (optionally to specific id)
  status               Show migration status
`;

function formatIssue(marker: string, issue: ValidationError): string {
  return issue.field ? `  ${marker} ${issue.field}: ${issue.message}` : `  ${marker} ${issue.message}`;
}

/**
 * Validate the document at `file`. Returns the exit code.
 */
export function validateFile(file: string, print: Print): number {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error) {
    print(`Cannot read ${file}: ${errorMessage(error)}`);
    return 1;
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    print(`${file}: invalid JSON: ${errorMessage(error)}`);
    return 1;
  }

  const result = validateConfig(document);
  for (const warning of result.warnings) {
    print(formatIssue('!', warning));
  }

  if (!result.valid || !result.config) {
    for (const error of result.errors) {
      print(formatIssue('✗', error));
    }
    print(`${file}: ${result.errors.length} error(s), ${result.warnings.length} warning(s)`);
    return 1;
  }

  const { rules, actionGroups } = result.config;
  print(`${file}: valid (${rules.length} rule(s), ${actionGroups.length} action group(s), ${result.warnings.length} warning(s))`);
  return 0;
}

export function runCli(argv: string[], env: NodeJS.ProcessEnv, print: Print): number {
  const [command, ...args] = argv;

  switch (command) {
    case 'validate': {
      if (!args[0]) {
        print('Usage: validate <file>');
        return 1;
      }
      return validateFile(args[0], print);
    }

    case 'migrate': {
      const db = openDatabase(loadSettings(env).databasePath);
      closeDatabase(db);
      return 0;
    }

    case 'rollback': {
      const db = new Database(loadSettings(env).databasePath);
      rollbackMigration(db, args[0]);
      db.close();
      return 0;
    }

    case 'status': {
      const db = new Database(loadSettings(env).databasePath);
      print('Migration Status:');
      print('─'.repeat(50));
      for (const m of getMigrationStatus(db)) {
        const icon = m.applied ? '✓' : '○';
        print(`  ${icon} ${m.id}: ${m.name}`);
      }
      db.close();
      return 0;
    }

    default:
      print(USAGE);
      return 1;
  }
}

if (require.main === module) {
  dotenv.config();
  try {
    process.exitCode = runCli(process.argv.slice(2), process.env, line => console.log(line));
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exitCode = 1;
  }
}
