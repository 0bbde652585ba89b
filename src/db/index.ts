import Database, { Database as DatabaseType } from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { runMigrations } from './migrate';

export const IN_MEMORY = ':memory:';

export interface OpenDatabaseOptions {
  /** Apply pending migrations on open (default true) */
  migrate?: boolean;
}

/**
 * Open (creating if needed) the state database and bring its schema up to date.
 */
export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): DatabaseType {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  // WAL lets a reader (serve mode) coexist with a timer-driven collect run
  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 2000');

  if (options.migrate ?? true) {
    runMigrations(db);
  }
  return db;
}

export function closeDatabase(db: DatabaseType): void {
  if (db.open) {
    db.close();
  }
}

export { runMigrations, getMigrationStatus, rollbackMigration } from './migrate';
