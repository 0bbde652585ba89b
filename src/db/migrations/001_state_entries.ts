import { Database } from 'better-sqlite3';

export const up = (db: Database): void => {
  // Versioned key-value slots: breaker records, slow cache, run marker, last document
  db.exec(`
    CREATE TABLE IF NOT EXISTS state_entries (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      version INTEGER NOT NULL DEFAULT 1,
      updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    )
  `);
};

export const down = (db: Database): void => {
  db.exec('DROP TABLE IF EXISTS state_entries');
};
