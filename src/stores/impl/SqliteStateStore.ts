import { Database } from 'better-sqlite3';
import { StateEntry, StateUpdater } from '../types';
import { IStateStore } from '../interfaces/IStateStore';

const NOW_SQL = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

export class SqliteStateStore implements IStateStore {
  constructor(private db: Database) {}

  findByKey(key: string): StateEntry | undefined {
    return this.db
      .prepare('SELECT * FROM state_entries WHERE key = ?')
      .get(key) as StateEntry | undefined;
  }

  findByPrefix(prefix: string): StateEntry[] {
    return this.db
      .prepare('SELECT * FROM state_entries WHERE substr(key, 1, length(?)) = ? ORDER BY key')
      .all(prefix, prefix) as StateEntry[];
  }

  put(key: string, value: string): void {
    this.db
      .prepare(`
        INSERT INTO state_entries (key, value, version, updated_at)
        VALUES (?, ?, 1, ${NOW_SQL})
        ON CONFLICT(key) DO UPDATE SET
          value = excluded.value,
          version = state_entries.version + 1,
          updated_at = excluded.updated_at
      `)
      .run(key, value);
  }

  update(key: string, fn: StateUpdater): string | null {
    const transaction = this.db.transaction((): string | null => {
      const current = this.findByKey(key);
      const next = fn(current?.value);
      if (next === null) {
        this.delete(key);
      } else {
        this.put(key, next);
      }
      return next;
    });

    // IMMEDIATE takes the write lock up front so two processes cannot interleave
    return transaction.immediate();
  }

  compareAndSet(key: string, expectedVersion: number | null, value: string): boolean {
    if (expectedVersion === null) {
      const result = this.db
        .prepare(`
          INSERT INTO state_entries (key, value, version, updated_at)
          VALUES (?, ?, 1, ${NOW_SQL})
          ON CONFLICT(key) DO NOTHING
        `)
        .run(key, value);
      return result.changes > 0;
    }

    const result = this.db
      .prepare(`
        UPDATE state_entries
        SET value = ?, version = version + 1, updated_at = ${NOW_SQL}
        WHERE key = ? AND version = ?
      `)
      .run(value, key, expectedVersion);
    return result.changes > 0;
  }

  delete(key: string): boolean {
    const result = this.db
      .prepare('DELETE FROM state_entries WHERE key = ?')
      .run(key);
    return result.changes > 0;
  }
}
