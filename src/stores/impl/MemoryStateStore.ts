import { StateEntry, StateUpdater } from '../types';
import { IStateStore } from '../interfaces/IStateStore';

/**
 * Process-local store for tests and `collect --ephemeral`.
 * Single-threaded JS makes every method atomic on its own.
 */
export class MemoryStateStore implements IStateStore {
  private entries: Map<string, StateEntry> = new Map();

  findByKey(key: string): StateEntry | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  findByPrefix(prefix: string): StateEntry[] {
    return [...this.entries.values()]
      .filter(entry => entry.key.startsWith(prefix))
      .sort((a, b) => a.key.localeCompare(b.key))
      .map(entry => ({ ...entry }));
  }

  put(key: string, value: string): void {
    const existing = this.entries.get(key);
    this.entries.set(key, {
      key,
      value,
      version: existing ? existing.version + 1 : 1,
      updated_at: new Date().toISOString(),
    });
  }

  update(key: string, fn: StateUpdater): string | null {
    const next = fn(this.entries.get(key)?.value);
    if (next === null) {
      this.entries.delete(key);
    } else {
      this.put(key, next);
    }
    return next;
  }

  compareAndSet(key: string, expectedVersion: number | null, value: string): boolean {
    const existing = this.entries.get(key);
    const currentVersion = existing ? existing.version : null;
    if (currentVersion !== expectedVersion) {
      return false;
    }
    this.put(key, value);
    return true;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }
}
