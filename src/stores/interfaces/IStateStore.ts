import { StateEntry, StateUpdater } from '../types';

/**
 * Versioned key-value store holding everything that outlives a cycle.
 * Every write bumps the entry version so callers can compare-and-swap.
 */
export interface IStateStore {
  findByKey(key: string): StateEntry | undefined;
  findByPrefix(prefix: string): StateEntry[];
  put(key: string, value: string): void;
  /** Atomic read-modify-write; returns the value written (null when deleted). */
  update(key: string, fn: StateUpdater): string | null;
  /**
   * Write only if the stored version still matches. `expectedVersion` null
   * means "only if absent". Returns false when another writer got there first.
   */
  compareAndSet(key: string, expectedVersion: number | null, value: string): boolean;
  delete(key: string): boolean;
}
