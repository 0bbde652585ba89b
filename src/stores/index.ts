import { Database } from 'better-sqlite3';
import type { IStateStore } from './interfaces/IStateStore';
import { SqliteStateStore } from './impl/SqliteStateStore';
import { MemoryStateStore } from './impl/MemoryStateStore';

export type StoreBackend = { kind: 'sqlite'; database: Database } | { kind: 'memory' };

export function createStateStore(backend: StoreBackend): IStateStore {
  switch (backend.kind) {
    case 'sqlite':
      return new SqliteStateStore(backend.database);
    case 'memory':
      return new MemoryStateStore();
  }
}

export { SqliteStateStore, MemoryStateStore };
export type { IStateStore };
export type { StateEntry, StateUpdater } from './types';
