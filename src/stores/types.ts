export interface StateEntry {
  key: string;
  value: string;
  version: number;
  updated_at: string;
}

/**
 * Read-modify-write callback. Receives the current raw value (undefined when
 * the key is absent) and returns the new value, or null to delete the key.
 */
export type StateUpdater = (current: string | undefined) => string | null;
