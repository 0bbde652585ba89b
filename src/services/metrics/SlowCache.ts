import type { IStateStore } from '../../stores/interfaces';
import { decodeSlowCacheEntry, encodeSlowCacheEntry } from './codec';
import type { SlowCacheEntry } from './types';

export const SLOW_CACHE_KEY = 'slow-cache';

/**
 * Single-slot TTL cache for the expensive knowledge-base aggregate.
 * The entry is only ever replaced whole.
 */
export class SlowCache {
  constructor(private store: IStateStore, private ttlMs: number) {}

  /**
   * Returns the cached entry while it is younger than the TTL.
   */
  read(now: number): SlowCacheEntry | undefined {
    const entry = decodeSlowCacheEntry(this.store.findByKey(SLOW_CACHE_KEY)?.value);
    if (!entry) return undefined;
    return now - entry.capturedAt < this.ttlMs ? entry : undefined;
  }

  write(entry: SlowCacheEntry): void {
    this.store.put(SLOW_CACHE_KEY, encodeSlowCacheEntry(entry));
  }
}
