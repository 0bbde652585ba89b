import type { IStateStore } from '../../stores/interfaces';
import { decodeRunMarker, encodeRunMarker } from './codec';

export const RUN_MARKER_KEY = 'run-marker';

const MAX_CLAIM_ATTEMPTS = 3;

/**
 * Whole-cycle rate limiter backed by the persisted run marker.
 * Claiming a cycle is a compare-and-swap on the marker, so two overlapping
 * invocations cannot both decide to run inside the same interval.
 */
export class CycleRateLimiter {
  constructor(private store: IStateStore, private minIntervalMs: number) {}

  getLastRunAt(): number | undefined {
    return decodeRunMarker(this.store.findByKey(RUN_MARKER_KEY)?.value);
  }

  /**
   * Try to claim a cycle at `now`. Returns false when the previous cycle is
   * younger than the minimum interval. `force` claims regardless (used when
   * there is no earlier document to fall back on).
   */
  tryAcquire(now: number, force = false): boolean {
    for (let attempt = 0; attempt < MAX_CLAIM_ATTEMPTS; attempt++) {
      const entry = this.store.findByKey(RUN_MARKER_KEY);
      const lastRunAt = decodeRunMarker(entry?.value);

      if (!force && lastRunAt !== undefined && now - lastRunAt < this.minIntervalMs) {
        return false;
      }

      // the marker never moves backwards, even if the clock does
      const next = Math.max(lastRunAt ?? 0, now);
      if (this.store.compareAndSet(RUN_MARKER_KEY, entry ? entry.version : null, encodeRunMarker(next))) {
        return true;
      }
    }

    // lost every race: someone else is running this interval
    return force;
  }

  getMinIntervalMs(): number {
    return this.minIntervalMs;
  }
}
