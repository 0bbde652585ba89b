import type { Logger } from 'pino';
import type { IStateStore } from '../../stores/interfaces';
import defaultLogger from '../../utils/logger';
import { decodeBreakerState, encodeBreakerState } from './codec';
import type { CircuitBreakerState } from './types';

export type CircuitState = 'closed' | 'open';

/**
 * How recordFailure stamps lastFailureAt.
 * - sliding: every failure re-stamps, so the cooldown restarts while failures continue
 * - fixed: an open breaker keeps the stamp it opened with until its cooldown has run out
 */
export type RestampPolicy = 'sliding' | 'fixed';

export interface CircuitBreakerConfig {
  failureThreshold: number;
  cooldownMs: number;
  restampPolicy: RestampPolicy;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 3,
  cooldownMs: 60000,
  restampPolicy: 'sliding',
};

const KEY_PREFIX = 'breaker:';

export interface CircuitBreakerStatus extends CircuitBreakerState {
  state: CircuitState;
}

/**
 * Per-service failure counters persisted across invocations.
 * No record means closed; a record is created by the first failure and
 * removed by the next success.
 */
export class CircuitBreakerStore {
  private config: CircuitBreakerConfig;
  private log: Logger;

  constructor(
    private store: IStateStore,
    config: Partial<CircuitBreakerConfig> = {},
    logger: Logger = defaultLogger
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.log = logger.child({ component: 'circuit-breaker' });
  }

  static key(serviceId: string): string {
    return `${KEY_PREFIX}${serviceId}`;
  }

  getState(serviceId: string): CircuitBreakerState | undefined {
    return decodeBreakerState(serviceId, this.store.findByKey(CircuitBreakerStore.key(serviceId))?.value);
  }

  shouldSkip(serviceId: string, now: number): boolean {
    const state = this.getState(serviceId);
    return state !== undefined && this.isOpen(state, now);
  }

  getCircuitState(serviceId: string, now: number): CircuitState {
    return this.shouldSkip(serviceId, now) ? 'open' : 'closed';
  }

  recordFailure(serviceId: string, now: number): CircuitBreakerState {
    let wasOpen = false;
    let next: CircuitBreakerState = { serviceId, failureCount: 1, lastFailureAt: now };

    this.store.update(CircuitBreakerStore.key(serviceId), raw => {
      const current = decodeBreakerState(serviceId, raw);
      wasOpen = current !== undefined && this.isOpen(current, now);
      next = {
        serviceId,
        failureCount: (current?.failureCount ?? 0) + 1,
        lastFailureAt: current && !this.shouldRestamp(current, now) ? current.lastFailureAt : now,
      };
      return encodeBreakerState(next);
    });

    if (!wasOpen && this.isOpen(next, now)) {
      this.log.warn(
        { serviceId, failureCount: next.failureCount, cooldownMs: this.config.cooldownMs },
        'circuit opened'
      );
    }

    return next;
  }

  recordSuccess(serviceId: string): void {
    if (this.store.delete(CircuitBreakerStore.key(serviceId))) {
      this.log.info({ serviceId }, 'circuit closed');
    }
  }

  listStates(): CircuitBreakerState[] {
    const states: CircuitBreakerState[] = [];
    for (const entry of this.store.findByPrefix(KEY_PREFIX)) {
      const state = decodeBreakerState(entry.key.slice(KEY_PREFIX.length), entry.value);
      if (state) states.push(state);
    }
    return states;
  }

  listStatuses(now: number): CircuitBreakerStatus[] {
    return this.listStates().map(state => ({
      ...state,
      state: this.isOpen(state, now) ? 'open' : 'closed',
    }));
  }

  /** Drop a service's record by hand. Returns false when there was none. */
  reset(serviceId: string): boolean {
    const removed = this.store.delete(CircuitBreakerStore.key(serviceId));
    if (removed) {
      this.log.info({ serviceId }, 'circuit reset');
    }
    return removed;
  }

  getCooldownMs(): number {
    return this.config.cooldownMs;
  }

  getFailureThreshold(): number {
    return this.config.failureThreshold;
  }

  private isOpen(state: CircuitBreakerState, now: number): boolean {
    return state.failureCount >= this.config.failureThreshold
      && now - state.lastFailureAt < this.config.cooldownMs;
  }

  private shouldRestamp(current: CircuitBreakerState, now: number): boolean {
    if (this.config.restampPolicy === 'sliding') return true;
    // fixed: keep the opening stamp while the breaker is still cooling down
    return !this.isOpen(current, now);
  }
}
