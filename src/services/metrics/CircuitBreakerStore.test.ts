import { MemoryStateStore } from '../../stores/impl/MemoryStateStore';
import { CircuitBreakerStore } from './CircuitBreakerStore';

describe('CircuitBreakerStore', () => {
  let store: MemoryStateStore;
  let breakers: CircuitBreakerStore;

  beforeEach(() => {
    store = new MemoryStateStore();
    breakers = new CircuitBreakerStore(store, { failureThreshold: 3, cooldownMs: 60000 });
  });

  it('should start closed with no stored record', () => {
    expect(breakers.shouldSkip('aidb', 0)).toBe(false);
    expect(breakers.getCircuitState('aidb', 0)).toBe('closed');
    expect(breakers.getState('aidb')).toBeUndefined();
  });

  it.each([1, 2])('should stay closed after %i failure(s) below the threshold', failures => {
    for (let i = 0; i < failures; i++) {
      breakers.recordFailure('aidb', 1000 * i);
    }
    expect(breakers.shouldSkip('aidb', 5000)).toBe(false);
  });

  it('should open once the threshold is reached within the cooldown', () => {
    breakers.recordFailure('aidb', 1000);
    breakers.recordFailure('aidb', 2000);
    const state = breakers.recordFailure('aidb', 3000);

    expect(state).toEqual({ serviceId: 'aidb', failureCount: 3, lastFailureAt: 3000 });
    expect(breakers.shouldSkip('aidb', 3000)).toBe(true);
    expect(breakers.shouldSkip('aidb', 62999)).toBe(true);
  });

  it('should self-heal once the cooldown elapses without new failures', () => {
    for (const t of [0, 1000, 2000]) breakers.recordFailure('aidb', t);

    expect(breakers.shouldSkip('aidb', 61999)).toBe(true);
    expect(breakers.shouldSkip('aidb', 62000)).toBe(false);
    // the record is still there; only time closed the circuit
    expect(breakers.getState('aidb')?.failureCount).toBe(3);
  });

  it('should reopen on the first failure after self-healing', () => {
    for (const t of [0, 1000, 2000]) breakers.recordFailure('aidb', t);
    breakers.recordFailure('aidb', 70000);

    expect(breakers.getState('aidb')).toEqual({ serviceId: 'aidb', failureCount: 4, lastFailureAt: 70000 });
    expect(breakers.shouldSkip('aidb', 70001)).toBe(true);
  });

  it('should delete the record on success regardless of prior failures', () => {
    for (let i = 0; i < 10; i++) breakers.recordFailure('aidb', i);

    breakers.recordSuccess('aidb');

    expect(breakers.shouldSkip('aidb', 10)).toBe(false);
    expect(store.findByKey('breaker:aidb')).toBeUndefined();
  });

  it('should keep services independent', () => {
    for (const t of [0, 1, 2]) breakers.recordFailure('aidb', t);
    breakers.recordFailure('qdrant', 2);

    expect(breakers.shouldSkip('aidb', 3)).toBe(true);
    expect(breakers.shouldSkip('qdrant', 3)).toBe(false);
  });

  it('should persist state as failure count and timestamp', () => {
    breakers.recordFailure('embeddings', 1234);
    expect(store.findByKey('breaker:embeddings')?.value).toBe('{"failureCount":1,"lastFailureAt":1234}');
  });

  it('should ignore corrupted records', () => {
    store.put('breaker:aidb', 'not json');
    expect(breakers.getState('aidb')).toBeUndefined();
    expect(breakers.shouldSkip('aidb', 0)).toBe(false);

    expect(breakers.recordFailure('aidb', 5)).toEqual({ serviceId: 'aidb', failureCount: 1, lastFailureAt: 5 });
  });

  it('should list stored states', () => {
    breakers.recordFailure('qdrant', 10);
    breakers.recordFailure('aidb', 20);
    store.put('slow-cache', '{}');

    expect(breakers.listStates()).toEqual([
      { serviceId: 'aidb', failureCount: 1, lastFailureAt: 20 },
      { serviceId: 'qdrant', failureCount: 1, lastFailureAt: 10 },
    ]);
  });

  it('should report open and closed breakers with their counters', () => {
    for (const t of [0, 1, 2]) breakers.recordFailure('aidb', t);
    breakers.recordFailure('embeddings', 5);

    expect(breakers.listStatuses(10)).toEqual([
      { serviceId: 'aidb', failureCount: 3, lastFailureAt: 2, state: 'open' },
      { serviceId: 'embeddings', failureCount: 1, lastFailureAt: 5, state: 'closed' },
    ]);
  });

  it('should reset a breaker by hand', () => {
    for (const t of [0, 1, 2]) breakers.recordFailure('aidb', t);

    expect(breakers.reset('aidb')).toBe(true);
    expect(breakers.shouldSkip('aidb', 3)).toBe(false);
    expect(breakers.reset('aidb')).toBe(false);
  });

  it('should use default config values', () => {
    const defaults = new CircuitBreakerStore(store);
    expect(defaults.getFailureThreshold()).toBe(3);
    expect(defaults.getCooldownMs()).toBe(60000);
  });

  describe('restamp policy', () => {
    const openThenFailAgain = (policy: 'sliding' | 'fixed'): CircuitBreakerStore => {
      const cb = new CircuitBreakerStore(new MemoryStateStore(), {
        failureThreshold: 3,
        cooldownMs: 60000,
        restampPolicy: policy,
      });
      for (const t of [0, 1000, 2000]) cb.recordFailure('aidb', t);
      // a failure recorded while the breaker is already open
      cb.recordFailure('aidb', 30000);
      return cb;
    };

    it('sliding (default) should restart the cooldown on every failure', () => {
      const cb = openThenFailAgain('sliding');
      expect(cb.getState('aidb')?.lastFailureAt).toBe(30000);
      expect(cb.shouldSkip('aidb', 70000)).toBe(true);
      expect(cb.shouldSkip('aidb', 90000)).toBe(false);
    });

    it('fixed should cool down from the failure that opened the breaker', () => {
      const cb = openThenFailAgain('fixed');
      expect(cb.getState('aidb')).toEqual({ serviceId: 'aidb', failureCount: 4, lastFailureAt: 2000 });
      expect(cb.shouldSkip('aidb', 61999)).toBe(true);
      expect(cb.shouldSkip('aidb', 62000)).toBe(false);
    });

    it('fixed should still stamp failures while closed and after the cooldown', () => {
      const cb = openThenFailAgain('fixed');
      cb.recordFailure('aidb', 100000);
      expect(cb.getState('aidb')?.lastFailureAt).toBe(100000);
      expect(cb.shouldSkip('aidb', 100001)).toBe(true);
    });
  });
});
