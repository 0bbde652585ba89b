import { MemoryStateStore } from '../../stores/impl/MemoryStateStore';
import { SlowCache, SLOW_CACHE_KEY } from './SlowCache';
import type { SlowCacheEntry } from './types';

const entry = (capturedAt: number, totalPoints = 42): SlowCacheEntry => ({
  capturedAt,
  totals: {
    status: 'ok',
    collectionCount: 1,
    totalPoints,
    collections: { codebaseContext: totalPoints },
  },
  summary: { realEmbeddingsPercent: totalPoints > 0 ? 100 : 0 },
});

describe('SlowCache', () => {
  let store: MemoryStateStore;
  let cache: SlowCache;

  beforeEach(() => {
    store = new MemoryStateStore();
    cache = new SlowCache(store, 30000);
  });

  it('should miss when nothing is cached', () => {
    expect(cache.read(0)).toBeUndefined();
  });

  it('should return the entry verbatim inside the TTL', () => {
    cache.write(entry(100000));
    expect(cache.read(110000)).toEqual(entry(100000));
    expect(cache.read(129999)?.capturedAt).toBe(100000);
  });

  it('should expire exactly at the TTL', () => {
    cache.write(entry(100000));
    expect(cache.read(130000)).toBeUndefined();
  });

  it('should overwrite the whole entry', () => {
    cache.write(entry(100000, 42));
    cache.write(entry(200000, 7));
    expect(cache.read(200001)).toEqual(entry(200000, 7));
  });

  it('should treat malformed entries as a miss', () => {
    store.put(SLOW_CACHE_KEY, JSON.stringify({ capturedAt: 1, totals: { status: 'weird' }, summary: {} }));
    expect(cache.read(2)).toBeUndefined();
  });
});
