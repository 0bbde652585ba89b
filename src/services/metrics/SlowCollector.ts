import type { Logger } from 'pino';
import type { VectorStoreDefinition } from '../../config/catalog';
import defaultLogger from '../../utils/logger';
import { getErrorMessage, sanitizeUpstreamError } from '../../utils/errors';
import { getOrElse, readArray, readCount, readObject, readString } from '../../utils/option';
import type { CircuitBreakerStore } from './CircuitBreakerStore';
import { fetchJson } from './fetchJson';
import type { SlowCache } from './SlowCache';
import type { KnowledgeBaseSummary, KnowledgeBaseTotals, SlowSnapshot, VectorStoreStatus } from './types';

export interface SlowCollectorDeps {
  breakers: CircuitBreakerStore;
  cache: SlowCache;
  requestTimeoutMs: number;
  logger?: Logger;
}

export function emptyTotals(definition: VectorStoreDefinition, status: VectorStoreStatus): KnowledgeBaseTotals {
  const collections: Record<string, number> = {};
  for (const field of Object.values(definition.recognizedCollections)) {
    collections[field] = 0;
  }
  return { status, collectionCount: 0, totalPoints: 0, collections };
}

export function summarize(totals: KnowledgeBaseTotals): KnowledgeBaseSummary {
  return { realEmbeddingsPercent: totals.totalPoints > 0 ? 100 : 0 };
}

export function emptySnapshot(definition: VectorStoreDefinition, status: VectorStoreStatus): SlowSnapshot {
  const totals = emptyTotals(definition, status);
  return { totals, summary: summarize(totals) };
}

/** `result.collections[].name` of the directory listing; entries without a name are dropped */
export function parseCollectionNames(body: unknown): string[] | undefined {
  const result = readObject(body, 'result');
  if (!result.some) return undefined;
  const collections = readArray(result.value, 'collections');
  if (!collections.some) return undefined;

  const names: string[] = [];
  for (const entry of collections.value) {
    const name = readString(entry, 'name');
    if (name.some) names.push(name.value);
  }
  return names;
}

/** `result.points_count` of a collection detail; anything malformed counts as 0 */
export function parsePointCount(body: unknown): number {
  const result = readObject(body, 'result');
  if (!result.some) return 0;
  return getOrElse(readCount(result.value, 'points_count'), 0);
}

/**
 * Knowledge-base totals from the vector store: one directory listing, then
 * one detail request per collection. Gated by the slow cache, so a TTL window
 * sees at most one round of requests.
 */
export class SlowCollector {
  private breakers: CircuitBreakerStore;
  private cache: SlowCache;
  private requestTimeoutMs: number;
  private log: Logger;

  constructor(readonly definition: VectorStoreDefinition, deps: SlowCollectorDeps) {
    this.breakers = deps.breakers;
    this.cache = deps.cache;
    this.requestTimeoutMs = deps.requestTimeoutMs;
    this.log = (deps.logger ?? defaultLogger).child({ component: 'slow-collector', serviceId: definition.id });
  }

  async collectSlow(now: number, signal?: AbortSignal): Promise<SlowSnapshot> {
    const cached = this.cache.read(now);
    if (cached) {
      this.log.debug({ capturedAt: cached.capturedAt }, 'slow cache hit');
      return { totals: cached.totals, summary: cached.summary };
    }

    const snapshot = await this.recompute(now, signal);

    if (signal?.aborted) {
      this.log.warn('slow recompute aborted, cache left as is');
      return snapshot;
    }

    this.cache.write({ capturedAt: now, ...snapshot });
    return snapshot;
  }

  private async recompute(now: number, signal?: AbortSignal): Promise<SlowSnapshot> {
    const { id } = this.definition;

    if (this.breakers.shouldSkip(id, now)) {
      this.log.debug('circuit open, skipping');
      return emptySnapshot(this.definition, 'skipped');
    }

    let names: string[] | undefined;
    try {
      names = parseCollectionNames(await this.get('/collections', signal));
    } catch (caught) {
      this.log.warn({ error: sanitizeUpstreamError(getErrorMessage(caught)) }, 'collection listing failed');
    }

    if (names === undefined) {
      this.breakers.recordFailure(id, now);
      return emptySnapshot(this.definition, 'unknown');
    }
    this.breakers.recordSuccess(id);

    const counts = await Promise.all(names.map(name => this.pointCount(name, signal)));

    // details cut short by the deadline would undercount the totals
    if (signal?.aborted) {
      this.breakers.recordFailure(id, now);
      this.log.warn({ collectionCount: names.length }, 'collection details aborted');
      return emptySnapshot(this.definition, 'unknown');
    }

    const totals = emptyTotals(this.definition, 'ok');
    totals.collectionCount = names.length;
    names.forEach((name, index) => {
      totals.totalPoints += counts[index];
      if (Object.hasOwn(this.definition.recognizedCollections, name)) {
        totals.collections[this.definition.recognizedCollections[name]] = counts[index];
      }
    });

    this.log.debug({ collectionCount: totals.collectionCount, totalPoints: totals.totalPoints }, 'slow aggregate recomputed');
    return { totals, summary: summarize(totals) };
  }

  private async pointCount(name: string, signal?: AbortSignal): Promise<number> {
    try {
      return parsePointCount(await this.get(`/collections/${encodeURIComponent(name)}`, signal));
    } catch (caught) {
      this.log.debug({ collection: name, error: sanitizeUpstreamError(getErrorMessage(caught)) }, 'collection detail failed');
      return 0;
    }
  }

  private get(path: string, signal?: AbortSignal): Promise<unknown> {
    return fetchJson(`${this.definition.baseUrl}${path}`, { timeoutMs: this.requestTimeoutMs, signal });
  }
}
