import type { Logger } from 'pino';
import type { CollectorConfig, ServiceCatalog } from '../../config';
import type { IStateStore } from '../../stores/interfaces';
import defaultLogger from '../../utils/logger';
import { CircuitBreakerStore } from './CircuitBreakerStore';
import { CycleRateLimiter } from './CycleRateLimiter';
import { DocumentStore } from './DocumentStore';
import { FastCollector } from './FastCollector';
import { MetricsOrchestrator } from './MetricsOrchestrator';
import { SlowCache } from './SlowCache';
import { SlowCollector } from './SlowCollector';
import { TelemetryReader } from './TelemetryReader';

export type MetricsServiceConfig = Pick<
  CollectorConfig,
  | 'outputFile'
  | 'minIntervalMs'
  | 'slowTtlMs'
  | 'requestTimeoutMs'
  | 'cycleDeadlineMs'
  | 'breaker'
  | 'telemetryWindow'
  | 'tokensPerLocalQuery'
>;

export interface MetricsService {
  orchestrator: MetricsOrchestrator;
  breakers: CircuitBreakerStore;
  cache: SlowCache;
  limiter: CycleRateLimiter;
  documents: DocumentStore;
}

/**
 * Wire every collector for a catalogue onto one state store.
 */
export function createMetricsService(
  config: MetricsServiceConfig,
  catalog: ServiceCatalog,
  store: IStateStore,
  logger: Logger = defaultLogger
): MetricsService {
  const breakers = new CircuitBreakerStore(store, config.breaker, logger);
  const cache = new SlowCache(store, config.slowTtlMs);
  const limiter = new CycleRateLimiter(store, config.minIntervalMs);
  const documents = new DocumentStore(store, config.outputFile, logger);
  const telemetry = new TelemetryReader(config.telemetryWindow, config.tokensPerLocalQuery, logger);

  const fastCollectors = catalog.services.map(definition =>
    new FastCollector(definition, { breakers, telemetry, requestTimeoutMs: config.requestTimeoutMs, logger })
  );
  const slowCollector = new SlowCollector(catalog.vectorStore, {
    breakers,
    cache,
    requestTimeoutMs: config.requestTimeoutMs,
    logger,
  });

  const orchestrator = new MetricsOrchestrator({
    fastCollectors,
    slowCollector,
    limiter,
    documents,
    routingServiceId: catalog.services.find(definition => definition.routing)?.id ?? null,
    cycleDeadlineMs: config.cycleDeadlineMs,
    logger,
  });

  return { orchestrator, breakers, cache, limiter, documents };
}

export { CircuitBreakerStore } from './CircuitBreakerStore';
export { CycleRateLimiter } from './CycleRateLimiter';
export { DocumentStore, writeFileAtomic } from './DocumentStore';
export { FastCollector, classifyHealth } from './FastCollector';
export { MetricsOrchestrator } from './MetricsOrchestrator';
export { SlowCache } from './SlowCache';
export { SlowCollector } from './SlowCollector';
export { TelemetryReader } from './TelemetryReader';
export { TaskGroup } from './taskGroup';
export { aggregate, computeEffectiveness } from './Aggregator';
export type { CircuitBreakerConfig, CircuitState, RestampPolicy } from './CircuitBreakerStore';
export * from './types';
