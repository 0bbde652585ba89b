import type { JsonObject } from '../../utils/option';

export type ServiceStatus = 'ok' | 'degraded' | 'unknown' | 'skipped';

export type VectorStoreStatus = 'ok' | 'unknown' | 'skipped';

export interface TelemetryStats {
  /** Newline count of the whole log, like `wc -l` */
  totalEvents: number;
  /** `timestamp` of the last line; null when missing or unparseable */
  lastEventTime: string | null;
  localQueries: number;
  remoteQueries: number;
  localPercentage: number;
  estimatedTokensSaved: number;
}

export interface ServiceRecord {
  serviceId: string;
  status: ServiceStatus;
  port: number;
  /** Raw `status` field from the health body, null when absent */
  reportedStatus: string | null;
  rawPayload: JsonObject;
  telemetry: TelemetryStats;
  model: string | null;
  error: string | null;
}

/** Slow-path payload A: what the vector store holds */
export interface KnowledgeBaseTotals {
  status: VectorStoreStatus;
  collectionCount: number;
  totalPoints: number;
  collections: Record<string, number>;
}

/** Slow-path payload B: derived from the totals alone */
export interface KnowledgeBaseSummary {
  realEmbeddingsPercent: number;
}

export interface SlowSnapshot {
  totals: KnowledgeBaseTotals;
  summary: KnowledgeBaseSummary;
}

export interface SlowCacheEntry extends SlowSnapshot {
  capturedAt: number;
}

export interface CircuitBreakerState {
  serviceId: string;
  failureCount: number;
  lastFailureAt: number;
}

export interface EffectivenessScore {
  usageScore: number;
  efficiencyScore: number;
  knowledgeScore: number;
  overallScore: number;
}

export interface EffectivenessReport extends EffectivenessScore {
  totalEventsProcessed: number;
  localQueryPercentage: number;
  estimatedTokensSaved: number;
  knowledgeBaseVectors: number;
}

export interface MetricsDocument {
  timestamp: string;
  services: Record<string, ServiceRecord>;
  knowledgeBase: SlowSnapshot;
  effectiveness: EffectivenessReport;
}

export interface CycleResult {
  document: MetricsDocument;
  /** true when the rate limiter replayed the previous document */
  coalesced: boolean;
}

export const EMPTY_TELEMETRY: TelemetryStats = Object.freeze({
  totalEvents: 0,
  lastEventTime: null,
  localQueries: 0,
  remoteQueries: 0,
  localPercentage: 0,
  estimatedTokensSaved: 0,
});
