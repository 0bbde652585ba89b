import { isJsonObject, readCount, readObject, readString } from '../../utils/option';
import type {
  CircuitBreakerState,
  EffectivenessReport,
  KnowledgeBaseSummary,
  KnowledgeBaseTotals,
  MetricsDocument,
  ServiceRecord,
  SlowCacheEntry,
  SlowSnapshot,
  TelemetryStats,
} from './types';

/*
 * Decoders for values persisted in the state store. Anything that does not
 * match the expected shape decodes to undefined and is treated as absent.
 */

function parseJson(raw: string | undefined): unknown {
  if (raw === undefined) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

export function decodeBreakerState(serviceId: string, raw: string | undefined): CircuitBreakerState | undefined {
  const value = parseJson(raw);
  const failureCount = readCount(value, 'failureCount');
  const lastFailureAt = readCount(value, 'lastFailureAt');
  if (!failureCount.some || !lastFailureAt.some) return undefined;
  return { serviceId, failureCount: failureCount.value, lastFailureAt: lastFailureAt.value };
}

export function encodeBreakerState(state: CircuitBreakerState): string {
  return JSON.stringify({ failureCount: state.failureCount, lastFailureAt: state.lastFailureAt });
}

export function decodeRunMarker(raw: string | undefined): number | undefined {
  const lastRunAt = readCount(parseJson(raw), 'lastRunAt');
  return lastRunAt.some ? lastRunAt.value : undefined;
}

export function encodeRunMarker(lastRunAt: number): string {
  return JSON.stringify({ lastRunAt });
}

function isCounterMap(value: unknown): value is Record<string, number> {
  return isJsonObject(value) && Object.values(value).every(isNonNegativeNumber);
}

function isKnowledgeBaseTotals(value: unknown): value is KnowledgeBaseTotals {
  if (!isJsonObject(value)) return false;
  return (value.status === 'ok' || value.status === 'unknown' || value.status === 'skipped')
    && isNonNegativeNumber(value.collectionCount)
    && isNonNegativeNumber(value.totalPoints)
    && isCounterMap(value.collections);
}

function isKnowledgeBaseSummary(value: unknown): value is KnowledgeBaseSummary {
  return isJsonObject(value) && isNonNegativeNumber(value.realEmbeddingsPercent);
}

function isSlowSnapshot(value: unknown): value is SlowSnapshot {
  return isJsonObject(value) && isKnowledgeBaseTotals(value.totals) && isKnowledgeBaseSummary(value.summary);
}

export function decodeSlowCacheEntry(raw: string | undefined): SlowCacheEntry | undefined {
  const value = parseJson(raw);
  const capturedAt = readCount(value, 'capturedAt');
  if (!capturedAt.some || !isJsonObject(value)) return undefined;
  if (!isKnowledgeBaseTotals(value.totals) || !isKnowledgeBaseSummary(value.summary)) return undefined;
  return { capturedAt: capturedAt.value, totals: value.totals, summary: value.summary };
}

export function encodeSlowCacheEntry(entry: SlowCacheEntry): string {
  return JSON.stringify({ capturedAt: entry.capturedAt, totals: entry.totals, summary: entry.summary });
}

function isTelemetryStats(value: unknown): value is TelemetryStats {
  if (!isJsonObject(value)) return false;
  return isNonNegativeNumber(value.totalEvents)
    && isNullableString(value.lastEventTime)
    && isNonNegativeNumber(value.localQueries)
    && isNonNegativeNumber(value.remoteQueries)
    && isNonNegativeNumber(value.localPercentage)
    && isNonNegativeNumber(value.estimatedTokensSaved);
}

function isServiceRecord(value: unknown): value is ServiceRecord {
  if (!isJsonObject(value)) return false;
  return typeof value.serviceId === 'string'
    && (value.status === 'ok' || value.status === 'degraded' || value.status === 'unknown' || value.status === 'skipped')
    && isNonNegativeNumber(value.port)
    && isNullableString(value.reportedStatus)
    && isJsonObject(value.rawPayload)
    && isTelemetryStats(value.telemetry)
    && isNullableString(value.model)
    && isNullableString(value.error);
}

function isEffectivenessReport(value: unknown): value is EffectivenessReport {
  if (!isJsonObject(value)) return false;
  return [
    'usageScore',
    'efficiencyScore',
    'knowledgeScore',
    'overallScore',
    'totalEventsProcessed',
    'localQueryPercentage',
    'estimatedTokensSaved',
    'knowledgeBaseVectors',
  ].every(key => isNonNegativeNumber(value[key]));
}

export function isMetricsDocument(value: unknown): value is MetricsDocument {
  if (!isJsonObject(value)) return false;
  const services = readObject(value, 'services');
  return readString(value, 'timestamp').some
    && services.some
    && Object.values(services.value).every(isServiceRecord)
    && isSlowSnapshot(value.knowledgeBase)
    && isEffectivenessReport(value.effectiveness);
}

export function decodeDocument(raw: string | undefined): MetricsDocument | undefined {
  const value = parseJson(raw);
  return isMetricsDocument(value) ? value : undefined;
}

export function encodeDocument(document: MetricsDocument): string {
  return JSON.stringify(document);
}
