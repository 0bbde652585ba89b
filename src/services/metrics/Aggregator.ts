import type {
  EffectivenessReport,
  EffectivenessScore,
  MetricsDocument,
  ServiceRecord,
  SlowSnapshot,
} from './types';

export interface EffectivenessInputs {
  totalEvents: number;
  localPercentage: number;
  totalItems: number;
}

const MAX_SCORE = 100;

function clampScore(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.min(MAX_SCORE, Math.floor(value));
}

/**
 * Effectiveness score on integer arithmetic. The 0.4/0.4/0.2 weights are
 * applied as 4/4/2 tenths so the floor never sees a float rounding error.
 */
export function computeEffectiveness(inputs: EffectivenessInputs): EffectivenessScore {
  const usageScore = inputs.totalEvents > 0 ? clampScore(inputs.totalEvents / 10) : 0;
  const efficiencyScore = clampScore(inputs.localPercentage);
  const knowledgeScore = inputs.totalItems > 0 ? clampScore(inputs.totalItems / 100) : 0;
  const overallScore = Math.floor((4 * usageScore + 4 * efficiencyScore + 2 * knowledgeScore) / 10);

  return { usageScore, efficiencyScore, knowledgeScore, overallScore };
}

/** The routing service, when one was collected this cycle */
export function findRoutingRecord(
  services: Record<string, ServiceRecord>,
  routingServiceId: string | null
): ServiceRecord | undefined {
  if (routingServiceId === null) return undefined;
  return Object.hasOwn(services, routingServiceId) ? services[routingServiceId] : undefined;
}

export function buildEffectivenessReport(
  services: Record<string, ServiceRecord>,
  slow: SlowSnapshot,
  routingServiceId: string | null
): EffectivenessReport {
  const telemetry = findRoutingRecord(services, routingServiceId)?.telemetry;
  const totalEvents = telemetry?.totalEvents ?? 0;
  const localPercentage = telemetry?.localPercentage ?? 0;
  const totalItems = slow.totals.totalPoints;

  return {
    ...computeEffectiveness({ totalEvents, localPercentage, totalItems }),
    totalEventsProcessed: totalEvents,
    localQueryPercentage: localPercentage,
    estimatedTokensSaved: telemetry?.estimatedTokensSaved ?? 0,
    knowledgeBaseVectors: totalItems,
  };
}

/**
 * Build the cycle document. Pure: same inputs, same document.
 */
export function aggregate(
  services: Record<string, ServiceRecord>,
  slow: SlowSnapshot,
  now: number,
  routingServiceId: string | null
): MetricsDocument {
  return {
    timestamp: new Date(now).toISOString(),
    services,
    knowledgeBase: slow,
    effectiveness: buildEffectivenessReport(services, slow, routingServiceId),
  };
}
