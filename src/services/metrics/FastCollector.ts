import type { Logger } from 'pino';
import type { ServiceDefinition } from '../../config/catalog';
import defaultLogger from '../../utils/logger';
import { getErrorMessage, sanitizeUpstreamError } from '../../utils/errors';
import { getOrElse, isJsonObject, JsonObject, readArray, readString } from '../../utils/option';
import type { CircuitBreakerStore } from './CircuitBreakerStore';
import { fetchJson } from './fetchJson';
import type { TelemetryReader } from './TelemetryReader';
import { EMPTY_TELEMETRY, ServiceRecord, ServiceStatus } from './types';

export interface HealthClassification {
  status: Exclude<ServiceStatus, 'skipped'>;
  healthy: boolean;
  reportedStatus: string | null;
  payload: JsonObject;
}

/**
 * Classify a successfully fetched health body.
 * - accepted `status` value: ok
 * - some other string `status`: degraded
 * - not an object, or no string `status`: unknown
 * Anything but ok is a failure and keeps an empty payload.
 */
export function classifyHealth(body: unknown, acceptedStatuses: readonly string[]): HealthClassification {
  if (!isJsonObject(body)) {
    return { status: 'unknown', healthy: false, reportedStatus: null, payload: {} };
  }

  const reported = readString(body, 'status');
  if (!reported.some) {
    return { status: 'unknown', healthy: false, reportedStatus: null, payload: {} };
  }

  if (acceptedStatuses.includes(reported.value)) {
    return { status: 'ok', healthy: true, reportedStatus: reported.value, payload: body };
  }

  return { status: 'degraded', healthy: false, reportedStatus: reported.value, payload: {} };
}

export function skippedRecord(definition: ServiceDefinition): ServiceRecord {
  return {
    serviceId: definition.id,
    status: 'skipped',
    port: definition.port,
    reportedStatus: null,
    rawPayload: {},
    telemetry: { ...EMPTY_TELEMETRY },
    model: null,
    error: null,
  };
}

export function failedRecord(definition: ServiceDefinition, error: string): ServiceRecord {
  return {
    ...skippedRecord(definition),
    status: 'unknown',
    error,
  };
}

export interface FastCollectorDeps {
  breakers: CircuitBreakerStore;
  telemetry: TelemetryReader;
  requestTimeoutMs: number;
  logger?: Logger;
}

/**
 * Collects one cheap upstream: breaker check, one health request, the
 * telemetry tail and an optional model lookup. Never throws; every failure
 * is folded into the returned record.
 */
export class FastCollector {
  private breakers: CircuitBreakerStore;
  private telemetry: TelemetryReader;
  private requestTimeoutMs: number;
  private log: Logger;

  constructor(readonly definition: ServiceDefinition, deps: FastCollectorDeps) {
    this.breakers = deps.breakers;
    this.telemetry = deps.telemetry;
    this.requestTimeoutMs = deps.requestTimeoutMs;
    this.log = (deps.logger ?? defaultLogger).child({ component: 'fast-collector', serviceId: definition.id });
  }

  get serviceId(): string {
    return this.definition.id;
  }

  async collect(now: number, signal?: AbortSignal): Promise<ServiceRecord> {
    const { id } = this.definition;

    if (this.breakers.shouldSkip(id, now)) {
      this.log.debug('circuit open, skipping');
      return skippedRecord(this.definition);
    }

    let health: HealthClassification;
    let error: string | null = null;
    try {
      const body = await fetchJson(this.definition.healthUrl, { timeoutMs: this.requestTimeoutMs, signal });
      health = classifyHealth(body, this.definition.acceptedStatuses);
      if (!health.healthy) {
        error = health.reportedStatus === null
          ? 'Invalid response: missing status'
          : `Unexpected status: ${health.reportedStatus}`;
      }
    } catch (caught) {
      health = { status: 'unknown', healthy: false, reportedStatus: null, payload: {} };
      error = sanitizeUpstreamError(getErrorMessage(caught));
    }

    if (health.healthy) {
      this.breakers.recordSuccess(id);
    } else {
      this.breakers.recordFailure(id, now);
    }

    const telemetry = this.telemetry.read(this.definition.telemetryFile);
    const model = await this.resolveModel(health, signal);

    this.log.debug({ status: health.status, error, totalEvents: telemetry.totalEvents }, 'service collected');

    return {
      serviceId: id,
      status: health.status,
      port: this.definition.port,
      reportedStatus: health.reportedStatus,
      rawPayload: health.payload,
      telemetry,
      model,
      error,
    };
  }

  /**
   * Model name from the models endpoint when configured, else from the health
   * body. Lookup failures never count against the breaker.
   */
  private async resolveModel(health: HealthClassification, signal?: AbortSignal): Promise<string | null> {
    if (this.definition.modelUrl === null) {
      return getOrElse<string | null>(readString(health.payload, 'model'), null);
    }

    try {
      const body = await fetchJson(this.definition.modelUrl, { timeoutMs: this.requestTimeoutMs, signal });
      const models = readArray(body, 'data');
      if (!models.some || models.value.length === 0) return null;
      return getOrElse<string | null>(readString(models.value[0], 'id'), null);
    } catch (caught) {
      this.log.debug({ error: getErrorMessage(caught) }, 'model lookup failed');
      return null;
    }
  }
}
