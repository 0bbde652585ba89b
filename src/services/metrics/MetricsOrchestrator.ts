import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';
import { getErrorMessage, sanitizeUpstreamError } from '../../utils/errors';
import { aggregate } from './Aggregator';
import type { CycleRateLimiter } from './CycleRateLimiter';
import type { DocumentStore } from './DocumentStore';
import { failedRecord } from './FastCollector';
import type { FastCollector } from './FastCollector';
import { emptySnapshot } from './SlowCollector';
import type { SlowCollector } from './SlowCollector';
import { TaskGroup } from './taskGroup';
import type { CycleResult, MetricsDocument, ServiceRecord, SlowSnapshot } from './types';

export interface MetricsOrchestratorDeps {
  fastCollectors: FastCollector[];
  slowCollector: SlowCollector;
  limiter: CycleRateLimiter;
  documents: DocumentStore;
  /** Service whose telemetry feeds usage and efficiency */
  routingServiceId: string | null;
  cycleDeadlineMs: number;
  /** Time tasks get to finish their own failure path after the deadline */
  graceMs?: number;
  logger?: Logger;
}

/**
 * Runs whole collection cycles: rate limit, concurrent fan-out, join,
 * aggregate, persist. `run` always resolves with a document.
 */
export class MetricsOrchestrator {
  private fastCollectors: FastCollector[];
  private slowCollector: SlowCollector;
  private limiter: CycleRateLimiter;
  private documents: DocumentStore;
  private routingServiceId: string | null;
  private cycleDeadlineMs: number;
  private graceMs: number | undefined;
  private log: Logger;

  constructor(deps: MetricsOrchestratorDeps) {
    this.fastCollectors = deps.fastCollectors;
    this.slowCollector = deps.slowCollector;
    this.limiter = deps.limiter;
    this.documents = deps.documents;
    this.routingServiceId = deps.routingServiceId;
    this.cycleDeadlineMs = deps.cycleDeadlineMs;
    this.graceMs = deps.graceMs;
    this.log = (deps.logger ?? defaultLogger).child({ component: 'orchestrator' });
  }

  async run(now: number): Promise<MetricsDocument> {
    return (await this.runDetailed(now)).document;
  }

  async runDetailed(now: number): Promise<CycleResult> {
    try {
      return await this.execute(now);
    } catch (error) {
      this.log.error({ err: error }, 'cycle failed, returning fallback document');
      return {
        document: this.fallbackDocument(now, sanitizeUpstreamError(getErrorMessage(error))),
        coalesced: false,
      };
    }
  }

  private async execute(now: number): Promise<CycleResult> {
    const previous = this.documents.load();

    // without an earlier document there is nothing to coalesce onto
    if (!this.limiter.tryAcquire(now, previous === undefined) && previous) {
      this.log.debug({ lastRunAt: this.limiter.getLastRunAt() }, 'cycle coalesced');
      return { document: previous, coalesced: true };
    }

    const group = new TaskGroup({ deadlineMs: this.cycleDeadlineMs, graceMs: this.graceMs, logger: this.log });
    const fanOut = Promise.all([
      Promise.all(this.fastCollectors.map(collector =>
        group.spawn(
          collector.serviceId,
          signal => collector.collect(now, signal),
          reason => failedRecord(collector.definition, reason)
        )
      )),
      group.spawn(
        this.slowCollector.definition.id,
        signal => this.slowCollector.collectSlow(now, signal),
        () => emptySnapshot(this.slowCollector.definition, 'unknown')
      ),
    ]);

    let joined: [ServiceRecord[], SlowSnapshot];
    try {
      joined = await fanOut;
    } finally {
      group.close();
    }
    const [records, slow] = joined;

    const services: Record<string, ServiceRecord> = {};
    for (const record of records) {
      services[record.serviceId] = record;
    }

    const document = aggregate(services, slow, now, this.routingServiceId);
    try {
      this.documents.save(document);
    } catch (error) {
      this.log.error({ err: error }, 'failed to persist document, returning it unsaved');
    }

    this.log.info(
      {
        services: records.length,
        healthy: records.filter(record => record.status === 'ok').length,
        skipped: records.filter(record => record.status === 'skipped').length,
        overallScore: document.effectiveness.overallScore,
      },
      'cycle complete'
    );

    return { document, coalesced: false };
  }

  private fallbackDocument(now: number, reason: string): MetricsDocument {
    const services: Record<string, ServiceRecord> = {};
    for (const collector of this.fastCollectors) {
      services[collector.serviceId] = failedRecord(collector.definition, reason);
    }
    return aggregate(services, emptySnapshot(this.slowCollector.definition, 'unknown'), now, this.routingServiceId);
  }
}
