import {
  RateLimiter,
  systemClock,
  type BackoffOptions,
  type Clock,
  type CollectionUnit,
  type Logger,
  type MergedRecord,
  type VideoSearchApi,
} from '@vidtrend/shared';
import { PaginationCollector, type UnitResult } from './paginator.js';
import { RecordMerger } from './merger.js';
import { DetailEnricher, type EnrichmentSummary } from './enricher.js';

export interface CollectionOrchestratorOptions {
  logger: Logger;
  /** Shared by every unit; defaults to one request per second */
  rateLimiter?: RateLimiter;
  retry?: BackoffOptions;
  clock?: Clock;
  /** Units in flight at once. The rate limiter still serializes requests. */
  concurrency?: number;
  stopOnWindowExit?: boolean;
  enrichDetails?: boolean;
}

export type UnitSummary = Omit<UnitResult, 'records'> & { recordCount: number };

export interface CollectionResult {
  records: MergedRecord[];
  units: UnitSummary[];
  unitsPlanned: number;
  failedUnits: number;
  partialUnits: number;
  cancelledUnits: number;
  /** Keywords with at least one failed or partial unit */
  failedKeywords: string[];
  requests: number;
  cancelled: boolean;
  enrichment?: EnrichmentSummary;
  startedAt: Date;
  finishedAt: Date;
}

export class CollectionOrchestrator {
  private readonly paginator: PaginationCollector;
  private readonly enricher: DetailEnricher;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    api: VideoSearchApi,
    private options: CollectionOrchestratorOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
    const rateLimiter = options.rateLimiter ?? new RateLimiter(1000, this.clock);
    const shared = { rateLimiter, logger: this.logger, retry: options.retry, clock: this.clock };
    this.paginator = new PaginationCollector(api, { ...shared, stopOnWindowExit: options.stopOnWindowExit });
    this.enricher = new DetailEnricher(api, shared);
  }

  async run(plan: readonly CollectionUnit[], signal?: AbortSignal): Promise<CollectionResult> {
    const startedAt = new Date(this.clock.now());
    const concurrency = Math.max(1, this.options.concurrency ?? 1);

    this.logger.info({ units: plan.length, concurrency }, 'Starting collection');

    const results: UnitResult[] = [];
    let next = 0;
    const worker = async () => {
      while (next < plan.length) {
        const index = next++;
        const unit = plan[index];
        results[index] = signal?.aborted ? skipped(unit) : await this.paginator.collect(unit, signal);
      }
    };
    await Promise.all(Array.from({ length: Math.min(concurrency, plan.length) }, worker));

    // Merge in plan order so the outcome does not depend on which unit finished first
    const merger = new RecordMerger();
    for (const result of results) merger.add(result.records);
    let records = merger.values();

    let enrichment: EnrichmentSummary | undefined;
    if (this.options.enrichDetails && records.length > 0 && !signal?.aborted) {
      const enriched = await this.enricher.enrich(records, signal);
      records = enriched.records;
      enrichment = enriched.summary;
    }

    const units = results.map(({ records: unitRecords, ...rest }) => ({
      ...rest,
      recordCount: unitRecords.length,
    }));
    const failedKeywords = [
      ...new Set(
        results.filter((r) => r.status === 'failed' || r.status === 'partial').map((r) => r.unit.keyword),
      ),
    ];

    const collection: CollectionResult = {
      records,
      units,
      unitsPlanned: plan.length,
      failedUnits: results.filter((r) => r.status === 'failed').length,
      partialUnits: results.filter((r) => r.status === 'partial').length,
      cancelledUnits: results.filter((r) => r.status === 'cancelled').length,
      failedKeywords,
      requests: results.reduce((s, r) => s + r.requests, 0) + (enrichment?.requests ?? 0),
      cancelled: signal?.aborted ?? false,
      enrichment,
      startedAt,
      finishedAt: new Date(this.clock.now()),
    };

    this.logger.info(
      {
        videos: records.length,
        rawSightings: results.reduce((s, r) => s + r.records.length, 0),
        failedUnits: collection.failedUnits,
        partialUnits: collection.partialUnits,
        requests: collection.requests,
        cancelled: collection.cancelled,
      },
      'Collection complete',
    );

    return collection;
  }
}

function skipped(unit: CollectionUnit): UnitResult {
  return { unit, status: 'cancelled', records: [], pagesFetched: 0, requests: 0, retries: 0 };
}
