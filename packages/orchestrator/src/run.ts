import {
  RateLimiter,
  systemClock,
  type Clock,
  type Config,
  type Logger,
  type VideoSearchApi,
} from '@vidtrend/shared';
import { CollectionOrchestrator, planQueries, toTimeWindow, type CollectionResult } from '@vidtrend/collector';
import { AnalysisPipeline, type Report } from '@vidtrend/analyzer';
import { RunStageError } from './errors.js';
import type { ReportStore } from './report-store.js';

export interface TrendRunOptions {
  config: Config;
  api: VideoSearchApi;
  logger: Logger;
  clock?: Clock;
  /** Aborting stops collection; whatever was gathered is still analyzed */
  signal?: AbortSignal;
  /** Persist the run when given */
  store?: ReportStore;
}

export interface TrendRunResult {
  report: Report;
  collection: CollectionResult;
  runId?: number;
}

/** Plan, collect, analyze and optionally persist one run. Stage failures surface as RunStageError. */
export async function runTrendAnalysis(options: TrendRunOptions): Promise<TrendRunResult> {
  const { config, api, logger, store, signal } = options;
  const clock = options.clock ?? systemClock;

  let runId: number | undefined;
  let collection: CollectionResult;
  try {
    const requestedRange = toTimeWindow(config.dateRange);
    const plan = planQueries({
      keywords: config.keywords,
      dateRange: config.dateRange,
      maxResultsPerKeyword: config.maxResultsPerKeyword,
      pageSize: config.pageSize,
      maxPagesPerQuery: config.maxPagesPerQuery,
    });
    logger.info({ keywords: config.keywords.length, units: plan.length }, 'Query plan ready');

    if (store) {
      runId = await store.startRun({ keywords: config.keywords, requestedRange }).catch((err: unknown) => {
        throw new RunStageError('persistence', err, 0);
      });
    }

    const orchestrator = new CollectionOrchestrator(api, {
      logger,
      rateLimiter: new RateLimiter(config.requestIntervalMs, clock),
      retry: config.retry,
      clock,
      concurrency: config.concurrency,
      stopOnWindowExit: config.assumeReverseChronological,
      enrichDetails: config.enrichDetails,
    });
    collection = await orchestrator.run(plan, signal);
  } catch (err) {
    if (err instanceof RunStageError) throw err;
    await markFailed(store, runId, err, logger);
    throw new RunStageError('collection', err, 0);
  }

  let report: Report;
  try {
    const pipeline = new AnalysisPipeline({
      logger,
      sentiment: config.sentiment,
      weights: config.weights,
      stopWords: config.stopWords,
      topN: config.topN,
      clock,
    });
    const { enrichment } = collection;
    report = pipeline.run(collection.records, {
      keywords: config.keywords,
      requestedRange: toTimeWindow(config.dateRange),
      unitsPlanned: collection.unitsPlanned,
      failedUnits: collection.failedUnits,
      partialUnits: collection.partialUnits,
      cancelledUnits: collection.cancelledUnits,
      failedKeywords: collection.failedKeywords,
      requests: collection.requests,
      cancelled: collection.cancelled,
      enrichment: enrichment && {
        attempted: enrichment.attempted,
        enriched: enrichment.enriched,
        failed: enrichment.failed,
      },
    });
  } catch (err) {
    await markFailed(store, runId, err, logger);
    throw new RunStageError('analysis', err, collection.records.length);
  }

  if (store && runId !== undefined) {
    try {
      await store.saveReport(runId, report);
    } catch (err) {
      await markFailed(store, runId, err, logger);
      throw new RunStageError('persistence', err, report.records.length, report);
    }
  }

  return { report, collection, runId };
}

async function markFailed(store: ReportStore | undefined, runId: number | undefined, err: unknown, logger: Logger) {
  if (!store || runId === undefined) return;
  try {
    await store.failRun(runId, err instanceof Error ? err.message : String(err));
  } catch (storeErr) {
    logger.error({ err: storeErr, runId }, 'Could not mark run as failed');
  }
}
