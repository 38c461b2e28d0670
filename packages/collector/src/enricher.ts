import {
  CancelledError,
  systemClock,
  withRetry,
  type BackoffOptions,
  type Clock,
  type Logger,
  type MergedRecord,
  type RateLimiter,
  type VideoDetail,
  type VideoSearchApi,
} from '@vidtrend/shared';
import { retryUnlessCancelled } from './paginator.js';

export interface EnrichmentSummary {
  attempted: number;
  enriched: number;
  failed: number;
  requests: number;
}

export interface DetailEnricherOptions {
  rateLimiter: RateLimiter;
  logger: Logger;
  retry?: BackoffOptions;
  clock?: Clock;
}

/**
 * Refreshes merged records from the per-video detail endpoint, which carries
 * coin/share counts and exact durations that search results leave out.
 */
export class DetailEnricher {
  constructor(
    private api: VideoSearchApi,
    private options: DetailEnricherOptions,
  ) {}

  async enrich(
    records: readonly MergedRecord[],
    signal?: AbortSignal,
  ): Promise<{ records: MergedRecord[]; summary: EnrichmentSummary }> {
    const { rateLimiter, logger, retry, clock = systemClock } = this.options;
    const summary: EnrichmentSummary = { attempted: 0, enriched: 0, failed: 0, requests: 0 };
    const out: MergedRecord[] = [];

    for (const record of records) {
      if (signal?.aborted) {
        out.push(record);
        continue;
      }

      summary.attempted++;
      try {
        const detail = await withRetry(
          async () => {
            await rateLimiter.acquire(signal);
            if (signal?.aborted) throw new CancelledError();
            summary.requests++;
            return this.api.fetchVideoDetail(record.bvid);
          },
          logger,
          `detail ${record.bvid}`,
          { ...retry, retryOn: retryUnlessCancelled, clock, signal },
        );
        out.push(applyDetail(record, detail, new Date(clock.now())));
        summary.enriched++;
      } catch (err) {
        summary.failed++;
        out.push(record);
        if (!signal?.aborted) {
          logger.warn(
            { bvid: record.bvid, error: err instanceof Error ? err.message : String(err) },
            'Detail lookup failed, keeping search data',
          );
        }
      }
    }

    logger.info(summary, 'Detail enrichment finished');
    return { records: out, summary };
  }
}

export function applyDetail(record: MergedRecord, detail: VideoDetail, fetchedAt: Date): MergedRecord {
  return {
    ...record,
    views: detail.views,
    likes: detail.likes,
    coins: detail.coins,
    favorites: detail.favorites,
    shares: detail.shares,
    comments: detail.comments,
    danmaku: detail.danmaku,
    durationSeconds: detail.durationSeconds ?? record.durationSeconds,
    authorId: detail.authorId || record.authorId,
    authorName: detail.authorName || record.authorName,
    description: detail.description || record.description,
    publishedAt: record.publishedAt ?? detail.publishedAt,
    fetchedAt,
  };
}
