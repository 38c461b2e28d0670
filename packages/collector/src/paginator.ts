import {
  CancelledError,
  INITIAL_CURSOR,
  classifyError,
  withRetry,
  type BackoffOptions,
  type Clock,
  type CollectionErrorKind,
  type CollectionUnit,
  type Logger,
  type PageResult,
  type RateLimiter,
  type RawRecord,
  type VideoSearchApi,
} from '@vidtrend/shared';

export type UnitStatus = 'completed' | 'partial' | 'failed' | 'cancelled';

export type StopReason = 'exhausted' | 'cap' | 'window';

export interface UnitResult {
  unit: CollectionUnit;
  status: UnitStatus;
  records: RawRecord[];
  pagesFetched: number;
  requests: number;
  retries: number;
  stopReason?: StopReason;
  error?: { kind: CollectionErrorKind; message: string };
}

export interface PaginationOptions {
  rateLimiter: RateLimiter;
  logger: Logger;
  retry?: BackoffOptions;
  clock?: Clock;
  /**
   * Stop paging once a record predates the unit window. Only valid when the
   * API returns results newest first, which Bilibili does not document.
   */
  stopOnWindowExit?: boolean;
}

/** Unclassified failures are retried as transient; a cancellation never is. */
export function retryUnlessCancelled(err: unknown): boolean {
  return !(err instanceof CancelledError) && classifyError(err).retryable;
}

/** Pages through one collection unit until it is exhausted, capped, abandoned or cancelled. */
export class PaginationCollector {
  constructor(
    private api: VideoSearchApi,
    private options: PaginationOptions,
  ) {}

  async collect(unit: CollectionUnit, signal?: AbortSignal): Promise<UnitResult> {
    const { rateLimiter, logger, retry, clock, stopOnWindowExit = false } = this.options;
    const windowStart = unit.window.start.getTime();
    const windowEnd = unit.window.end.getTime();
    const label = `${unit.keyword} ${unit.window.start.toISOString().slice(0, 10)}..${unit.window.end.toISOString().slice(0, 10)}`;

    const result: UnitResult = {
      unit,
      status: 'completed',
      records: [],
      pagesFetched: 0,
      requests: 0,
      retries: 0,
    };

    logger.info({ unit: label, maxResults: unit.maxResults }, 'Collecting unit');

    let cursor = INITIAL_CURSOR;
    for (;;) {
      if (signal?.aborted) {
        result.status = 'cancelled';
        break;
      }

      let page: PageResult;
      try {
        page = await withRetry(
          async () => {
            await rateLimiter.acquire(signal);
            if (signal?.aborted) throw new CancelledError();
            result.requests++;
            return this.api.fetchPage(unit.keyword, unit.window, cursor);
          },
          logger,
          `${label} page ${cursor}`,
          {
            ...retry,
            retryOn: retryUnlessCancelled,
            clock,
            signal,
            onRetry: () => {
              result.retries++;
            },
          },
        );
      } catch (err) {
        if (signal?.aborted) {
          result.status = 'cancelled';
          break;
        }
        const error = classifyError(err);
        result.error = { kind: error.kind, message: error.message };
        if (error.retryable) {
          result.status = 'partial';
          logger.warn(
            { unit: label, page: cursor, kept: result.records.length, error: error.message },
            'Retries exhausted, abandoning rest of unit',
          );
        } else {
          result.status = 'failed';
          logger.error({ unit: label, page: cursor, kind: error.kind, error: error.message }, 'Unit failed');
        }
        break;
      }

      result.pagesFetched++;

      let passedWindowStart = false;
      for (const record of page.records) {
        const publishedAt = record.publishedAt?.getTime();
        if (publishedAt !== undefined && publishedAt < windowStart) {
          passedWindowStart = true;
          continue;
        }
        if (publishedAt !== undefined && publishedAt > windowEnd) continue;
        if (result.records.length >= unit.maxResults) break;
        result.records.push(record);
      }

      if (result.records.length >= unit.maxResults) {
        result.stopReason = 'cap';
        break;
      }
      if (stopOnWindowExit && passedWindowStart) {
        result.stopReason = 'window';
        break;
      }
      if (!page.hasMore) {
        result.stopReason = 'exhausted';
        break;
      }
      cursor = page.nextCursor;
    }

    logger.info(
      {
        unit: label,
        status: result.status,
        records: result.records.length,
        pages: result.pagesFetched,
        retries: result.retries,
        stopReason: result.stopReason,
      },
      'Unit finished',
    );

    return result;
  }
}
