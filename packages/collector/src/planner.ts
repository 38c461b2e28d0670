import type { CollectionUnit, TimeWindow } from '@vidtrend/shared';

const DAY_MS = 86_400_000;

/** Bilibili publish dates are calendar days in Beijing time */
export const DEFAULT_UTC_OFFSET = '+08:00';

export interface DateRange {
  /** YYYY-MM-DD, inclusive */
  start: string;
  /** YYYY-MM-DD, inclusive */
  end: string;
  /** Offset the calendar days are read in, `+08:00` when absent */
  utcOffset?: string;
}

export interface QueryPlanInput {
  keywords: readonly string[];
  dateRange: DateRange;
  maxResultsPerKeyword: number;
  pageSize: number;
  maxPagesPerQuery: number;
}

/** Whole days at the range's offset: start at 00:00:00.000, end at 23:59:59.999 local time */
export function toTimeWindow(range: DateRange): TimeWindow {
  const offset = range.utcOffset ?? DEFAULT_UTC_OFFSET;
  const start = Date.parse(`${range.start}T00:00:00.000${offset}`);
  const end = Date.parse(`${range.end}T00:00:00.000${offset}`) + DAY_MS - 1;
  if (Number.isNaN(start) || Number.isNaN(end)) {
    throw new RangeError(`Invalid date range: ${range.start}..${range.end} (${offset})`);
  }
  if (start > end) {
    throw new RangeError(`Date range start ${range.start} is after end ${range.end}`);
  }
  return { start: new Date(start), end: new Date(end) };
}

/**
 * Expand keywords × date range into collection units.
 *
 * A query can only reach `pageSize × maxPagesPerQuery` results, so when the
 * per-keyword cap is larger the range is cut into equal whole-day sub-windows
 * and the cap is shared between them. This is an estimate: the API can still
 * return fewer results per query than it advertises.
 */
export function planQueries(input: QueryPlanInput): CollectionUnit[] {
  const { dateRange, maxResultsPerKeyword, pageSize, maxPagesPerQuery } = input;
  if (maxResultsPerKeyword <= 0 || pageSize <= 0 || maxPagesPerQuery <= 0) {
    throw new RangeError('maxResultsPerKeyword, pageSize and maxPagesPerQuery must be positive');
  }

  const keywords = uniqueKeywords(input.keywords);
  const range = toTimeWindow(dateRange);
  const totalDays = Math.round((range.end.getTime() + 1 - range.start.getTime()) / DAY_MS);

  const reachable = pageSize * maxPagesPerQuery;
  const splits = Math.min(Math.ceil(maxResultsPerKeyword / reachable), totalDays);
  const perUnit = Math.ceil(maxResultsPerKeyword / splits);
  const windows = splitWindow(range.start.getTime(), totalDays, splits);

  return keywords.flatMap((keyword) =>
    windows.map((window) => ({ keyword, window, maxResults: perUnit })),
  );
}

function uniqueKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of keywords) {
    const keyword = raw.trim();
    if (keyword) seen.add(keyword);
  }
  return [...seen];
}

function splitWindow(startMs: number, totalDays: number, splits: number): TimeWindow[] {
  const windows: TimeWindow[] = [];
  for (let i = 0; i < splits; i++) {
    const fromDay = Math.floor((i * totalDays) / splits);
    const toDay = Math.floor(((i + 1) * totalDays) / splits);
    windows.push({
      start: new Date(startMs + fromDay * DAY_MS),
      end: new Date(startMs + toDay * DAY_MS - 1),
    });
  }
  return windows;
}
