import { describe, it, expect, vi } from 'vitest';
import {
  AuthError,
  FatalError,
  ManualClock,
  RateLimitedError,
  RateLimiter,
  TransientError,
  type CollectionUnit,
  type Logger,
  type PageResult,
  type RawRecord,
  type VideoSearchApi,
} from '@vidtrend/shared';
import { PaginationCollector } from './paginator.js';

const mockLogger: Logger = {
  info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
} as unknown as Logger;

const UNIT: CollectionUnit = {
  keyword: '执行力',
  window: { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2024-12-31T23:59:59.999Z') },
  maxResults: 100,
};

function makeRecord(bvid: string, publishedAt: string | null = '2024-06-01T00:00:00Z'): RawRecord {
  return {
    bvid,
    aid: 0,
    title: bvid,
    description: '',
    tags: [],
    authorId: 'a',
    authorName: 'A',
    publishedAt: publishedAt ? new Date(publishedAt) : null,
    durationSeconds: 60,
    views: 10,
    likes: 1,
    coins: 0,
    favorites: 0,
    shares: 0,
    comments: 0,
    danmaku: 0,
    category: '',
    url: '',
    sourceKeyword: '执行力',
    fetchedAt: new Date('2024-12-31T00:00:00Z'),
  };
}

function page(ids: string[], hasMore: boolean, cursor = 1): PageResult {
  return {
    records: ids.map((id) => makeRecord(id)),
    hasMore,
    nextCursor: cursor + 1,
    totalResults: 0,
    totalPages: 0,
  };
}

function fakeApi(fetchPage: VideoSearchApi['fetchPage']): VideoSearchApi {
  return {
    fetchPage: vi.fn(fetchPage),
    fetchVideoDetail: vi.fn(async () => {
      throw new FatalError('not used');
    }),
  };
}

function makeCollector(api: VideoSearchApi, clock = new ManualClock(), extra: { stopOnWindowExit?: boolean } = {}) {
  return new PaginationCollector(api, {
    rateLimiter: new RateLimiter(1000, clock),
    logger: mockLogger,
    retry: { maxAttempts: 3, initialDelayMs: 100, maxDelayMs: 10_000, backoffMultiplier: 2 },
    clock,
    ...extra,
  });
}

describe('PaginationCollector', () => {
  it('follows cursors until the API reports no more pages', async () => {
    const api = fakeApi(async (_k, _w, cursor) =>
      cursor === 1 ? page(['a', 'b'], true, 1) : page(['c'], false, 2),
    );
    const result = await makeCollector(api).collect(UNIT);

    expect(result.status).toBe('completed');
    expect(result.stopReason).toBe('exhausted');
    expect(result.records.map((r) => r.bvid)).toEqual(['a', 'b', 'c']);
    expect(result.pagesFetched).toBe(2);
    expect(result.requests).toBe(2);
    expect(vi.mocked(api.fetchPage).mock.calls.map((c) => c[2])).toEqual([1, 2]);
  });

  it('waits for the rate limiter between pages', async () => {
    const clock = new ManualClock();
    const api = fakeApi(async (_k, _w, cursor) => page([`p${cursor}`], cursor < 3, cursor));
    await makeCollector(api, clock).collect(UNIT);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  it('stops at the unit cap', async () => {
    const api = fakeApi(async (_k, _w, cursor) => page([`${cursor}-1`, `${cursor}-2`, `${cursor}-3`], true, cursor));
    const result = await makeCollector(api).collect({ ...UNIT, maxResults: 5 });

    expect(result.stopReason).toBe('cap');
    expect(result.records).toHaveLength(5);
    expect(result.pagesFetched).toBe(2);
  });

  it('drops records outside the window and keeps undated ones', async () => {
    const api = fakeApi(async () => ({
      records: [
        makeRecord('late', '2025-02-01T00:00:00Z'),
        makeRecord('inside'),
        makeRecord('undated', null),
        makeRecord('early', '2023-06-01T00:00:00Z'),
      ],
      hasMore: false,
      nextCursor: 2,
      totalResults: 4,
      totalPages: 1,
    }));
    const result = await makeCollector(api).collect(UNIT);
    expect(result.records.map((r) => r.bvid)).toEqual(['inside', 'undated']);
  });

  it('keeps paging past old records unless ordering is assumed', async () => {
    const oldThenMore = async (_k: string, _w: unknown, cursor: number): Promise<PageResult> => ({
      records: cursor === 1 ? [makeRecord('new'), makeRecord('old', '2023-01-01T00:00:00Z')] : [makeRecord('later')],
      hasMore: cursor === 1,
      nextCursor: cursor + 1,
      totalResults: 3,
      totalPages: 2,
    });

    const exhaustive = await makeCollector(fakeApi(oldThenMore)).collect(UNIT);
    expect(exhaustive.records.map((r) => r.bvid)).toEqual(['new', 'later']);
    expect(exhaustive.stopReason).toBe('exhausted');

    const ordered = await makeCollector(fakeApi(oldThenMore), new ManualClock(), { stopOnWindowExit: true }).collect(UNIT);
    expect(ordered.records.map((r) => r.bvid)).toEqual(['new']);
    expect(ordered.stopReason).toBe('window');
  });

  it('retries a transient failure on the same page', async () => {
    const clock = new ManualClock();
    let calls = 0;
    const api = fakeApi(async (_k, _w, cursor) => {
      calls++;
      if (calls === 1) throw new TransientError('HTTP 502');
      return page(['a'], false, cursor);
    });
    const result = await makeCollector(api, clock).collect(UNIT);

    expect(result.status).toBe('completed');
    expect(result.retries).toBe(1);
    expect(result.requests).toBe(2);
    expect(vi.mocked(api.fetchPage).mock.calls.map((c) => c[2])).toEqual([1, 1]);
    // 100ms backoff, then the limiter tops the wait up to its 1s interval
    expect(clock.sleeps).toEqual([100, 900]);
  });

  it('never exceeds max attempts per page and keeps earlier pages', async () => {
    const api = fakeApi(async (_k, _w, cursor) => {
      if (cursor === 1) return page(['a', 'b'], true, 1);
      throw new RateLimitedError('HTTP 429');
    });
    const result = await makeCollector(api).collect(UNIT);

    expect(result.status).toBe('partial');
    expect(result.records.map((r) => r.bvid)).toEqual(['a', 'b']);
    expect(result.error).toEqual({ kind: 'rate_limited', message: 'HTTP 429' });
    const pageTwoCalls = vi.mocked(api.fetchPage).mock.calls.filter((c) => c[2] === 2);
    expect(pageTwoCalls).toHaveLength(3);
    expect(result.retries).toBe(2);
  });

  it('abandons the unit immediately on a fatal error', async () => {
    const api = fakeApi(async () => {
      throw new AuthError('Bilibili API code -101: 账号未登录');
    });
    const result = await makeCollector(api).collect(UNIT);

    expect(result.status).toBe('failed');
    expect(result.records).toEqual([]);
    expect(result.requests).toBe(1);
    expect(result.error?.kind).toBe('auth');
  });

  it('treats unclassified errors as transient', async () => {
    const api = fakeApi(async () => {
      throw new Error('socket hang up');
    });
    const result = await makeCollector(api).collect(UNIT);
    expect(result.status).toBe('partial');
    expect(result.requests).toBe(3);
  });

  it('returns what it has when cancelled between pages', async () => {
    const controller = new AbortController();
    const api = fakeApi(async (_k, _w, cursor) => {
      if (cursor === 2) controller.abort();
      return page([`p${cursor}`], true, cursor);
    });
    const result = await makeCollector(api).collect(UNIT, controller.signal);

    expect(result.status).toBe('cancelled');
    expect(result.records.map((r) => r.bvid)).toEqual(['p1', 'p2']);
    expect(api.fetchPage).toHaveBeenCalledTimes(2);
  });
});
