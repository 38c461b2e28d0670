import { describe, it, expect } from 'vitest';
import type { ScoredRecord } from '@vidtrend/shared';
import {
  buildEngagementTable,
  buildSentimentEngagementTable,
  computeRecordEngagement,
  durationBand,
  median,
  percentile,
  withEngagement,
} from './engagement.js';

function makeVideo(overrides: Partial<ScoredRecord> = {}): ScoredRecord {
  return {
    bvid: 'BV-' + Math.random().toString(36).slice(2, 8),
    aid: 0,
    title: 'Test Video',
    description: '',
    tags: [],
    authorId: 'author-1',
    authorName: 'Author',
    publishedAt: new Date('2024-01-15T10:00:00Z'),
    durationSeconds: 180,
    views: 1000,
    likes: 50,
    coins: 20,
    favorites: 30,
    shares: 5,
    comments: 10,
    danmaku: 8,
    category: '',
    url: '',
    sourceKeyword: '执行力',
    fetchedAt: new Date('2024-06-01T00:00:00Z'),
    keywords: ['执行力'],
    firstSeenAt: new Date('2024-06-01T00:00:00Z'),
    sightings: 1,
    sentiment: { label: 'neutral', score: 0 },
    ...overrides,
  };
}

describe('computeRecordEngagement', () => {
  it('computes ratios against views and the weighted score', () => {
    const e = computeRecordEngagement(makeVideo());
    expect(e.likeRatio).toBeCloseTo(0.05);
    expect(e.coinRatio).toBeCloseTo(0.02);
    expect(e.favoriteRatio).toBeCloseTo(0.03);
    expect(e.engagementRatio).toBeCloseTo(0.1 / 3);
    // 50*3 + 20*5 + 30*4 + 5*6 + 10*2
    expect(e.engagementScore).toBe(420);
    expect(e.lowSignal).toBe(false);
  });

  it('marks zero-view records as low signal with zero ratios', () => {
    const e = computeRecordEngagement(makeVideo({ views: 0, likes: 3 }));
    expect(e).toEqual({
      likeRatio: 0,
      coinRatio: 0,
      favoriteRatio: 0,
      engagementRatio: 0,
      engagementScore: 9 + 100 + 120 + 30 + 20,
      lowSignal: true,
    });
  });

  it('clamps ratios to [0, 1]', () => {
    const e = computeRecordEngagement(makeVideo({ views: 10, likes: 50, coins: 0, favorites: 5 }));
    expect(e.likeRatio).toBe(1);
    expect(e.coinRatio).toBe(0);
    expect(e.favoriteRatio).toBe(0.5);
    expect(e.engagementRatio).toBe(0.5);
  });
});

describe('summary statistics', () => {
  it('interpolates percentiles linearly', () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(percentile([1, 2, 3, 4], 0.9)).toBeCloseTo(3.7);
    expect(percentile([7], 0.9)).toBe(7);
    expect(percentile([], 0.5)).toBe(0);
  });
});

describe('durationBand', () => {
  it('uses inclusive upper bounds', () => {
    expect(durationBand(0)).toBe('0-5m');
    expect(durationBand(300)).toBe('0-5m');
    expect(durationBand(301)).toBe('5-15m');
    expect(durationBand(1800)).toBe('15-30m');
    expect(durationBand(3600)).toBe('30-60m');
    expect(durationBand(3601)).toBe('60m+');
  });
});

describe('buildEngagementTable', () => {
  const records = withEngagement([
    makeVideo({ views: 1000, likes: 100, coins: 0, favorites: 0, durationSeconds: 120 }),
    makeVideo({ views: 1000, likes: 300, coins: 0, favorites: 0, durationSeconds: 600, publishedAt: new Date('2024-05-01T00:00:00Z') }),
    makeVideo({ views: 0, durationSeconds: null }),
    makeVideo({ publishedAt: null, durationSeconds: 4000 }),
  ]);
  const table = buildEngagementTable(records);

  it('builds overall, quarter and duration rows', () => {
    expect(table.rows.map((r) => [r.dimension, r.key, r.count, r.lowSignal])).toEqual([
      ['overall', 'overall', 4, 1],
      ['quarter', '2024-Q1', 2, 1],
      ['quarter', '2024-Q2', 1, 0],
      ['duration', '0-5m', 1, 0],
      ['duration', '5-15m', 1, 0],
      ['duration', '60m+', 1, 0],
    ]);
  });

  it('records exclusions per missing field', () => {
    expect(table.exclusions).toEqual({ missingPublishedAt: 1, missingDuration: 1 });
  });

  it('summarizes ratios over records with views', () => {
    const overall = table.rows[0];
    expect(overall.likeRatio?.median).toBeCloseTo(0.1);
    expect(overall.likeRatio?.mean).toBeCloseTo((0.1 + 0.3 + 0.05) / 3);
    expect(overall.coinRatio?.p90).toBeCloseTo(0.016);
  });

  it('leaves stats empty when a group has only low-signal records', () => {
    const onlyZero = buildEngagementTable(withEngagement([makeVideo({ views: 0 })]));
    expect(onlyZero.rows[0].engagementRatio).toBeNull();
    expect(onlyZero.rows[0].lowSignal).toBe(1);
  });

  it('keeps every ratio within [0, 1]', () => {
    for (const { engagement } of records) {
      for (const value of [engagement.likeRatio, engagement.coinRatio, engagement.favoriteRatio, engagement.engagementRatio]) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
    }
  });
});

describe('buildSentimentEngagementTable', () => {
  const table = buildSentimentEngagementTable(
    withEngagement([
      makeVideo({ views: 1000, likes: 300, coins: 0, favorites: 0, sentiment: { label: 'positive', score: 0.6 } }),
      makeVideo({ views: 3000, likes: 0, coins: 0, favorites: 0, sentiment: { label: 'positive', score: 1 } }),
      makeVideo({ views: 0, sentiment: { label: 'negative', score: -0.5 } }),
    ]),
  );

  it('has one row per label that occurs', () => {
    expect(table.rows.map((r) => [r.key, r.count])).toEqual([
      ['positive', 2],
      ['negative', 1],
    ]);
  });

  it('averages views, engagement and score per label', () => {
    const [positive, negative] = table.rows;
    expect(positive.avgViews).toBe(2000);
    expect(positive.avgEngagementRatio).toBeCloseTo(0.05);
    expect(positive.avgSentimentScore).toBeCloseTo(0.8);
    expect(negative).toEqual({ key: 'negative', count: 1, avgViews: 0, avgEngagementRatio: null, avgSentimentScore: -0.5 });
  });
});
