import {
  SENTIMENT_LABELS,
  type AggregateTable,
  type EngagementCounters,
  type ScoredRecord,
  type SentimentLabel,
} from '@vidtrend/shared';
import { quarterKey } from './time-buckets.js';

/** Analyze engagement ratios per video, per quarter and per duration band */

export interface RecordEngagement {
  likeRatio: number;
  coinRatio: number;
  favoriteRatio: number;
  /** Mean of the three ratios */
  engagementRatio: number;
  engagementScore: number;
  /** No views, so the ratios carry no information */
  lowSignal: boolean;
}

export const ENGAGEMENT_WEIGHTS = {
  likes: 3,
  coins: 5,
  favorites: 4,
  shares: 6,
  comments: 2,
} as const;

export function computeRecordEngagement(counters: EngagementCounters): RecordEngagement {
  const engagementScore =
    counters.likes * ENGAGEMENT_WEIGHTS.likes +
    counters.coins * ENGAGEMENT_WEIGHTS.coins +
    counters.favorites * ENGAGEMENT_WEIGHTS.favorites +
    counters.shares * ENGAGEMENT_WEIGHTS.shares +
    counters.comments * ENGAGEMENT_WEIGHTS.comments;

  if (counters.views <= 0) {
    return { likeRatio: 0, coinRatio: 0, favoriteRatio: 0, engagementRatio: 0, engagementScore, lowSignal: true };
  }

  const likeRatio = ratio(counters.likes, counters.views);
  const coinRatio = ratio(counters.coins, counters.views);
  const favoriteRatio = ratio(counters.favorites, counters.views);
  return {
    likeRatio,
    coinRatio,
    favoriteRatio,
    engagementRatio: (likeRatio + coinRatio + favoriteRatio) / 3,
    engagementScore,
    lowSignal: false,
  };
}

function ratio(part: number, views: number): number {
  return Math.min(1, Math.max(0, part / views));
}

// ─── Summary statistics ───

export interface RatioStats {
  mean: number;
  median: number;
  p90: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Linear interpolation between closest ranks; `p` in [0, 1] */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * p;
  const lower = Math.floor(pos);
  const upper = Math.ceil(pos);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (pos - lower);
}

export function median(values: readonly number[]): number {
  return percentile(values, 0.5);
}

function ratioStats(values: readonly number[]): RatioStats | null {
  if (values.length === 0) return null;
  return { mean: mean(values), median: median(values), p90: percentile(values, 0.9) };
}

// ─── Aggregate ───

export type EngagementDimension = 'overall' | 'quarter' | 'duration';

export interface EngagementRow {
  dimension: EngagementDimension;
  key: string;
  count: number;
  lowSignal: number;
  /** Stats cover records with views only; null when there are none */
  likeRatio: RatioStats | null;
  coinRatio: RatioStats | null;
  favoriteRatio: RatioStats | null;
  engagementRatio: RatioStats | null;
}

export interface EngagedRecord extends ScoredRecord {
  readonly engagement: Readonly<RecordEngagement>;
}

export const DURATION_BANDS = [
  { key: '0-5m', maxMinutes: 5 },
  { key: '5-15m', maxMinutes: 15 },
  { key: '15-30m', maxMinutes: 30 },
  { key: '30-60m', maxMinutes: 60 },
  { key: '60m+', maxMinutes: Infinity },
] as const;

export type DurationBand = (typeof DURATION_BANDS)[number]['key'];

/** Upper bounds are inclusive, so a five-minute video is in `0-5m` */
export function durationBand(seconds: number): DurationBand {
  const minutes = seconds / 60;
  const band = DURATION_BANDS.find((b) => minutes <= b.maxMinutes);
  return band ? band.key : '60m+';
}

export function withEngagement(records: readonly ScoredRecord[]): EngagedRecord[] {
  return records.map((record) => ({ ...record, engagement: computeRecordEngagement(record) }));
}

export function buildEngagementTable(records: readonly EngagedRecord[]): AggregateTable<EngagementRow> {
  const exclusions: Record<string, number> = {};
  const byQuarter = new Map<string, EngagedRecord[]>();
  const byBand = new Map<DurationBand, EngagedRecord[]>();

  for (const record of records) {
    if (record.publishedAt) {
      pushTo(byQuarter, quarterKey(record.publishedAt), record);
    } else {
      exclusions.missingPublishedAt = (exclusions.missingPublishedAt ?? 0) + 1;
    }
    if (record.durationSeconds !== null) {
      pushTo(byBand, durationBand(record.durationSeconds), record);
    } else {
      exclusions.missingDuration = (exclusions.missingDuration ?? 0) + 1;
    }
  }

  const rows: EngagementRow[] = [summarize('overall', 'overall', records)];
  for (const key of [...byQuarter.keys()].sort()) {
    rows.push(summarize('quarter', key, byQuarter.get(key) ?? []));
  }
  for (const { key } of DURATION_BANDS) {
    const group = byBand.get(key);
    if (group) rows.push(summarize('duration', key, group));
  }

  return { name: 'engagement', rows, exclusions, degraded: false };
}

function summarize(dimension: EngagementDimension, key: string, group: readonly EngagedRecord[]): EngagementRow {
  const signal = group.filter((r) => !r.engagement.lowSignal).map((r) => r.engagement);
  return {
    dimension,
    key,
    count: group.length,
    lowSignal: group.length - signal.length,
    likeRatio: ratioStats(signal.map((e) => e.likeRatio)),
    coinRatio: ratioStats(signal.map((e) => e.coinRatio)),
    favoriteRatio: ratioStats(signal.map((e) => e.favoriteRatio)),
    engagementRatio: ratioStats(signal.map((e) => e.engagementRatio)),
  };
}

// ─── Engagement by sentiment ───

export interface SentimentEngagementRow {
  key: SentimentLabel;
  count: number;
  avgViews: number;
  /** Over records with views; null when the label has none */
  avgEngagementRatio: number | null;
  avgSentimentScore: number;
}

/** One row per sentiment label that occurs, in label order */
export function buildSentimentEngagementTable(
  records: readonly EngagedRecord[],
): AggregateTable<SentimentEngagementRow> {
  const rows: SentimentEngagementRow[] = [];
  for (const label of SENTIMENT_LABELS) {
    const group = records.filter((r) => r.sentiment.label === label);
    if (group.length === 0) continue;
    const signal = group.filter((r) => !r.engagement.lowSignal);
    rows.push({
      key: label,
      count: group.length,
      avgViews: mean(group.map((r) => r.views)),
      avgEngagementRatio: signal.length > 0 ? mean(signal.map((r) => r.engagement.engagementRatio)) : null,
      avgSentimentScore: mean(group.map((r) => r.sentiment.score)),
    });
  }
  return { name: 'sentimentEngagement', rows, exclusions: {}, degraded: false };
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}
