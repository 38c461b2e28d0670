import { SENTIMENT_LABELS, type AggregateTable, type ScoredRecord, type SentimentLabel } from '@vidtrend/shared';

export type Granularity = 'year' | 'quarter' | 'month';

export const GRANULARITIES: readonly Granularity[] = ['year', 'quarter', 'month'];

export interface TimeBucketRow {
  granularity: Granularity;
  /** `2024`, `2024-Q1` or `2024-03` (UTC) */
  key: string;
  count: number;
  views: number;
  sentiment: Record<SentimentLabel, number>;
  /** Per-label share of the bucket in percent, all zero for an empty bucket */
  sentimentShares: Record<SentimentLabel, number>;
  /** Count change relative to the previous bucket; null when that bucket is empty or absent */
  growthRate: number | null;
  viewGrowthRate: number | null;
}

export function yearKey(date: Date): string {
  return String(date.getUTCFullYear());
}

export function quarterKey(date: Date): string {
  return `${date.getUTCFullYear()}-Q${Math.floor(date.getUTCMonth() / 3) + 1}`;
}

export function monthKey(date: Date): string {
  return `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;
}

/** Buckets are addressed by an ordinal so gaps can be filled by counting up */
const BUCKETING: Record<Granularity, { ordinal(date: Date): number; key(ordinal: number): string }> = {
  year: {
    ordinal: (d) => d.getUTCFullYear(),
    key: (n) => String(n),
  },
  quarter: {
    ordinal: (d) => d.getUTCFullYear() * 4 + Math.floor(d.getUTCMonth() / 3),
    key: (n) => `${Math.floor(n / 4)}-Q${(n % 4) + 1}`,
  },
  month: {
    ordinal: (d) => d.getUTCFullYear() * 12 + d.getUTCMonth(),
    key: (n) => `${Math.floor(n / 12)}-${String((n % 12) + 1).padStart(2, '0')}`,
  },
};

function emptySentiment(): Record<SentimentLabel, number> {
  return { positive: 0, neutral: 0, negative: 0 };
}

export function buildTimeBucketTable(records: readonly ScoredRecord[]): AggregateTable<TimeBucketRow> {
  const dated: { record: ScoredRecord; publishedAt: Date }[] = [];
  let missing = 0;
  for (const record of records) {
    if (record.publishedAt) dated.push({ record, publishedAt: record.publishedAt });
    else missing++;
  }

  const rows: TimeBucketRow[] = [];
  for (const granularity of GRANULARITIES) {
    rows.push(...bucketize(granularity, dated));
  }

  return {
    name: 'timeBuckets',
    rows,
    exclusions: missing > 0 ? { missingPublishedAt: missing } : {},
    degraded: false,
  };
}

function bucketize(
  granularity: Granularity,
  dated: readonly { record: ScoredRecord; publishedAt: Date }[],
): TimeBucketRow[] {
  if (dated.length === 0) return [];
  const { ordinal, key } = BUCKETING[granularity];

  const counts = new Map<number, { count: number; views: number; sentiment: Record<SentimentLabel, number> }>();
  let first = Infinity;
  let last = -Infinity;
  for (const { record, publishedAt } of dated) {
    const n = ordinal(publishedAt);
    first = Math.min(first, n);
    last = Math.max(last, n);
    let bucket = counts.get(n);
    if (!bucket) {
      bucket = { count: 0, views: 0, sentiment: emptySentiment() };
      counts.set(n, bucket);
    }
    bucket.count++;
    bucket.views += record.views;
    bucket.sentiment[record.sentiment.label]++;
  }

  const rows: TimeBucketRow[] = [];
  let previous: TimeBucketRow | undefined;
  for (let n = first; n <= last; n++) {
    const bucket = counts.get(n) ?? { count: 0, views: 0, sentiment: emptySentiment() };
    const row: TimeBucketRow = {
      granularity,
      key: key(n),
      count: bucket.count,
      views: bucket.views,
      sentiment: bucket.sentiment,
      sentimentShares: sentimentShares(bucket),
      growthRate: growth(previous?.count, bucket.count),
      viewGrowthRate: growth(previous?.views, bucket.views),
    };
    rows.push(row);
    previous = row;
  }
  return rows;
}

function growth(previous: number | undefined, current: number): number | null {
  if (previous === undefined || previous === 0) return null;
  return (current - previous) / previous;
}

/** Per-label share of a bucket's records, in percent */
export function sentimentShares(row: Pick<TimeBucketRow, 'count' | 'sentiment'>): Record<SentimentLabel, number> {
  const shares = emptySentiment();
  if (row.count === 0) return shares;
  for (const label of SENTIMENT_LABELS) {
    shares[label] = (row.sentiment[label] / row.count) * 100;
  }
  return shares;
}
