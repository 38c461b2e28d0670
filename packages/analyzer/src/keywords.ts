import type { AggregateTable, ScoredRecord, SentimentLabel } from '@vidtrend/shared';
import { sentimentText } from './sentiment.js';
import type { Tokenizer } from './tokenizer.js';
import { yearKey } from './time-buckets.js';
import { percentile, type EngagedRecord } from './engagement.js';

export interface KeywordRow {
  token: string;
  /** Occurrences across all records */
  count: number;
  /** Records containing the token at least once */
  documents: number;
  /** Occurrences in records of each sentiment label */
  sentiment: Record<SentimentLabel, number>;
}

export interface TermCount {
  term: string;
  count: number;
}

export interface KeywordTable extends AggregateTable<KeywordRow> {
  byLabel: Record<SentimentLabel, KeywordRow[]>;
  byYear: { year: string; tokens: TermCount[] }[];
  topTags: TermCount[];
}

export interface KeywordOptions {
  topN?: number;
  /** Tokens kept per year */
  yearTopN?: number;
}

export function emptyKeywordTable(): KeywordTable {
  return {
    name: 'keywords',
    rows: [],
    exclusions: {},
    degraded: false,
    byLabel: { positive: [], neutral: [], negative: [] },
    byYear: [],
    topTags: [],
  };
}

export function buildKeywordTable(
  records: readonly ScoredRecord[],
  tokenizer: Tokenizer,
  options: KeywordOptions = {},
): KeywordTable {
  const { topN = 50, yearTopN = 10 } = options;
  const tokens = new Map<string, KeywordRow>();
  const years = new Map<string, Map<string, number>>();
  const tags = new Map<string, number>();
  let emptyText = 0;

  for (const record of records) {
    for (const tag of new Set(record.tags.map((t) => t.trim()).filter(Boolean))) {
      tags.set(tag, (tags.get(tag) ?? 0) + 1);
    }

    const found = tokenizer.tokenize(sentimentText(record));
    if (found.length === 0) {
      emptyText++;
      continue;
    }

    const year = record.publishedAt ? yearKey(record.publishedAt) : null;
    const seen = new Set<string>();
    for (const token of found) {
      let row = tokens.get(token);
      if (!row) {
        row = { token, count: 0, documents: 0, sentiment: { positive: 0, neutral: 0, negative: 0 } };
        tokens.set(token, row);
      }
      row.count++;
      row.sentiment[record.sentiment.label]++;
      if (!seen.has(token)) {
        row.documents++;
        seen.add(token);
      }
      if (year !== null) {
        const counts = years.get(year) ?? new Map<string, number>();
        counts.set(token, (counts.get(token) ?? 0) + 1);
        years.set(year, counts);
      }
    }
  }

  const all = [...tokens.values()];
  const rankBy = (label: SentimentLabel) =>
    all
      .filter((row) => row.sentiment[label] > 0)
      .sort((a, b) => b.sentiment[label] - a.sentiment[label] || compareTerms(a.token, b.token))
      .slice(0, topN);
  const byLabel: Record<SentimentLabel, KeywordRow[]> = {
    positive: rankBy('positive'),
    neutral: rankBy('neutral'),
    negative: rankBy('negative'),
  };

  return {
    name: 'keywords',
    rows: [...all].sort((a, b) => b.count - a.count || compareTerms(a.token, b.token)).slice(0, topN),
    exclusions: emptyText > 0 ? { emptyText } : {},
    degraded: false,
    byLabel,
    byYear: [...years.keys()].sort().map((year) => ({
      year,
      tokens: topTerms(years.get(year) ?? new Map<string, number>(), yearTopN),
    })),
    topTags: topTerms(tags, topN),
  };
}

// ─── Keywords of highly engaging videos ───

export interface HighEngagementTable extends AggregateTable<TermCount> {
  /** Engagement ratio a record must exceed; null without records that have views */
  threshold: number | null;
  /** Records above the threshold */
  records: number;
}

export interface HighEngagementOptions {
  /** Quantile of the engagement ratio used as the cut-off */
  quantile?: number;
  topN?: number;
}

export function emptyHighEngagementTable(): HighEngagementTable {
  return { name: 'highEngagementKeywords', rows: [], exclusions: {}, degraded: false, threshold: null, records: 0 };
}

/** Tokens counted once per record, over records whose engagement ratio is above the quantile */
export function buildHighEngagementTable(
  records: readonly EngagedRecord[],
  tokenizer: Tokenizer,
  options: HighEngagementOptions = {},
): HighEngagementTable {
  const { quantile = 0.8, topN = 20 } = options;
  const signal = records.filter((r) => !r.engagement.lowSignal);
  const lowSignal = records.length - signal.length;
  const exclusions: Record<string, number> = lowSignal > 0 ? { lowSignal } : {};
  if (signal.length === 0) return { ...emptyHighEngagementTable(), exclusions };

  const threshold = percentile(
    signal.map((r) => r.engagement.engagementRatio),
    quantile,
  );
  const above = signal.filter((r) => r.engagement.engagementRatio > threshold);

  const counts = new Map<string, number>();
  for (const record of above) {
    for (const token of new Set(tokenizer.tokenize(sentimentText(record)))) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }

  return {
    name: 'highEngagementKeywords',
    rows: topTerms(counts, topN),
    exclusions,
    degraded: false,
    threshold,
    records: above.length,
  };
}

function topTerms(counts: ReadonlyMap<string, number>, n: number): TermCount[] {
  return [...counts.entries()]
    .map(([term, count]) => ({ term, count }))
    .sort((a, b) => b.count - a.count || compareTerms(a.term, b.term))
    .slice(0, n);
}

function compareTerms(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
