import type { SentimentLabel, TimeWindow } from '@vidtrend/shared';
import type { EngagedRecord } from './engagement.js';
import type { Report, ReportAggregates, ReportSummary } from './pipeline.js';

/** One flat row per video, for tabular export */
export interface RecordRow {
  bvid: string;
  aid: number;
  title: string;
  description: string;
  url: string;
  authorId: string;
  authorName: string;
  category: string;
  tags: string;
  /** Every keyword that surfaced the video, joined with `|` */
  keywords: string;
  sourceKeyword: string;
  publishedAt: string | null;
  durationSeconds: number | null;
  views: number;
  likes: number;
  coins: number;
  favorites: number;
  shares: number;
  comments: number;
  danmaku: number;
  sentiment: SentimentLabel;
  sentimentScore: number;
  likeRatio: number;
  coinRatio: number;
  favoriteRatio: number;
  engagementRatio: number;
  engagementScore: number;
  lowSignal: boolean;
  sightings: number;
  firstSeenAt: string;
  fetchedAt: string;
}

export function toRecordRow(record: EngagedRecord): RecordRow {
  return {
    bvid: record.bvid,
    aid: record.aid,
    title: record.title,
    description: record.description,
    url: record.url,
    authorId: record.authorId,
    authorName: record.authorName,
    category: record.category,
    tags: record.tags.join('|'),
    keywords: record.keywords.join('|'),
    sourceKeyword: record.sourceKeyword,
    publishedAt: record.publishedAt?.toISOString() ?? null,
    durationSeconds: record.durationSeconds,
    views: record.views,
    likes: record.likes,
    coins: record.coins,
    favorites: record.favorites,
    shares: record.shares,
    comments: record.comments,
    danmaku: record.danmaku,
    sentiment: record.sentiment.label,
    sentimentScore: record.sentiment.score,
    likeRatio: record.engagement.likeRatio,
    coinRatio: record.engagement.coinRatio,
    favoriteRatio: record.engagement.favoriteRatio,
    engagementRatio: record.engagement.engagementRatio,
    engagementScore: record.engagement.engagementScore,
    lowSignal: record.engagement.lowSignal,
    sightings: record.sightings,
    firstSeenAt: record.firstSeenAt.toISOString(),
    fetchedAt: record.fetchedAt.toISOString(),
  };
}

export function toRecordRows(report: Report): RecordRow[] {
  return report.records.map(toRecordRow);
}

// ─── Nested form ───

export interface WindowJson {
  start: string;
  end: string;
}

export type SummaryJson = Omit<ReportSummary, 'requestedRange' | 'coveredRange'> & {
  requestedRange: WindowJson;
  coveredRange: WindowJson | null;
};

export type RecordJson = Omit<EngagedRecord, 'publishedAt' | 'firstSeenAt' | 'fetchedAt'> & {
  publishedAt: string | null;
  firstSeenAt: string;
  fetchedAt: string;
};

export interface ReportJson {
  generatedAt: string;
  summary: SummaryJson;
  aggregates: ReportAggregates;
  records: RecordJson[];
}

function windowJson(window: TimeWindow): WindowJson {
  return { start: window.start.toISOString(), end: window.end.toISOString() };
}

/** The report as a plain object with ISO-8601 dates, ready for JSON.stringify */
export function toReportJson(report: Report): ReportJson {
  const { summary } = report;
  return {
    generatedAt: report.generatedAt.toISOString(),
    summary: {
      ...summary,
      requestedRange: windowJson(summary.requestedRange),
      coveredRange: summary.coveredRange ? windowJson(summary.coveredRange) : null,
    },
    aggregates: report.aggregates,
    records: report.records.map((record) => ({
      ...record,
      publishedAt: record.publishedAt?.toISOString() ?? null,
      firstSeenAt: record.firstSeenAt.toISOString(),
      fetchedAt: record.fetchedAt.toISOString(),
    })),
  };
}
