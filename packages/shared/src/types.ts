// ─── Collection Types ───

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface CollectionUnit {
  readonly keyword: string;
  readonly window: Readonly<TimeWindow>;
  /** This unit's share of the per-keyword result cap */
  readonly maxResults: number;
}

/** Page number on the search API; pages start at 1 */
export type PageCursor = number;

export const INITIAL_CURSOR: PageCursor = 1;

export interface EngagementCounters {
  views: number;
  likes: number;
  coins: number;
  favorites: number;
  shares: number;
  comments: number;
  danmaku: number;
}

export interface RawRecord extends EngagementCounters {
  bvid: string;
  aid: number;
  title: string;
  description: string;
  tags: string[];
  authorId: string;
  authorName: string;
  publishedAt: Date | null;
  durationSeconds: number | null;
  category: string;
  url: string;
  sourceKeyword: string;
  fetchedAt: Date;
}

export interface MergedRecord extends RawRecord {
  /** Every keyword that surfaced this video, in first-seen order */
  keywords: string[];
  firstSeenAt: Date;
  sightings: number;
}

export interface PageResult {
  records: RawRecord[];
  hasMore: boolean;
  nextCursor: PageCursor;
  totalResults: number;
  totalPages: number;
}

export interface VideoDetail extends EngagementCounters {
  bvid: string;
  durationSeconds: number | null;
  authorId: string;
  authorName: string;
  publishedAt: Date | null;
  description: string;
}

/** The remote search API as seen by the collector */
export interface VideoSearchApi {
  fetchPage(keyword: string, window: TimeWindow, cursor: PageCursor): Promise<PageResult>;
  fetchVideoDetail(bvid: string): Promise<VideoDetail>;
}

// ─── Analysis Types ───

export const SENTIMENT_LABELS = ['positive', 'neutral', 'negative'] as const;

export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

export interface SentimentResult {
  label: SentimentLabel;
  /** In [-1, 1] */
  score: number;
}

export interface ScoredRecord extends MergedRecord {
  readonly sentiment: Readonly<SentimentResult>;
}

export interface AggregateTable<Row> {
  name: string;
  rows: Row[];
  /** Records left out of this table, by reason */
  exclusions: Record<string, number>;
  degraded: boolean;
  error?: string;
}
