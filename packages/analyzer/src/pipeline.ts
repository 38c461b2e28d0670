import {
  systemClock,
  type AggregateTable,
  type Clock,
  type Logger,
  type MergedRecord,
  type SentimentLabel,
  type TimeWindow,
} from '@vidtrend/shared';
import { EmptyDatasetError } from './errors.js';
import { SentimentScorer, scoreRecords, type SentimentOptions } from './sentiment.js';
import { Tokenizer } from './tokenizer.js';
import { buildTimeBucketTable, type TimeBucketRow } from './time-buckets.js';
import {
  buildEngagementTable,
  buildSentimentEngagementTable,
  mean,
  withEngagement,
  type EngagedRecord,
  type EngagementRow,
  type SentimentEngagementRow,
} from './engagement.js';
import { buildCreatorTable, type CreatorRow, type InfluenceWeights } from './creators.js';
import {
  buildHighEngagementTable,
  buildKeywordTable,
  emptyHighEngagementTable,
  emptyKeywordTable,
  type HighEngagementTable,
  type KeywordTable,
} from './keywords.js';

export interface AnalysisPipelineOptions {
  logger: Logger;
  sentiment?: Omit<SentimentOptions, 'lexicon'>;
  weights?: InfluenceWeights;
  /** Added to the built-in stop words */
  stopWords?: readonly string[];
  topN?: number;
  clock?: Clock;
}

/** Outcome of the per-video detail lookups */
export interface EnrichmentMeta {
  attempted: number;
  enriched: number;
  failed: number;
}

/** What the collection stage reports alongside its records */
export interface RunMeta {
  keywords: string[];
  requestedRange: TimeWindow;
  unitsPlanned: number;
  failedUnits: number;
  partialUnits: number;
  cancelledUnits: number;
  failedKeywords: string[];
  requests: number;
  cancelled: boolean;
  /** Absent when detail lookups were not run */
  enrichment?: EnrichmentMeta;
}

export interface ReportSummary extends Omit<RunMeta, 'enrichment'> {
  enrichment: EnrichmentMeta | null;
  totalRecords: number;
  totalViews: number;
  avgViews: number;
  avgEngagementRatio: number;
  lowSignalRecords: number;
  sentimentDistribution: Record<SentimentLabel, number>;
  /** Earliest and latest publish time in the dataset */
  coveredRange: TimeWindow | null;
  degradedAggregates: string[];
}

export interface ReportAggregates {
  timeBuckets: AggregateTable<TimeBucketRow>;
  engagement: AggregateTable<EngagementRow>;
  sentimentEngagement: AggregateTable<SentimentEngagementRow>;
  creators: AggregateTable<CreatorRow>;
  keywords: KeywordTable;
  highEngagementKeywords: HighEngagementTable;
}

export interface Report {
  generatedAt: Date;
  summary: ReportSummary;
  aggregates: ReportAggregates;
  records: EngagedRecord[];
}

export class AnalysisPipeline {
  private readonly scorer: SentimentScorer;
  private readonly tokenizer: Tokenizer;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private options: AnalysisPipelineOptions) {
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.scorer = new SentimentScorer(options.sentiment);
    this.tokenizer = new Tokenizer({ stopWords: options.stopWords });
  }

  run(records: readonly MergedRecord[], meta: RunMeta): Report {
    if (records.length === 0) throw new EmptyDatasetError();

    this.logger.info({ records: records.length }, 'Step 1: Scoring sentiment and engagement...');
    const analyzed = withEngagement(scoreRecords(records, this.scorer));

    this.logger.info('Step 2: Building aggregates...');
    const aggregates: ReportAggregates = {
      timeBuckets: this.isolate<AggregateTable<TimeBucketRow>>('timeBuckets', () => buildTimeBucketTable(analyzed), degradedTable),
      engagement: this.isolate<AggregateTable<EngagementRow>>('engagement', () => buildEngagementTable(analyzed), degradedTable),
      sentimentEngagement: this.isolate<AggregateTable<SentimentEngagementRow>>(
        'sentimentEngagement',
        () => buildSentimentEngagementTable(analyzed),
        degradedTable,
      ),
      creators: this.isolate<AggregateTable<CreatorRow>>('creators', () => buildCreatorTable(analyzed, this.options.weights), degradedTable),
      keywords: this.isolate(
        'keywords',
        () => buildKeywordTable(analyzed, this.tokenizer, { topN: this.options.topN }),
        emptyKeywordTable,
      ),
      highEngagementKeywords: this.isolate(
        'highEngagementKeywords',
        () => buildHighEngagementTable(analyzed, this.tokenizer),
        emptyHighEngagementTable,
      ),
    };

    const summary = summarize(analyzed, meta, aggregates);

    this.logger.info(
      {
        records: summary.totalRecords,
        avgViews: Math.round(summary.avgViews),
        avgEngagement: (summary.avgEngagementRatio * 100).toFixed(2) + '%',
        sentiment: summary.sentimentDistribution,
        degraded: summary.degradedAggregates,
      },
      'Analysis complete',
    );

    return { generatedAt: new Date(this.clock.now()), summary, aggregates, records: analyzed };
  }

  /** A throwing aggregator degrades its own table and nothing else */
  private isolate<T extends AggregateTable<unknown>>(name: string, build: () => T, fallback: (name: string) => T): T {
    try {
      const table = build();
      this.logger.info({ aggregate: name, rows: table.rows.length, exclusions: table.exclusions }, 'Aggregate computed');
      return table;
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      this.logger.warn({ aggregate: name, error }, 'Aggregate failed, marking degraded');
      return { ...fallback(name), degraded: true, error };
    }
  }
}

function degradedTable<Row>(name: string): AggregateTable<Row> {
  return { name, rows: [], exclusions: {}, degraded: true };
}

function summarize(records: readonly EngagedRecord[], meta: RunMeta, aggregates: ReportAggregates): ReportSummary {
  const totalViews = records.reduce((s, r) => s + r.views, 0);
  const signal = records.filter((r) => !r.engagement.lowSignal);

  const sentimentDistribution: Record<SentimentLabel, number> = { positive: 0, neutral: 0, negative: 0 };
  for (const record of records) sentimentDistribution[record.sentiment.label]++;

  let coveredRange: TimeWindow | null = null;
  for (const { publishedAt } of records) {
    if (!publishedAt) continue;
    if (!coveredRange) {
      coveredRange = { start: publishedAt, end: publishedAt };
      continue;
    }
    if (publishedAt < coveredRange.start) coveredRange.start = publishedAt;
    if (publishedAt > coveredRange.end) coveredRange.end = publishedAt;
  }

  return {
    ...meta,
    enrichment: meta.enrichment ?? null,
    totalRecords: records.length,
    totalViews,
    avgViews: records.length > 0 ? totalViews / records.length : 0,
    avgEngagementRatio: mean(signal.map((r) => r.engagement.engagementRatio)),
    lowSignalRecords: records.length - signal.length,
    sentimentDistribution,
    coveredRange,
    degradedAggregates: [
      aggregates.timeBuckets,
      aggregates.engagement,
      aggregates.sentimentEngagement,
      aggregates.creators,
      aggregates.keywords,
      aggregates.highEngagementKeywords,
    ]
      .filter((table) => table.degraded)
      .map((table) => table.name),
  };
}
