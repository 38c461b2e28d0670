export {
  AnalysisPipeline,
  type AnalysisPipelineOptions,
  type EnrichmentMeta,
  type Report,
  type ReportAggregates,
  type ReportSummary,
  type RunMeta,
} from './pipeline.js';
export { EmptyDatasetError } from './errors.js';
export { SentimentScorer, scoreRecords, sentimentText, type SentimentOptions } from './sentiment.js';
export { Tokenizer, type TokenizerOptions } from './tokenizer.js';
export { defaultLexicon, defaultStopWords, type SentimentLexicon } from './data.js';
export {
  buildTimeBucketTable,
  sentimentShares,
  yearKey,
  quarterKey,
  monthKey,
  GRANULARITIES,
  type Granularity,
  type TimeBucketRow,
} from './time-buckets.js';
export {
  computeRecordEngagement,
  withEngagement,
  buildEngagementTable,
  buildSentimentEngagementTable,
  durationBand,
  mean,
  median,
  percentile,
  DURATION_BANDS,
  ENGAGEMENT_WEIGHTS,
  type DurationBand,
  type EngagedRecord,
  type EngagementDimension,
  type EngagementRow,
  type RatioStats,
  type RecordEngagement,
  type SentimentEngagementRow,
} from './engagement.js';
export {
  buildCreatorTable,
  DEFAULT_INFLUENCE_WEIGHTS,
  type CreatorRow,
  type InfluenceWeights,
} from './creators.js';
export {
  buildKeywordTable,
  buildHighEngagementTable,
  emptyKeywordTable,
  emptyHighEngagementTable,
  type HighEngagementOptions,
  type HighEngagementTable,
  type KeywordOptions,
  type KeywordRow,
  type KeywordTable,
  type TermCount,
} from './keywords.js';
export {
  toRecordRow,
  toRecordRows,
  toReportJson,
  type RecordJson,
  type RecordRow,
  type ReportJson,
  type SummaryJson,
  type WindowJson,
} from './report.js';
