import type { Database, Logger, TimeWindow } from '@vidtrend/shared';
import { aggregateTables, collectionRuns, videos, eq } from '@vidtrend/shared/db';
import type { EngagedRecord, Report } from '@vidtrend/analyzer';

export interface RunStart {
  keywords: string[];
  requestedRange: TimeWindow;
}

/** Writes runs, merged videos and aggregate tables to Postgres */
export class ReportStore {
  constructor(
    private db: Database,
    private logger: Logger,
  ) {}

  async startRun(run: RunStart): Promise<number> {
    const [row] = await this.db
      .insert(collectionRuns)
      .values({
        startedAt: new Date(),
        keywords: run.keywords,
        requestedFrom: run.requestedRange.start,
        requestedTo: run.requestedRange.end,
        status: 'running',
      })
      .returning({ id: collectionRuns.id });

    this.logger.info({ runId: row.id }, 'Run recorded');
    return row.id;
  }

  async saveReport(runId: number, report: Report): Promise<void> {
    for (const record of report.records) {
      await this.upsertVideo(runId, record);
    }

    const { timeBuckets, engagement, creators, keywords, sentimentEngagement, highEngagementKeywords } =
      report.aggregates;
    for (const table of [timeBuckets, engagement, creators, keywords, sentimentEngagement, highEngagementKeywords]) {
      await this.db.insert(aggregateTables).values({
        runId,
        name: table.name,
        rows: table.rows,
        exclusions: table.exclusions,
        degraded: table.degraded,
        error: table.error ?? null,
      });
    }
    // Keyword breakdowns that do not fit the row shape
    await this.db.insert(aggregateTables).values([
      { runId, name: 'keywords.byLabel', rows: [keywords.byLabel] },
      { runId, name: 'keywords.byYear', rows: keywords.byYear },
      { runId, name: 'keywords.topTags', rows: keywords.topTags },
      {
        runId,
        name: 'highEngagementKeywords.threshold',
        rows: [{ threshold: highEngagementKeywords.threshold, records: highEngagementKeywords.records }],
      },
    ]);

    const { summary } = report;
    await this.db
      .update(collectionRuns)
      .set({
        completedAt: new Date(),
        coveredFrom: summary.coveredRange?.start ?? null,
        coveredTo: summary.coveredRange?.end ?? null,
        unitsPlanned: summary.unitsPlanned,
        unitsFailed: summary.failedUnits,
        unitsPartial: summary.partialUnits,
        failedKeywords: summary.failedKeywords,
        requests: summary.requests,
        videosCollected: summary.totalRecords,
        cancelled: summary.cancelled,
        enrichmentFailed: summary.enrichment?.failed ?? null,
        status: 'completed',
      })
      .where(eq(collectionRuns.id, runId));

    this.logger.info({ runId, videos: report.records.length }, 'Report stored');
  }

  async failRun(runId: number, error: string): Promise<void> {
    await this.db
      .update(collectionRuns)
      .set({ completedAt: new Date(), status: 'failed', error })
      .where(eq(collectionRuns.id, runId));
  }

  private async upsertVideo(runId: number, record: EngagedRecord): Promise<void> {
    const values = {
      bvid: record.bvid,
      aid: record.aid,
      title: record.title.slice(0, 512),
      description: record.description.slice(0, 5000),
      tags: record.tags,
      authorId: record.authorId || null,
      authorName: record.authorName || null,
      publishedAt: record.publishedAt,
      durationSeconds: record.durationSeconds,
      category: record.category,
      url: record.url,
      keywords: record.keywords,
      viewCount: record.views,
      likeCount: record.likes,
      coinCount: record.coins,
      favoriteCount: record.favorites,
      shareCount: record.shares,
      commentCount: record.comments,
      danmakuCount: record.danmaku,
      sentiment: record.sentiment.label,
      sentimentScore: record.sentiment.score,
      engagementRatio: record.engagement.engagementRatio,
      lowSignal: record.engagement.lowSignal,
      lastRunId: runId,
      fetchedAt: record.fetchedAt,
      updatedAt: new Date(),
    };

    const existing = await this.db.query.videos.findFirst({
      where: eq(videos.bvid, record.bvid),
      columns: { id: true },
    });

    if (existing) {
      await this.db.update(videos).set(values).where(eq(videos.id, existing.id));
    } else {
      await this.db.insert(videos).values({ ...values, createdAt: new Date() });
    }
  }
}
