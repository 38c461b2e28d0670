import type { AggregateTable } from '@vidtrend/shared';
import type { EngagedRecord } from './engagement.js';
import { mean } from './engagement.js';

export interface InfluenceWeights {
  videoCount: number;
  engagement: number;
}

export interface CreatorRow {
  rank: number;
  authorId: string;
  authorName: string;
  videoCount: number;
  totalViews: number;
  avgViews: number;
  /** Over the creator's videos that have views */
  avgEngagementRatio: number;
  influence: number;
}

export const DEFAULT_INFLUENCE_WEIGHTS: InfluenceWeights = { videoCount: 0.4, engagement: 0.6 };

/** Rank creators by a weighted blend of output volume and audience engagement */
export function buildCreatorTable(
  records: readonly EngagedRecord[],
  weights: InfluenceWeights = DEFAULT_INFLUENCE_WEIGHTS,
): AggregateTable<CreatorRow> {
  const byAuthor = new Map<string, EngagedRecord[]>();
  let missing = 0;
  for (const record of records) {
    if (!record.authorId) {
      missing++;
      continue;
    }
    const list = byAuthor.get(record.authorId) ?? [];
    list.push(record);
    byAuthor.set(record.authorId, list);
  }

  const creators = [...byAuthor.entries()].map(([authorId, videos]) => {
    const totalViews = videos.reduce((s, v) => s + v.views, 0);
    const named = videos.filter((v) => v.authorName);
    return {
      authorId,
      authorName: named.length > 0 ? named[named.length - 1].authorName : '',
      videoCount: videos.length,
      totalViews,
      avgViews: totalViews / videos.length,
      avgEngagementRatio: mean(
        videos.filter((v) => !v.engagement.lowSignal).map((v) => v.engagement.engagementRatio),
      ),
    };
  });

  const maxCount = Math.max(0, ...creators.map((c) => c.videoCount));
  const maxEngagement = Math.max(0, ...creators.map((c) => c.avgEngagementRatio));

  const rows = creators
    .map((c) => ({
      ...c,
      influence:
        weights.videoCount * (maxCount > 0 ? c.videoCount / maxCount : 0) +
        weights.engagement * (maxEngagement > 0 ? c.avgEngagementRatio / maxEngagement : 0),
    }))
    .sort(
      (a, b) =>
        b.influence - a.influence ||
        b.totalViews - a.totalViews ||
        (a.authorId < b.authorId ? -1 : a.authorId > b.authorId ? 1 : 0),
    )
    .map((c, i) => ({ rank: i + 1, ...c }));

  return {
    name: 'creators',
    rows,
    exclusions: missing > 0 ? { missingAuthor: missing } : {},
    degraded: false,
  };
}
