import {
  pgTable,
  text,
  varchar,
  integer,
  bigint,
  real,
  boolean,
  timestamp,
  jsonb,
  pgEnum,
  serial,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// ─── Enums ───

export const sentimentLabelEnum = pgEnum('sentiment_label', ['positive', 'neutral', 'negative']);

export const runStatusEnum = pgEnum('run_status', ['running', 'completed', 'failed']);

// ─── Collection Runs ───

export const collectionRuns = pgTable('collection_runs', {
  id: serial('id').primaryKey(),
  startedAt: timestamp('started_at').defaultNow().notNull(),
  completedAt: timestamp('completed_at'),
  keywords: jsonb('keywords').$type<string[]>().default([]),
  requestedFrom: timestamp('requested_from'),
  requestedTo: timestamp('requested_to'),
  coveredFrom: timestamp('covered_from'),
  coveredTo: timestamp('covered_to'),
  unitsPlanned: integer('units_planned').default(0),
  unitsFailed: integer('units_failed').default(0),
  unitsPartial: integer('units_partial').default(0),
  failedKeywords: jsonb('failed_keywords').$type<string[]>().default([]),
  requests: integer('requests').default(0),
  videosCollected: integer('videos_collected').default(0),
  cancelled: boolean('cancelled').default(false),
  /** Null when detail lookups were not run */
  enrichmentFailed: integer('enrichment_failed'),
  status: runStatusEnum('status').default('running'),
  error: text('error'),
});

// ─── Videos (merged + scored) ───

export const videos = pgTable(
  'videos',
  {
    id: serial('id').primaryKey(),
    bvid: varchar('bvid', { length: 32 }).notNull(),
    aid: bigint('aid', { mode: 'number' }),
    title: varchar('title', { length: 512 }).notNull(),
    description: text('description'),
    tags: jsonb('tags').$type<string[]>().default([]),
    authorId: varchar('author_id', { length: 32 }),
    authorName: varchar('author_name', { length: 128 }),
    publishedAt: timestamp('published_at'),
    durationSeconds: integer('duration_seconds'),
    category: varchar('category', { length: 64 }),
    url: text('url'),
    keywords: jsonb('keywords').$type<string[]>().default([]),
    viewCount: bigint('view_count', { mode: 'number' }),
    likeCount: bigint('like_count', { mode: 'number' }),
    coinCount: bigint('coin_count', { mode: 'number' }),
    favoriteCount: bigint('favorite_count', { mode: 'number' }),
    shareCount: bigint('share_count', { mode: 'number' }),
    commentCount: bigint('comment_count', { mode: 'number' }),
    danmakuCount: bigint('danmaku_count', { mode: 'number' }),
    // Computed analysis fields
    sentiment: sentimentLabelEnum('sentiment'),
    sentimentScore: real('sentiment_score'),
    engagementRatio: real('engagement_ratio'), // mean of like/coin/favorite per view
    lowSignal: boolean('low_signal'), // zero views
    lastRunId: integer('last_run_id').references(() => collectionRuns.id),
    fetchedAt: timestamp('fetched_at'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => [uniqueIndex('videos_bvid_idx').on(table.bvid)],
);

// ─── Aggregate Tables ───

export const aggregateTables = pgTable('aggregate_tables', {
  id: serial('id').primaryKey(),
  runId: integer('run_id')
    .references(() => collectionRuns.id)
    .notNull(),
  name: varchar('name', { length: 64 }).notNull(),
  rows: jsonb('rows').$type<unknown[]>().default([]),
  exclusions: jsonb('exclusions').$type<Record<string, number>>().default({}),
  degraded: boolean('degraded').default(false),
  error: text('error'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});
