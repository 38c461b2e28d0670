import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

export const DEFAULT_KEYWORDS = [
  '执行力',
  '执行力培训',
  '执行力管理',
  '团队执行力',
  '提高执行力',
  '执行力差',
  '执行力强',
  '执行力不足',
  '执行能力',
  '执行方法',
  '高效执行',
  '落地执行',
  '执行思维',
  '执行技巧',
  '执行文化',
] as const;

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine((s) => !Number.isNaN(Date.parse(`${s}T00:00:00Z`)), 'not a calendar date');

const logLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const configSchema = z
  .object({
    // Query planning
    keywords: z.array(z.string().trim()).default([...DEFAULT_KEYWORDS]),
    dateRange: z
      .object({
        start: isoDate.default('2019-01-01'),
        end: isoDate.default('2025-12-31'),
        utcOffset: z
          .string()
          .regex(/^[+-]\d{2}:\d{2}$/, 'expected an offset such as +08:00')
          .default('+08:00'),
      })
      .default({})
      .refine((r) => r.start <= r.end, 'start must not be after end'),
    maxResultsPerKeyword: z.coerce.number().int().positive().default(1000),
    pageSize: z.coerce.number().int().min(1).max(50).default(20),
    maxPagesPerQuery: z.coerce.number().int().positive().default(50),

    // Fetching
    requestIntervalMs: z.coerce.number().int().nonnegative().default(1000),
    retry: z
      .object({
        maxAttempts: z.coerce.number().int().positive().default(3),
        initialDelayMs: z.coerce.number().int().nonnegative().default(1000),
        maxDelayMs: z.coerce.number().int().nonnegative().default(30_000),
        backoffMultiplier: z.coerce.number().min(1).default(2),
        rateLimitMultiplier: z.coerce.number().min(1).default(4),
      })
      .default({}),
    concurrency: z.coerce.number().int().positive().default(1),
    assumeReverseChronological: z.boolean().default(false),
    /** Search results carry no coin or share counts; the detail endpoint fills them in */
    enrichDetails: z.boolean().default(true),

    // Analysis
    sentiment: z
      .object({
        positiveThreshold: z.coerce.number().min(-1).max(1).default(0.25),
        negativeThreshold: z.coerce.number().min(-1).max(1).default(-0.25),
      })
      .default({})
      .refine((s) => s.negativeThreshold < s.positiveThreshold, 'negativeThreshold must be below positiveThreshold'),
    weights: z
      .object({
        videoCount: z.coerce.number().nonnegative().default(0.4),
        engagement: z.coerce.number().nonnegative().default(0.6),
      })
      .default({}),
    stopWords: z.array(z.string()).default([]),
    topN: z.coerce.number().int().positive().default(50),

    // Bilibili
    api: z
      .object({
        cookie: z.string().default(''),
        userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
        timeoutMs: z.coerce.number().int().positive().default(10_000),
      })
      .default({}),

    // Database (optional persistence)
    databaseUrl: z.string().url().optional(),

    // Logging
    logLevel: logLevel.default('info'),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

/** Validate a plain config object, filling defaults */
export function parseConfig(input: unknown): Config {
  const result = configSchema.safeParse(input);

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${problems}`);
  }

  return result.data;
}

/** Build config from the environment, with explicit overrides taking precedence */
export function loadConfig(overrides: ConfigInput = {}, env: NodeJS.ProcessEnv = process.env): Config {
  const fromEnv = {
    keywords: splitList(env.VIDTREND_KEYWORDS),
    dateRange: prune({
      start: env.VIDTREND_START_DATE,
      end: env.VIDTREND_END_DATE,
      utcOffset: env.VIDTREND_UTC_OFFSET,
    }),
    maxResultsPerKeyword: env.VIDTREND_MAX_RESULTS,
    pageSize: env.VIDTREND_PAGE_SIZE,
    requestIntervalMs: env.VIDTREND_REQUEST_INTERVAL_MS,
    retry: prune({
      maxAttempts: env.VIDTREND_RETRY_ATTEMPTS,
      initialDelayMs: env.VIDTREND_RETRY_DELAY_MS,
    }),
    concurrency: env.VIDTREND_CONCURRENCY,
    assumeReverseChronological: parseFlag(env.VIDTREND_ASSUME_ORDERED),
    enrichDetails: parseFlag(env.VIDTREND_ENRICH),
    stopWords: splitList(env.VIDTREND_STOP_WORDS),
    topN: env.VIDTREND_TOP_N,
    api: prune({ cookie: env.BILIBILI_COOKIE }),
    databaseUrl: env.DATABASE_URL || undefined,
    logLevel: env.LOG_LEVEL,
  };

  return parseConfig(deepMerge(prune(fromEnv), overrides));
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

/** `z.coerce.boolean` treats any non-empty string as true, so flags are parsed here */
function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function prune(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}
