import { z } from 'zod';
import { createLogger, type Logger } from '../logger.js';
import {
  AuthError,
  CollectionError,
  FatalError,
  RateLimitedError,
  TransientError,
} from '../errors.js';
import type {
  PageCursor,
  PageResult,
  RawRecord,
  TimeWindow,
  VideoDetail,
  VideoSearchApi,
} from '../types.js';
import { cleanText, parseCount, parseDuration, parseTimestamp, splitTags } from './parse.js';

const BILIBILI_API_BASE = 'https://api.bilibili.com';

// Envelope codes: https://github.com/SocialSisterYi/bilibili-API-collect
const THROTTLE_CODES = new Set([-412, -352, -799]);
const AUTH_CODES = new Set([-101, -111]);
const SERVER_CODES = new Set([-500, -503]);

export type SearchOrder = 'pubdate' | 'totalrank' | 'click';

export interface BilibiliClientOptions {
  pageSize?: number;
  /** `pubdate` returns newest first */
  order?: SearchOrder;
  cookie?: string;
  userAgent?: string;
  timeoutMs?: number;
  baseUrl?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Bilibili web search client. Issues exactly one HTTP request per call and
 * classifies failures; retrying is the caller's job.
 */
export class BilibiliClient implements VideoSearchApi {
  private readonly pageSize: number;
  private readonly order: SearchOrder;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: BilibiliClientOptions = {}) {
    this.pageSize = options.pageSize ?? 20;
    this.order = options.order ?? 'pubdate';
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.baseUrl = options.baseUrl ?? BILIBILI_API_BASE;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger('bilibili-client');
    this.headers = {
      'User-Agent': options.userAgent ?? 'Mozilla/5.0',
      Referer: 'https://www.bilibili.com/',
      Origin: 'https://www.bilibili.com',
      Accept: 'application/json, text/plain, */*',
      'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
    };
    if (options.cookie) this.headers.Cookie = options.cookie;
  }

  async fetchPage(keyword: string, window: TimeWindow, cursor: PageCursor): Promise<PageResult> {
    if (!keyword.trim()) throw new FatalError('Search keyword must not be empty');
    if (window.start.getTime() > window.end.getTime()) {
      throw new FatalError(
        `Invalid time window: ${window.start.toISOString()} is after ${window.end.toISOString()}`,
      );
    }
    if (!Number.isInteger(cursor) || cursor < 1) throw new FatalError(`Invalid page cursor: ${cursor}`);

    const payload = await this.request('/x/web-interface/search/type', {
      search_type: 'video',
      keyword,
      page: String(cursor),
      page_size: String(this.pageSize),
      order: this.order,
      pubtime_begin_s: String(Math.floor(window.start.getTime() / 1000)),
      pubtime_end_s: String(Math.floor(window.end.getTime() / 1000)),
    });

    const parsed = searchDataSchema.safeParse(payload);
    if (!parsed.success) {
      throw new FatalError(`Unexpected search payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const fetchedAt = new Date();
    const records: RawRecord[] = [];
    let skipped = 0;
    for (const item of parsed.data.result ?? []) {
      const video = searchItemSchema.safeParse(item);
      if (!video.success) {
        skipped++;
        continue;
      }
      try {
        records.push(toRawRecord(video.data, keyword, fetchedAt));
      } catch (err) {
        this.logger.warn({ keyword, page: cursor, bvid: video.data.bvid, err }, 'Could not convert search result');
        skipped++;
      }
    }
    if (skipped > 0) {
      this.logger.warn({ keyword, page: cursor, skipped }, 'Skipped unparseable search results');
    }

    const totalPages = parsed.data.numPages;
    return {
      records,
      hasMore: cursor < totalPages && records.length + skipped > 0,
      nextCursor: cursor + 1,
      totalResults: parsed.data.numResults,
      totalPages,
    };
  }

  async fetchVideoDetail(bvid: string): Promise<VideoDetail> {
    if (!bvid.trim()) throw new FatalError('bvid must not be empty');

    const payload = await this.request('/x/web-interface/view', { bvid });
    const parsed = videoDetailSchema.safeParse(payload);
    if (!parsed.success) {
      throw new FatalError(`Unexpected video detail payload for ${bvid}`);
    }

    const { stat, owner } = parsed.data;
    return {
      bvid: parsed.data.bvid,
      durationSeconds: parseDuration(parsed.data.duration),
      authorId: String(owner.mid),
      authorName: owner.name,
      publishedAt: parseTimestamp(parsed.data.pubdate),
      description: parsed.data.desc,
      views: parseCount(stat.view),
      likes: parseCount(stat.like),
      coins: parseCount(stat.coin),
      favorites: parseCount(stat.favorite),
      shares: parseCount(stat.share),
      comments: parseCount(stat.reply),
      danmaku: parseCount(stat.danmaku),
    };
  }

  private async request(path: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    this.logger.debug({ path, params }, 'API request');

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let body: unknown;
    try {
      const response = await this.fetchImpl(url.toString(), {
        headers: this.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw classifyStatus(response.status, text.slice(0, 200));
      }

      try {
        body = await response.json();
      } catch (err) {
        throw new TransientError(`Malformed JSON from ${path}`, { status: response.status, cause: err });
      }
    } catch (err) {
      if (err instanceof CollectionError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new TransientError(`Request to ${path} timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new TransientError(`Network error on ${path}: ${message}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new FatalError(`Response from ${path} is not an API envelope`);
    }

    const { code, message } = envelope.data;
    if (code !== 0) {
      this.logger.error({ path, code, message }, 'Bilibili API error');
      throw classifyCode(code, message);
    }

    return envelope.data.data;
  }
}

export function classifyStatus(status: number, body = ''): CollectionError {
  const message = `Bilibili HTTP ${status}${body ? `: ${body}` : ''}`;
  if (status === 429 || status === 412) return new RateLimitedError(message, { status });
  if (status === 401 || status === 403) return new AuthError(message, { status });
  if (status >= 500) return new TransientError(message, { status });
  return new FatalError(message, { status });
}

export function classifyCode(code: number, message: string): CollectionError {
  const text = `Bilibili API code ${code}: ${message || 'unknown error'}`;
  if (THROTTLE_CODES.has(code)) return new RateLimitedError(text, { code });
  if (AUTH_CODES.has(code)) return new AuthError(text, { code });
  if (SERVER_CODES.has(code)) return new TransientError(text, { code });
  return new FatalError(text, { code });
}

function toRawRecord(item: SearchItem, keyword: string, fetchedAt: Date): RawRecord {
  return {
    bvid: item.bvid,
    aid: item.aid,
    title: cleanText(item.title),
    description: cleanText(item.description),
    tags: splitTags(item.tag),
    authorId: item.mid === 0 || item.mid === '' ? '' : String(item.mid),
    authorName: item.author,
    publishedAt: parseTimestamp(item.pubdate),
    durationSeconds: parseDuration(item.duration),
    views: parseCount(item.play),
    likes: parseCount(item.like),
    coins: 0,
    favorites: parseCount(item.favorites),
    shares: 0,
    comments: parseCount(item.review),
    danmaku: parseCount(item.video_review),
    category: item.typename,
    url: item.arcurl,
    sourceKeyword: keyword,
    fetchedAt,
  };
}

// ─── Bilibili API Response Schemas (internal) ───

const counter = z.union([z.number(), z.string()]).nullish();

const envelopeSchema = z.object({
  code: z.number(),
  message: z.string().default(''),
  data: z.unknown().optional(),
});

const searchDataSchema = z.object({
  numResults: z.number().default(0),
  numPages: z.number().default(0),
  result: z.array(z.unknown()).nullish(),
});

const searchItemSchema = z.object({
  bvid: z.string().min(1),
  aid: z.number().default(0),
  title: z.string().default(''),
  description: z.string().default(''),
  tag: z.string().nullish(),
  author: z.string().default(''),
  mid: z.union([z.number(), z.string()]).default(0),
  pubdate: z.number().nullish(),
  duration: z.union([z.string(), z.number()]).nullish(),
  play: counter,
  like: counter,
  favorites: counter,
  review: counter,
  video_review: counter,
  typename: z.string().default(''),
  arcurl: z.string().default(''),
});

type SearchItem = z.infer<typeof searchItemSchema>;

const videoDetailSchema = z.object({
  bvid: z.string().min(1),
  desc: z.string().default(''),
  pubdate: z.number().nullish(),
  duration: z.number().nullish(),
  owner: z.object({
    mid: z.union([z.number(), z.string()]),
    name: z.string().default(''),
  }),
  stat: z.object({
    view: counter,
    like: counter,
    coin: counter,
    favorite: counter,
    share: counter,
    reply: counter,
    danmaku: counter,
  }),
});
