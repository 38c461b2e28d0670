export * from './types.js';
export * from './config.js';
export * from './logger.js';
export * from './errors.js';
export { systemClock, ManualClock, type Clock } from './clock.js';
export { RateLimiter } from './rate-limiter.js';
export { Backoff, withRetry, isRetryableError, type BackoffOptions, type RetryOptions } from './retry.js';
export {
  BilibiliClient,
  classifyStatus,
  classifyCode,
  type BilibiliClientOptions,
  type SearchOrder,
} from './bilibili/client.js';
export { cleanText, parseDuration, parseCount, parseTimestamp, splitTags } from './bilibili/parse.js';
export { getDb, closeDb, type Database } from './db/index.js';
