import type { Logger } from './logger.js';
import { systemClock, type Clock } from './clock.js';
import { CollectionError, RateLimitedError } from './errors.js';

/** Retry with exponential backoff, modelled as an explicit attempt/delay state machine. */

export interface BackoffOptions {
  /** Total attempts, the first one included */
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Extra factor applied to the delay after a rate-limit response */
  rateLimitMultiplier?: number;
}

export interface RetryOptions extends BackoffOptions {
  retryOn?: (error: unknown) => boolean;
  clock?: Clock;
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

const BACKOFF_DEFAULTS: Required<BackoffOptions> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  rateLimitMultiplier: 4,
};

export class Backoff {
  private readonly opts: Required<BackoffOptions>;
  private failures = 0;

  constructor(options: BackoffOptions = {}) {
    this.opts = { ...BACKOFF_DEFAULTS, ...options };
  }

  /** Failed attempts recorded since the last reset */
  get attempt(): number {
    return this.failures;
  }

  get exhausted(): boolean {
    return this.failures >= this.opts.maxAttempts;
  }

  /** Record a failed attempt. Returns the wait before the next one, or null once attempts are used up. */
  fail(error: unknown): number | null {
    this.failures++;
    if (this.exhausted) return null;

    const base = Math.min(
      this.opts.initialDelayMs * this.opts.backoffMultiplier ** (this.failures - 1),
      this.opts.maxDelayMs,
    );
    return error instanceof RateLimitedError ? base * this.opts.rateLimitMultiplier : base;
  }

  reset(): void {
    this.failures = 0;
  }
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  logger: Logger,
  label: string,
  options: RetryOptions = {},
): Promise<T> {
  const { retryOn = isRetryableError, clock = systemClock, signal, onRetry, ...backoffOptions } = options;
  const backoff = new Backoff(backoffOptions);

  for (;;) {
    try {
      return await fn();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const attempt = backoff.attempt + 1;

      if (!retryOn(err)) throw err;

      const delay = backoff.fail(err);
      if (delay === null) {
        logger.error({ attempt, label, error: message }, 'All retries exhausted');
        throw err;
      }

      logger.warn(
        { attempt, maxAttempts: backoffOptions.maxAttempts ?? BACKOFF_DEFAULTS.maxAttempts, label, error: message, nextRetryMs: delay },
        'Retrying after failure',
      );
      onRetry?.(attempt, delay, err);

      await clock.sleep(delay, signal);
      if (signal?.aborted) throw err;
    }
  }
}

/** Returns true if the error is retryable (network/transient errors) */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof CollectionError) return err.retryable;
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();

  // Rate limits
  if (msg.includes('429') || msg.includes('rate limit') || msg.includes('too many requests')) return true;
  // Server errors
  if (msg.includes('500') || msg.includes('502') || msg.includes('503') || msg.includes('504')) return true;
  // Network errors
  if (msg.includes('econnreset') || msg.includes('etimedout') || msg.includes('fetch failed') || msg.includes('network')) return true;

  return false;
}
