// ─── Collection error taxonomy ───

export type CollectionErrorKind = 'transient' | 'rate_limited' | 'auth' | 'fatal';

export interface CollectionErrorDetails {
  status?: number;
  /** Bilibili envelope `code`, when the API answered */
  code?: number;
  cause?: unknown;
}

export abstract class CollectionError extends Error {
  abstract readonly kind: CollectionErrorKind;
  readonly status?: number;
  readonly code?: number;

  constructor(message: string, details: CollectionErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.status = details.status;
    this.code = details.code;
  }

  /** Transient and rate-limited failures are worth another attempt */
  get retryable(): boolean {
    return this.kind === 'transient' || this.kind === 'rate_limited';
  }
}

/** Network failure, timeout, 5xx or a body that is not JSON */
export class TransientError extends CollectionError {
  readonly kind = 'transient';

  constructor(message: string, details?: CollectionErrorDetails) {
    super(message, details);
    this.name = 'TransientError';
  }
}

/** HTTP 429/412 or an API throttle code */
export class RateLimitedError extends CollectionError {
  readonly kind = 'rate_limited';

  constructor(message: string, details?: CollectionErrorDetails) {
    super(message, details);
    this.name = 'RateLimitedError';
  }
}

export class FatalError extends CollectionError {
  readonly kind: CollectionErrorKind = 'fatal';

  constructor(message: string, details?: CollectionErrorDetails) {
    super(message, details);
    this.name = 'FatalError';
  }
}

export class AuthError extends FatalError {
  override readonly kind = 'auth';

  constructor(message: string, details?: CollectionErrorDetails) {
    super(message, details);
    this.name = 'AuthError';
  }
}

/** Anything that is not already classified counts as transient (e.g. a socket reset thrown by fetch). */
export function classifyError(err: unknown): CollectionError {
  if (err instanceof CollectionError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TransientError(message, { cause: err });
}

/** Raised inside a retry loop when the run was cancelled between waits */
export class CancelledError extends Error {
  constructor(message = 'Collection cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}
