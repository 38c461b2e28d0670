import { systemClock, type Clock } from './clock.js';

/** Enforces a minimum interval between permitted requests. */
export class RateLimiter {
  private lastPermittedAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly intervalMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (intervalMs < 0) throw new RangeError(`intervalMs must be >= 0, got ${intervalMs}`);
  }

  /**
   * Wait until `intervalMs` has passed since the previous permit. Callers queue
   * behind each other, so concurrent acquirers are still spaced out.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot(signal));
    this.tail = turn;
    return turn;
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    if (this.lastPermittedAt !== null) {
      const wait = this.lastPermittedAt + this.intervalMs - this.clock.now();
      if (wait > 0) await this.clock.sleep(wait, signal);
    }
    this.lastPermittedAt = this.clock.now();
  }
}
