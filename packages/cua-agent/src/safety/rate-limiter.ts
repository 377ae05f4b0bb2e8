import { delay } from '@cua/shared';

export const DEFAULT_ACTIONS_PER_MINUTE = 60;
const WINDOW_MS = 60_000;

/**
 * Sliding one-minute window over admitted action timestamps.
 */
export class RateLimiter {
  readonly maxPerMinute: number;
  private timestamps: number[] = [];

  constructor(
    maxPerMinute: number,
    private readonly now: () => number = Date.now,
  ) {
    this.maxPerMinute =
      maxPerMinute > 0 ? Math.floor(maxPerMinute) : DEFAULT_ACTIONS_PER_MINUTE;
  }

  /** Admits and records an action if the window has room. */
  allow(): boolean {
    const now = this.now();
    this.prune(now);

    if (this.timestamps.length >= this.maxPerMinute) {
      return false;
    }
    this.timestamps.push(now);
    return true;
  }

  /**
   * Resolves once {@link allow} would admit an action, with the milliseconds
   * spent waiting. Does not take the slot. Rejects when `signal` aborts
   * first.
   */
  async wait(signal?: AbortSignal): Promise<number> {
    const started = this.now();

    while (this.available() === 0) {
      const oldest = this.timestamps[0];
      const retryIn = Math.max(1, oldest + WINDOW_MS - this.now());
      await delay(retryIn, signal);
    }

    return this.now() - started;
  }

  available(): number {
    this.prune(this.now());
    return Math.max(0, this.maxPerMinute - this.timestamps.length);
  }

  reset(): void {
    this.timestamps = [];
  }

  private prune(now: number): void {
    const cutoff = now - WINDOW_MS;
    let firstLive = 0;
    while (
      firstLive < this.timestamps.length &&
      this.timestamps[firstLive] < cutoff
    ) {
      firstLive++;
    }
    if (firstLive > 0) {
      this.timestamps = this.timestamps.slice(firstLive);
    }
  }
}
