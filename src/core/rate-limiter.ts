/**
 * Minimum-interval rate limiter for the SEC archive host.
 *
 * One instance is shared by every request the process makes, whichever
 * institution task issues it. Slots are reserved synchronously, so
 * concurrent callers are released one interval apart in call order.
 */

export class RateLimiter {
  private nextSlot = 0;
  private readonly minIntervalMs: number;

  constructor(minIntervalMs: number = 200) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
  }

  get intervalMs(): number {
    return this.minIntervalMs;
  }

  /** Resolves when the caller may issue its request */
  async acquire(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await new Promise(resolve => setTimeout(resolve, waitMs));
    }
  }
}
