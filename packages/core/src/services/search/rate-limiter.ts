/**
 * Minimum-interval rate limiter
 *
 * Each provider instance owns one. Slots are reserved synchronously, so
 * concurrent callers are spaced out instead of all waking at once.
 */

import { sleep } from "../../utils/concurrency";

export class RateLimiter {
  private nextSlot = 0;

  constructor(private readonly minIntervalMs: number) {}

  /**
   * Wait until this caller's slot comes up
   */
  async wait(signal?: AbortSignal): Promise<void> {
    if (this.minIntervalMs <= 0) {
      return;
    }

    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;

    const delay = slot - now;
    if (delay > 0) {
      await sleep(delay, signal);
    }
  }
}
