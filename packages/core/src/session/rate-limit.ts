import { type SleepFn, sleep } from "./sleep";

/**
 * Spaces requests evenly at `requestsPerSecond`. Each caller reserves
 * the next free slot and waits for it.
 */
export class RequestRateLimiter {
  private nextSlot = 0;
  private readonly intervalMs: number;

  constructor(
    requestsPerSecond: number,
    private readonly now: () => number = Date.now,
    private readonly wait: SleepFn = sleep
  ) {
    this.intervalMs = 1_000 / requestsPerSecond;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    if (slot > now) {
      await this.wait(slot - now, signal);
    }
  }
}
