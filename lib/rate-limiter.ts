/**
 * Rolling-window token bucket shared by every fetch worker.
 *
 * At most `rate` acquisitions are granted within any `perMs` window. A caller
 * that finds the window full sleeps until the oldest grant expires, then
 * tries again. Waiters are served in arrival order.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RateLimiterOptions {
  perMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class RateLimiter {
  readonly rate: number;
  readonly perMs: number;
  private readonly stamps: number[] = [];
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<void>;
  // Serializes waiters so wake order follows acquire() call order
  private queue: Promise<void> = Promise.resolve();

  constructor(rate: number, options: RateLimiterOptions = {}) {
    if (!Number.isInteger(rate) || rate <= 0) {
      throw new RangeError(`RateLimiter rate must be a positive integer (got ${rate})`);
    }
    this.rate = rate;
    this.perMs = options.perMs ?? 1_000;
    this.now = options.now ?? (() => performance.now());
    this.wait = options.sleep ?? sleep;
  }

  /** Resolves once the caller holds a slot in the current window. */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.take());
    this.queue = turn;
    return turn;
  }

  private async take(): Promise<void> {
    for (;;) {
      const now = this.now();
      this.evict(now);
      if (this.stamps.length < this.rate) {
        this.stamps.push(now);
        return;
      }
      const oldest = this.stamps[0] ?? now;
      const waitMs = this.perMs - (now - oldest);
      await this.wait(waitMs > 0 ? waitMs : 1);
    }
  }

  private evict(now: number): void {
    while (this.stamps.length > 0 && now - (this.stamps[0] ?? now) >= this.perMs) {
      this.stamps.shift();
    }
  }
}
