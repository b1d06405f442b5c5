import { Clock, Sleep, sleep as systemSleep, systemClock } from "./time";

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  now?: Clock;
  sleep?: Sleep;
}

/**
 * Sliding-window limiter for outbound provider calls.
 *
 * Callers queue on a single promise tail, so the evict/count/append sequence
 * for one caller finishes (including any wait for headroom) before the next
 * caller looks at the window. A slot is reserved as soon as it is granted,
 * not when the guarded call completes.
 */
export class SlidingWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly now: Clock;
  private readonly sleep: Sleep;
  private readonly timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(opts: RateLimiterOptions) {
    if (!(opts.maxRequests >= 1)) throw new Error(`maxRequests must be at least 1 (got ${opts.maxRequests})`);
    if (!(opts.windowMs > 0)) throw new Error(`windowMs must be positive (got ${opts.windowMs})`);
    this.maxRequests = Math.floor(opts.maxRequests);
    this.windowMs = opts.windowMs;
    this.now = opts.now ?? systemClock;
    this.sleep = opts.sleep ?? systemSleep;
  }

  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    // A failed turn (e.g. a throwing sleep) must not wedge later callers.
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  inFlightWindow(): number {
    this.evict(this.now());
    return this.timestamps.length;
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.now();
      this.evict(now);
      if (this.timestamps.length < this.maxRequests) {
        this.timestamps.push(now);
        return;
      }
      const oldest = this.timestamps[0];
      await this.sleep(oldest + this.windowMs - now);
    }
  }

  private evict(now: number): void {
    while (this.timestamps.length > 0 && now - this.timestamps[0] >= this.windowMs) {
      this.timestamps.shift();
    }
  }
}
