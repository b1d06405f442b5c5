import { Clock, systemClock } from "./time";

export const DEFAULT_DEDUP_TTL_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Remembers which items already had a reply delivered, for `ttlMs`, and
 * which items some job is currently replying to.
 *
 * Every method is synchronous: check-then-insert can't interleave with
 * another task on the event loop. Expired entries are dropped lazily.
 */
export class DedupCache {
  readonly ttlMs: number;
  private readonly now: Clock;
  private readonly processedAt = new Map<string, number>();
  private readonly claims = new Set<string>();

  constructor(opts: { ttlMs?: number; now?: Clock } = {}) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_DEDUP_TTL_MS;
    this.now = opts.now ?? systemClock;
  }

  isProcessed(itemId: string): boolean {
    this.evictExpired(this.now());
    return this.processedAt.has(itemId);
  }

  isClaimed(itemId: string): boolean {
    return this.claims.has(itemId);
  }

  /**
   * Reserves an item for sending. False when it was already replied to or
   * another job holds it. The holder must end with markProcessed or release.
   */
  tryClaim(itemId: string): boolean {
    if (this.isProcessed(itemId) || this.claims.has(itemId)) return false;
    this.claims.add(itemId);
    return true;
  }

  release(itemId: string): void {
    this.claims.delete(itemId);
  }

  markProcessed(itemId: string): void {
    const now = this.now();
    this.evictExpired(now);
    this.claims.delete(itemId);
    if (this.processedAt.has(itemId)) return;
    this.processedAt.set(itemId, now);
  }

  get size(): number {
    this.evictExpired(this.now());
    return this.processedAt.size;
  }

  private evictExpired(now: number): void {
    for (const [itemId, at] of this.processedAt) {
      if (now - at > this.ttlMs) this.processedAt.delete(itemId);
    }
  }
}
