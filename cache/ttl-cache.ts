/**
 * A bounded key cache with TTL (Time-To-Live) support for automatic expiration of entries.
 *
 * Each key remembers when it was inserted and how long it lives. Time comes from a
 * monotonic clock, so wall-clock adjustments on the device cannot resurrect or expire
 * entries early. When the cache grows past `maxEntries` the oldest insertions are
 * evicted first.
 */

export type Clock = () => number;

export type TTLEntry = {
  insertedAt: number;
  ttlMs: number;
};

export const monotonicClock: Clock = () => performance.now();

export default class TTLCache {
  private entries: Map<string, TTLEntry> = new Map();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: Clock;

  /**
   * @param ttlMs - Default time-to-live in milliseconds (default: 1 minute)
   * @param maxEntries - Hard cap on tracked keys
   * @param now - Clock source in milliseconds
   */
  constructor(
    ttlMs: number = 60 * 1000,
    maxEntries: number = 1000,
    now: Clock = monotonicClock,
  ) {
    this.ttlMs = ttlMs;
    this.maxEntries = maxEntries;
    this.now = now;
  }

  /**
   * Record a key. Re-adding a live key refreshes its position and lifetime.
   */
  public add(key: string, ttlMs: number = this.ttlMs): void {
    this.entries.delete(key);
    this.entries.set(key, { insertedAt: this.now(), ttlMs });
    this.evictOverflow();
  }

  /**
   * Test if a key exists and hasn't expired
   */
  public has(key: string): boolean {
    const entry = this.entries.get(key);
    if (entry === undefined) return false;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return false;
    }

    return true;
  }

  /**
   * Clean up expired entries
   * @returns Number of entries removed
   */
  public pruneExpired(): number {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(
        `[TTLCache] Pruned ${removed} expired entries, ${this.entries.size} remain`,
      );
    }

    return removed;
  }

  public delete(key: string): boolean {
    return this.entries.delete(key);
  }

  public clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  public stats(): {
    totalEntries: number;
    expiredEntries: number;
    activeEntries: number;
    ttlMs: number;
    maxEntries: number;
  } {
    const now = this.now();
    let expiredCount = 0;

    for (const entry of this.entries.values()) {
      if (this.isExpired(entry, now)) {
        expiredCount++;
      }
    }

    return {
      totalEntries: this.entries.size,
      expiredEntries: expiredCount,
      activeEntries: this.entries.size - expiredCount,
      ttlMs: this.ttlMs,
      maxEntries: this.maxEntries,
    };
  }

  private isExpired(entry: TTLEntry, now: number = this.now()): boolean {
    return now - entry.insertedAt > entry.ttlMs;
  }

  // Map iteration order is insertion order, so the first key is the oldest
  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
