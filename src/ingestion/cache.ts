/**
 * In-memory cache with a per-instance TTL.
 * Expired entries are swept on every write and the entry count is capped,
 * dropping the oldest writes first.
 */

const DEFAULT_MAX_ENTRIES = 1000;

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class TtlCache<T> {
  private entries: Map<string, CacheEntry<T>> = new Map();
  private ttlMs: number;
  private now: () => number;
  private maxEntries: number;

  constructor(ttlMs: number, now: () => number = Date.now, maxEntries = DEFAULT_MAX_ENTRIES) {
    this.ttlMs = ttlMs;
    this.now = now;
    this.maxEntries = Math.max(1, maxEntries);
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    const now = this.now();
    this.sweep(now);

    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  /**
   * Return the cached value or load, store and return a fresh one.
   * Rejections are not cached.
   */
  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const value = await load();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}
