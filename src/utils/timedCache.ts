/** Default lifetime of an entry (10 minutes). */
const DEFAULT_TTL_MS = 10 * 60 * 1000;
/** Default number of entries kept before the least recently used one is evicted. */
const DEFAULT_MAX_ENTRIES = 64;

interface CacheEntry<V> {
  readonly expiresAt: number;
  readonly value: V;
}

export interface TimedCacheOptions {
  readonly ttlMs?: number;
  readonly maxEntries?: number;
  readonly now?: () => number;
}

/**
 * Bounded in-memory cache whose entries expire after a fixed lifetime. The
 * backing map keeps insertion order, so re-inserting on every hit gives a
 * least-recently-used eviction order.
 */
export class TimedCache<V> {
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(options: TimedCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Cached value for {@link key}, or `undefined` when missing or expired. */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(key);
    if (entry.expiresAt < this.now()) {
      return undefined;
    }
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { expiresAt: this.now() + this.ttlMs, value });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  /** Drops every expired entry. Returns how many were removed. */
  purgeExpired(): number {
    const cutoff = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt < cutoff) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
