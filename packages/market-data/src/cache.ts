// In-memory TTL cache shared by the market data clients.
// Constructed once at startup and passed in; nothing here is module-level state.

interface CacheEntry {
  data: unknown;
  expiresAt: number;
}

export interface TtlCacheOptions {
  /** Sweep expired entries once the map grows past this size */
  maxEntries?: number;
  now?: () => number;
}

export class TtlCache {
  private entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.now = options.now ?? Date.now;
  }

  get(key: string): unknown {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.data;
  }

  set(key: string, data: unknown, ttlSeconds: number): void {
    if (ttlSeconds <= 0) return;
    this.entries.set(key, { data, expiresAt: this.now() + ttlSeconds * 1000 });
    if (this.entries.size > this.maxEntries) this.evictExpired();
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Drop everything; called on shutdown */
  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [k, v] of this.entries) {
      if (now > v.expiresAt) this.entries.delete(k);
    }
  }
}

/** Cache TTL presets by data type, in seconds */
export const CacheTTL = {
  REALTIME: 30,
  SHORT: 300,
  MEDIUM: 3600,
  LONG: 86400,
} as const;
