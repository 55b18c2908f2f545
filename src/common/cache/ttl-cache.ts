import { Clock } from '../clock/clock';

export const DASHBOARD_CACHE = Symbol('DASHBOARD_CACHE');
export const SECTOR_CACHE = Symbol('SECTOR_CACHE');

export interface Cache<V> {
  get(key: string): V | undefined;
  /** `ttlMs` overrides the default; `null` keeps the entry until deleted. */
  set(key: string, value: V, ttlMs?: number | null): void;
  /** Remaining lifetime in ms, `Infinity` for non-expiring entries, undefined when absent or expired. */
  ttl(key: string): number | undefined;
  delete(key: string): void;
  clear(): void;
}

interface CacheEntry<V> {
  value: V;
  expiresAt: number | null;
}

// In-process read-through cache. Expiry is checked against the clock on every read.
export class TtlCache<V> implements Cache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly clock: Clock,
    private readonly defaultTtlMs: number | null,
  ) {}

  get(key: string): V | undefined {
    return this.liveEntry(key)?.value;
  }

  set(key: string, value: V, ttlMs?: number | null): void {
    const lifetime = ttlMs === undefined ? this.defaultTtlMs : ttlMs;
    this.entries.set(key, {
      value,
      expiresAt: lifetime === null ? null : this.clock.now().getTime() + lifetime,
    });
  }

  ttl(key: string): number | undefined {
    const entry = this.liveEntry(key);
    if (!entry) {
      return undefined;
    }
    return entry.expiresAt === null ? Infinity : entry.expiresAt - this.clock.now().getTime();
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Returns the cached value or computes, stores and returns a fresh one.
   * Values rejected by `shouldCache` are returned but not stored.
   */
  async getOrLoad(
    key: string,
    load: () => Promise<V>,
    shouldCache: (value: V) => boolean = () => true,
  ): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = await load();
    if (shouldCache(value)) {
      this.set(key, value);
    }
    return value;
  }

  private liveEntry(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt !== null && this.clock.now().getTime() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
