export interface DailyCacheEntry<V> {
  date: string;
  zone: string;
  value: V;
}

export interface DailyCacheOptions {
  maxEntries?: number;
}

/**
 * Anything that can hold per-day values; injected into services so tests can
 * supply their own.
 */
export interface DayCache<V> {
  get(date: string, zone: string): V | undefined;
  set(date: string, zone: string, value: V): void;
  clear(): void;
}

/**
 * In-memory cache of values keyed by settlement date and zone.
 * Entries never expire; a lookup for a different date or zone is a miss.
 * Oldest entries are evicted first once maxEntries is exceeded.
 */
export class DailySeriesCache<V> implements DayCache<V> {
  private readonly maxEntries: number;
  private readonly map = new Map<string, DailyCacheEntry<V>>();

  constructor(options: DailyCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 7);
  }

  private static key(date: string, zone: string): string {
    return `${zone}|${date}`;
  }

  get(date: string, zone: string): V | undefined {
    const entry = this.map.get(DailySeriesCache.key(date, zone));
    if (!entry || entry.date !== date || entry.zone !== zone) {
      return undefined;
    }
    return entry.value;
  }

  set(date: string, zone: string, value: V): void {
    const key = DailySeriesCache.key(date, zone);
    // re-insert so the entry counts as newest
    this.map.delete(key);
    this.map.set(key, { date, zone, value });
    this.enforceSizeLimit();
  }

  has(date: string, zone: string): boolean {
    return this.get(date, zone) !== undefined;
  }

  get size(): number {
    return this.map.size;
  }

  clear(): void {
    this.map.clear();
  }

  private enforceSizeLimit(): void {
    const keys = this.map.keys();
    while (this.map.size > this.maxEntries) {
      const oldestKey = keys.next();
      if (oldestKey.done) {
        break;
      }
      this.map.delete(oldestKey.value);
    }
  }
}
