/**
 * cache.ts
 *
 * In-memory TTL cache for catalog lookups.
 */

interface CacheEntry<T> {
  data: T;
  timestamp: number;
}

// Catalog results do not change within a run
export const CACHE_TTL_MS = 3600000; // 1 hour

export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number = CACHE_TTL_MS,
    private readonly now: () => number = Date.now,
  ) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.timestamp <= this.ttlMs) {
      return entry.data;
    }

    // Expired
    this.entries.delete(key);
    return undefined;
  }

  set(key: string, data: T): void {
    this.entries.set(key, { data, timestamp: this.now() });
  }

  /**
   * Return the cached value or compute, store and return it.
   */
  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const hit = this.get(key);
    if (hit !== undefined) return hit;
    const data = await load();
    this.set(key, data);
    return data;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Key from the lower-cased, trimmed arguments.
 */
export function cacheKey(kind: "song" | "top", ...parts: (string | number)[]): string {
  return [kind, ...parts.map((p) => String(p).trim().toLowerCase())].join("::");
}
