/**
 * Cache Service
 *
 * In-memory cache with Redis-ready interface.
 * Short-lived entries only: status polling results and prepared image payloads.
 */

export interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

/**
 * TTL per kind of entry (in milliseconds)
 */
export const CACHE_TTL = {
  // Polling clients hit this every couple of seconds
  simulationStatus: 3 * 1000,
  // Resized generation payload, reused across retries and regenerations
  simulationPayload: 10 * 60 * 1000,
  classifierStats: 30 * 1000,
} as const;

export class CacheService {
  private cache = new Map<string, CacheEntry<unknown>>();
  private readonly cleanupInterval = 60000; // Clean up expired entries every minute
  private cleanupTimer?: NodeJS.Timeout;

  constructor(private readonly now: () => number = Date.now) {
    this.startCleanupInterval();
  }

  /**
   * Get value from cache if not expired
   */
  get<T>(key: string): T | null {
    const entry = this.cache.get(key);

    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.cache.delete(key);
      return null;
    }

    return entry.data as T;
  }

  /**
   * Set value in cache with TTL
   */
  set<T>(key: string, data: T, ttlMs: number): void {
    this.cache.set(key, {
      data,
      expiresAt: this.now() + ttlMs,
    });
  }

  /**
   * Get from cache OR fetch fresh, automatically caching result
   */
  async getOrFetch<T>(
    key: string,
    fetcher: () => Promise<T>,
    ttlMs: number,
  ): Promise<{ data: T; source: 'cached' | 'fresh' }> {
    const entry = this.cache.get(key);
    if (entry && entry.expiresAt > this.now()) {
      return { data: entry.data as T, source: 'cached' };
    }

    const fresh = await fetcher();
    this.set(key, fresh, ttlMs);
    return { data: fresh, source: 'fresh' };
  }

  has(key: string): boolean {
    return this.get(key) !== null;
  }

  delete(key: string): void {
    this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  /**
   * Get cache stats for monitoring
   */
  getStats() {
    let totalEntries = 0;
    let expiredEntries = 0;
    const now = this.now();

    this.cache.forEach((entry) => {
      totalEntries++;
      if (entry.expiresAt <= now) {
        expiredEntries++;
      }
    });

    return {
      totalEntries,
      expiredEntries,
      activeEntries: totalEntries - expiredEntries,
    };
  }

  stop(): void {
    clearInterval(this.cleanupTimer);
  }

  private startCleanupInterval(): void {
    this.cleanupTimer = setInterval(() => {
      let cleaned = 0;
      const now = this.now();

      this.cache.forEach((entry, key) => {
        if (entry.expiresAt <= now) {
          this.cache.delete(key);
          cleaned++;
        }
      });

      if (cleaned > 0) {
        console.log(`[Cache] Cleaned up ${cleaned} expired entries`);
      }
    }, this.cleanupInterval);
    // Never keep the process alive for housekeeping
    this.cleanupTimer.unref();
  }
}

// Export singleton instance
export const cache = new CacheService();

/**
 * Cache key builders for type safety
 */
export const cacheKeys = {
  // Status polling response for one scan
  simulationStatus: (scanId: string) => `sim:status:${scanId}`,

  // Normalized JPEG sent to image generation
  simulationPayload: (imageHash: string) => `sim:payload:${imageHash}`,

  classifierStats: () => 'classifier:stats',
};
