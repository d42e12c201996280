import type { IRenderCache } from '@leafwiki/types';

interface MemoryEntry {
  value: unknown;
  expiresAt?: number;
}

/**
 * In-process render cache used when no Redis URL is configured.
 *
 * Entries live in a Map for the lifetime of the process. Expired entries are
 * dropped lazily when they are read.
 */
export class MemoryRenderCache implements IRenderCache {
  private readonly entries = new Map<string, MemoryEntry>();

  /**
   * @param now - Clock used for TTL checks, in milliseconds
   */
  constructor(private readonly now: () => number = Date.now) {}

  async get<T>(key: string): Promise<T | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }

    return entry.value as T;
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAt: ttlSeconds ? this.now() + ttlSeconds * 1000 : undefined
    });
  }

  async del(key: string): Promise<number> {
    return this.entries.delete(key) ? 1 : 0;
  }

  get size(): number {
    return this.entries.size;
  }
}
