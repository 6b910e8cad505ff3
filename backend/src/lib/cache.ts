import { Redis } from "ioredis";

/**
 * Caller-owned cache for derived tables. Keys carry a content fingerprint, so
 * a changed source never hits a stale entry; `invalidate` drops one early.
 */
export interface TableCache<T> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T): Promise<void>;
  invalidate(key: string): Promise<void>;
}

type MemoryEntry<T> = { value: T; expiresAt: number };

export class MemoryTableCache<T> implements TableCache<T> {
  private readonly entries = new Map<string, MemoryEntry<T>>();

  /** A ttlSeconds of 0 keeps entries until invalidated. */
  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  async get(key: string): Promise<T | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: T): Promise<void> {
    const now = this.now();
    this.sweep(now);
    const expiresAt = this.ttlSeconds > 0 ? now + this.ttlSeconds * 1000 : Infinity;
    this.entries.set(key, { value, expiresAt });
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }

  async invalidate(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

/** The slice of a Redis client the cache needs. */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

export class RedisTableCache<T> implements TableCache<T> {
  constructor(
    private readonly store: KeyValueStore,
    private readonly ttlSeconds: number,
    private readonly isValue: (value: unknown) => value is T
  ) {}

  async get(key: string): Promise<T | undefined> {
    const cached = await this.store.get(key);
    if (cached === null) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(cached);
    } catch (error) {
      console.warn(`[cache] Discarding unreadable entry ${key}:`, error);
      return undefined;
    }
    if (!this.isValue(parsed)) {
      console.warn(`[cache] Discarding malformed entry ${key}`);
      return undefined;
    }
    return parsed;
  }

  async set(key: string, value: T): Promise<void> {
    await this.store.set(key, JSON.stringify(value), this.ttlSeconds);
  }

  async invalidate(key: string): Promise<void> {
    await this.store.del(key);
  }
}

export function createRedisStore(url: string): KeyValueStore {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
  });
  return {
    get: (key) => redis.get(key),
    set: (key, value, ttlSeconds) =>
      ttlSeconds > 0
        ? redis.set(key, value, "EX", ttlSeconds)
        : redis.set(key, value),
    del: (key) => redis.del(key),
  };
}
