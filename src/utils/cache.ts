import type { RedisClient } from '../connections/redis';
import { logger } from './logging';

/**
 * Side-channel cache for read projections.
 *
 * Values are stored as JSON in both backends, so a cached projection reads back
 * as `Serialized<T>` whichever one is active. Every method swallows backend
 * failures after logging them: a miss or a stale entry only costs a database read.
 */
export interface ProjectionCache {
  get<T>(key: string): Promise<Serialized<T> | null>;
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  invalidate(...keys: string[]): Promise<void>;
}

/**
 * The shape a value takes after a JSON round trip: dates become ISO strings
 */
export type Serialized<T> = T extends Date
  ? string
  : T extends (infer U)[]
    ? Serialized<U>[]
    : T extends object
      ? { [K in keyof T]: Serialized<T[K]> }
      : T;

export const serialize = <T>(value: T): Serialized<T> => JSON.parse(JSON.stringify(value));

export const cacheKeys = {
  driverShipments: (driverId: number) => `driver:${driverId}:shipments`,
  driverBoard: () => 'drivers:board',
};

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export class RedisProjectionCache implements ProjectionCache {
  constructor(
    private readonly client: RedisClient,
    private readonly defaultTtlSeconds: number
  ) {}

  async get<T>(key: string): Promise<Serialized<T> | null> {
    if (!this.client.isReady) return null;

    try {
      const raw = await this.client.get(key);
      if (raw === null) return null;
      const value: Serialized<T> = JSON.parse(raw);
      return value;
    } catch (err) {
      logger.warn('Redis GET failed', { key, error: errorMessage(err) });
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds: number = this.defaultTtlSeconds): Promise<void> {
    if (!this.client.isReady) return;

    try {
      await this.client.set(key, JSON.stringify(value), { EX: ttlSeconds });
    } catch (err) {
      logger.warn('Redis SET failed', { key, error: errorMessage(err) });
    }
  }

  async invalidate(...keys: string[]): Promise<void> {
    if (keys.length === 0 || !this.client.isReady) return;

    try {
      await this.client.del(keys);
    } catch (err) {
      logger.warn('Redis DEL failed', { keys, error: errorMessage(err) });
    }
  }
}

/**
 * In-process TTL map, used when Redis is disabled and in tests.
 * Expired entries are dropped lazily on read; the oldest entry is evicted at capacity.
 */
export class MemoryProjectionCache implements ProjectionCache {
  private entries = new Map<string, { raw: string; expiresAt: number }>();

  constructor(
    private readonly defaultTtlSeconds: number = 60,
    private readonly maxEntries: number = 1000
  ) {}

  async get<T>(key: string): Promise<Serialized<T> | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (Date.now() > entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }

    const value: Serialized<T> = JSON.parse(entry.raw);
    return value;
  }

  async set<T>(key: string, value: T, ttlSeconds: number = this.defaultTtlSeconds): Promise<void> {
    if (!this.entries.has(key) && this.entries.size >= this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey !== undefined) this.entries.delete(oldestKey);
    }

    this.entries.set(key, {
      raw: JSON.stringify(value),
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  async invalidate(...keys: string[]): Promise<void> {
    for (const key of keys) {
      this.entries.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Read-through helper: serve `key` from the cache or compute and store it.
 * A fresh value is serialized too, so hits and misses have the same shape.
 */
export const cached = async <T>(
  cache: ProjectionCache,
  key: string,
  load: () => Promise<T>
): Promise<Serialized<T>> => {
  const hit = await cache.get<T>(key);
  if (hit !== null) return hit;

  const value = await load();
  await cache.set(key, value);
  return serialize(value);
};
