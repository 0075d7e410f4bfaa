/**
 * Cache Service
 *
 * Redis-backed with in-memory fallback.
 * Tracks hit/miss metrics via Prometheus.
 */

import Redis from 'ioredis';
import { CacheStore, CacheConfig, CacheStats, RedisCommands } from './types';
import { logger } from '../observability/logger';
import { cacheHitsTotal, cacheMissesTotal } from '../observability/metrics';

const DEFAULT_CONFIG: CacheConfig = {
  defaultTtlSeconds: 3600,
  maxEntries: 10_000,
  keyPrefix: 'aigw:cache:',
};

const SWEEP_INTERVAL_MS = 60_000;

/** A TTL of zero or less means "do not cache"; both stores skip the write */
function isStorableTtl(ttlSeconds: number): boolean {
  return Number.isFinite(ttlSeconds) && ttlSeconds > 0;
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisCacheStore implements CacheStore {
  private _hits = 0;
  private _misses = 0;
  private readonly log = logger.child({ component: 'cache-redis' });

  constructor(
    private readonly redis: RedisCommands,
    private readonly config: CacheConfig,
  ) {}

  async get<T = unknown>(key: string): Promise<T | null> {
    try {
      const raw = await this.redis.get(this.prefixKey(key));
      if (raw === null) {
        this.recordMiss();
        return null;
      }
      this.recordHit();
      return JSON.parse(raw) as T;
    } catch (err) {
      this.log.warn({ err, key }, 'Cache get error; treating as miss');
      this.recordMiss();
      return null;
    }
  }

  async set<T = unknown>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const requested = ttlSeconds ?? this.config.defaultTtlSeconds;
    if (!isStorableTtl(requested)) return;
    // SETEX takes whole seconds
    const ttl = Math.ceil(requested);
    try {
      await this.redis.setex(this.prefixKey(key), ttl, JSON.stringify(value));
    } catch (err) {
      this.log.warn({ err, key }, 'Cache set error');
    }
  }

  async del(key: string): Promise<void> {
    try {
      await this.redis.del(this.prefixKey(key));
    } catch (err) {
      this.log.warn({ err, key }, 'Cache del error');
    }
  }

  async has(key: string): Promise<boolean> {
    try {
      return (await this.redis.exists(this.prefixKey(key))) === 1;
    } catch (err) {
      this.log.warn({ err, key }, 'Cache exists error');
      return false;
    }
  }

  async clear(): Promise<void> {
    // Only clears keys with our prefix
    try {
      let cursor = '0';
      do {
        const [next, keys] = await this.redis.scan(cursor, `${this.config.keyPrefix}*`, 500);
        if (keys.length > 0) await this.redis.del(...keys);
        cursor = next;
      } while (cursor !== '0');
    } catch (err) {
      this.log.warn({ err }, 'Cache clear error');
    }
  }

  stats(): CacheStats {
    return { hits: this._hits, misses: this._misses, size: -1 };
  }

  close(): void {
    // Connection lifecycle belongs to the Redis client's owner
  }

  private recordHit(): void {
    this._hits++;
    cacheHitsTotal.inc({ cache_type: 'redis' });
  }

  private recordMiss(): void {
    this._misses++;
    cacheMissesTotal.inc({ cache_type: 'redis' });
  }

  private prefixKey(key: string): string {
    return `${this.config.keyPrefix}${key}`;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

interface MemoryEntry {
  value: unknown;
  expiresAt: number;
}

export class InMemoryCacheStore implements CacheStore {
  private readonly store = new Map<string, MemoryEntry>();
  private readonly sweepTimer: NodeJS.Timeout;
  private _hits = 0;
  private _misses = 0;

  constructor(
    private readonly config: CacheConfig,
    private readonly now: () => number = Date.now,
  ) {
    this.sweepTimer = setInterval(() => this.evictExpired(), SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
  }

  async get<T = unknown>(key: string): Promise<T | null> {
    const entry = this.store.get(key);
    if (!entry || this.now() >= entry.expiresAt) {
      if (entry) this.store.delete(key);
      this._misses++;
      cacheMissesTotal.inc({ cache_type: 'memory' });
      return null;
    }
    this._hits++;
    cacheHitsTotal.inc({ cache_type: 'memory' });
    return entry.value as T;
  }

  async set<T = unknown>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.config.defaultTtlSeconds;
    if (!isStorableTtl(ttl)) return;
    // Re-insert so Map order tracks write recency
    this.store.delete(key);
    if (this.store.size >= this.config.maxEntries) {
      this.evictExpired();
      if (this.store.size >= this.config.maxEntries) {
        const oldest = this.store.keys().next();
        if (!oldest.done) this.store.delete(oldest.value);
      }
    }
    this.store.set(key, { value, expiresAt: this.now() + ttl * 1000 });
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }

  async has(key: string): Promise<boolean> {
    const entry = this.store.get(key);
    return entry !== undefined && this.now() < entry.expiresAt;
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  stats(): CacheStats {
    return { hits: this._hits, misses: this._misses, size: this.store.size };
  }

  close(): void {
    clearInterval(this.sweepTimer);
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) this.store.delete(key);
    }
  }
}

// ───── Factory ──────────────────────────────────────────────────

/** Adapt an ioredis client to the commands the store issues */
export function redisCommands(redis: Redis): RedisCommands {
  return {
    get: (key) => redis.get(key),
    setex: (key, seconds, value) => redis.setex(key, seconds, value),
    del: (...keys) => redis.del(...keys),
    exists: (key) => redis.exists(key),
    scan: (cursor, pattern, count) => redis.scan(cursor, 'MATCH', pattern, 'COUNT', count),
  };
}

export function createCacheStore(
  redis?: Redis,
  config?: Partial<CacheConfig>,
  now?: () => number,
): CacheStore {
  const merged = { ...DEFAULT_CONFIG, ...config };
  if (redis) {
    logger.info({ keyPrefix: merged.keyPrefix }, 'Cache store: Redis-backed');
    return new RedisCacheStore(redisCommands(redis), merged);
  }
  logger.info({ maxEntries: merged.maxEntries }, 'Cache store: In-memory');
  return new InMemoryCacheStore(merged, now);
}
