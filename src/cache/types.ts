/**
 * Cache Infrastructure Types
 *
 * Memoizes upstream AI responses. Redis-backed, or in-memory when no
 * Redis is configured.
 */

export interface CacheConfig {
  /** TTL used when set() is called without one */
  defaultTtlSeconds: number;
  /** Maximum entries in memory cache */
  maxEntries: number;
  /** Redis key prefix */
  keyPrefix: string;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** -1 when the backend cannot report it cheaply */
  size: number;
}

/**
 * Every method is soft-failing: backend errors are logged, reads report a
 * miss and writes become no-ops.
 */
export interface CacheStore {
  get<T = unknown>(key: string): Promise<T | null>;
  set<T = unknown>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
  has(key: string): Promise<boolean>;
  clear(): Promise<void>;
  stats(): CacheStats;
  /** Stop background timers */
  close(): void;
}

/** The subset of ioredis commands the Redis store issues */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  exists(key: string): Promise<number>;
  scan(cursor: string, pattern: string, count: number): Promise<[string, string[]]>;
}
