import { InMemoryCacheStore, RedisCacheStore } from '../../src/cache/cache-service';
import { buildCacheKey, stableStringify } from '../../src/cache/cache-key';
import { RedisCommands } from '../../src/cache/types';
import { FakeClock } from '../helpers/fake-provider';

/** Map-backed stand-in for the handful of Redis commands the store issues */
class FakeRedis implements RedisCommands {
  readonly data = new Map<string, { value: string; ttl: number }>();
  down = false;

  async get(key: string): Promise<string | null> {
    this.check();
    return this.data.get(key)?.value ?? null;
  }

  async setex(key: string, seconds: number, value: string): Promise<'OK'> {
    this.check();
    this.data.set(key, { value, ttl: seconds });
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    this.check();
    let removed = 0;
    for (const key of keys) {
      if (this.data.delete(key)) removed++;
    }
    return removed;
  }

  async exists(key: string): Promise<number> {
    this.check();
    return this.data.has(key) ? 1 : 0;
  }

  async scan(_cursor: string, pattern: string): Promise<[string, string[]]> {
    this.check();
    const prefix = pattern.replace(/\*$/, '');
    return ['0', [...this.data.keys()].filter((k) => k.startsWith(prefix))];
  }

  private check(): void {
    if (this.down) throw new Error('ECONNREFUSED');
  }
}

describe('stableStringify', () => {
  it('should sort object keys at every depth', () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  it('should keep array order', () => {
    expect(stableStringify({ list: [3, 1, 2] })).toBe('{"list":[3,1,2]}');
  });
});

describe('buildCacheKey', () => {
  it('should ignore argument key order', () => {
    expect(buildCacheKey('generate_blog_topics', { interests: ['go'], count: 3 })).toBe(
      buildCacheKey('generate_blog_topics', { count: 3, interests: ['go'] }),
    );
  });

  it('should differ by tool and by argument values', () => {
    const base = buildCacheKey('generate_blog_topics', { interests: ['go'] });
    expect(buildCacheKey('moderate_content', { interests: ['go'] })).not.toBe(base);
    expect(buildCacheKey('generate_blog_topics', { interests: ['rust'] })).not.toBe(base);
  });

  it('should namespace keys by tool', () => {
    expect(buildCacheKey('moderate_content', { text: 'hi' })).toMatch(/^tool:moderate_content:[0-9a-f]{64}$/);
  });
});

describe('InMemoryCacheStore', () => {
  let clock: FakeClock;
  let cache: InMemoryCacheStore;

  beforeEach(() => {
    clock = new FakeClock();
    cache = new InMemoryCacheStore({ defaultTtlSeconds: 60, maxEntries: 3, keyPrefix: '' }, clock.now);
  });

  afterEach(() => {
    cache.close();
  });

  it('should return a stored value before expiry', async () => {
    await cache.set('k', { answer: 42 }, 30);
    clock.advance(29_999);
    expect(await cache.get('k')).toEqual({ answer: 42 });
  });

  it('should treat an entry as absent from its expiry instant', async () => {
    await cache.set('k', 'v', 30);
    clock.advance(30_000);
    expect(await cache.get('k')).toBeNull();
    expect(await cache.has('k')).toBe(false);
  });

  it('should skip the write for a TTL of zero or less', async () => {
    await cache.set('zero', 'v', 0);
    await cache.set('negative', 'v', -5);
    expect(await cache.has('zero')).toBe(false);
    expect(await cache.has('negative')).toBe(false);
    expect(cache.stats().size).toBe(0);
  });

  it('should apply the default TTL when none is given', async () => {
    await cache.set('k', 'v');
    clock.advance(59_000);
    expect(await cache.has('k')).toBe(true);
    clock.advance(1_000);
    expect(await cache.has('k')).toBe(false);
  });

  it('should evict the oldest entry when full', async () => {
    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.set('c', 3);
    await cache.set('d', 4);

    expect(await cache.get('a')).toBeNull();
    expect(await cache.get('d')).toBe(4);
    expect(cache.stats().size).toBe(3);
  });

  it('should count hits and misses', async () => {
    await cache.set('k', 'v');
    await cache.get('k');
    await cache.get('missing');
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('should delete and clear entries', async () => {
    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.del('a');
    expect(await cache.has('a')).toBe(false);
    await cache.clear();
    expect(cache.stats().size).toBe(0);
  });
});

describe('RedisCacheStore', () => {
  let redis: FakeRedis;
  let cache: RedisCacheStore;

  beforeEach(() => {
    redis = new FakeRedis();
    cache = new RedisCacheStore(redis, { defaultTtlSeconds: 3600, maxEntries: 0, keyPrefix: 'aigw:cache:' });
  });

  it('should store JSON under the prefixed key with the given TTL', async () => {
    await cache.set('tool:x:abc', { topics: ['one'] }, 120);
    expect(redis.data.get('aigw:cache:tool:x:abc')).toEqual({ value: '{"topics":["one"]}', ttl: 120 });
    expect(await cache.get('tool:x:abc')).toEqual({ topics: ['one'] });
  });

  it('should round fractional TTLs up to whole seconds', async () => {
    await cache.set('k', 'v', 0.2);
    expect(redis.data.get('aigw:cache:k')?.ttl).toBe(1);
  });

  it('should skip the write for a TTL of zero or less', async () => {
    await cache.set('zero', 'v', 0);
    await cache.set('negative', 'v', -5);
    expect(redis.data.size).toBe(0);
  });

  it('should fall back to the default TTL', async () => {
    await cache.set('k', 'v');
    expect(redis.data.get('aigw:cache:k')?.ttl).toBe(3600);
  });

  it('should report a miss instead of throwing when Redis is down', async () => {
    redis.down = true;
    await expect(cache.get('k')).resolves.toBeNull();
    await expect(cache.set('k', 'v')).resolves.toBeUndefined();
    await expect(cache.has('k')).resolves.toBe(false);
    expect(cache.stats()).toEqual({ hits: 0, misses: 1, size: -1 });
  });

  it('should clear only prefixed keys', async () => {
    redis.data.set('other:key', { value: '"x"', ttl: 10 });
    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.clear();
    expect([...redis.data.keys()]).toEqual(['other:key']);
  });
});
