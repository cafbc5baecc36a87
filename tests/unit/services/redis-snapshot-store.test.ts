import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createRedisClient } from '../../../src/services/redis-client.js';
import { RedisSnapshotStore } from '../../../src/services/redis-snapshot-store.js';
import { CacheError } from '../../../src/errors.js';
import { FakeRedis } from '../../fixtures/fake-redis.js';
import { makeSnapshot } from '../../fixtures/snapshots.js';

vi.mock('ioredis', async () => {
  const { FakeRedis: Redis } = await import('../../fixtures/fake-redis.js');
  return { Redis };
});

function connect() {
  const client = createRedisClient({ url: 'redis://localhost:6379' });
  if (!(client instanceof FakeRedis)) throw new Error('ioredis mock not installed');
  return client;
}

describe('RedisSnapshotStore', () => {
  let redis: ReturnType<typeof connect>;
  let store: RedisSnapshotStore;
  const log = vi.fn();

  beforeEach(() => {
    log.mockReset();
    redis = connect();
    store = new RedisSnapshotStore(redis, 'stats:snapshot', { log });
  });

  it('stores under the prefix with a PX ttl', async () => {
    await store.set('player-1:1:abc', makeSnapshot(), 1500.4);
    expect(redis.kv.has('stats:snapshot:player-1:1:abc')).toBe(true);
    expect(redis.pxByKey.get('stats:snapshot:player-1:1:abc')).toBe(1500);
  });

  it('never sends a zero ttl', async () => {
    await store.set('k', makeSnapshot(), 0);
    expect(redis.pxByKey.get('stats:snapshot:k')).toBe(1);
  });

  it('round-trips a snapshot including unbounded caps', async () => {
    const snapshot = makeSnapshot('player-1', 3, {
      capsUsed: { strength: { min: 0, max: Number.POSITIVE_INFINITY } },
      diagnostics: [{ type: 'SUBSYSTEM_TIMEOUT', systemId: 'slow', timeoutMs: 50 }],
    });
    await store.set('k', snapshot, 1000);

    expect(redis.kv.get('stats:snapshot:k')).toContain('"max":"Infinity"');
    expect(await store.get('k')).toEqual(snapshot);
  });

  it('returns null on a miss', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('drops a corrupt value and reports a miss', async () => {
    redis.kv.set('stats:snapshot:bad', '{"actorId":42}');

    expect(await store.get('bad')).toBeNull();
    expect(redis.kv.has('stats:snapshot:bad')).toBe(false);
    expect(log).toHaveBeenCalledWith('warn', { event: 'stats_snapshot_corrupt', key: 'bad' });
  });

  it('invalidate deletes the given keys', async () => {
    await store.set('a', makeSnapshot(), 1000);
    await store.set('b', makeSnapshot(), 1000);
    expect(await store.invalidate(['a', 'b', 'c'])).toBe(2);
    expect(await store.invalidate([])).toBe(0);
  });

  it('invalidateActor removes only that actor across scan pages', async () => {
    for (const key of ['player-1:1:a', 'player-1:1:b', 'player-1:2:c', 'player-10:1:a', 'other:1:a']) {
      await store.set(key, makeSnapshot(), 1000);
    }

    expect(await store.invalidateActor('player-1')).toBe(3);
    expect([...redis.kv.keys()].sort()).toEqual(['stats:snapshot:other:1:a', 'stats:snapshot:player-10:1:a']);
    expect(redis.scan).toHaveBeenCalledWith('0', 'MATCH', 'stats:snapshot:player-1:*', 'COUNT', 100);
  });

  it('escapes glob characters in actor ids', async () => {
    await store.set('a*b:1:x', makeSnapshot(), 1000);
    await store.set('aXb:1:x', makeSnapshot(), 1000);

    expect(await store.invalidateActor('a*b')).toBe(1);
    expect(redis.kv.has('stats:snapshot:aXb:1:x')).toBe(true);
  });

  it('clear removes everything under the prefix', async () => {
    await store.set('a', makeSnapshot(), 1000);
    await store.set('b', makeSnapshot(), 1000);
    await store.set('c', makeSnapshot(), 1000);
    redis.kv.set('unrelated', 'x');

    expect(await store.clear()).toBe(3);
    expect([...redis.kv.keys()]).toEqual(['unrelated']);
  });

  it('wraps Redis failures in CacheError', async () => {
    redis.get.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    const err = await store.get('k').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CacheError);
    expect(err).toMatchObject({
      message: 'Redis get failed: ECONNREFUSED',
      kind: 'cache',
      body: { operation: 'get' },
    });
  });

  it('reports its backend', () => {
    expect(store.backend).toBe('redis');
  });
});
