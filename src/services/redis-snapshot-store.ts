import { CacheError, errorMessage } from '../errors.js';
import type { Snapshot } from '../types/stats.js';
import type { RedisClient } from './redis-client.js';
import { deserializeSnapshot, serializeSnapshot } from './snapshot-codec.js';
import { actorKeyPrefix, type SnapshotStore } from './snapshot-store.js';

/**
 * Snapshot store backed by Redis.
 *
 * Keys live under `${prefix}:` with a per-entry PX TTL. Prefix invalidation
 * walks the keyspace with SCAN rather than KEYS so a large cache never blocks
 * the server. Every Redis failure is rethrown as CacheError.
 */
export class RedisSnapshotStore implements SnapshotStore {
  readonly backend = 'redis' as const;

  constructor(
    private readonly redis: RedisClient,
    private readonly prefix: string,
    private readonly options: {
      log?: (level: 'warn', data: Record<string, unknown>) => void;
    } = {},
  ) {}

  private key(id: string): string {
    return `${this.prefix}:${id}`;
  }

  async get(key: string): Promise<Snapshot | null> {
    const raw = await this.call('get', () => this.redis.get(this.key(key)));
    if (raw === null) return null;

    const snapshot = deserializeSnapshot(raw);
    if (snapshot === null) {
      this.options.log?.('warn', { event: 'stats_snapshot_corrupt', key });
      await this.call('del', () => this.redis.del(this.key(key)));
    }
    return snapshot;
  }

  async set(key: string, snapshot: Snapshot, ttlMs: number): Promise<void> {
    await this.call('set', () =>
      this.redis.set(this.key(key), serializeSnapshot(snapshot), 'PX', Math.max(1, Math.round(ttlMs))),
    );
  }

  async invalidate(keys: readonly string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.call('del', () => this.redis.del(...keys.map((k) => this.key(k))));
  }

  async invalidateActor(actorId: string): Promise<number> {
    return this.scanAndDelete(`${this.key(escapeGlob(actorKeyPrefix(actorId)))}*`);
  }

  async clear(): Promise<number> {
    return this.scanAndDelete(`${this.prefix}:*`);
  }

  private async scanAndDelete(pattern: string): Promise<number> {
    let cursor = '0';
    let deleted = 0;
    do {
      const [nextCursor, keys] = await this.call('scan', () =>
        this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', 100),
      );
      cursor = nextCursor;
      if (keys.length > 0) {
        deleted += await this.call('del', () => this.redis.del(...keys));
      }
    } while (cursor !== '0');
    return deleted;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new CacheError(`Redis ${operation} failed: ${errorMessage(err)}`, { operation }, { cause: err });
    }
  }
}

/** Escape glob metacharacters for a SCAN MATCH pattern. */
function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}
