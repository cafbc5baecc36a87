/**
 * In-process snapshot store: LRU with TTL.
 *
 * Map iteration order doubles as recency order: a hit deletes and re-inserts
 * the key, and eviction takes the first key. Expired entries are removed
 * lazily on read.
 */
import type { Snapshot } from '../types/stats.js';
import { actorKeyPrefix, type SnapshotStore } from './snapshot-store.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MemorySnapshotStoreConfig {
  /** Maximum cached entries. Default: 10_000 */
  maxEntries?: number;
}

interface CacheEntry {
  snapshot: Snapshot;
  expiresAt: number;
}

export interface MemoryStoreMetrics {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  hitRate: number;
}

// ---------------------------------------------------------------------------
// MemorySnapshotStore
// ---------------------------------------------------------------------------

export class MemorySnapshotStore implements SnapshotStore {
  readonly backend = 'memory' as const;

  private readonly _map = new Map<string, CacheEntry>();
  private readonly _maxEntries: number;

  // Metrics
  private _hits = 0;
  private _misses = 0;
  private _evictions = 0;

  constructor(config: MemorySnapshotStoreConfig = {}) {
    this._maxEntries = config.maxEntries ?? 10_000;
  }

  async get(key: string): Promise<Snapshot | null> {
    const entry = this._map.get(key);

    if (!entry) {
      this._misses++;
      return null;
    }

    if (Date.now() > entry.expiresAt) {
      this._map.delete(key);
      this._misses++;
      return null;
    }

    // LRU refresh
    this._map.delete(key);
    this._map.set(key, entry);
    this._hits++;
    return entry.snapshot;
  }

  async set(key: string, snapshot: Snapshot, ttlMs: number): Promise<void> {
    if (this._map.has(key)) {
      this._map.delete(key);
    }

    while (this._map.size >= this._maxEntries) {
      const oldest = this._map.keys().next();
      if (oldest.done) break;
      this._map.delete(oldest.value);
      this._evictions++;
    }

    this._map.set(key, { snapshot, expiresAt: Date.now() + ttlMs });
  }

  async invalidate(keys: readonly string[]): Promise<number> {
    let deleted = 0;
    for (const key of keys) {
      if (this._map.delete(key)) deleted++;
    }
    return deleted;
  }

  async invalidateActor(actorId: string): Promise<number> {
    const prefix = actorKeyPrefix(actorId);
    return this.invalidate([...this._map.keys()].filter((key) => key.startsWith(prefix)));
  }

  async clear(): Promise<number> {
    const size = this._map.size;
    this._map.clear();
    return size;
  }

  /** Current number of entries (including potentially expired). */
  get size(): number {
    return this._map.size;
  }

  get metrics(): MemoryStoreMetrics {
    const total = this._hits + this._misses;
    return {
      hits: this._hits,
      misses: this._misses,
      evictions: this._evictions,
      size: this._map.size,
      hitRate: total > 0 ? this._hits / total : 0,
    };
  }
}
