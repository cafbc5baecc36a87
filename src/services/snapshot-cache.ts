/**
 * Snapshot cache: cache-aside over a SnapshotStore with single-flight and
 * version-aware invalidation.
 *
 * Key layout: `<encoded actorId>:<version>:<fingerprint parts...>`. The actor
 * version is part of the key, so a snapshot of an older version can never be
 * served for a newer one; lookups additionally compare the stored version.
 *
 * Concurrent misses on one key share a single computation. When the store is
 * unreachable the cache computes directly and hands the computation a
 * CACHE_UNAVAILABLE diagnostic to embed in the snapshot.
 *
 * The version index is bounded like the store: least recently stored actors
 * fall out first. An actor missing from the index only loses eager cleanup of
 * its older keys; those still expire through the store's TTL and eviction.
 */
import { CacheError, StatEngineError, errorMessage } from '../errors.js';
import type { Actor, Diagnostic, Snapshot } from '../types/stats.js';
import { actorKeyPrefix, type SnapshotStore } from './snapshot-store.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SnapshotCacheConfig {
  /** Entry TTL. Default: 300_000 (5 min) */
  ttlMs?: number;
  /** Actors tracked by the version index, and keys per actor. Default: 10_000 */
  maxIndexEntries?: number;
  log?: (level: 'warn' | 'debug', data: Record<string, unknown>) => void;
}

/** How a getOrCompute call was satisfied. */
export type CacheOutcome = 'hit' | 'computed' | 'coalesced' | 'degraded';

export interface CacheResult {
  readonly snapshot: Snapshot;
  readonly outcome: CacheOutcome;
}

/** Builds a snapshot. `diagnostics` must be carried into the result. */
export type SnapshotComputation = (diagnostics: readonly Diagnostic[]) => Promise<Snapshot>;

export interface SnapshotCacheMetrics {
  hits: number;
  misses: number;
  coalesced: number;
  errors: number;
  versionEvictions: number;
  inflight: number;
  indexedActors: number;
}

interface ActorIndex {
  version: number;
  keys: Set<string>;
}

// ---------------------------------------------------------------------------
// SnapshotCache
// ---------------------------------------------------------------------------

export class SnapshotCache {
  private readonly ttlMs: number;
  private readonly maxIndexEntries: number;
  private readonly inflight = new Map<string, Promise<CacheResult>>();
  /** actor prefix → newest version seen and the keys stored for it */
  private readonly index = new Map<string, ActorIndex>();

  private _hits = 0;
  private _misses = 0;
  private _coalesced = 0;
  private _errors = 0;
  private _versionEvictions = 0;

  constructor(
    readonly store: SnapshotStore,
    private readonly config: SnapshotCacheConfig = {},
  ) {
    this.ttlMs = config.ttlMs ?? 300_000;
    this.maxIndexEntries = config.maxIndexEntries ?? 10_000;
  }

  /** Cache key for an actor at its current version. */
  keyFor(actor: Actor, parts: readonly string[]): string {
    return [`${actorKeyPrefix(actor.id)}${actor.version}`, ...parts].join(':');
  }

  /**
   * Return the stored snapshot for `key`, or compute and store it.
   * Concurrent callers with the same key await one computation.
   */
  getOrCompute(key: string, actor: Actor, compute: SnapshotComputation): Promise<CacheResult> {
    const pending = this.inflight.get(key);
    if (pending) {
      this._coalesced++;
      return pending.then((result): CacheResult => ({ snapshot: result.snapshot, outcome: 'coalesced' }));
    }

    const work = this.lookupOrCompute(key, actor, compute).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, work);
    return work;
  }

  /**
   * Stored snapshot without computing. Null on miss.
   * @throws CacheError when the store is unreachable
   */
  async peek(key: string, actor: Actor): Promise<Snapshot | null> {
    const snapshot = await this.store.get(key);
    if (snapshot === null) return null;
    if (!this.matches(snapshot, actor)) {
      await this.store.invalidate([key]);
      return null;
    }
    return snapshot;
  }

  /**
   * Drop every snapshot of one actor, whatever the version.
   * @throws CacheError when the store is unreachable
   */
  async invalidateActor(actorId: string): Promise<number> {
    this.index.delete(actorKeyPrefix(actorId));
    return this.store.invalidateActor(actorId);
  }

  /** @throws CacheError when the store is unreachable */
  async clear(): Promise<number> {
    this.index.clear();
    return this.store.clear();
  }

  getMetrics(): SnapshotCacheMetrics {
    return {
      hits: this._hits,
      misses: this._misses,
      coalesced: this._coalesced,
      errors: this._errors,
      versionEvictions: this._versionEvictions,
      inflight: this.inflight.size,
      indexedActors: this.index.size,
    };
  }

  private async lookupOrCompute(key: string, actor: Actor, compute: SnapshotComputation): Promise<CacheResult> {
    let cached: Snapshot | null;
    try {
      cached = await this.peek(key, actor);
    } catch (err) {
      const cacheErr = this.asCacheError(err, 'get');
      this.config.log?.('warn', {
        event: 'stats_cache_error',
        operation: 'get',
        actor_id: actor.id,
        message: cacheErr.message,
      });
      const snapshot = await compute([{ type: 'CACHE_UNAVAILABLE', message: cacheErr.message }]);
      return { snapshot, outcome: 'degraded' };
    }

    if (cached !== null) {
      this._hits++;
      return { snapshot: cached, outcome: 'hit' };
    }

    this._misses++;
    const snapshot = await compute([]);
    await this.persist(key, actor, snapshot);
    return { snapshot, outcome: 'computed' };
  }

  /** Store and index. A failing store is logged; the snapshot is still returned. */
  private async persist(key: string, actor: Actor, snapshot: Snapshot): Promise<void> {
    const prefix = actorKeyPrefix(actor.id);
    const entry = this.index.get(prefix);

    // A resolution of an older version finishing late must not displace the newer one
    if (entry && actor.version < entry.version) return;

    // Claim the new version before awaiting, so a late older persist sees it
    let stale: string[] = [];
    if (!entry || actor.version > entry.version) {
      stale = entry ? [...entry.keys] : [];
      this.track(prefix, { version: actor.version, keys: new Set() });
    }

    try {
      if (stale.length > 0) this._versionEvictions += await this.store.invalidate(stale);
      await this.store.set(key, snapshot, this.ttlMs);

      // A newer version may have been claimed while the write was in flight
      const latest = this.index.get(prefix);
      if (latest && latest.version > actor.version) {
        await this.store.invalidate([key]);
        return;
      }
    } catch (err) {
      const cacheErr = this.asCacheError(err, 'set');
      this.config.log?.('warn', {
        event: 'stats_cache_error',
        operation: 'set',
        actor_id: actor.id,
        message: cacheErr.message,
      });
      return;
    }

    const current = this.index.get(prefix) ?? { version: actor.version, keys: new Set<string>() };
    current.keys.add(key);
    if (current.keys.size > this.maxIndexEntries) {
      const oldest = current.keys.values().next();
      if (!oldest.done) current.keys.delete(oldest.value);
    }
    this.track(prefix, current);
  }

  /** Insert or refresh an index entry as most recent, evicting the oldest past the bound. */
  private track(prefix: string, entry: ActorIndex): void {
    this.index.delete(prefix);
    this.index.set(prefix, entry);
    if (this.index.size > this.maxIndexEntries) {
      const oldest = this.index.keys().next();
      if (!oldest.done) this.index.delete(oldest.value);
    }
  }

  private matches(snapshot: Snapshot, actor: Actor): boolean {
    return snapshot.actorId === actor.id && snapshot.version === actor.version;
  }

  /**
   * Count a store failure. Plain errors are treated as an unavailable store;
   * other engine errors propagate.
   */
  private asCacheError(err: unknown, operation: string): CacheError {
    if (StatEngineError.isStatEngineError(err) && !(err instanceof CacheError)) throw err;
    this._errors++;
    if (err instanceof CacheError) return err;
    return new CacheError(`Snapshot store ${operation} failed: ${errorMessage(err)}`, { operation }, { cause: err });
  }
}
