import type { Snapshot } from '../types/stats.js';

/**
 * Backing store for computed snapshots.
 *
 * Keys are opaque strings built by SnapshotCache; every key for one actor
 * starts with `actorKeyPrefix(actorId)`. Implementations reject with CacheError
 * when the backend is unreachable, and the caller falls back to computing.
 */
export interface SnapshotStore {
  readonly backend: 'memory' | 'redis';
  /** Null on miss or expiry. */
  get(key: string): Promise<Snapshot | null>;
  set(key: string, snapshot: Snapshot, ttlMs: number): Promise<void>;
  /** @returns number of keys removed */
  invalidate(keys: readonly string[]): Promise<number>;
  /** Remove every key under `actorKeyPrefix(actorId)`. @returns number of keys removed */
  invalidateActor(actorId: string): Promise<number>;
  /** @returns number of keys removed */
  clear(): Promise<number>;
}

/**
 * Prefix shared by every key of one actor. The id is URI-encoded so a `:` in
 * an actor id cannot make one actor's prefix match another's keys.
 */
export function actorKeyPrefix(actorId: string): string {
  return `${encodeURIComponent(actorId)}:`;
}
