import { ValidationError } from './errors.js';
import { isLogLevel, type LogLevel } from './middleware/logger.js';
import type { DimensionClassifier } from './types/stats.js';

export interface StatEngineConfig {
  logLevel: LogLevel;

  // Snapshot cache
  cacheTtlMs: number;
  cacheMaxEntries: number;
  cacheBackend: 'memory' | 'redis';
  redisUrl: string | null;
  redisPrefix: string;

  // Subsystem fan-out
  subsystemTimeoutMs: number;
  maxConcurrentSubsystems: number;

  /** Register Exponential, Logarithmic and Conditional buckets. */
  extendedBuckets: boolean;

  /** Dimensions classified as primary; everything else is derived. */
  primaryDimensions: string[];
}

export const DEFAULT_PRIMARY_DIMENSIONS = [
  'strength',
  'agility',
  'intelligence',
  'vitality',
  'spirit',
  'luck',
] as const;

/**
 * Environment variables (all optional):
 *
 * LOG_LEVEL                        structured log level; default 'info'
 * STATS_CACHE_TTL_MS               snapshot TTL in ms; default 300000
 * STATS_CACHE_MAX_ENTRIES          in-memory LRU bound; default 10000
 * STATS_CACHE_BACKEND              'memory' or 'redis'; default 'memory' (auto-upgrades to 'redis' when REDIS_URL set)
 * REDIS_URL                        Redis connection string; null keeps the in-memory store
 * STATS_REDIS_PREFIX               Redis key prefix; default 'stats:snapshot'
 * STATS_SUBSYSTEM_TIMEOUT_MS       per-subsystem call timeout in ms; default 1000
 * STATS_MAX_CONCURRENT_SUBSYSTEMS  subsystem calls in flight per engine; default 8
 * STATS_EXTENDED_BUCKETS           'true' enables Exponential/Logarithmic/Conditional; default false
 * STATS_PRIMARY_DIMENSIONS         comma-separated primary dimensions; default strength,agility,intelligence,vitality,spirit,luck
 *
 * @throws ValidationError on a malformed value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StatEngineConfig {
  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ValidationError(`LOG_LEVEL must be one of error, warn, info, debug (got ${logLevel})`, {
      variable: 'LOG_LEVEL',
    });
  }

  const redisUrl = env.REDIS_URL || null;

  // Explicit override, or auto-upgrade when Redis is available
  const cacheBackendRaw = env.STATS_CACHE_BACKEND;
  let cacheBackend: 'memory' | 'redis' = 'memory';
  if (cacheBackendRaw === 'redis' || cacheBackendRaw === 'memory') {
    cacheBackend = cacheBackendRaw;
  } else if (cacheBackendRaw !== undefined && cacheBackendRaw !== '') {
    throw new ValidationError(`STATS_CACHE_BACKEND must be 'memory' or 'redis' (got ${cacheBackendRaw})`, {
      variable: 'STATS_CACHE_BACKEND',
    });
  } else if (redisUrl) {
    cacheBackend = 'redis';
  }
  if (cacheBackend === 'redis' && !redisUrl) {
    throw new ValidationError('STATS_CACHE_BACKEND=redis requires REDIS_URL', { variable: 'REDIS_URL' });
  }

  const primaryRaw = env.STATS_PRIMARY_DIMENSIONS;
  const primaryDimensions = primaryRaw
    ? primaryRaw.split(',').map((d) => d.trim()).filter((d) => d.length > 0)
    : [...DEFAULT_PRIMARY_DIMENSIONS];

  return {
    logLevel,
    cacheTtlMs: parsePositiveInt(env, 'STATS_CACHE_TTL_MS', 300_000),
    cacheMaxEntries: parsePositiveInt(env, 'STATS_CACHE_MAX_ENTRIES', 10_000),
    cacheBackend,
    redisUrl,
    redisPrefix: env.STATS_REDIS_PREFIX || 'stats:snapshot',
    subsystemTimeoutMs: parsePositiveInt(env, 'STATS_SUBSYSTEM_TIMEOUT_MS', 1_000),
    maxConcurrentSubsystems: parsePositiveInt(env, 'STATS_MAX_CONCURRENT_SUBSYSTEMS', 8),
    extendedBuckets: env.STATS_EXTENDED_BUCKETS === 'true',
    primaryDimensions,
  };
}

/** Primary when listed, derived otherwise. */
export function createDimensionClassifier(primaryDimensions: readonly string[]): DimensionClassifier {
  const primary = new Set(primaryDimensions);
  return (dimension) => (primary.has(dimension) ? 'primary' : 'derived');
}

function parsePositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ValidationError(`${name} must be a positive integer (got ${raw})`, { variable: name });
  }
  const value = parseInt(raw, 10);
  if (value <= 0) {
    throw new ValidationError(`${name} must be a positive integer (got ${raw})`, { variable: name });
  }
  return value;
}
