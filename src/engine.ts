import type { StatEngineConfig } from './config.js';
import { createDimensionClassifier, loadConfig } from './config.js';
import { createLogger, type LogFn } from './middleware/logger.js';
import { Aggregator } from './services/aggregator.js';
import { AggregatorMetricsCollector } from './services/aggregator-metrics.js';
import { createBucketOperatorRegistry, type BucketOperator } from './services/bucket-operators.js';
import { BucketProcessor } from './services/bucket-processor.js';
import { createDefaultCapLayerConfig } from './services/cap-layer-config.js';
import { CapsProvider } from './services/caps-provider.js';
import { MemorySnapshotStore } from './services/memory-snapshot-store.js';
import { closeRedisClient, createRedisClient, type RedisClient } from './services/redis-client.js';
import { RedisSnapshotStore } from './services/redis-snapshot-store.js';
import { SnapshotCache } from './services/snapshot-cache.js';
import type { SnapshotStore } from './services/snapshot-store.js';
import { SubsystemRegistry, type Subsystem } from './services/subsystem-registry.js';
import type { CapLayerConfig, DimensionClassifier } from './types/stats.js';

export interface StatEngineOptions {
  /** Default: loadConfig() from the environment. */
  config?: StatEngineConfig;
  /** Default: the five-layer strict configuration. */
  capLayers?: CapLayerConfig;
  /** Registered in order after the registry is created. */
  subsystems?: readonly Subsystem[];
  /** Extra bucket operators on top of the configured set. */
  bucketOperators?: readonly BucketOperator[];
  /** Default: primary when listed in config.primaryDimensions. */
  classifier?: DimensionClassifier;
  /** Overrides the store chosen by config.cacheBackend. */
  store?: SnapshotStore;
  /** Default: JSON lines on stdout at config.logLevel. */
  log?: LogFn;
}

/** A wired engine. `close()` releases the Redis connection when one was opened. */
export interface StatEngine {
  readonly config: StatEngineConfig;
  readonly registry: SubsystemRegistry;
  readonly capsProvider: CapsProvider;
  readonly aggregator: Aggregator;
  readonly cache: SnapshotCache;
  readonly store: SnapshotStore;
  /** Null unless the Redis backend is in use. */
  readonly redis: RedisClient | null;
  readonly log: LogFn;
  close(): Promise<void>;
}

/**
 * Composition root. Builds and wires every collaborator in one place.
 *
 * Wiring order matters in one spot: the caps provider needs the aggregator's
 * collectOutputs for getCapsForDimension, and the aggregator needs the caps
 * provider, so the output source is bound after both exist.
 */
export function createStatEngine(options: StatEngineOptions = {}): StatEngine {
  const config = options.config ?? loadConfig();
  const log = options.log ?? createLogger('stat-engine', config.logLevel).log;

  const registry = new SubsystemRegistry({ log });
  for (const subsystem of options.subsystems ?? []) registry.register(subsystem);

  const capsProvider = new CapsProvider(options.capLayers ?? createDefaultCapLayerConfig(), { log });

  const operators = createBucketOperatorRegistry({
    extended: config.extendedBuckets,
    additional: options.bucketOperators,
  });
  const bucketProcessor = new BucketProcessor(operators, { log });

  let redis: RedisClient | null = null;
  let store: SnapshotStore;
  if (options.store) {
    store = options.store;
  } else if (config.cacheBackend === 'redis' && config.redisUrl) {
    redis = createRedisClient({ url: config.redisUrl, log });
    store = new RedisSnapshotStore(redis, config.redisPrefix, { log });
  } else {
    store = new MemorySnapshotStore({ maxEntries: config.cacheMaxEntries });
  }

  const cache = new SnapshotCache(store, {
    ttlMs: config.cacheTtlMs,
    maxIndexEntries: config.cacheMaxEntries,
    log,
  });

  const aggregator = new Aggregator({
    registry,
    capsProvider,
    cache,
    bucketProcessor,
    classifier: options.classifier ?? createDimensionClassifier(config.primaryDimensions),
    subsystemTimeoutMs: config.subsystemTimeoutMs,
    maxConcurrentSubsystems: config.maxConcurrentSubsystems,
    metrics: new AggregatorMetricsCollector(),
    log,
  });

  capsProvider.bindOutputSource((actor) => aggregator.collectOutputs(actor));

  log('info', {
    event: 'stats_engine_started',
    cache_backend: store.backend,
    subsystems: registry.count(),
    cap_layers: capsProvider.getLayerOrder(),
    cap_policy: capsProvider.config.policy,
    buckets: bucketProcessor.processingOrder(),
  });

  return {
    config,
    registry,
    capsProvider,
    aggregator,
    cache,
    store,
    redis,
    log,
    async close() {
      if (redis) await closeRedisClient(redis);
    },
  };
}
