export type * from './types/stats.js';
export type { HealthResponse, ComponentHealth, ErrorResponse } from './types.js';

export {
  StatEngineError,
  ValidationError,
  ProcessingError,
  RegistryError,
  CacheError,
  ERROR_STATUS_MAP,
  type StatEngineErrorKind,
} from './errors.js';

export { loadConfig, createDimensionClassifier, DEFAULT_PRIMARY_DIMENSIONS, type StatEngineConfig } from './config.js';
export { createLogger, type LogLevel, type LogFn } from './middleware/logger.js';

export { Caps } from './services/caps.js';
export { createContribution, isValidContribution, contributionInvalidReason } from './services/contribution.js';
export {
  BucketOperatorRegistry,
  createBucketOperatorRegistry,
  CORE_BUCKETS,
  EXTENDED_BUCKETS,
  CORE_OPERATORS,
  EXTENDED_OPERATORS,
  type BucketOperator,
  type FoldEnvironment,
} from './services/bucket-operators.js';
export {
  BucketProcessor,
  processContributionsInOrder,
  validateContributions,
  groupContributionsByBucket,
  getBucketProcessingOrder,
  sortWithinBucket,
  type BucketResult,
} from './services/bucket-processor.js';
export { parseCapLayerConfig, orderCapLayers, createDefaultCapLayerConfig } from './services/cap-layer-config.js';
export {
  CapsProvider,
  unionAcrossLayers,
  prioritizedOverrideAcrossLayers,
  penaltyTolerantDimensions,
  type EffectiveCaps,
  type OutputSource,
} from './services/caps-provider.js';
export { SubsystemRegistry, type Subsystem, type RegisteredSubsystem } from './services/subsystem-registry.js';
export { actorKeyPrefix, type SnapshotStore } from './services/snapshot-store.js';
export { MemorySnapshotStore } from './services/memory-snapshot-store.js';
export { RedisSnapshotStore } from './services/redis-snapshot-store.js';
export { createRedisClient, checkRedisHealth, closeRedisClient, type RedisClient } from './services/redis-client.js';
export { SnapshotCache, type CacheOutcome } from './services/snapshot-cache.js';
export { serializeSnapshot, deserializeSnapshot, toWireSnapshot, type WireSnapshot } from './services/snapshot-codec.js';
export { AggregatorMetricsCollector, type AggregatorMetrics, type SubsystemMetrics } from './services/aggregator-metrics.js';
export { Aggregator, type AggregatorOptions } from './services/aggregator.js';

export { createStatEngine, type StatEngine, type StatEngineOptions } from './engine.js';
export { createStatsApp, type StatsAppOptions } from './server.js';
