/**
 * Aggregator: resolves an actor's snapshot from every eligible subsystem.
 *
 * Per resolution:
 * 1. Take the registry's current ordering (a frozen array; later registrations
 *    do not affect a resolution already running) and keep the subsystems the
 *    actor is eligible for.
 * 2. Build the cache key
 *    `actorId:version:subsystemFingerprint:configFingerprint[:contextFingerprint]`
 *    and go through the snapshot cache (hit, or one computation per key).
 * 3. On a miss, call every subsystem on a bottleneck limiter (bounded
 *    concurrency, per-call expiration). A failing or timed-out subsystem is
 *    skipped and reported; only when every subsystem fails does the resolution
 *    fail.
 * 4. Merge contributions per dimension in registry order (never completion
 *    order), compute caps across layers, fold each dimension, clamp, classify.
 *
 * Snapshots are deep-frozen before they are returned or stored.
 */
import Bottleneck from 'bottleneck';
import { z } from 'zod';
import { ProcessingError, StatEngineError, ValidationError, errorMessage } from '../errors.js';
import type { LogFn } from '../middleware/logger.js';
import type {
  Actor,
  CapsRange,
  Contribution,
  Diagnostic,
  DimensionClassifier,
  OrderedOutput,
  ResolutionContext,
  Snapshot,
  SubsystemOutput,
} from '../types/stats.js';
import { fingerprint } from '../utils/crypto.js';
import { addSanitizedAttributes, startSanitizedSpan } from '../utils/span-sanitizer.js';
import { AggregatorMetricsCollector, type AggregatorMetrics } from './aggregator-metrics.js';
import { BucketProcessor } from './bucket-processor.js';
import { penaltyTolerantDimensions, type CapsProvider } from './caps-provider.js';
import type { SnapshotCache } from './snapshot-cache.js';
import type { RegisteredSubsystem, SubsystemRegistry } from './subsystem-registry.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AggregatorOptions {
  registry: SubsystemRegistry;
  capsProvider: CapsProvider;
  cache: SnapshotCache;
  /** Default: core buckets only. */
  bucketProcessor?: BucketProcessor;
  /** Default: every dimension is primary. */
  classifier?: DimensionClassifier;
  /** Per-call subsystem timeout. Default: 1000 */
  subsystemTimeoutMs?: number;
  /** Subsystem calls in flight across all resolutions. Default: 8 */
  maxConcurrentSubsystems?: number;
  metrics?: AggregatorMetricsCollector;
  log?: LogFn;
}

type SubsystemResult =
  | { readonly ok: true; readonly entry: RegisteredSubsystem; readonly output: SubsystemOutput }
  | { readonly ok: false; readonly entry: RegisteredSubsystem; readonly diagnostic: Diagnostic };

const EMPTY_CONTEXT: ResolutionContext = Object.freeze({});

// ---------------------------------------------------------------------------
// Aggregator
// ---------------------------------------------------------------------------

export class Aggregator {
  private readonly registry: SubsystemRegistry;
  private readonly capsProvider: CapsProvider;
  private readonly cache: SnapshotCache;
  private readonly processor: BucketProcessor;
  private readonly classifier: DimensionClassifier;
  private readonly timeoutMs: number;
  private readonly limiter: Bottleneck;
  private readonly metrics: AggregatorMetricsCollector;
  private readonly log: LogFn | undefined;
  /** Cap layers, policy and bucket order never change after construction. */
  private readonly configFingerprint: string;

  constructor(options: AggregatorOptions) {
    this.registry = options.registry;
    this.capsProvider = options.capsProvider;
    this.cache = options.cache;
    this.processor = options.bucketProcessor ?? new BucketProcessor();
    this.classifier = options.classifier ?? (() => 'primary');
    this.timeoutMs = options.subsystemTimeoutMs ?? 1_000;
    this.limiter = new Bottleneck({ maxConcurrent: options.maxConcurrentSubsystems ?? 8 });
    this.metrics = options.metrics ?? new AggregatorMetricsCollector();
    this.log = options.log;

    const capConfig = this.capsProvider.config;
    this.configFingerprint = fingerprint({
      layers: this.capsProvider.getLayers(),
      policy: capConfig.policy,
      order: capConfig.order,
      customMerge: capConfig.customMerge,
      buckets: this.processor.processingOrder(),
    });
  }

  /** Resolve with an empty context. */
  resolve(actor: Actor): Promise<Snapshot> {
    return this.resolveWithContext(actor, EMPTY_CONTEXT);
  }

  /**
   * Resolve an actor's snapshot, from cache when possible.
   * @throws ValidationError on a malformed actor or context
   * @throws ProcessingError when every eligible subsystem fails
   */
  async resolveWithContext(actor: Actor, context: ResolutionContext): Promise<Snapshot> {
    validateActor(actor);
    validateContext(context);

    return startSanitizedSpan(
      'stats.resolve',
      { actor_id: actor.id, actor_version: actor.version },
      async (span) => {
        const eligible = this.eligibleSubsystems(actor);
        const key = this.cache.keyFor(actor, this.keyParts(eligible, context));

        try {
          const { snapshot, outcome } = await this.cache.getOrCompute(key, actor, (diagnostics) =>
            this.compute(actor, context, eligible, diagnostics),
          );

          switch (outcome) {
            case 'hit':
              this.metrics.recordCacheHit();
              break;
            case 'coalesced':
              this.metrics.recordCoalesced();
              break;
            case 'computed':
              this.metrics.recordCacheMiss();
              break;
            case 'degraded':
              this.metrics.recordCacheError();
              break;
          }

          addSanitizedAttributes(span, 'stats.resolve', {
            subsystem_count: eligible.length,
            cache_outcome: outcome,
            dimension_count: Object.keys(snapshot.primary).length + Object.keys(snapshot.derived).length,
            diagnostic_count: snapshot.diagnostics.length,
          });
          return snapshot;
        } catch (err) {
          this.metrics.recordError();
          this.log?.('error', {
            event: 'stats_resolution_failed',
            actor_id: actor.id,
            version: actor.version,
            message: errorMessage(err),
          });
          throw err;
        }
      },
    );
  }

  /**
   * Resolve several actors concurrently. Results follow input order; the
   * first failure rejects the batch.
   */
  resolveBatch(actors: readonly Actor[], context: ResolutionContext = EMPTY_CONTEXT): Promise<Snapshot[]> {
    return Promise.all(actors.map((actor) => this.resolveWithContext(actor, context)));
  }

  /**
   * Stored snapshot for the actor's current version without computing.
   * Null on miss, and when the store is unreachable.
   */
  async getCachedSnapshot(actor: Actor, context: ResolutionContext = EMPTY_CONTEXT): Promise<Snapshot | null> {
    validateActor(actor);
    const key = this.cache.keyFor(actor, this.keyParts(this.eligibleSubsystems(actor), context));
    try {
      return await this.cache.peek(key, actor);
    } catch (err) {
      if (StatEngineError.isStatEngineError(err) && err.kind === 'cache') {
        this.metrics.recordCacheError();
        this.log?.('warn', { event: 'stats_cache_error', operation: 'peek', actor_id: actor.id, message: err.message });
        return null;
      }
      throw err;
    }
  }

  /**
   * Drop every stored snapshot of an actor.
   * @throws CacheError when the store is unreachable
   */
  invalidateActor(actorId: string): Promise<number> {
    return this.cache.invalidateActor(actorId);
  }

  /** @throws CacheError when the store is unreachable */
  clearCache(): Promise<number> {
    return this.cache.clear();
  }

  getMetrics(): AggregatorMetrics {
    this.metrics.setActiveSubsystems(this.registry.count());
    return this.metrics.getMetrics();
  }

  /**
   * Run every eligible subsystem and return the successful outputs in merge
   * order. Failures are recorded in metrics only. Nothing is cached.
   */
  async collectOutputs(actor: Actor, context: ResolutionContext = EMPTY_CONTEXT): Promise<OrderedOutput[]> {
    const results = await this.runSubsystems(actor, context, this.eligibleSubsystems(actor));
    return toOrderedOutputs(results);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private eligibleSubsystems(actor: Actor): readonly RegisteredSubsystem[] {
    const wanted = actor.subsystems ? new Set(actor.subsystems) : null;
    return this.registry.entries().filter(({ subsystem }) => {
      if (wanted && !wanted.has(subsystem.systemId)) return false;
      return subsystem.shouldContribute ? subsystem.shouldContribute(actor) : true;
    });
  }

  private keyParts(eligible: readonly RegisteredSubsystem[], context: ResolutionContext): string[] {
    const parts = [
      fingerprint(eligible.map(({ subsystem, sequence }) => [subsystem.systemId, subsystem.priority, sequence])),
      this.configFingerprint,
    ];
    if (!isEmptyContext(context)) parts.push(fingerprint(context));
    return parts;
  }

  private async compute(
    actor: Actor,
    context: ResolutionContext,
    eligible: readonly RegisteredSubsystem[],
    initialDiagnostics: readonly Diagnostic[],
  ): Promise<Snapshot> {
    const start = Date.now();
    const diagnostics: Diagnostic[] = [...initialDiagnostics];

    const results = await this.runSubsystems(actor, context, eligible);
    for (const result of results) {
      if (!result.ok) diagnostics.push(result.diagnostic);
    }

    const outputs = toOrderedOutputs(results);
    if (eligible.length > 0 && outputs.length === 0) {
      throw new ProcessingError(`All ${eligible.length} subsystems failed for actor ${actor.id}`, {
        actorId: actor.id,
        version: actor.version,
        failures: diagnostics.filter((d) => d.type === 'SUBSYSTEM_FAILURE' || d.type === 'SUBSYSTEM_TIMEOUT'),
      });
    }

    // dimension → contributions, in merge order
    const byDimension = new Map<string, Contribution[]>();
    for (const { output } of outputs) {
      for (const list of Object.values(output.contributions)) {
        for (const contribution of list) {
          const bucket = byDimension.get(contribution.dimension);
          if (bucket) {
            bucket.push(contribution);
          } else {
            byDimension.set(contribution.dimension, [contribution]);
          }
        }
      }
    }

    const { caps, conflicts } = this.capsProvider.effectiveCapsAcrossLayers(actor, outputs, {
      penaltyTolerantDimensions: penaltyTolerantDimensions(outputs),
    });

    // Dimension names are caller data: collect in Maps, never on a plain object
    const primary = new Map<string, number>();
    const derived = new Map<string, number>();
    const capsUsed = new Map<string, CapsRange>();
    const initialValues = context.initialValues ?? {};

    for (const dimension of [...byDimension.keys()].sort()) {
      const contributions = byDimension.get(dimension) ?? [];
      const dimensionCaps = caps.get(dimension) ?? null;
      const result = this.processor.evaluate(
        dimension,
        contributions,
        Object.hasOwn(initialValues, dimension) ? initialValues[dimension] : 0,
        dimensionCaps,
        context.conditions,
      );
      diagnostics.push(...result.diagnostics);
      if (result.applied === 0) continue;

      const conflict = conflicts.get(dimension);
      if (conflict) {
        this.metrics.recordCapConflict();
        diagnostics.push({ type: 'CAP_CONFLICT', dimension, message: conflict.message, unclamped: true });
      }
      if (dimensionCaps) capsUsed.set(dimension, dimensionCaps.toJSON());

      if (this.classifier(dimension) === 'primary') {
        primary.set(dimension, result.value);
      } else {
        derived.set(dimension, result.value);
      }
    }

    const processingTimeMs = Date.now() - start;
    this.metrics.recordResolution(processingTimeMs);
    this.log?.('debug', {
      event: 'stats_snapshot_computed',
      actor_id: actor.id,
      version: actor.version,
      subsystems: outputs.length,
      dimensions: primary.size + derived.size,
      diagnostics: diagnostics.length,
      duration_ms: processingTimeMs,
    });

    return deepFreeze<Snapshot>({
      actorId: actor.id,
      version: actor.version,
      primary: Object.fromEntries(primary),
      derived: Object.fromEntries(derived),
      capsUsed: Object.fromEntries(capsUsed),
      subsystemsProcessed: outputs.map((o) => o.systemId),
      diagnostics,
      processingTimeMs,
      createdAt: new Date().toISOString(),
    });
  }

  /** Results come back in the order of `eligible`, whatever the completion order. */
  private runSubsystems(
    actor: Actor,
    context: ResolutionContext,
    eligible: readonly RegisteredSubsystem[],
  ): Promise<SubsystemResult[]> {
    return Promise.all(eligible.map((entry) => this.runSubsystem(actor, context, entry)));
  }

  private async runSubsystem(
    actor: Actor,
    context: ResolutionContext,
    entry: RegisteredSubsystem,
  ): Promise<SubsystemResult> {
    const { systemId, priority } = entry.subsystem;

    return startSanitizedSpan(
      'stats.subsystem.contribute',
      { actor_id: actor.id, system_id: systemId, priority },
      async (span) => {
        const start = Date.now();
        try {
          const output = await this.limiter.schedule({ expiration: this.timeoutMs }, () =>
            entry.subsystem.contribute(actor, context),
          );
          const checked = SubsystemOutputSchema.safeParse(output);
          if (!checked.success) {
            const issue = checked.error.issues[0];
            throw new ValidationError(
              `Subsystem ${systemId} returned a malformed output: ${issue.path.join('.') || '(root)'}: ${issue.message}`,
              { systemId },
            );
          }

          const durationMs = Date.now() - start;
          this.metrics.recordSubsystemSuccess(systemId, durationMs);
          addSanitizedAttributes(span, 'stats.subsystem.contribute', {
            outcome: 'ok',
            contribution_count: Object.values(output.contributions).reduce((n, list) => n + list.length, 0),
            duration_ms: durationMs,
          });
          return { ok: true, entry, output };
        } catch (err) {
          const durationMs = Date.now() - start;

          if (err instanceof Bottleneck.BottleneckError) {
            this.metrics.recordSubsystemTimeout(systemId);
            this.log?.('warn', {
              event: 'stats_subsystem_timeout',
              actor_id: actor.id,
              system_id: systemId,
              timeout_ms: this.timeoutMs,
            });
            addSanitizedAttributes(span, 'stats.subsystem.contribute', { outcome: 'timeout', duration_ms: durationMs });
            return { ok: false, entry, diagnostic: { type: 'SUBSYSTEM_TIMEOUT', systemId, timeoutMs: this.timeoutMs } };
          }

          const message = errorMessage(err);
          this.metrics.recordSubsystemFailure(systemId);
          this.log?.('warn', {
            event: 'stats_subsystem_failed',
            actor_id: actor.id,
            system_id: systemId,
            message,
          });
          addSanitizedAttributes(span, 'stats.subsystem.contribute', { outcome: 'error', duration_ms: durationMs });
          return { ok: false, entry, diagnostic: { type: 'SUBSYSTEM_FAILURE', systemId, message } };
        }
      },
    );
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toOrderedOutputs(results: readonly SubsystemResult[]): OrderedOutput[] {
  const outputs: OrderedOutput[] = [];
  for (const result of results) {
    if (!result.ok) continue;
    outputs.push({
      systemId: result.entry.subsystem.systemId,
      priority: result.entry.subsystem.priority,
      sequence: result.entry.sequence,
      output: result.output,
    });
  }
  return outputs;
}

// Shape check for outputs from subsystems written without the types. Values
// the arithmetic rejects on its own (NaN, empty names) pass here and surface
// as INVALID_CONTRIBUTION or invalid cap proposals instead.
const LooseNumber = z.union([z.number(), z.nan()]);

const ContributionSchema = z.object({
  dimension: z.string(),
  bucket: z.string(),
  value: LooseNumber,
  source: z.string(),
  priority: LooseNumber.optional(),
  penaltyTolerant: z.boolean().optional(),
  condition: z.string().optional(),
});

const SubsystemOutputSchema = z.object({
  contributions: z.record(z.array(ContributionSchema)),
  caps: z.record(z.record(z.object({ min: LooseNumber, max: LooseNumber }))).optional(),
});

function validateActor(actor: Actor): void {
  if (actor.id.length === 0) {
    throw new ValidationError('Actor id cannot be empty');
  }
  if (!Number.isSafeInteger(actor.version) || actor.version < 0) {
    throw new ValidationError(`Actor version must be a non-negative integer (got ${actor.version})`, {
      actorId: actor.id,
    });
  }
}

function validateContext(context: ResolutionContext): void {
  for (const [dimension, value] of Object.entries(context.initialValues ?? {})) {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Initial value for ${dimension} must be finite (got ${value})`, { dimension });
    }
  }
}

function isEmptyContext(context: ResolutionContext): boolean {
  return (
    Object.keys(context.initialValues ?? {}).length === 0 &&
    Object.keys(context.conditions ?? {}).length === 0 &&
    Object.keys(context.data ?? {}).length === 0
  );
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
