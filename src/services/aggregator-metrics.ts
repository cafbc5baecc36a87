/**
 * Aggregator Metrics Collector: in-memory counters for resolutions, the
 * snapshot cache and individual subsystems.
 *
 * Counters only grow until reset(). `activeSubsystems` is a gauge set by the
 * aggregator from the registry size. Exported through GET /api/metrics.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SubsystemMetrics {
  readonly contributions: number;
  readonly failures: number;
  readonly timeouts: number;
  readonly avgProcessingTimeMs: number;
  readonly maxProcessingTimeMs: number;
  /** ISO-8601 of the last successful contribution; null before the first. */
  readonly lastContributionAt: string | null;
}

/** Read-only view of every counter at a point in time. */
export interface AggregatorMetrics {
  readonly totalResolutions: number;
  readonly cacheHits: number;
  readonly cacheMisses: number;
  /** Callers that joined an in-flight computation for the same key. */
  readonly coalescedRequests: number;
  readonly cacheErrors: number;
  readonly avgResolutionTimeMs: number;
  readonly maxResolutionTimeMs: number;
  /** Resolutions that failed as a whole. */
  readonly errorCount: number;
  readonly capConflicts: number;
  readonly activeSubsystems: number;
  readonly subsystems: Readonly<Record<string, SubsystemMetrics>>;
}

interface SubsystemCounters {
  contributions: number;
  failures: number;
  timeouts: number;
  totalProcessingTimeMs: number;
  maxProcessingTimeMs: number;
  lastContributionAt: string | null;
}

// ---------------------------------------------------------------------------
// AggregatorMetricsCollector
// ---------------------------------------------------------------------------

export class AggregatorMetricsCollector {
  private _totalResolutions = 0;
  private _cacheHits = 0;
  private _cacheMisses = 0;
  private _coalescedRequests = 0;
  private _cacheErrors = 0;
  private _errorCount = 0;
  private _capConflicts = 0;
  private _activeSubsystems = 0;

  /** Sum over computed resolutions, for the average. */
  private _totalResolutionTimeMs = 0;
  private _computedResolutions = 0;
  private _maxResolutionTimeMs = 0;

  private readonly _subsystems = new Map<string, SubsystemCounters>();

  // -------------------------------------------------------------------------
  // Recording
  // -------------------------------------------------------------------------

  /**
   * A snapshot was computed (not served from cache).
   * @param durationMs wall-clock time of the computation
   */
  recordResolution(durationMs: number): void {
    this._totalResolutions++;
    this._computedResolutions++;
    this._totalResolutionTimeMs += durationMs;
    if (durationMs > this._maxResolutionTimeMs) this._maxResolutionTimeMs = durationMs;
  }

  /** A snapshot was served from cache; counts as a resolution too. */
  recordCacheHit(): void {
    this._totalResolutions++;
    this._cacheHits++;
  }

  recordCacheMiss(): void {
    this._cacheMisses++;
  }

  recordCoalesced(): void {
    this._totalResolutions++;
    this._coalescedRequests++;
  }

  recordCacheError(): void {
    this._cacheErrors++;
  }

  recordError(): void {
    this._errorCount++;
  }

  recordCapConflict(): void {
    this._capConflicts++;
  }

  recordSubsystemSuccess(systemId: string, durationMs: number): void {
    const c = this.counters(systemId);
    c.contributions++;
    c.totalProcessingTimeMs += durationMs;
    if (durationMs > c.maxProcessingTimeMs) c.maxProcessingTimeMs = durationMs;
    c.lastContributionAt = new Date().toISOString();
  }

  recordSubsystemFailure(systemId: string): void {
    this.counters(systemId).failures++;
  }

  /** A timeout is also a failure. */
  recordSubsystemTimeout(systemId: string): void {
    const c = this.counters(systemId);
    c.failures++;
    c.timeouts++;
  }

  setActiveSubsystems(count: number): void {
    this._activeSubsystems = count;
  }

  // -------------------------------------------------------------------------
  // Reading
  // -------------------------------------------------------------------------

  getMetrics(): AggregatorMetrics {
    const subsystems: Record<string, SubsystemMetrics> = {};
    for (const systemId of [...this._subsystems.keys()].sort()) {
      const c = this.counters(systemId);
      subsystems[systemId] = {
        contributions: c.contributions,
        failures: c.failures,
        timeouts: c.timeouts,
        avgProcessingTimeMs: c.contributions > 0 ? c.totalProcessingTimeMs / c.contributions : 0,
        maxProcessingTimeMs: c.maxProcessingTimeMs,
        lastContributionAt: c.lastContributionAt,
      };
    }

    return {
      totalResolutions: this._totalResolutions,
      cacheHits: this._cacheHits,
      cacheMisses: this._cacheMisses,
      coalescedRequests: this._coalescedRequests,
      cacheErrors: this._cacheErrors,
      avgResolutionTimeMs:
        this._computedResolutions > 0 ? this._totalResolutionTimeMs / this._computedResolutions : 0,
      maxResolutionTimeMs: this._maxResolutionTimeMs,
      errorCount: this._errorCount,
      capConflicts: this._capConflicts,
      activeSubsystems: this._activeSubsystems,
      subsystems,
    };
  }

  reset(): void {
    this._totalResolutions = 0;
    this._cacheHits = 0;
    this._cacheMisses = 0;
    this._coalescedRequests = 0;
    this._cacheErrors = 0;
    this._errorCount = 0;
    this._capConflicts = 0;
    this._activeSubsystems = 0;
    this._totalResolutionTimeMs = 0;
    this._computedResolutions = 0;
    this._maxResolutionTimeMs = 0;
    this._subsystems.clear();
  }

  private counters(systemId: string): SubsystemCounters {
    let c = this._subsystems.get(systemId);
    if (!c) {
      c = {
        contributions: 0,
        failures: 0,
        timeouts: 0,
        totalProcessingTimeMs: 0,
        maxProcessingTimeMs: 0,
        lastContributionAt: null,
      };
      this._subsystems.set(systemId, c);
    }
    return c;
  }
}
