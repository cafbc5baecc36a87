/**
 * Stat aggregation domain types.
 *
 * Contributions, cap proposals, subsystem outputs and snapshots. Everything
 * here is plain data: the arithmetic lives in bucket-processor.ts and
 * caps-provider.ts.
 */
import type { Caps } from '../services/caps.js';

// ---------------------------------------------------------------------------
// Buckets
// ---------------------------------------------------------------------------

/** Buckets every operator table carries. */
export type CoreBucket = 'Flat' | 'Mult' | 'PostAdd' | 'Override';

/** Buckets registered only when the extended-buckets capability is on. */
export type ExtendedBucket = 'Exponential' | 'Logarithmic' | 'Conditional';

/**
 * Arithmetic role of a contribution. Open-ended: any kind registered in a
 * BucketOperatorRegistry is accepted.
 */
export type Bucket = CoreBucket | ExtendedBucket | (string & {});

// ---------------------------------------------------------------------------
// Contributions
// ---------------------------------------------------------------------------

export interface Contribution {
  /** Stat name, e.g. "strength". */
  readonly dimension: string;
  readonly bucket: Bucket;
  readonly value: number;
  /** Provenance, e.g. "equipment:sword_01". */
  readonly source: string;
  /** Tie-break among same-bucket contributions; higher folds first. Absent = 0. */
  readonly priority?: number;
  /** May exceed a SoftMax layer cap when that layer allows it. */
  readonly penaltyTolerant?: boolean;
  /** Context condition consulted by the Conditional bucket. */
  readonly condition?: string;
}

// ---------------------------------------------------------------------------
// Cap layers
// ---------------------------------------------------------------------------

export type CapMode = 'Baseline' | 'Additive' | 'HardMax' | 'SoftMax';

export type SoftCapPolicy = 'enforce' | 'allow-penalty-tolerant';

export interface CapLayer {
  readonly name: string;
  readonly priority: number;
  readonly mode: CapMode;
  /** Only read for SoftMax layers. Default 'enforce'. */
  readonly softCapPolicy?: SoftCapPolicy;
}

export type AcrossLayerPolicy = 'strict' | 'lenient' | 'custom';

/** Processing order of layers: higher priority first, or lower first. */
export type LayerOrder = 'priority-desc' | 'priority-asc';

/** One layer's effective caps for a dimension, as handed to a custom merge. */
export interface LayerCaps {
  readonly layer: CapLayer;
  readonly caps: Caps;
}

/**
 * Custom across-layer merge. Receives the per-layer caps of one dimension in
 * processing order. Returning null leaves the dimension uncapped.
 */
export type CustomCapMerge = (dimension: string, perLayer: readonly LayerCaps[]) => Caps | null;

export interface CapLayerConfig {
  readonly layers: readonly CapLayer[];
  readonly policy: AcrossLayerPolicy;
  readonly order: LayerOrder;
  readonly customMerge?: CustomCapMerge;
}

// ---------------------------------------------------------------------------
// Actors and subsystems
// ---------------------------------------------------------------------------

/** External entity. The engine only reads it. */
export interface Actor {
  readonly id: string;
  /** Bumped on every stat-relevant mutation. */
  readonly version: number;
  /** Subsystem ids registered on this actor. Absent = every registered subsystem. */
  readonly subsystems?: readonly string[];
}

/** Per-call context passed through resolveWithContext to every subsystem. */
export interface ResolutionContext {
  /** Starting value per dimension before any bucket applies. Default 0. */
  readonly initialValues?: Readonly<Record<string, number>>;
  /** Conditions read by the Conditional bucket. */
  readonly conditions?: Readonly<Record<string, boolean>>;
  /** Free-form data for subsystems; part of the cache key. */
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface SubsystemOutput {
  readonly systemId: string;
  /** dimension → contributions in the order the subsystem produced them. */
  readonly contributions: Readonly<Record<string, readonly Contribution[]>>;
  /** layer name → dimension → proposed caps. */
  readonly caps?: Readonly<Record<string, Readonly<Record<string, Caps>>>>;
  /** Not used by the arithmetic. */
  readonly context?: Readonly<Record<string, unknown>>;
  readonly meta?: Readonly<Record<string, unknown>>;
}

/** A subsystem output tagged with the registry position it merges at. */
export interface OrderedOutput {
  readonly systemId: string;
  readonly priority: number;
  /** Registration sequence; breaks priority ties. */
  readonly sequence: number;
  readonly output: SubsystemOutput;
}

// ---------------------------------------------------------------------------
// Diagnostics and snapshots
// ---------------------------------------------------------------------------

export type Diagnostic =
  | {
      readonly type: 'INVALID_CONTRIBUTION';
      readonly dimension: string;
      readonly source: string;
      readonly reason: string;
    }
  | {
      readonly type: 'UNKNOWN_BUCKET';
      readonly dimension: string;
      readonly source: string;
      readonly bucket: string;
    }
  | {
      readonly type: 'CAP_CONFLICT';
      readonly dimension: string;
      readonly message: string;
      /** The reported value was not clamped. */
      readonly unclamped: true;
    }
  | {
      readonly type: 'SUBSYSTEM_FAILURE';
      readonly systemId: string;
      readonly message: string;
    }
  | {
      readonly type: 'SUBSYSTEM_TIMEOUT';
      readonly systemId: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: 'CACHE_UNAVAILABLE';
      readonly message: string;
    };

/** Serializable caps range as stored in a snapshot. */
export interface CapsRange {
  readonly min: number;
  readonly max: number;
}

export interface Snapshot {
  readonly actorId: string;
  /** Actor version the snapshot was computed against. */
  readonly version: number;
  readonly primary: Readonly<Record<string, number>>;
  readonly derived: Readonly<Record<string, number>>;
  readonly capsUsed: Readonly<Record<string, CapsRange>>;
  /** Subsystems whose output was merged, in merge order. */
  readonly subsystemsProcessed: readonly string[];
  readonly diagnostics: readonly Diagnostic[];
  readonly processingTimeMs?: number;
  /** ISO-8601 */
  readonly createdAt: string;
}

/** Primary vs derived is a naming decision, not an arithmetic one. */
export type DimensionClass = 'primary' | 'derived';

export type DimensionClassifier = (dimension: string) => DimensionClass;
