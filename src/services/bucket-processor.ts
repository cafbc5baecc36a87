/**
 * Bucket Processor: folds one dimension's contributions into a scalar.
 *
 * Algorithm:
 * 1. Drop invalid contributions (non-finite value, empty dimension/source)
 *    and contributions whose bucket has no registered operator. Both are
 *    reported as diagnostics; neither aborts the dimension.
 * 2. Partition by bucket, keeping input order inside each partition.
 * 3. Visit buckets in operator order (Flat → Mult → PostAdd → Override → extended).
 * 4. Inside a partition: priority DESC (absent = 0), then insertion order.
 * 5. Fold with the bucket's operator; clamp at the end when caps are given.
 *
 * Everything here is synchronous and pure. The exported helpers can be called
 * without an Aggregator for tests or offline analysis.
 */
import type { Bucket, Contribution, Diagnostic } from '../types/stats.js';
import { contributionInvalidReason } from './contribution.js';
import { createBucketOperatorRegistry, type BucketOperatorRegistry } from './bucket-operators.js';
import type { Caps } from './caps.js';

/** Core buckets only. */
const DEFAULT_OPERATORS = createBucketOperatorRegistry();

export interface FoldOptions {
  /** Operator table. Default: core buckets only. */
  operators?: BucketOperatorRegistry;
  /** Conditions for the Conditional bucket. */
  conditions?: Readonly<Record<string, boolean>>;
}

export interface ContributionValidation {
  readonly valid: Contribution[];
  readonly diagnostics: Diagnostic[];
}

export interface BucketResult {
  readonly dimension: string;
  /** Final value, clamped when caps were supplied. */
  readonly value: number;
  /** Value before clamping. */
  readonly unclamped: number;
  /** Number of contributions that took part in the fold. */
  readonly applied: number;
  readonly diagnostics: readonly Diagnostic[];
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Split contributions into foldable ones and diagnostics for the rest.
 * Order of the valid list follows the input.
 */
export function validateContributions(
  contributions: readonly Contribution[],
  operators: BucketOperatorRegistry = DEFAULT_OPERATORS,
): ContributionValidation {
  const valid: Contribution[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const contribution of contributions) {
    const reason = contributionInvalidReason(contribution);
    if (reason !== null) {
      diagnostics.push({
        type: 'INVALID_CONTRIBUTION',
        dimension: contribution.dimension,
        source: contribution.source,
        reason,
      });
      continue;
    }
    if (!operators.has(contribution.bucket)) {
      diagnostics.push({
        type: 'UNKNOWN_BUCKET',
        dimension: contribution.dimension,
        source: contribution.source,
        bucket: contribution.bucket,
      });
      continue;
    }
    valid.push(contribution);
  }

  return { valid, diagnostics };
}

/** Stable partition by bucket. Map iteration follows first appearance. */
export function groupContributionsByBucket(
  contributions: readonly Contribution[],
): Map<Bucket, Contribution[]> {
  const groups = new Map<Bucket, Contribution[]>();
  for (const contribution of contributions) {
    const group = groups.get(contribution.bucket);
    if (group) {
      group.push(contribution);
    } else {
      groups.set(contribution.bucket, [contribution]);
    }
  }
  return groups;
}

/** Bucket kinds in the order they are folded. */
export function getBucketProcessingOrder(operators: BucketOperatorRegistry = DEFAULT_OPERATORS): Bucket[] {
  return operators.processingOrder();
}

/**
 * Sort one partition: priority DESC, ties by insertion order.
 * Array.prototype.sort is stable, so equal priorities keep input order.
 */
export function sortWithinBucket(contributions: readonly Contribution[]): Contribution[] {
  return [...contributions].sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0));
}

function fold(
  contributions: readonly Contribution[],
  initialValue: number,
  options: FoldOptions,
): { value: number; applied: number; diagnostics: Diagnostic[] } {
  const operators = options.operators ?? DEFAULT_OPERATORS;
  const env = { conditions: options.conditions ?? {} };
  const { valid, diagnostics } = validateContributions(contributions, operators);
  const groups = groupContributionsByBucket(valid);

  let value = initialValue;
  for (const operator of operators.operatorsInOrder()) {
    const group = groups.get(operator.kind);
    if (!group) continue;
    value = operator.apply(value, sortWithinBucket(group), env);
  }

  return { value, applied: valid.length, diagnostics };
}

/**
 * Fold contributions in bucket order from `initialValue`, clamping the
 * result when `clamp` is given. Invalid contributions are skipped.
 */
export function processContributionsInOrder(
  contributions: readonly Contribution[],
  initialValue: number,
  clamp?: Caps | null,
  options: FoldOptions = {},
): number {
  const { value } = fold(contributions, initialValue, options);
  return clamp ? clamp.clamp(value) : value;
}

// ---------------------------------------------------------------------------
// BucketProcessor
// ---------------------------------------------------------------------------

export interface BucketProcessorOptions {
  log?: (level: 'warn' | 'debug', data: Record<string, unknown>) => void;
}

/**
 * Bound to one operator table. The aggregator keeps one instance for its
 * lifetime.
 */
export class BucketProcessor {
  constructor(
    readonly operators: BucketOperatorRegistry = DEFAULT_OPERATORS,
    private readonly options: BucketProcessorOptions = {},
  ) {}

  /** Fold one dimension and return the final value. */
  process(
    dimension: string,
    contributions: readonly Contribution[],
    initialValue: number,
    clamp?: Caps | null,
  ): number {
    return this.evaluate(dimension, contributions, initialValue, clamp).value;
  }

  /** Fold one dimension and keep the diagnostics and the pre-clamp value. */
  evaluate(
    dimension: string,
    contributions: readonly Contribution[],
    initialValue: number,
    clamp?: Caps | null,
    conditions?: Readonly<Record<string, boolean>>,
  ): BucketResult {
    const result = fold(contributions, initialValue, { operators: this.operators, conditions });

    if (result.diagnostics.length > 0) {
      this.options.log?.('warn', {
        event: 'stats_contributions_dropped',
        dimension,
        dropped: result.diagnostics.length,
      });
    }

    return {
      dimension,
      value: clamp ? clamp.clamp(result.value) : result.value,
      unclamped: result.value,
      applied: result.applied,
      diagnostics: result.diagnostics,
    };
  }

  processingOrder(): Bucket[] {
    return this.operators.processingOrder();
  }
}
