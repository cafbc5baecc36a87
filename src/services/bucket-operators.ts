/**
 * Bucket operator table.
 *
 * Every bucket kind maps to a pure fold over its (already sorted) partition.
 * The processor looks operators up here instead of switching on the kind, so
 * new buckets are registered as data. Kinds are visited in ascending `order`.
 *
 * Core kinds:      Flat(10) → Mult(20) → PostAdd(30) → Override(40)
 * Extended kinds:  Exponential(50) → Logarithmic(60) → Conditional(70)
 */
import { ValidationError } from '../errors.js';
import type { Bucket, Contribution, CoreBucket, ExtendedBucket } from '../types/stats.js';

/** Inputs a fold may read besides the running value. */
export interface FoldEnvironment {
  readonly conditions: Readonly<Record<string, boolean>>;
}

export interface BucketOperator {
  readonly kind: Bucket;
  /** Position in the global processing order; lower runs first. */
  readonly order: number;
  /** Fold one partition into the running value. Must be pure. */
  readonly apply: (value: number, contributions: readonly Contribution[], env: FoldEnvironment) => number;
}

export const CORE_BUCKETS: readonly CoreBucket[] = ['Flat', 'Mult', 'PostAdd', 'Override'];
export const EXTENDED_BUCKETS: readonly ExtendedBucket[] = ['Exponential', 'Logarithmic', 'Conditional'];

// ---------------------------------------------------------------------------
// Built-in operators
// ---------------------------------------------------------------------------

const add: BucketOperator['apply'] = (value, contributions) =>
  contributions.reduce((acc, c) => acc + c.value, value);

export const CORE_OPERATORS: readonly BucketOperator[] = [
  { kind: 'Flat', order: 10, apply: add },
  {
    kind: 'Mult',
    order: 20,
    apply: (value, contributions) => contributions.reduce((acc, c) => acc * c.value, value),
  },
  { kind: 'PostAdd', order: 30, apply: add },
  {
    kind: 'Override',
    order: 40,
    // Last override in processing order wins over everything before it
    apply: (value, contributions) =>
      contributions.length > 0 ? contributions[contributions.length - 1].value : value,
  },
];

export const EXTENDED_OPERATORS: readonly BucketOperator[] = [
  {
    kind: 'Exponential',
    order: 50,
    apply: (value, contributions) => contributions.reduce((acc, c) => acc * (1 + c.value), value),
  },
  {
    kind: 'Logarithmic',
    order: 60,
    // ln is undefined for v <= 0: such a step is a no-op
    apply: (value, contributions) =>
      contributions.reduce((acc, c) => (acc <= 0 ? acc : acc + c.value * Math.log(acc)), value),
  },
  {
    kind: 'Conditional',
    order: 70,
    apply: (value, contributions, env) =>
      contributions.reduce(
        (acc, c) => (c.condition === undefined || env.conditions[c.condition] === true ? acc + c.value : acc),
        value,
      ),
  },
];

// ---------------------------------------------------------------------------
// BucketOperatorRegistry
// ---------------------------------------------------------------------------

export class BucketOperatorRegistry {
  private readonly operators = new Map<string, BucketOperator>();
  /** Cached processing order; rebuilt on register. */
  private ordered: readonly BucketOperator[] = [];

  constructor(operators: readonly BucketOperator[] = []) {
    for (const op of operators) this.register(op);
  }

  /**
   * Register an operator.
   * @throws ValidationError on a duplicate kind, empty kind, duplicate order or non-finite order
   */
  register(operator: BucketOperator): void {
    if (operator.kind.length === 0) {
      throw new ValidationError('Bucket kind cannot be empty');
    }
    if (this.operators.has(operator.kind)) {
      throw new ValidationError(`Bucket operator already registered: ${operator.kind}`, {
        bucket: operator.kind,
      });
    }
    if (!Number.isFinite(operator.order)) {
      throw new ValidationError(`Bucket operator order must be finite: ${operator.kind}`, {
        bucket: operator.kind,
      });
    }
    const clash = [...this.operators.values()].find((op) => op.order === operator.order);
    if (clash) {
      throw new ValidationError(
        `Bucket operator order ${operator.order} already taken by ${clash.kind}`,
        { bucket: operator.kind },
      );
    }
    this.operators.set(operator.kind, operator);
    this.ordered = [...this.operators.values()].sort((a, b) => a.order - b.order);
  }

  get(kind: Bucket): BucketOperator | undefined {
    return this.operators.get(kind);
  }

  has(kind: Bucket): boolean {
    return this.operators.has(kind);
  }

  /** Operators in processing order. */
  operatorsInOrder(): readonly BucketOperator[] {
    return this.ordered;
  }

  /** Bucket kinds in processing order. */
  processingOrder(): Bucket[] {
    return this.ordered.map((op) => op.kind);
  }

  get size(): number {
    return this.operators.size;
  }
}

export interface BucketOperatorOptions {
  /** Register Exponential, Logarithmic and Conditional. Default false. */
  extended?: boolean;
  /** Extra operators registered after the built-ins. */
  additional?: readonly BucketOperator[];
}

export function createBucketOperatorRegistry(options: BucketOperatorOptions = {}): BucketOperatorRegistry {
  const registry = new BucketOperatorRegistry(CORE_OPERATORS);
  if (options.extended) {
    for (const op of EXTENDED_OPERATORS) registry.register(op);
  }
  for (const op of options.additional ?? []) registry.register(op);
  return registry;
}
