import type { CapsRange } from '../types/stats.js';

/**
 * Min/max constraint pair for one dimension.
 *
 * Immutable value type: every operation returns a new Caps. Operations are
 * total: an intersection of disjoint ranges yields an invalid Caps
 * (min > max) that callers must check with isValid().
 */
export class Caps implements CapsRange {
  readonly min: number;
  readonly max: number;

  constructor(min: number, max: number) {
    this.min = min;
    this.max = max;
  }

  /** (-Infinity, +Infinity), the identity for intersection. */
  static unbounded(): Caps {
    return new Caps(Number.NEGATIVE_INFINITY, Number.POSITIVE_INFINITY);
  }

  static from(range: CapsRange): Caps {
    return range instanceof Caps ? range : new Caps(range.min, range.max);
  }

  /** Valid iff min ≤ max. NaN on either side is never valid. */
  isValid(): boolean {
    return this.min <= this.max;
  }

  /** Disjoint range (min > max). */
  isEmpty(): boolean {
    return this.min > this.max;
  }

  clamp(value: number): number {
    return Math.max(this.min, Math.min(this.max, value));
  }

  contains(value: number): boolean {
    return this.min <= value && value <= this.max;
  }

  union(other: CapsRange): Caps {
    return new Caps(Math.min(this.min, other.min), Math.max(this.max, other.max));
  }

  intersection(other: CapsRange): Caps {
    return new Caps(Math.max(this.min, other.min), Math.min(this.max, other.max));
  }

  get range(): number {
    return this.max - this.min;
  }

  get center(): number {
    return (this.min + this.max) / 2;
  }

  /** Widen both bounds by `amount`. */
  expand(amount: number): Caps {
    return new Caps(this.min - amount, this.max + amount);
  }

  /** Narrow both bounds by `amount`; collapses to the center point instead of inverting. */
  shrink(amount: number): Caps {
    const min = this.min + amount;
    const max = this.max - amount;
    if (min > max) {
      const center = this.center;
      return new Caps(center, center);
    }
    return new Caps(min, max);
  }

  equals(other: CapsRange): boolean {
    return this.min === other.min && this.max === other.max;
  }

  toJSON(): CapsRange {
    return { min: this.min, max: this.max };
  }

  toString(): string {
    return `Caps(${this.min}, ${this.max})`;
  }
}
