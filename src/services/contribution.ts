import type { Bucket, Contribution } from '../types/stats.js';

/**
 * Why a contribution cannot be folded, or null when it can.
 *
 * Invalid contributions are filtered before processing and reported as
 * diagnostics; they never throw.
 */
export function contributionInvalidReason(contribution: Contribution): string | null {
  if (contribution.dimension.length === 0) return 'empty dimension';
  if (contribution.source.length === 0) return 'empty source';
  if (!Number.isFinite(contribution.value)) return `non-finite value: ${contribution.value}`;
  if (contribution.priority !== undefined && !Number.isInteger(contribution.priority)) {
    return `non-integer priority: ${contribution.priority}`;
  }
  return null;
}

export function isValidContribution(contribution: Contribution): boolean {
  return contributionInvalidReason(contribution) === null;
}

/** Shorthand for subsystems building their outputs. */
export function createContribution(
  dimension: string,
  bucket: Bucket,
  value: number,
  source: string,
  extra: Pick<Contribution, 'priority' | 'penaltyTolerant' | 'condition'> = {},
): Contribution {
  return { dimension, bucket, value, source, ...extra };
}
