import { describe, it, expect } from 'vitest';
import {
  contributionInvalidReason,
  createContribution,
  isValidContribution,
} from '../../../src/services/contribution.js';

describe('contribution', () => {
  it('accepts a finite value with dimension and source', () => {
    expect(isValidContribution(createContribution('strength', 'Flat', 10, 'equipment:sword'))).toBe(true);
  });

  it('rejects non-finite values', () => {
    expect(contributionInvalidReason(createContribution('strength', 'Flat', Number.NaN, 'x'))).toBe(
      'non-finite value: NaN',
    );
    expect(contributionInvalidReason(createContribution('strength', 'Flat', Infinity, 'x'))).toBe(
      'non-finite value: Infinity',
    );
  });

  it('rejects empty dimension or source', () => {
    expect(contributionInvalidReason(createContribution('', 'Flat', 1, 'x'))).toBe('empty dimension');
    expect(contributionInvalidReason(createContribution('hp', 'Flat', 1, ''))).toBe('empty source');
  });

  it('rejects a priority that is not an integer', () => {
    expect(contributionInvalidReason(createContribution('hp', 'Flat', 1, 'x', { priority: Number.NaN }))).toBe(
      'non-integer priority: NaN',
    );
    expect(contributionInvalidReason(createContribution('hp', 'Flat', 1, 'x', { priority: 1.5 }))).toBe(
      'non-integer priority: 1.5',
    );
    expect(isValidContribution(createContribution('hp', 'Flat', 1, 'x', { priority: -2 }))).toBe(true);
  });

  it('carries optional fields through createContribution', () => {
    const c = createContribution('hp', 'Conditional', 5, 'buff:night', { condition: 'night', priority: 3 });
    expect(c).toEqual({
      dimension: 'hp',
      bucket: 'Conditional',
      value: 5,
      source: 'buff:night',
      condition: 'night',
      priority: 3,
    });
  });
});
