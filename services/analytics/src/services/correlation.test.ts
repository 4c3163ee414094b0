import { describe, it, expect } from 'vitest';
import { Decimal } from '../lib/decimal.js';
import {
  byAbsoluteCoefficientDesc,
  classifyCorrelation,
  isSignificant,
  isStrongNegative,
  isStrongPositive,
  pearsonCorrelation,
} from './correlation.js';

const d = (values: Array<number | string>) => values.map((v) => Decimal.from(v));

describe('pearsonCorrelation', () => {
  it('is 1 for a series against itself', () => {
    const x = d([10, 20, 30, 40, 50]);
    expect(pearsonCorrelation(x, x).toString()).toBe('1.0000');
  });

  it('is -1 against the exact negation', () => {
    const x = d([3, 7, 1, 9, 4]);
    expect(pearsonCorrelation(x, x.map((v) => v.negate())).toString()).toBe('-1.0000');
  });

  it('is 0 when either series is constant', () => {
    expect(pearsonCorrelation(d([5, 5, 5, 5, 5]), d([5, 5, 5, 5, 5])).toString()).toBe('0.0000');
    expect(pearsonCorrelation(d([1, 2, 3, 4, 5]), d([2, 2, 2, 2, 2])).isZero()).toBe(true);
  });

  it('is 0 for mismatched or empty input', () => {
    expect(pearsonCorrelation(d([1, 2, 3]), d([1, 2])).isZero()).toBe(true);
    expect(pearsonCorrelation([], []).isZero()).toBe(true);
  });

  it('computes an intermediate coefficient', () => {
    // Σdxdy = 8, Σdx² = Σdy² = 10
    expect(pearsonCorrelation(d([1, 2, 3, 4, 5]), d([2, 1, 4, 3, 5])).toString()).toBe('0.8000');
  });

  it('stays inside [-1, 1] when the root underestimates', () => {
    // Σdx² = 8, whose 10-digit root rounds down
    const x = d([1, 3, 3, 3, 5]);
    const r = pearsonCorrelation(x, x);

    expect(r.lte(1)).toBe(true);
    expect(r.toString()).toBe('1.0000');
  });
});

describe('classifyCorrelation', () => {
  it.each([
    ['1.0000', 'STRONG_POSITIVE'],
    ['0.7', 'STRONG_POSITIVE'],
    ['0.6999', 'MODERATE_POSITIVE'],
    ['0.4', 'MODERATE_POSITIVE'],
    ['0.2', 'WEAK_POSITIVE'],
    ['0.1999', 'NO_CORRELATION'],
    ['0', 'NO_CORRELATION'],
    ['-0.1999', 'NO_CORRELATION'],
    ['-0.2', 'WEAK_NEGATIVE'],
    ['-0.4', 'MODERATE_NEGATIVE'],
    ['-0.7', 'STRONG_NEGATIVE'],
  ])('classifies %s as %s', (r, expected) => {
    expect(classifyCorrelation(r)).toBe(expected);
  });
});

describe('significance and strength', () => {
  it('treats |r| at the threshold as significant', () => {
    expect(isSignificant('0.3000', 0.3)).toBe(true);
    expect(isSignificant('-0.3000', 0.3)).toBe(true);
    expect(isSignificant('0.2999', 0.3)).toBe(false);
  });

  it('requires strong buckets to exceed ±0.7', () => {
    expect(isStrongPositive('0.7000')).toBe(false);
    expect(isStrongPositive('0.7001')).toBe(true);
    expect(isStrongNegative('-0.7000')).toBe(false);
    expect(isStrongNegative('-0.7001')).toBe(true);
  });

  it('orders by absolute coefficient', () => {
    const ranked = [{ coefficient: '0.3' }, { coefficient: '-0.9' }, { coefficient: '0.5' }].sort(
      byAbsoluteCoefficientDesc,
    );
    expect(ranked.map((r) => r.coefficient)).toEqual(['-0.9', '0.5', '0.3']);
  });
});
