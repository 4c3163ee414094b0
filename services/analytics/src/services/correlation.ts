import type { CorrelationType } from '@stockpulse/shared-types';
import { Decimal, type DecimalInput } from '../lib/decimal.js';
import { INTERMEDIATE_SCALE, OUTPUT_SCALE, sqrt } from './numeric.js';

// ─── Pearson Coefficient ──────────────────────────────────────────────

/**
 * Pearson correlation of two equal-length series, at 4 digits, clamped
 * into [-1, 1]. Mismatched or empty input and constant series yield 0.
 */
export function pearsonCorrelation(x: readonly Decimal[], y: readonly Decimal[]): Decimal {
  const zero = Decimal.ZERO.round(OUTPUT_SCALE);
  if (x.length !== y.length || x.length === 0) return zero;

  const n = x.length;
  const meanX = Decimal.sum(x).div(n, INTERMEDIATE_SCALE);
  const meanY = Decimal.sum(y).div(n, INTERMEDIATE_SCALE);

  let numerator = Decimal.ZERO;
  let sumSqX = Decimal.ZERO;
  let sumSqY = Decimal.ZERO;
  for (let i = 0; i < n; i++) {
    const dx = x[i].sub(meanX);
    const dy = y[i].sub(meanY);
    numerator = numerator.add(dx.mul(dy));
    sumSqX = sumSqX.add(dx.mul(dx));
    sumSqY = sumSqY.add(dy.mul(dy));
  }

  if (sumSqX.isZero() || sumSqY.isZero()) return zero;

  const denominator = sqrt(sumSqX).mul(sqrt(sumSqY));
  if (denominator.isZero()) return zero;

  const r = numerator.div(denominator, OUTPUT_SCALE);
  if (r.gt(1)) return Decimal.ONE.round(OUTPUT_SCALE);
  if (r.lt(-1)) return Decimal.ONE.negate().round(OUTPUT_SCALE);
  return r;
}

// ─── Classification ───────────────────────────────────────────────────

const STRONG = Decimal.from('0.7');
const MODERATE = Decimal.from('0.4');
const WEAK = Decimal.from('0.2');

export function classifyCorrelation(coefficient: DecimalInput): CorrelationType {
  const r = Decimal.from(coefficient);
  const magnitude = r.abs();
  const positive = !r.isNegative();

  if (magnitude.gte(STRONG)) return positive ? 'STRONG_POSITIVE' : 'STRONG_NEGATIVE';
  if (magnitude.gte(MODERATE)) return positive ? 'MODERATE_POSITIVE' : 'MODERATE_NEGATIVE';
  if (magnitude.gte(WEAK)) return positive ? 'WEAK_POSITIVE' : 'WEAK_NEGATIVE';
  return 'NO_CORRELATION';
}

export function isSignificant(coefficient: DecimalInput, threshold: number): boolean {
  return Decimal.from(coefficient).abs().gte(threshold);
}

/** Strictly beyond ±0.7, as used for the single-item strong buckets. */
export function isStrongPositive(coefficient: DecimalInput): boolean {
  return Decimal.from(coefficient).gt(STRONG);
}

export function isStrongNegative(coefficient: DecimalInput): boolean {
  return Decimal.from(coefficient).lt(STRONG.negate());
}

export const byAbsoluteCoefficientDesc = <T extends { coefficient: string }>(a: T, b: T) =>
  Decimal.from(b.coefficient).abs().compare(Decimal.from(a.coefficient).abs());
