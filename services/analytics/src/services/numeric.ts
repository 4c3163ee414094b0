import { Decimal } from '../lib/decimal.js';
import { ArithmeticError } from '../lib/errors.js';

// ─── Precision ────────────────────────────────────────────────────────
/** Fractional digits of every value the engine reports. */
export const OUTPUT_SCALE = 4;
/** Fractional digits of variance, regression and root intermediates. */
export const INTERMEDIATE_SCALE = 10;

const SQRT_TOLERANCE = Decimal.from('0.0001');
const SQRT_MAX_ITERATIONS = 10;

function sorted(values: readonly Decimal[]): Decimal[] {
  return [...values].sort((a, b) => a.compare(b));
}

// ─── Descriptive Statistics ───────────────────────────────────────────

export function mean(values: readonly Decimal[]): Decimal {
  if (values.length === 0) return Decimal.ZERO.round(OUTPUT_SCALE);
  return Decimal.sum(values).div(values.length, OUTPUT_SCALE);
}

export function median(values: readonly Decimal[]): Decimal {
  if (values.length === 0) return Decimal.ZERO.round(OUTPUT_SCALE);

  const ordered = sorted(values);
  const mid = Math.floor(ordered.length / 2);
  if (ordered.length % 2 === 0) {
    return ordered[mid - 1].add(ordered[mid]).div(2, OUTPUT_SCALE);
  }
  return ordered[mid];
}

/**
 * Sample standard deviation (n − 1 denominator) around a precomputed mean.
 * Squared deviations are summed exactly; the variance is quantised to
 * INTERMEDIATE_SCALE before the root.
 */
export function standardDeviation(values: readonly Decimal[], mu: Decimal): Decimal {
  if (values.length <= 1) return Decimal.ZERO.round(OUTPUT_SCALE);

  const sumSquares = Decimal.sum(
    values.map((v) => {
      const deviation = v.sub(mu);
      return deviation.mul(deviation);
    }),
  );
  const variance = sumSquares.div(values.length - 1, INTERMEDIATE_SCALE);
  return sqrt(variance).round(OUTPUT_SCALE);
}

export function coefficientOfVariation(mu: Decimal, std: Decimal): Decimal {
  if (mu.isZero()) return Decimal.ZERO.round(OUTPUT_SCALE);
  return std.div(mu, OUTPUT_SCALE);
}

/** Nearest-rank percentile; `p` is in [0, 100]. */
export function percentile(values: readonly Decimal[], p: number): Decimal {
  if (values.length === 0) return Decimal.ZERO.round(OUTPUT_SCALE);

  const ordered = sorted(values);
  const rank = Math.ceil((p * ordered.length) / 100) - 1;
  const index = Math.max(0, Math.min(rank, ordered.length - 1));
  return ordered[index];
}

// ─── Square Root ──────────────────────────────────────────────────────

/**
 * Newton–Raphson square root at INTERMEDIATE_SCALE, seeded from the
 * floating-point estimate. Stops once two successive approximations are
 * closer than 1e-4, or after 10 refinements.
 */
export function sqrt(value: Decimal): Decimal {
  if (value.isNegative()) {
    throw new ArithmeticError(`Square root of negative value: ${value.toString()}`);
  }
  if (value.isZero()) return Decimal.ZERO.round(INTERMEDIATE_SCALE);

  let x = Decimal.from(Math.sqrt(value.toNumber()));
  for (let i = 0; i < SQRT_MAX_ITERATIONS; i++) {
    const next = x.add(value.div(x, INTERMEDIATE_SCALE)).div(2, INTERMEDIATE_SCALE);
    if (next.sub(x).abs().lt(SQRT_TOLERANCE)) return next;
    x = next;
  }
  return x.round(INTERMEDIATE_SCALE);
}
