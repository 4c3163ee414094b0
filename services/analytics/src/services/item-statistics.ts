import {
  WEEKDAY_NAMES,
  type ConsumptionPattern,
  type ItemStatisticsSnapshot,
  type TrendDirection,
  type VolatilityClass,
  type VolatilityScheme,
  type WeekdayName,
} from '@stockpulse/shared-types';
import { Decimal } from '../lib/decimal.js';
import { addDays, isoWeekday, toIsoDate } from '../lib/dates.js';
import {
  INTERMEDIATE_SCALE,
  OUTPUT_SCALE,
  coefficientOfVariation,
  mean,
  median,
  percentile,
  standardDeviation,
} from './numeric.js';
import type { SeriesPoint } from './time-series.js';

// ─── Volatility ───────────────────────────────────────────────────────

const FIVE_TIER: ReadonlyArray<[Decimal, VolatilityClass]> = [
  [Decimal.from('0.75'), 'VERY_HIGH'],
  [Decimal.from('0.50'), 'HIGH'],
  [Decimal.from('0.25'), 'MEDIUM'],
  [Decimal.from('0.10'), 'LOW'],
];

const THREE_TIER: ReadonlyArray<[Decimal, VolatilityClass]> = [
  [Decimal.from('0.5'), 'HIGH'],
  [Decimal.from('0.3'), 'MEDIUM'],
];

function classifyAgainst(
  cv: Decimal | null,
  tiers: ReadonlyArray<[Decimal, VolatilityClass]>,
  floor: VolatilityClass,
): VolatilityClass {
  if (cv === null) return 'UNKNOWN';
  const magnitude = cv.abs();
  for (const [bound, label] of tiers) {
    if (magnitude.gt(bound)) return label;
  }
  return floor;
}

/** Used by statistics reports and the batch sweep. */
export function classifyVolatility(cv: Decimal | null): VolatilityClass {
  return classifyAgainst(cv, FIVE_TIER, 'VERY_LOW');
}

/** Used by the per-item update path. */
export function classifyVolatilityCoarse(cv: Decimal | null): VolatilityClass {
  return classifyAgainst(cv, THREE_TIER, 'LOW');
}

export function classifyVolatilityWith(
  scheme: VolatilityScheme,
  cv: Decimal | null,
): VolatilityClass {
  return scheme === 'three_tier' ? classifyVolatilityCoarse(cv) : classifyVolatility(cv);
}

// ─── Trend ────────────────────────────────────────────────────────────

const TREND_THRESHOLD = Decimal.from('0.1');

/** Least-squares slope of value against index 0..n−1; null below 3 points. */
export function calculateSlope(values: readonly Decimal[]): Decimal | null {
  const n = values.length;
  if (n < 3) return null;

  let sumX = Decimal.ZERO;
  let sumY = Decimal.ZERO;
  let sumXY = Decimal.ZERO;
  let sumX2 = Decimal.ZERO;
  values.forEach((y, i) => {
    sumX = sumX.add(i);
    sumY = sumY.add(y);
    sumXY = sumXY.add(y.mul(i));
    sumX2 = sumX2.add(i * i);
  });

  const numerator = sumXY.mul(n).sub(sumX.mul(sumY));
  const denominator = sumX2.mul(n).sub(sumX.mul(sumX));
  return numerator.div(denominator, INTERMEDIATE_SCALE);
}

export function analyzeTrend(values: readonly Decimal[]): TrendDirection {
  const slope = calculateSlope(values);
  if (slope === null) return 'INSUFFICIENT_DATA';
  if (slope.gt(TREND_THRESHOLD)) return 'INCREASING';
  if (slope.lt(TREND_THRESHOLD.negate())) return 'DECREASING';
  return 'STABLE';
}

// ─── Seasonality ──────────────────────────────────────────────────────

export interface Seasonality {
  /** Mean per ISO weekday, only for weekdays that were observed */
  dayOfWeekPattern: Partial<Record<WeekdayName, string>>;
  weekdayAverage: string;
  weekendAverage: string;
}

export function detectSeasonality(series: readonly SeriesPoint[]): Seasonality {
  const byWeekday = new Map<number, Decimal[]>();
  for (const point of series) {
    const weekday = isoWeekday(point.date);
    const bucket = byWeekday.get(weekday);
    if (bucket) bucket.push(point.value);
    else byWeekday.set(weekday, [point.value]);
  }

  const dayOfWeekPattern: Partial<Record<WeekdayName, string>> = {};
  const weekdayMeans: Decimal[] = [];
  const weekendMeans: Decimal[] = [];
  WEEKDAY_NAMES.forEach((name, index) => {
    const values = byWeekday.get(index + 1);
    if (!values) return;
    const dayMean = mean(values);
    dayOfWeekPattern[name] = dayMean.toFixed(OUTPUT_SCALE);
    (index < 5 ? weekdayMeans : weekendMeans).push(dayMean);
  });

  return {
    dayOfWeekPattern,
    weekdayAverage: mean(weekdayMeans).toFixed(OUTPUT_SCALE),
    weekendAverage: mean(weekendMeans).toFixed(OUTPUT_SCALE),
  };
}

// ─── Pattern, Forecast, Coverage ──────────────────────────────────────

/** Share of zero-consumption days: >70% sporadic, >30% irregular. */
export function analyzeConsumptionPattern(values: readonly Decimal[]): ConsumptionPattern {
  if (values.length === 0) return 'NO_DATA';

  const zeroDays = values.filter((v) => v.isZero()).length;
  if (zeroDays * 10 > values.length * 7) return 'SPORADIC';
  if (zeroDays * 10 > values.length * 3) return 'IRREGULAR';
  return 'REGULAR';
}

const GROWTH_FACTOR = Decimal.from('1.1');
const DECAY_FACTOR = Decimal.from('0.9');

export function forecastNextPeriod(values: readonly Decimal[], trend: TrendDirection): Decimal {
  if (values.length === 0) return Decimal.ZERO.round(OUTPUT_SCALE);

  const last = values[values.length - 1];
  switch (trend) {
    case 'INCREASING':
      return last.mul(GROWTH_FACTOR).round(OUTPUT_SCALE);
    case 'DECREASING':
      return last.mul(DECAY_FACTOR).round(OUTPUT_SCALE);
    default:
      return mean(values);
  }
}

export interface Coverage {
  coverageDays: number;
  expectedStockoutDate: string | null;
}

/** Days of stock left at the mean rate, rounded up; zero when nothing is consumed. */
export function calculateCoverage(currentStock: Decimal, dailyMean: Decimal, today: string): Coverage {
  if (!dailyMean.isPositive() || !currentStock.isPositive()) {
    return { coverageDays: 0, expectedStockoutDate: null };
  }

  let days = currentStock.div(dailyMean, INTERMEDIATE_SCALE).ceil();
  if (dailyMean.mul(days).lt(currentStock)) days += 1n;

  const coverageDays = Number(days);
  return { coverageDays, expectedStockoutDate: addDays(today, coverageDays) };
}

// ─── Full Calculation ─────────────────────────────────────────────────

export interface ConsumptionFigures {
  observedDays: number;
  total: Decimal;
  mean: Decimal;
  median: Decimal;
  standardDeviation: Decimal;
  coefficientOfVariation: Decimal;
  min: Decimal;
  max: Decimal;
  trend: TrendDirection;
  pattern: ConsumptionPattern;
  daysWithActivity: number;
  percentile25: Decimal;
  percentile75: Decimal;
  percentile90: Decimal;
  seasonality: Seasonality;
  forecast: Decimal;
}

/** Descriptive statistics over a non-empty daily series. */
export function calculateItemStatistics(series: readonly SeriesPoint[]): ConsumptionFigures {
  const values = series.map((p) => p.value);
  const mu = mean(values);
  const std = standardDeviation(values, mu);
  const trend = analyzeTrend(values);
  const ordered = [...values].sort((a, b) => a.compare(b));

  return {
    observedDays: values.length,
    total: Decimal.sum(values),
    mean: mu,
    median: median(values),
    standardDeviation: std,
    coefficientOfVariation: coefficientOfVariation(mu, std),
    min: ordered[0] ?? Decimal.ZERO,
    max: ordered[ordered.length - 1] ?? Decimal.ZERO,
    trend,
    pattern: analyzeConsumptionPattern(values),
    daysWithActivity: values.filter((v) => v.isPositive()).length,
    percentile25: percentile(values, 25),
    percentile75: percentile(values, 75),
    percentile90: percentile(values, 90),
    seasonality: detectSeasonality(series),
    forecast: forecastNextPeriod(values, trend),
  };
}

// ─── Snapshots ────────────────────────────────────────────────────────

export function buildStatisticsSnapshot(
  figures: ConsumptionFigures,
  opts: { scheme: VolatilityScheme; currentQuantity: Decimal; now: Date },
): ItemStatisticsSnapshot {
  const coverage = calculateCoverage(opts.currentQuantity, figures.mean, toIsoDate(opts.now));
  return {
    meanDailyConsumption: figures.mean.toFixed(OUTPUT_SCALE),
    standardDeviation: figures.standardDeviation.toFixed(OUTPUT_SCALE),
    coefficientOfVariation: figures.coefficientOfVariation.toFixed(OUTPUT_SCALE),
    volatilityClassification: classifyVolatilityWith(opts.scheme, figures.coefficientOfVariation),
    trend: figures.trend,
    consumptionPattern: figures.pattern,
    forecastNextPeriod: figures.forecast.toFixed(OUTPUT_SCALE),
    coverageDays: coverage.coverageDays,
    expectedStockoutDate: coverage.expectedStockoutDate,
    lastUpdated: opts.now,
  };
}

/** Written for items with no records in the window. */
export function noDataSnapshot(now: Date): ItemStatisticsSnapshot {
  const zero = Decimal.ZERO.toFixed(OUTPUT_SCALE);
  return {
    meanDailyConsumption: zero,
    standardDeviation: zero,
    coefficientOfVariation: zero,
    volatilityClassification: 'NO_DATA',
    trend: 'INSUFFICIENT_DATA',
    consumptionPattern: 'NO_DATA',
    forecastNextPeriod: zero,
    coverageDays: 0,
    expectedStockoutDate: null,
    lastUpdated: now,
  };
}
