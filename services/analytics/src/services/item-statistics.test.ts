import { describe, it, expect } from 'vitest';
import type { VolatilityClass } from '@stockpulse/shared-types';
import { Decimal } from '../lib/decimal.js';
import { addDays } from '../lib/dates.js';
import {
  analyzeConsumptionPattern,
  analyzeTrend,
  buildStatisticsSnapshot,
  calculateCoverage,
  calculateItemStatistics,
  calculateSlope,
  classifyVolatility,
  classifyVolatilityCoarse,
  detectSeasonality,
  forecastNextPeriod,
  noDataSnapshot,
} from './item-statistics.js';
import type { SeriesPoint } from './time-series.js';

const d = (values: Array<number | string>) => values.map((v) => Decimal.from(v));

function series(startDate: string, values: number[]): SeriesPoint[] {
  return values.map((v, i) => ({ date: addDays(startDate, i), value: Decimal.from(v) }));
}

const NOW = new Date('2025-03-31T12:00:00.000Z');

describe('classifyVolatility', () => {
  it.each([
    ['0.7501', 'VERY_HIGH'],
    ['0.75', 'HIGH'],
    ['0.5001', 'HIGH'],
    ['0.50', 'MEDIUM'],
    ['0.26', 'MEDIUM'],
    ['0.25', 'LOW'],
    ['0.1001', 'LOW'],
    ['0.10', 'VERY_LOW'],
    ['0', 'VERY_LOW'],
    ['-0.8', 'VERY_HIGH'],
  ])('maps CV %s to %s', (cv, expected) => {
    expect(classifyVolatility(Decimal.from(cv))).toBe(expected);
  });

  it('returns UNKNOWN without a CV', () => {
    expect(classifyVolatility(null)).toBe('UNKNOWN');
  });

  it('is monotonic in |CV|', () => {
    const rank: VolatilityClass[] = ['VERY_LOW', 'LOW', 'MEDIUM', 'HIGH', 'VERY_HIGH'];
    let previous = 0;
    for (let hundredths = 0; hundredths <= 120; hundredths++) {
      const current = rank.indexOf(classifyVolatility(Decimal.from(hundredths).div(100, 2)));
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
  });
});

describe('classifyVolatilityCoarse', () => {
  it.each([
    ['0.51', 'HIGH'],
    ['0.5', 'MEDIUM'],
    ['0.31', 'MEDIUM'],
    ['0.3', 'LOW'],
    ['0.0983', 'LOW'],
  ])('maps CV %s to %s', (cv, expected) => {
    expect(classifyVolatilityCoarse(Decimal.from(cv))).toBe(expected);
  });
});

describe('trend', () => {
  it('computes the regression slope', () => {
    expect(calculateSlope(d([10, 12, 11, 13, 12]))?.toString()).toBe('0.5000000000');
    expect(calculateSlope(d([1, 2]))).toBeNull();
  });

  it('classifies the slope', () => {
    expect(analyzeTrend(d([10, 12, 11, 13, 12]))).toBe('INCREASING');
    expect(analyzeTrend(d([5, 4, 3, 2, 1]))).toBe('DECREASING');
    expect(analyzeTrend(d([10, 10, 10]))).toBe('STABLE');
    expect(analyzeTrend(d([10, 11.2, 10.1]))).toBe('STABLE');
    expect(analyzeTrend(d([1, 2]))).toBe('INSUFFICIENT_DATA');
  });
});

describe('detectSeasonality', () => {
  it('averages by ISO weekday and splits weekday from weekend', () => {
    // 2025-03-01 is a Saturday
    const points: SeriesPoint[] = [
      { date: '2025-03-01', value: Decimal.from(4) },
      { date: '2025-03-02', value: Decimal.from(6) },
      { date: '2025-03-03', value: Decimal.from(10) },
      { date: '2025-03-04', value: Decimal.from(20) },
      { date: '2025-03-10', value: Decimal.from(30) },
    ];

    expect(detectSeasonality(points)).toEqual({
      dayOfWeekPattern: {
        Monday: '20.0000',
        Tuesday: '20.0000',
        Saturday: '4.0000',
        Sunday: '6.0000',
      },
      weekdayAverage: '20.0000',
      weekendAverage: '5.0000',
    });
  });
});

describe('analyzeConsumptionPattern', () => {
  const withZeros = (zeros: number) =>
    d([...new Array<number>(zeros).fill(0), ...new Array<number>(10 - zeros).fill(5)]);

  it('uses the share of zero days', () => {
    expect(analyzeConsumptionPattern(withZeros(8))).toBe('SPORADIC');
    expect(analyzeConsumptionPattern(withZeros(7))).toBe('IRREGULAR');
    expect(analyzeConsumptionPattern(withZeros(4))).toBe('IRREGULAR');
    expect(analyzeConsumptionPattern(withZeros(3))).toBe('REGULAR');
  });

  it('reports NO_DATA for an empty series', () => {
    expect(analyzeConsumptionPattern([])).toBe('NO_DATA');
  });
});

describe('forecastNextPeriod', () => {
  const values = d([10, 12, 11, 13, 12]);

  it('scales the last value along the trend', () => {
    expect(forecastNextPeriod(values, 'INCREASING').toString()).toBe('13.2000');
    expect(forecastNextPeriod(d([14, 12, 10]), 'DECREASING').toString()).toBe('9.0000');
  });

  it('falls back to the mean', () => {
    expect(forecastNextPeriod(values, 'STABLE').toString()).toBe('11.6000');
    expect(forecastNextPeriod([], 'STABLE').toString()).toBe('0.0000');
  });
});

describe('calculateCoverage', () => {
  it('rounds days of cover up and projects the stockout date', () => {
    expect(calculateCoverage(Decimal.from(100), Decimal.from('11.6'), '2025-03-31')).toEqual({
      coverageDays: 9,
      expectedStockoutDate: '2025-04-09',
    });
  });

  it('keeps exact multiples', () => {
    expect(calculateCoverage(Decimal.from(58), Decimal.from('11.6000'), '2025-03-31').coverageDays).toBe(5);
  });

  it('is zero without consumption or stock', () => {
    const none = { coverageDays: 0, expectedStockoutDate: null };
    expect(calculateCoverage(Decimal.from(100), Decimal.ZERO, '2025-03-31')).toEqual(none);
    expect(calculateCoverage(Decimal.ZERO, Decimal.from(3), '2025-03-31')).toEqual(none);
  });
});

describe('calculateItemStatistics', () => {
  // 2025-03-03 is a Monday
  const figures = calculateItemStatistics(series('2025-03-03', [10, 12, 11, 13, 12]));

  it('computes the descriptive figures', () => {
    expect(figures.mean.toString()).toBe('11.6000');
    expect(figures.standardDeviation.toString()).toBe('1.1402');
    expect(figures.coefficientOfVariation.toString()).toBe('0.0983');
    expect(figures.median.toString()).toBe('12');
    expect(figures.min.toString()).toBe('10');
    expect(figures.max.toString()).toBe('13');
    expect(figures.total.toString()).toBe('58');
    expect(figures.daysWithActivity).toBe(5);
    expect(figures.observedDays).toBe(5);
  });

  it('computes percentiles and forecast', () => {
    expect(figures.percentile25.toString()).toBe('11');
    expect(figures.percentile75.toString()).toBe('12');
    expect(figures.percentile90.toString()).toBe('13');
    expect(figures.trend).toBe('INCREASING');
    expect(figures.forecast.toString()).toBe('13.2000');
    expect(figures.pattern).toBe('REGULAR');
    expect(figures.seasonality.weekendAverage).toBe('0.0000');
  });

  it('builds a snapshot under either volatility scheme', () => {
    const coarse = buildStatisticsSnapshot(figures, {
      scheme: 'three_tier',
      currentQuantity: Decimal.from(100),
      now: NOW,
    });
    const fine = buildStatisticsSnapshot(figures, {
      scheme: 'five_tier',
      currentQuantity: Decimal.from(100),
      now: NOW,
    });

    expect(coarse).toEqual({
      meanDailyConsumption: '11.6000',
      standardDeviation: '1.1402',
      coefficientOfVariation: '0.0983',
      volatilityClassification: 'LOW',
      trend: 'INCREASING',
      consumptionPattern: 'REGULAR',
      forecastNextPeriod: '13.2000',
      coverageDays: 9,
      expectedStockoutDate: '2025-04-09',
      lastUpdated: NOW,
    });
    expect(fine.volatilityClassification).toBe('VERY_LOW');
  });
});

describe('noDataSnapshot', () => {
  it('marks the item as having no data', () => {
    const snapshot = noDataSnapshot(NOW);

    expect(snapshot.volatilityClassification).toBe('NO_DATA');
    expect(snapshot.consumptionPattern).toBe('NO_DATA');
    expect(snapshot.meanDailyConsumption).toBe('0.0000');
    expect(snapshot.coverageDays).toBe(0);
    expect(snapshot.expectedStockoutDate).toBeNull();
  });
});
