import { createLogger } from '@stockpulse/config';
import { Decimal } from '../lib/decimal.js';
import { windowEndingAt, type DateWindow } from '../lib/dates.js';
import type { AnalyticsEngineOptions } from '../lib/options.js';
import type { AnalyticsStore, ConsumptionObservation } from '../store/analytics-store.js';

const log = createLogger('analytics:time-series');

export interface SeriesPoint {
  date: string;
  value: Decimal;
}

/** Two series over the same ascending dates. */
export interface AlignedPair {
  dates: string[];
  x: Decimal[];
  y: Decimal[];
}

// ─── Pure Builders ────────────────────────────────────────────────────

function consumedByDate(records: readonly ConsumptionObservation[]): Map<string, Decimal> {
  const byDate = new Map<string, Decimal>();
  for (const record of records) {
    const previous = byDate.get(record.date) ?? Decimal.ZERO;
    byDate.set(record.date, previous.add(Decimal.orZero(record.consumedQuantity)));
  }
  return byDate;
}

/**
 * One value per observed date, ascending. Null quantities count as zero;
 * several records on the same date are summed.
 */
export function buildDailySeries(records: readonly ConsumptionObservation[]): SeriesPoint[] {
  return [...consumedByDate(records).entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, value]) => ({ date, value }));
}

/**
 * Aligns two items over the union of their observed dates, filling the
 * side without a record with zero. Returns null when either item has
 * fewer than `minDataPoints` records or the union is shorter than that.
 */
export function alignPair(
  records1: readonly ConsumptionObservation[],
  records2: readonly ConsumptionObservation[],
  minDataPoints: number,
): AlignedPair | null {
  if (records1.length < minDataPoints || records2.length < minDataPoints) {
    return null;
  }

  const series1 = consumedByDate(records1);
  const series2 = consumedByDate(records2);
  const dates = [...new Set([...series1.keys(), ...series2.keys()])].sort((a, b) =>
    a.localeCompare(b),
  );
  if (dates.length < minDataPoints) {
    return null;
  }

  return {
    dates,
    x: dates.map((date) => series1.get(date) ?? Decimal.ZERO),
    y: dates.map((date) => series2.get(date) ?? Decimal.ZERO),
  };
}

export function groupByItem(
  records: readonly ConsumptionObservation[],
): Map<string, ConsumptionObservation[]> {
  const grouped = new Map<string, ConsumptionObservation[]>();
  for (const record of records) {
    const bucket = grouped.get(record.itemId);
    if (bucket) bucket.push(record);
    else grouped.set(record.itemId, [record]);
  }
  return grouped;
}

// ─── Extractor ────────────────────────────────────────────────────────

export class TimeSeriesExtractor {
  constructor(
    private readonly store: AnalyticsStore,
    private readonly options: Pick<AnalyticsEngineOptions, 'minDataPoints' | 'now'>,
  ) {}

  window(windowDays: number): DateWindow {
    return windowEndingAt(this.options.now(), windowDays);
  }

  async loadItemRecords(itemId: string, windowDays: number): Promise<ConsumptionObservation[]> {
    const { startDate, endDate } = this.window(windowDays);
    return this.store.getItemConsumptionRecords(itemId, startDate, endDate);
  }

  /**
   * Aligns two items out of records already grouped by `loadGroupedRecords`;
   * null when either side is short of the minimum.
   */
  alignGrouped(
    grouped: ReadonlyMap<string, readonly ConsumptionObservation[]>,
    item1Id: string,
    item2Id: string,
  ): AlignedPair | null {
    const records1 = grouped.get(item1Id) ?? [];
    const records2 = grouped.get(item2Id) ?? [];

    const pair = alignPair(records1, records2, this.options.minDataPoints);
    if (!pair) {
      log.debug(
        { item1Id, item2Id, records1: records1.length, records2: records2.length },
        'Insufficient data for correlation',
      );
    }
    return pair;
  }

  /** One query for the whole window, grouped by item in memory. */
  async loadGroupedRecords(
    windowDays: number,
    itemIds?: readonly string[],
  ): Promise<Map<string, ConsumptionObservation[]>> {
    const { startDate, endDate } = this.window(windowDays);
    const records = await this.store.getConsumptionRecords(startDate, endDate, itemIds);
    return groupByItem(records);
  }
}
