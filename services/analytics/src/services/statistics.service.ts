/**
 * Statistics Service
 *
 * Read-side reports over consumption observations (per item, per
 * category, dashboard) and the per-item update path that writes the
 * statistics snapshot back onto the item.
 *
 * The update path classifies volatility with the coarse 3-tier table;
 * reports and the batch sweep use the 5-tier table.
 */

import { createLogger } from '@stockpulse/config';
import type {
  ConsumptionPattern,
  ItemStatisticsSnapshot,
  TrendDirection,
  VolatilityClass,
} from '@stockpulse/shared-types';
import { Decimal } from '../lib/decimal.js';
import { eachDate } from '../lib/dates.js';
import { NotFoundError, errorMessage } from '../lib/errors.js';
import type { AnalyticsEngineOptions } from '../lib/options.js';
import type { AnalyticsStore, ItemRef } from '../store/analytics-store.js';
import {
  buildStatisticsSnapshot,
  calculateItemStatistics,
  classifyVolatility,
  noDataSnapshot,
  type Seasonality,
} from './item-statistics.js';
import { OUTPUT_SCALE, coefficientOfVariation, mean, standardDeviation } from './numeric.js';
import { buildDailySeries, groupByItem, type TimeSeriesExtractor } from './time-series.js';

const log = createLogger('analytics:statistics');

// ─── Types ───────────────────────────────────────────────────────────

/** Hands a "recompute correlations for this item" task to background work. */
export interface CorrelationRefreshPublisher {
  publish(itemId: string, reason: string): Promise<void>;
}

export interface NoStatistics {
  error: 'no data';
}

export interface ItemStatisticsReport {
  itemId: string;
  itemName: string;
  periodDays: number;
  totalRecords: number;
  mean: string;
  median: string;
  standardDeviation: string;
  coefficientOfVariation: string;
  min: string;
  max: string;
  range: string;
  totalConsumption: string;
  volatilityClassification: VolatilityClass;
  isHighlyVolatile: boolean;
  trend: TrendDirection;
  consumptionPattern: ConsumptionPattern;
  daysWithActivity: number;
  /** Days with activity ÷ period days, 2 digits */
  activityRate: string;
  percentile25: string;
  percentile75: string;
  percentile90: string;
  seasonality: Seasonality;
  forecastNextPeriod: string;
}

export interface CategoryItemStatistics {
  itemId: string;
  itemName: string;
  totalConsumption: string;
  avgConsumption: string;
  cv: string;
}

export interface CategoryStatisticsReport {
  categoryId: string;
  categoryName: string;
  periodDays: number;
  /** Items with at least one record in the window */
  totalItems: number;
  totalRecords: number;
  totalConsumption: string;
  categoryCV: string;
  categoryVolatility: VolatilityClass;
  itemStatistics: CategoryItemStatistics[];
  topConsumingItems: CategoryItemStatistics[];
}

export interface DailyConsumptionPoint {
  date: string;
  consumed: string;
  received: string;
}

export interface DashboardStatistics {
  periodDays: number;
  startDate: string;
  endDate: string;
  totalItems: number;
  activeItems: number;
  totalCategories: number;
  activeCategories: number;
  totalConsumption: string;
  totalReceived: string;
  itemsNeedingReorder: number;
  dailySeries: DailyConsumptionPoint[];
}

const TOP_CONSUMERS = 5;

export function needsReorder(item: ItemRef): boolean {
  if (item.reorderLevel === null) return false;
  return Decimal.from(item.currentQuantity).lte(item.reorderLevel);
}

const fmt = (value: Decimal) => value.toFixed(OUTPUT_SCALE);

// ─── Service ─────────────────────────────────────────────────────────

export class StatisticsService {
  constructor(
    private readonly store: AnalyticsStore,
    private readonly extractor: TimeSeriesExtractor,
    private readonly options: AnalyticsEngineOptions,
    private readonly publisher?: CorrelationRefreshPublisher,
  ) {}

  async computeItemStatistics(
    itemId: string,
    windowDays: number = this.options.statisticsWindowDays,
  ): Promise<ItemStatisticsReport | NoStatistics> {
    const item = await this.store.getItem(itemId);
    if (!item) throw new NotFoundError('Item', itemId);

    const records = await this.extractor.loadItemRecords(itemId, windowDays);
    if (records.length === 0) {
      log.debug({ itemId, windowDays }, 'No consumption data in window');
      return { error: 'no data' };
    }

    const figures = calculateItemStatistics(buildDailySeries(records));
    const volatility = classifyVolatility(figures.coefficientOfVariation);

    return {
      itemId,
      itemName: item.name,
      periodDays: windowDays,
      totalRecords: records.length,
      mean: fmt(figures.mean),
      median: fmt(figures.median),
      standardDeviation: fmt(figures.standardDeviation),
      coefficientOfVariation: fmt(figures.coefficientOfVariation),
      min: fmt(figures.min),
      max: fmt(figures.max),
      range: fmt(figures.max.sub(figures.min)),
      totalConsumption: fmt(figures.total),
      volatilityClassification: volatility,
      isHighlyVolatile: volatility === 'HIGH' || volatility === 'VERY_HIGH',
      trend: figures.trend,
      consumptionPattern: figures.pattern,
      daysWithActivity: figures.daysWithActivity,
      activityRate: Decimal.from(figures.daysWithActivity).div(windowDays, 2).toFixed(2),
      percentile25: fmt(figures.percentile25),
      percentile75: fmt(figures.percentile75),
      percentile90: fmt(figures.percentile90),
      seasonality: figures.seasonality,
      forecastNextPeriod: fmt(figures.forecast),
    };
  }

  async computeCategoryStatistics(
    categoryId: string,
    windowDays: number = this.options.statisticsWindowDays,
  ): Promise<CategoryStatisticsReport | NoStatistics> {
    const category = await this.store.getCategory(categoryId);
    if (!category) throw new NotFoundError('Category', categoryId);

    const { startDate, endDate } = this.extractor.window(windowDays);
    const records = await this.store.getCategoryConsumptionRecords(categoryId, startDate, endDate);
    if (records.length === 0) {
      log.debug({ categoryId, windowDays }, 'No consumption data for category in window');
      return { error: 'no data' };
    }

    const grouped = groupByItem(records);
    const itemsById = new Map(
      (await this.store.getItemsByIds([...grouped.keys()])).map((item) => [item.id, item]),
    );

    const itemTotals: Decimal[] = [];
    const itemStatistics: Array<CategoryItemStatistics & { total: Decimal }> = [];
    for (const [itemId, itemRecords] of grouped) {
      const values = buildDailySeries(itemRecords).map((p) => p.value);
      const total = Decimal.sum(values);
      itemTotals.push(total);

      const item = itemsById.get(itemId);
      if (!item) continue;
      const mu = mean(values);
      itemStatistics.push({
        itemId,
        itemName: item.name,
        total,
        totalConsumption: fmt(total),
        avgConsumption: fmt(mu),
        cv: fmt(coefficientOfVariation(mu, standardDeviation(values, mu))),
      });
    }
    itemStatistics.sort((a, b) => b.total.compare(a.total));

    const totalsMean = mean(itemTotals);
    const categoryCV = coefficientOfVariation(totalsMean, standardDeviation(itemTotals, totalsMean));
    const ranked = itemStatistics.map(({ total: _total, ...rest }) => rest);

    return {
      categoryId,
      categoryName: category.name,
      periodDays: windowDays,
      totalItems: grouped.size,
      totalRecords: records.length,
      totalConsumption: fmt(Decimal.sum(itemTotals)),
      categoryCV: fmt(categoryCV),
      categoryVolatility: classifyVolatility(categoryCV),
      itemStatistics: ranked,
      topConsumingItems: ranked.slice(0, TOP_CONSUMERS),
    };
  }

  async computeDashboardStatistics(
    windowDays: number = this.options.statisticsWindowDays,
  ): Promise<DashboardStatistics> {
    const window = this.extractor.window(windowDays);
    const [items, categories, records] = await Promise.all([
      this.store.getAllItems(),
      this.store.getAllCategories(),
      this.store.getConsumptionRecords(window.startDate, window.endDate),
    ]);

    const consumedByDate = new Map<string, Decimal>();
    const receivedByDate = new Map<string, Decimal>();
    const activeItemIds = new Set<string>();
    for (const record of records) {
      activeItemIds.add(record.itemId);
      consumedByDate.set(
        record.date,
        (consumedByDate.get(record.date) ?? Decimal.ZERO).add(Decimal.orZero(record.consumedQuantity)),
      );
      receivedByDate.set(
        record.date,
        (receivedByDate.get(record.date) ?? Decimal.ZERO).add(Decimal.orZero(record.receivedQuantity)),
      );
    }

    const activeCategoryIds = new Set<string>();
    for (const item of items) {
      if (activeItemIds.has(item.id) && item.categoryId) activeCategoryIds.add(item.categoryId);
    }

    return {
      periodDays: windowDays,
      startDate: window.startDate,
      endDate: window.endDate,
      totalItems: items.length,
      activeItems: activeItemIds.size,
      totalCategories: categories.length,
      activeCategories: activeCategoryIds.size,
      totalConsumption: fmt(Decimal.sum([...consumedByDate.values()])),
      totalReceived: fmt(Decimal.sum([...receivedByDate.values()])),
      itemsNeedingReorder: items.filter(needsReorder).length,
      dailySeries: eachDate(window).map((date) => ({
        date,
        consumed: fmt(consumedByDate.get(date) ?? Decimal.ZERO),
        received: fmt(receivedByDate.get(date) ?? Decimal.ZERO),
      })),
    };
  }

  /**
   * Recomputes the statistics-window snapshot for one item and persists
   * it, then asks for a correlation refresh without waiting on it.
   */
  async updateItemStatistics(itemId: string): Promise<ItemStatisticsSnapshot> {
    const item = await this.store.getItem(itemId);
    if (!item) throw new NotFoundError('Item', itemId);

    const now = this.options.now();
    const records = await this.extractor.loadItemRecords(itemId, this.options.statisticsWindowDays);
    const snapshot =
      records.length === 0
        ? noDataSnapshot(now)
        : buildStatisticsSnapshot(calculateItemStatistics(buildDailySeries(records)), {
            scheme: 'three_tier',
            currentQuantity: Decimal.from(item.currentQuantity),
            now,
          });

    await this.store.saveItemStatistics(itemId, snapshot);
    log.info(
      {
        itemId,
        mean: snapshot.meanDailyConsumption,
        cv: snapshot.coefficientOfVariation,
        volatility: snapshot.volatilityClassification,
      },
      'Item statistics updated',
    );

    this.requestCorrelationRefresh(itemId);
    return snapshot;
  }

  private requestCorrelationRefresh(itemId: string): void {
    if (!this.publisher) return;
    void this.publisher.publish(itemId, 'statistics_updated').catch((err) => {
      log.error({ itemId, error: errorMessage(err) }, 'Failed to publish correlation refresh');
    });
  }
}
