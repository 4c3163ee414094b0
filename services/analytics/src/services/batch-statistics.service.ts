import { createLogger } from '@stockpulse/config';
import type { ItemFailure } from '@stockpulse/shared-types';
import { Decimal } from '../lib/decimal.js';
import { NotFoundError, errorMessage } from '../lib/errors.js';
import type { AnalyticsEngineOptions } from '../lib/options.js';
import type { AnalyticsStore, ItemRef, ItemStatisticsUpdate } from '../store/analytics-store.js';
import { buildStatisticsSnapshot, calculateItemStatistics, noDataSnapshot } from './item-statistics.js';
import { buildDailySeries, type TimeSeriesExtractor } from './time-series.js';

const log = createLogger('analytics:batch-statistics');

export interface BatchStatisticsSummary {
  totalItems: number;
  updated: number;
  noData: number;
  failed: number;
  errors: ItemFailure[];
  windowDays: number;
  startDate: string;
  endDate: string;
  elapsedMs: number;
  timestamp: Date;
}

/**
 * Recomputes statistics snapshots for many items in one pass: one read of
 * the window's records, grouped in memory, and one batch write at the end.
 */
export class BatchStatisticsService {
  constructor(
    private readonly store: AnalyticsStore,
    private readonly extractor: TimeSeriesExtractor,
    private readonly options: AnalyticsEngineOptions,
  ) {}

  async recalculateAllStatistics(
    windowDays: number = this.options.statisticsWindowDays,
  ): Promise<BatchStatisticsSummary> {
    const items = await this.store.getAllItems();
    return this.run(items, windowDays);
  }

  async recalculateStatisticsForItems(
    itemIds: readonly string[],
    windowDays: number = this.options.statisticsWindowDays,
  ): Promise<BatchStatisticsSummary> {
    const ids = [...new Set(itemIds)];
    const items = await this.store.getItemsByIds(ids);
    const found = new Set(items.map((item) => item.id));
    const missing: ItemFailure[] = ids
      .filter((id) => !found.has(id))
      .map((id) => ({ itemId: id, message: new NotFoundError('Item', id).message }));

    return this.run(items, windowDays, ids, missing);
  }

  async recalculateStatisticsForCategory(
    categoryId: string,
    windowDays: number = this.options.statisticsWindowDays,
  ): Promise<BatchStatisticsSummary> {
    const category = await this.store.getCategory(categoryId);
    if (!category) throw new NotFoundError('Category', categoryId);

    const items = await this.store.getItemsByCategory(categoryId);
    return this.run(items, windowDays, items.map((item) => item.id));
  }

  private async run(
    items: readonly ItemRef[],
    windowDays: number,
    itemIds?: readonly string[],
    preFailed: ItemFailure[] = [],
  ): Promise<BatchStatisticsSummary> {
    const started = Date.now();
    const now = this.options.now();
    const { startDate, endDate } = this.extractor.window(windowDays);
    const grouped = await this.extractor.loadGroupedRecords(windowDays, itemIds);

    const updates: ItemStatisticsUpdate[] = [];
    const errors: ItemFailure[] = [...preFailed];
    let updated = 0;
    let noData = 0;

    for (const item of items) {
      try {
        const records = grouped.get(item.id);
        if (!records || records.length === 0) {
          updates.push({ itemId: item.id, snapshot: noDataSnapshot(now) });
          noData++;
          continue;
        }

        const figures = calculateItemStatistics(buildDailySeries(records));
        const snapshot = buildStatisticsSnapshot(figures, {
          scheme: 'five_tier',
          currentQuantity: Decimal.from(item.currentQuantity),
          now,
        });
        updates.push({ itemId: item.id, snapshot });
        updated++;
      } catch (err) {
        errors.push({ itemId: item.id, message: errorMessage(err) });
        log.error({ itemId: item.id, error: errorMessage(err) }, 'Statistics failed for item');
      }
    }

    if (updates.length > 0) {
      await this.store.saveItemsStatistics(updates);
    }

    const summary: BatchStatisticsSummary = {
      totalItems: items.length + preFailed.length,
      updated,
      noData,
      failed: errors.length,
      errors,
      windowDays,
      startDate,
      endDate,
      elapsedMs: Date.now() - started,
      timestamp: now,
    };
    log.info(
      {
        totalItems: summary.totalItems,
        updated,
        noData,
        failed: summary.failed,
        elapsedMs: summary.elapsedMs,
      },
      'Batch statistics recalculated',
    );
    return summary;
  }
}
