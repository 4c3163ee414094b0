import { createLogger } from '@stockpulse/config';
import type { ItemStatisticsSnapshot } from '@stockpulse/shared-types';
import { toIsoDate } from './lib/dates.js';
import { errorMessage } from './lib/errors.js';
import { resolveEngineOptions, type AnalyticsEngineOptions } from './lib/options.js';
import type { AnalyticsStore } from './store/analytics-store.js';
import {
  BatchStatisticsService,
  type BatchStatisticsSummary,
} from './services/batch-statistics.service.js';
import {
  CorrelationGraphService,
  type CorrelationDebugInfo,
  type CorrelationStatistics,
  type CorrelationSweepSummary,
  type ForcedRecalculationSummary,
  type ItemCorrelationsResult,
  type Recommendation,
} from './services/correlation-graph.service.js';
import {
  StatisticsService,
  type CategoryStatisticsReport,
  type CorrelationRefreshPublisher,
  type DashboardStatistics,
  type ItemStatisticsReport,
  type NoStatistics,
} from './services/statistics.service.js';
import { TimeSeriesExtractor } from './services/time-series.js';

const log = createLogger('analytics:engine');

export interface ComprehensiveItemAnalytics {
  itemId: string;
  /** ISO date (YYYY-MM-DD) */
  analysisDate: string;
  statistics: ItemStatisticsReport | NoStatistics;
  correlations: ItemCorrelationsResult;
  recommendations: Recommendation[];
}

/**
 * Consumption Analytics Engine
 *
 * Single entry point for callers (API handlers, workers, schedulers). Wires
 * the time-series extractor and the three services around one store and one
 * set of options. When a publisher is given, per-item correlation refreshes
 * go through it; otherwise they run in-process in the background.
 */
export class ConsumptionAnalyticsEngine {
  readonly options: AnalyticsEngineOptions;
  readonly statistics: StatisticsService;
  readonly correlations: CorrelationGraphService;
  readonly batch: BatchStatisticsService;

  constructor(
    store: AnalyticsStore,
    options: Partial<AnalyticsEngineOptions> = {},
    private readonly publisher?: CorrelationRefreshPublisher,
  ) {
    this.options = resolveEngineOptions(options);
    const extractor = new TimeSeriesExtractor(store, this.options);
    this.statistics = new StatisticsService(store, extractor, this.options, publisher);
    this.correlations = new CorrelationGraphService(store, extractor, this.options);
    this.batch = new BatchStatisticsService(store, extractor, this.options);
  }

  // ─── Statistics ─────────────────────────────────────────────────────

  computeItemStatistics(
    itemId: string,
    windowDays: number = this.options.statisticsWindowDays,
  ): Promise<ItemStatisticsReport | NoStatistics> {
    return this.statistics.computeItemStatistics(itemId, windowDays);
  }

  computeCategoryStatistics(
    categoryId: string,
    windowDays: number = this.options.statisticsWindowDays,
  ): Promise<CategoryStatisticsReport | NoStatistics> {
    return this.statistics.computeCategoryStatistics(categoryId, windowDays);
  }

  computeDashboardStatistics(
    windowDays: number = this.options.statisticsWindowDays,
  ): Promise<DashboardStatistics> {
    return this.statistics.computeDashboardStatistics(windowDays);
  }

  updateItemStatistics(itemId: string): Promise<ItemStatisticsSnapshot> {
    return this.statistics.updateItemStatistics(itemId);
  }

  recalculateAllStatistics(windowDays?: number): Promise<BatchStatisticsSummary> {
    return this.batch.recalculateAllStatistics(windowDays);
  }

  recalculateStatisticsForItems(
    itemIds: readonly string[],
    windowDays?: number,
  ): Promise<BatchStatisticsSummary> {
    return this.batch.recalculateStatisticsForItems(itemIds, windowDays);
  }

  recalculateStatisticsForCategory(
    categoryId: string,
    windowDays?: number,
  ): Promise<BatchStatisticsSummary> {
    return this.batch.recalculateStatisticsForCategory(categoryId, windowDays);
  }

  // ─── Correlations ───────────────────────────────────────────────────

  recalculateAllCorrelations(): Promise<CorrelationSweepSummary> {
    return this.correlations.recalculateAllCorrelations();
  }

  recalculateCorrelationsForItem(itemId: string): Promise<ItemCorrelationsResult> {
    return this.correlations.recalculateCorrelationsForItem(itemId);
  }

  forceFullRecalculation(): Promise<ForcedRecalculationSummary> {
    return this.correlations.forceFullRecalculation();
  }

  getRecommendations(itemId: string, limit = 10): Promise<Recommendation[]> {
    return this.correlations.getRecommendations(itemId, limit);
  }

  getCorrelationStatistics(): Promise<CorrelationStatistics> {
    return this.correlations.getCorrelationStatistics();
  }

  getCorrelationDebugInfo(): Promise<CorrelationDebugInfo> {
    return this.correlations.getCorrelationDebugInfo();
  }

  // ─── Combined Views ─────────────────────────────────────────────────

  async getComprehensiveItemAnalytics(
    itemId: string,
    windowDays: number = this.options.statisticsWindowDays,
  ): Promise<ComprehensiveItemAnalytics> {
    const statistics = await this.statistics.computeItemStatistics(itemId, windowDays);
    const correlations = await this.correlations.recalculateCorrelationsForItem(itemId);
    const recommendations = await this.correlations.getRecommendations(itemId, 5);

    return {
      itemId,
      analysisDate: toIsoDate(this.options.now()),
      statistics,
      correlations,
      recommendations,
    };
  }

  // ─── Write-Path Hook ────────────────────────────────────────────────

  /**
   * Called after a consumption record for `itemId` was written. Returns
   * immediately; the correlation refresh never fails the caller's write.
   */
  onConsumptionRecorded(itemId: string): void {
    if (this.publisher) {
      void this.publisher.publish(itemId, 'consumption_recorded').catch((err) => {
        log.error({ itemId, error: errorMessage(err) }, 'Failed to publish correlation refresh');
      });
      return;
    }

    void this.correlations.recalculateCorrelationsForItem(itemId).catch((err) => {
      log.error({ itemId, error: errorMessage(err) }, 'Background correlation refresh failed');
    });
  }
}

export { DrizzleAnalyticsStore } from './store/drizzle-store.js';
export { resolveEngineOptions, engineOptionsFromConfig, DEFAULT_ENGINE_OPTIONS } from './lib/options.js';
export type { AnalyticsEngineOptions } from './lib/options.js';
export type * from './store/analytics-store.js';
export { AppError, NotFoundError, ArithmeticError } from './lib/errors.js';
export { Decimal } from './lib/decimal.js';
