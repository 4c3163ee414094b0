import { createLogger } from '@stockpulse/config';
import type { CorrelationEdge, CorrelationType, PairFailure } from '@stockpulse/shared-types';
import { Decimal } from '../lib/decimal.js';
import { NotFoundError, errorMessage } from '../lib/errors.js';
import type { AnalyticsEngineOptions } from '../lib/options.js';
import type { AnalyticsStore, ConsumptionObservation, ItemRef } from '../store/analytics-store.js';
import {
  byAbsoluteCoefficientDesc,
  classifyCorrelation,
  isSignificant,
  isStrongNegative,
  isStrongPositive,
  pearsonCorrelation,
} from './correlation.js';
import { OUTPUT_SCALE } from './numeric.js';
import { needsReorder } from './statistics.service.js';
import type { TimeSeriesExtractor } from './time-series.js';

const log = createLogger('analytics:correlation-graph');

const TOP_CORRELATIONS = 10;
const DEBUG_RECENT_DAYS = 30;
const NEW_EDGE_CONFIDENCE = '95.00';

// ─── Types ───────────────────────────────────────────────────────────

export interface CorrelationDetail {
  item1Id: string;
  item1Name: string;
  item2Id: string;
  item2Name: string;
  coefficient: string;
  correlationType: CorrelationType;
}

export interface CorrelationSweepSummary {
  totalItems: number;
  pairsEvaluated: number;
  correlationsCalculated: number;
  significantCorrelations: number;
  insufficientData: number;
  failed: number;
  errors: PairFailure[];
  threshold: number;
  /** Significant pairs, strongest |r| first */
  topCorrelations: CorrelationDetail[];
  lastUpdated: Date;
  message?: string;
}

export interface ForcedRecalculationSummary extends CorrelationSweepSummary {
  edgesDeleted: number;
}

export interface RelatedItemCorrelation {
  itemId: string;
  itemName: string;
  categoryName: string;
  coefficient: string;
  correlationType: CorrelationType;
  isSignificant: boolean;
}

export interface ItemCorrelationsResult {
  itemId: string;
  itemName: string;
  totalCorrelations: number;
  correlations: RelatedItemCorrelation[];
  strongPositive: RelatedItemCorrelation[];
  strongNegative: RelatedItemCorrelation[];
}

export interface Recommendation {
  itemId: string;
  itemName: string;
  coefficient: string;
  correlationType: CorrelationType;
  currentStock: string;
  reorderLevel: string | null;
  needsReorder: boolean;
}

export type CorrelationStatistics =
  | { totalCorrelations: 0; message: string }
  | {
      totalCorrelations: number;
      averageCorrelation: string;
      maxCorrelation: string;
      minCorrelation: string;
      strongPositiveCount: number;
      strongNegativeCount: number;
      significantCount: number;
      significantThreshold: number;
      minDataPoints: number;
      lastUpdated: Date;
    };

export interface CorrelationDebugInfo {
  totalItems: number;
  totalConsumptionRecords: number;
  totalCorrelations: number;
  recentConsumptionRecords: number;
  minDataPointsRequired: number;
  significanceThreshold: number;
}

// ─── Service ─────────────────────────────────────────────────────────

/**
 * Maintains the pairwise correlation graph. A failing pair is logged and
 * counted; it never aborts a sweep.
 */
export class CorrelationGraphService {
  constructor(
    private readonly store: AnalyticsStore,
    private readonly extractor: TimeSeriesExtractor,
    private readonly options: AnalyticsEngineOptions,
  ) {}

  async recalculateAllCorrelations(): Promise<CorrelationSweepSummary> {
    const items = await this.store.getAllItems();
    const now = this.options.now();
    const summary: CorrelationSweepSummary = {
      totalItems: items.length,
      pairsEvaluated: 0,
      correlationsCalculated: 0,
      significantCorrelations: 0,
      insufficientData: 0,
      failed: 0,
      errors: [],
      threshold: this.options.significanceThreshold,
      topCorrelations: [],
      lastUpdated: now,
    };

    if (items.length < 2) {
      summary.message = 'Need at least 2 items to calculate correlations';
      return summary;
    }

    log.info({ items: items.length }, 'Starting correlation sweep');
    const grouped = await this.extractor.loadGroupedRecords(this.options.correlationWindowDays);
    const significant: CorrelationDetail[] = [];

    for (let i = 0; i < items.length; i++) {
      for (let j = i + 1; j < items.length; j++) {
        const item1 = items[i];
        const item2 = items[j];
        summary.pairsEvaluated++;

        try {
          const edge = await this.correlateAndSave(item1, item2, grouped, now);
          if (!edge) {
            summary.insufficientData++;
            continue;
          }
          summary.correlationsCalculated++;
          if (isSignificant(edge.coefficient, this.options.significanceThreshold)) {
            summary.significantCorrelations++;
            significant.push({
              item1Id: item1.id,
              item1Name: item1.name,
              item2Id: item2.id,
              item2Name: item2.name,
              coefficient: edge.coefficient,
              correlationType: edge.correlationType,
            });
          }
        } catch (err) {
          summary.failed++;
          summary.errors.push({ item1Id: item1.id, item2Id: item2.id, message: errorMessage(err) });
          log.error(
            { item1Id: item1.id, item2Id: item2.id, error: errorMessage(err) },
            'Correlation failed for pair',
          );
        }
      }
    }

    summary.topCorrelations = significant.sort(byAbsoluteCoefficientDesc).slice(0, TOP_CORRELATIONS);
    log.info(
      {
        pairs: summary.pairsEvaluated,
        calculated: summary.correlationsCalculated,
        significant: summary.significantCorrelations,
        failed: summary.failed,
      },
      'Correlation sweep complete',
    );
    return summary;
  }

  async recalculateCorrelationsForItem(itemId: string): Promise<ItemCorrelationsResult> {
    const target = await this.store.getItem(itemId);
    if (!target) throw new NotFoundError('Item', itemId);

    const others = (await this.store.getAllItems()).filter((item) => item.id !== itemId);
    const grouped = await this.extractor.loadGroupedRecords(this.options.correlationWindowDays, [
      itemId,
      ...others.map((item) => item.id),
    ]);
    const now = this.options.now();
    log.info({ itemId, candidates: others.length }, 'Calculating correlations for item');

    const correlations: RelatedItemCorrelation[] = [];
    for (const other of others) {
      try {
        const edge = await this.correlateAndSave(target, other, grouped, now);
        if (!edge) continue;
        correlations.push({
          itemId: other.id,
          itemName: other.name,
          categoryName: other.categoryName ?? 'Unknown',
          coefficient: edge.coefficient,
          correlationType: edge.correlationType,
          isSignificant: isSignificant(edge.coefficient, this.options.significanceThreshold),
        });
      } catch (err) {
        log.error(
          { item1Id: itemId, item2Id: other.id, error: errorMessage(err) },
          'Correlation failed for pair',
        );
      }
    }
    correlations.sort(byAbsoluteCoefficientDesc);

    return {
      itemId,
      itemName: target.name,
      totalCorrelations: correlations.length,
      correlations,
      strongPositive: correlations.filter((c) => isStrongPositive(c.coefficient)),
      strongNegative: correlations.filter((c) => isStrongNegative(c.coefficient)),
    };
  }

  /** Read path: significant edges of an item, strongest first. */
  async getRecommendations(itemId: string, limit = 10): Promise<Recommendation[]> {
    const edges = (
      await this.store.findSignificantEdges(itemId, this.options.significanceThreshold)
    ).slice(0, limit);
    log.debug({ itemId, edges: edges.length }, 'Significant correlations found');

    const relatedIds = edges.map((edge) => (edge.item1Id === itemId ? edge.item2Id : edge.item1Id));
    const related = new Map(
      (await this.store.getItemsByIds(relatedIds)).map((item) => [item.id, item]),
    );

    const recommendations: Recommendation[] = [];
    edges.forEach((edge, i) => {
      const item = related.get(relatedIds[i]);
      if (!item) return;
      recommendations.push({
        itemId: item.id,
        itemName: item.name,
        coefficient: edge.coefficient,
        correlationType: edge.correlationType,
        currentStock: item.currentQuantity,
        reorderLevel: item.reorderLevel,
        needsReorder: needsReorder(item),
      });
    });
    return recommendations;
  }

  async forceFullRecalculation(): Promise<ForcedRecalculationSummary> {
    const edgesDeleted = await this.store.deleteAllEdges();
    log.info({ edgesDeleted }, 'Cleared correlation graph; recalculating');
    return { ...(await this.recalculateAllCorrelations()), edgesDeleted };
  }

  async getCorrelationStatistics(): Promise<CorrelationStatistics> {
    const edges = await this.store.getActiveEdges();
    if (edges.length === 0) {
      return { totalCorrelations: 0, message: 'No correlations calculated yet' };
    }

    const coefficients = edges.map((edge) => Decimal.from(edge.coefficient));
    const ordered = [...coefficients].sort((a, b) => a.compare(b));
    const countOf = (type: CorrelationType) =>
      edges.filter((edge) => edge.correlationType === type).length;

    return {
      totalCorrelations: edges.length,
      averageCorrelation: Decimal.sum(coefficients).div(edges.length, OUTPUT_SCALE).toFixed(OUTPUT_SCALE),
      maxCorrelation: ordered[ordered.length - 1].toFixed(OUTPUT_SCALE),
      minCorrelation: ordered[0].toFixed(OUTPUT_SCALE),
      strongPositiveCount: countOf('STRONG_POSITIVE'),
      strongNegativeCount: countOf('STRONG_NEGATIVE'),
      significantCount: coefficients.filter((r) =>
        isSignificant(r, this.options.significanceThreshold),
      ).length,
      significantThreshold: this.options.significanceThreshold,
      minDataPoints: this.options.minDataPoints,
      lastUpdated: this.options.now(),
    };
  }

  async getCorrelationDebugInfo(): Promise<CorrelationDebugInfo> {
    const { startDate, endDate } = this.extractor.window(DEBUG_RECENT_DAYS);
    const [counts, recent] = await Promise.all([
      this.store.countAll(),
      this.store.countConsumptionRecordsBetween(startDate, endDate),
    ]);

    return {
      totalItems: counts.items,
      totalConsumptionRecords: counts.consumptionRecords,
      totalCorrelations: counts.correlations,
      recentConsumptionRecords: recent,
      minDataPointsRequired: this.options.minDataPoints,
      significanceThreshold: this.options.significanceThreshold,
    };
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private async correlateAndSave(
    item1: ItemRef,
    item2: ItemRef,
    grouped: ReadonlyMap<string, ConsumptionObservation[]>,
    now: Date,
  ): Promise<CorrelationEdge | null> {
    const pair = this.extractor.alignGrouped(grouped, item1.id, item2.id);
    if (!pair) return null;

    const r = pearsonCorrelation(pair.x, pair.y);
    return this.upsertEdge(item1, item2, r, pair.dates.length, now);
  }

  /**
   * Updates coefficient, type and timestamp of an existing edge; otherwise
   * creates one with the smaller item id first, so the pair index covers
   * the unordered pair.
   */
  private async upsertEdge(
    item1: ItemRef,
    item2: ItemRef,
    r: Decimal,
    dataPoints: number,
    now: Date,
  ): Promise<CorrelationEdge> {
    const coefficient = r.toFixed(OUTPUT_SCALE);
    const correlationType = classifyCorrelation(r);
    const existing = await this.store.findCorrelationEdge(item1.id, item2.id);
    if (existing) {
      return this.store.saveCorrelationEdge({
        ...existing,
        coefficient,
        correlationType,
        lastCalculated: now,
      });
    }

    const [first, second] = item1.id <= item2.id ? [item1, item2] : [item2, item1];
    return this.store.saveCorrelationEdge({
      item1Id: first.id,
      item2Id: second.id,
      coefficient,
      correlationType,
      dataPoints,
      confidenceLevel: NEW_EDGE_CONFIDENCE,
      categoryId: first.categoryId,
      isActive: true,
      lastCalculated: now,
    });
  }
}
