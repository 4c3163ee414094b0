import type { CorrelationEdge, ItemStatisticsSnapshot } from '@stockpulse/shared-types';

// ─── Read Models ──────────────────────────────────────────────────────

/** One item's activity on one day. Quantities are decimal strings. */
export interface ConsumptionObservation {
  itemId: string;
  /** ISO date (YYYY-MM-DD) */
  date: string;
  consumedQuantity: string | null;
  receivedQuantity: string | null;
  openingStock: string | null;
  closingStock: string | null;
}

export interface ItemRef {
  id: string;
  itemCode: string | null;
  name: string;
  categoryId: string | null;
  categoryName: string | null;
  currentQuantity: string;
  reorderLevel: string | null;
  isActive: boolean;
}

export interface CategoryRef {
  id: string;
  name: string;
}

export interface ItemStatisticsUpdate {
  itemId: string;
  snapshot: ItemStatisticsSnapshot;
}

export interface StoreCounts {
  items: number;
  categories: number;
  consumptionRecords: number;
  correlations: number;
}

// ─── Store Contract ───────────────────────────────────────────────────

/**
 * Everything the analytics engine reads from or writes to persistence.
 * Date bounds are inclusive ISO dates. The engine never writes
 * consumption observations.
 */
export interface AnalyticsStore {
  getItemConsumptionRecords(
    itemId: string,
    startDate: string,
    endDate: string,
  ): Promise<ConsumptionObservation[]>;
  /** All items' records in the window, optionally restricted to `itemIds`. */
  getConsumptionRecords(
    startDate: string,
    endDate: string,
    itemIds?: readonly string[],
  ): Promise<ConsumptionObservation[]>;
  getCategoryConsumptionRecords(
    categoryId: string,
    startDate: string,
    endDate: string,
  ): Promise<ConsumptionObservation[]>;

  getAllItems(): Promise<ItemRef[]>;
  getItem(itemId: string): Promise<ItemRef | null>;
  getItemsByIds(itemIds: readonly string[]): Promise<ItemRef[]>;
  getItemsByCategory(categoryId: string): Promise<ItemRef[]>;
  getCategory(categoryId: string): Promise<CategoryRef | null>;
  getAllCategories(): Promise<CategoryRef[]>;

  saveItemStatistics(itemId: string, snapshot: ItemStatisticsSnapshot): Promise<void>;
  /** Persists every update in one unit of work. */
  saveItemsStatistics(updates: readonly ItemStatisticsUpdate[]): Promise<void>;

  /** Matches the pair in either order. */
  findCorrelationEdge(item1Id: string, item2Id: string): Promise<CorrelationEdge | null>;
  saveCorrelationEdge(edge: CorrelationEdge): Promise<CorrelationEdge>;
  deleteAllEdges(): Promise<number>;
  getActiveEdges(): Promise<CorrelationEdge[]>;
  /**
   * Active edges touching `itemId` with |coefficient| ≥ threshold,
   * strongest first.
   */
  findSignificantEdges(itemId: string, threshold: number): Promise<CorrelationEdge[]>;

  countAll(): Promise<StoreCounts>;
  countConsumptionRecordsBetween(startDate: string, endDate: string): Promise<number>;
}
