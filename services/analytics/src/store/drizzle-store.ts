import { and, asc, between, desc, eq, inArray, or, sql } from 'drizzle-orm';
import type { Database } from '@stockpulse/db';
import { consumptionRecords, itemCategories, itemCorrelations, items } from '@stockpulse/db/schema';
import type { CorrelationEdge, ItemStatisticsSnapshot } from '@stockpulse/shared-types';
import type {
  AnalyticsStore,
  CategoryRef,
  ConsumptionObservation,
  ItemRef,
  ItemStatisticsUpdate,
  StoreCounts,
} from './analytics-store.js';

// ─── Column Projections ───────────────────────────────────────────────

const observationColumns = {
  itemId: consumptionRecords.itemId,
  date: consumptionRecords.consumptionDate,
  consumedQuantity: consumptionRecords.consumedQuantity,
  receivedQuantity: consumptionRecords.receivedQuantity,
  openingStock: consumptionRecords.openingStock,
  closingStock: consumptionRecords.closingStock,
};

const itemColumns = {
  id: items.id,
  itemCode: items.itemCode,
  name: items.name,
  categoryId: items.categoryId,
  categoryName: itemCategories.name,
  currentQuantity: items.currentQuantity,
  reorderLevel: items.reorderLevel,
  isActive: items.isActive,
};

const edgeColumns = {
  id: itemCorrelations.id,
  item1Id: itemCorrelations.item1Id,
  item2Id: itemCorrelations.item2Id,
  coefficient: itemCorrelations.correlationCoefficient,
  correlationType: itemCorrelations.correlationType,
  dataPoints: itemCorrelations.dataPoints,
  confidenceLevel: itemCorrelations.confidenceLevel,
  categoryId: itemCorrelations.categoryId,
  isActive: itemCorrelations.isActive,
  lastCalculated: itemCorrelations.lastCalculated,
};

type EdgeRow = {
  id: string;
  item1Id: string;
  item2Id: string;
  coefficient: string;
  correlationType: CorrelationEdge['correlationType'];
  dataPoints: number;
  confidenceLevel: string | null;
  categoryId: string | null;
  isActive: boolean;
  lastCalculated: Date;
};

function toEdge(row: EdgeRow): CorrelationEdge {
  return { ...row, confidenceLevel: row.confidenceLevel ?? '0.00' };
}

function statisticsColumns(snapshot: ItemStatisticsSnapshot) {
  return {
    avgDailyConsumption: snapshot.meanDailyConsumption,
    consumptionStdDev: snapshot.standardDeviation,
    coefficientOfVariation: snapshot.coefficientOfVariation,
    volatilityClassification: snapshot.volatilityClassification,
    consumptionTrend: snapshot.trend,
    consumptionPattern: snapshot.consumptionPattern,
    forecastNextPeriod: snapshot.forecastNextPeriod,
    coverageDays: snapshot.coverageDays,
    expectedStockoutDate: snapshot.expectedStockoutDate,
    statisticsUpdatedAt: snapshot.lastUpdated,
    updatedAt: snapshot.lastUpdated,
  };
}

const countColumn = { count: sql<number>`count(*)::int` };

/**
 * Postgres-backed store over the inventory and analytics schemas.
 */
export class DrizzleAnalyticsStore implements AnalyticsStore {
  constructor(private readonly db: Database) {}

  // ─── Consumption ────────────────────────────────────────────────────

  async getItemConsumptionRecords(
    itemId: string,
    startDate: string,
    endDate: string,
  ): Promise<ConsumptionObservation[]> {
    return this.db
      .select(observationColumns)
      .from(consumptionRecords)
      .where(
        and(
          eq(consumptionRecords.itemId, itemId),
          between(consumptionRecords.consumptionDate, startDate, endDate),
        ),
      )
      .orderBy(asc(consumptionRecords.consumptionDate));
  }

  async getConsumptionRecords(
    startDate: string,
    endDate: string,
    itemIds?: readonly string[],
  ): Promise<ConsumptionObservation[]> {
    if (itemIds && itemIds.length === 0) return [];

    const inWindow = between(consumptionRecords.consumptionDate, startDate, endDate);
    return this.db
      .select(observationColumns)
      .from(consumptionRecords)
      .where(itemIds ? and(inWindow, inArray(consumptionRecords.itemId, [...itemIds])) : inWindow)
      .orderBy(asc(consumptionRecords.itemId), asc(consumptionRecords.consumptionDate));
  }

  async getCategoryConsumptionRecords(
    categoryId: string,
    startDate: string,
    endDate: string,
  ): Promise<ConsumptionObservation[]> {
    return this.db
      .select(observationColumns)
      .from(consumptionRecords)
      .innerJoin(items, eq(consumptionRecords.itemId, items.id))
      .where(
        and(
          eq(items.categoryId, categoryId),
          between(consumptionRecords.consumptionDate, startDate, endDate),
        ),
      )
      .orderBy(asc(consumptionRecords.consumptionDate));
  }

  // ─── Items & Categories ─────────────────────────────────────────────

  async getAllItems(): Promise<ItemRef[]> {
    return this.db
      .select(itemColumns)
      .from(items)
      .leftJoin(itemCategories, eq(items.categoryId, itemCategories.id))
      .orderBy(asc(items.name));
  }

  async getItem(itemId: string): Promise<ItemRef | null> {
    const [row] = await this.db
      .select(itemColumns)
      .from(items)
      .leftJoin(itemCategories, eq(items.categoryId, itemCategories.id))
      .where(eq(items.id, itemId))
      .limit(1);
    return row ?? null;
  }

  async getItemsByIds(itemIds: readonly string[]): Promise<ItemRef[]> {
    if (itemIds.length === 0) return [];
    return this.db
      .select(itemColumns)
      .from(items)
      .leftJoin(itemCategories, eq(items.categoryId, itemCategories.id))
      .where(inArray(items.id, [...itemIds]));
  }

  async getItemsByCategory(categoryId: string): Promise<ItemRef[]> {
    return this.db
      .select(itemColumns)
      .from(items)
      .leftJoin(itemCategories, eq(items.categoryId, itemCategories.id))
      .where(eq(items.categoryId, categoryId))
      .orderBy(asc(items.name));
  }

  async getCategory(categoryId: string): Promise<CategoryRef | null> {
    const [row] = await this.db
      .select({ id: itemCategories.id, name: itemCategories.name })
      .from(itemCategories)
      .where(eq(itemCategories.id, categoryId))
      .limit(1);
    return row ?? null;
  }

  async getAllCategories(): Promise<CategoryRef[]> {
    return this.db
      .select({ id: itemCategories.id, name: itemCategories.name })
      .from(itemCategories)
      .orderBy(asc(itemCategories.name));
  }

  // ─── Statistics ─────────────────────────────────────────────────────

  async saveItemStatistics(itemId: string, snapshot: ItemStatisticsSnapshot): Promise<void> {
    await this.db.update(items).set(statisticsColumns(snapshot)).where(eq(items.id, itemId));
  }

  async saveItemsStatistics(updates: readonly ItemStatisticsUpdate[]): Promise<void> {
    if (updates.length === 0) return;
    await this.db.transaction(async (tx) => {
      for (const { itemId, snapshot } of updates) {
        await tx.update(items).set(statisticsColumns(snapshot)).where(eq(items.id, itemId));
      }
    });
  }

  // ─── Correlations ───────────────────────────────────────────────────

  async findCorrelationEdge(item1Id: string, item2Id: string): Promise<CorrelationEdge | null> {
    const [row] = await this.db
      .select(edgeColumns)
      .from(itemCorrelations)
      .where(
        or(
          and(eq(itemCorrelations.item1Id, item1Id), eq(itemCorrelations.item2Id, item2Id)),
          and(eq(itemCorrelations.item1Id, item2Id), eq(itemCorrelations.item2Id, item1Id)),
        ),
      )
      .limit(1);
    return row ? toEdge(row) : null;
  }

  async saveCorrelationEdge(edge: CorrelationEdge): Promise<CorrelationEdge> {
    const values = {
      item1Id: edge.item1Id,
      item2Id: edge.item2Id,
      correlationCoefficient: edge.coefficient,
      correlationType: edge.correlationType,
      dataPoints: edge.dataPoints,
      confidenceLevel: edge.confidenceLevel,
      categoryId: edge.categoryId,
      isActive: edge.isActive,
      lastCalculated: edge.lastCalculated,
    };

    if (edge.id) {
      const [row] = await this.db
        .update(itemCorrelations)
        .set({ ...values, updatedAt: edge.lastCalculated })
        .where(eq(itemCorrelations.id, edge.id))
        .returning(edgeColumns);
      if (row) return toEdge(row);
    }

    // A concurrent refresh may have inserted the same ordered pair first.
    const [row] = await this.db
      .insert(itemCorrelations)
      .values(values)
      .onConflictDoUpdate({
        target: [itemCorrelations.item1Id, itemCorrelations.item2Id],
        set: {
          correlationCoefficient: edge.coefficient,
          correlationType: edge.correlationType,
          lastCalculated: edge.lastCalculated,
          updatedAt: edge.lastCalculated,
        },
      })
      .returning(edgeColumns);
    return toEdge(row);
  }

  async deleteAllEdges(): Promise<number> {
    const deleted = await this.db
      .delete(itemCorrelations)
      .returning({ id: itemCorrelations.id });
    return deleted.length;
  }

  async getActiveEdges(): Promise<CorrelationEdge[]> {
    const rows = await this.db
      .select(edgeColumns)
      .from(itemCorrelations)
      .where(eq(itemCorrelations.isActive, true));
    return rows.map(toEdge);
  }

  async findSignificantEdges(itemId: string, threshold: number): Promise<CorrelationEdge[]> {
    const absCoefficient = sql`abs(${itemCorrelations.correlationCoefficient})`;
    const rows = await this.db
      .select(edgeColumns)
      .from(itemCorrelations)
      .where(
        and(
          eq(itemCorrelations.isActive, true),
          or(eq(itemCorrelations.item1Id, itemId), eq(itemCorrelations.item2Id, itemId)),
          sql`${absCoefficient} >= ${threshold}`,
        ),
      )
      .orderBy(desc(absCoefficient));
    return rows.map(toEdge);
  }

  // ─── Counts ─────────────────────────────────────────────────────────

  async countAll(): Promise<StoreCounts> {
    const [[itemCount], [categoryCount], [recordCount], [edgeCount]] = await Promise.all([
      this.db.select(countColumn).from(items),
      this.db.select(countColumn).from(itemCategories),
      this.db.select(countColumn).from(consumptionRecords),
      this.db.select(countColumn).from(itemCorrelations),
    ]);
    return {
      items: itemCount?.count ?? 0,
      categories: categoryCount?.count ?? 0,
      consumptionRecords: recordCount?.count ?? 0,
      correlations: edgeCount?.count ?? 0,
    };
  }

  async countConsumptionRecordsBetween(startDate: string, endDate: string): Promise<number> {
    const [row] = await this.db
      .select(countColumn)
      .from(consumptionRecords)
      .where(between(consumptionRecords.consumptionDate, startDate, endDate));
    return row?.count ?? 0;
  }
}
