import {
  pgSchema,
  uuid,
  varchar,
  text,
  timestamp,
  boolean,
  numeric,
  integer,
  date,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import type { ConsumptionPattern, TrendDirection, VolatilityClass } from '@stockpulse/shared-types';

export const inventorySchema = pgSchema('inventory');

// ─── Item Categories ──────────────────────────────────────────────────
export const itemCategories = inventorySchema.table(
  'item_categories',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    description: text('description'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('item_categories_name_idx').on(table.name)]
);

// ─── Items ────────────────────────────────────────────────────────────
// Stock levels are maintained by the transaction-recording flows.
// The statistics columns are derived and written only by the analytics engine.
export const items = inventorySchema.table(
  'items',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    itemCode: varchar('item_code', { length: 50 }),
    name: varchar('name', { length: 255 }).notNull(),
    description: text('description'),
    categoryId: uuid('category_id').references(() => itemCategories.id),
    unitOfMeasure: varchar('unit_of_measure', { length: 50 }).notNull().default('pcs'),
    currentQuantity: numeric('current_quantity', { precision: 12, scale: 2 }).notNull().default('0'),
    minStockLevel: numeric('min_stock_level', { precision: 12, scale: 2 }),
    maxStockLevel: numeric('max_stock_level', { precision: 12, scale: 2 }),
    reorderLevel: numeric('reorder_level', { precision: 12, scale: 2 }),
    reorderQuantity: numeric('reorder_quantity', { precision: 12, scale: 2 }),

    // Derived consumption statistics
    avgDailyConsumption: numeric('avg_daily_consumption', { precision: 12, scale: 4 }),
    consumptionStdDev: numeric('consumption_std_dev', { precision: 12, scale: 4 }),
    coefficientOfVariation: numeric('coefficient_of_variation', { precision: 10, scale: 4 }),
    volatilityClassification: varchar('volatility_classification', { length: 20 }).$type<VolatilityClass>(),
    consumptionTrend: varchar('consumption_trend', { length: 20 }).$type<TrendDirection>(),
    consumptionPattern: varchar('consumption_pattern', { length: 20 }).$type<ConsumptionPattern>(),
    forecastNextPeriod: numeric('forecast_next_period', { precision: 12, scale: 4 }),
    coverageDays: integer('coverage_days'),
    expectedStockoutDate: date('expected_stockout_date', { mode: 'string' }),
    statisticsUpdatedAt: timestamp('statistics_updated_at', { withTimezone: true }),

    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('items_item_code_idx').on(table.itemCode),
    index('items_category_idx').on(table.categoryId),
    index('items_volatility_idx').on(table.volatilityClassification),
    index('items_stockout_idx').on(table.expectedStockoutDate),
  ]
);

// ─── Relations ────────────────────────────────────────────────────────
export const itemCategoriesRelations = relations(itemCategories, ({ many }) => ({
  items: many(items),
}));

export const itemsRelations = relations(items, ({ one }) => ({
  category: one(itemCategories, {
    fields: [items.categoryId],
    references: [itemCategories.id],
  }),
}));
