import {
  pgSchema,
  uuid,
  varchar,
  timestamp,
  numeric,
  integer,
  boolean,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import type { CorrelationType } from '@stockpulse/shared-types';
import { itemCategories, items } from './catalog.js';

export const analyticsSchema = pgSchema('analytics');

// ─── Item Correlations ────────────────────────────────────────────────
// Pairwise Pearson correlation between two items' daily consumption.
// The pair is unordered; new edges store the smaller item id as item1.
export const itemCorrelations = analyticsSchema.table(
  'item_correlations',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    item1Id: uuid('item1_id')
      .notNull()
      .references(() => items.id, { onDelete: 'cascade' }),
    item2Id: uuid('item2_id')
      .notNull()
      .references(() => items.id, { onDelete: 'cascade' }),
    correlationCoefficient: numeric('correlation_coefficient', { precision: 5, scale: 4 }).notNull(),
    correlationType: varchar('correlation_type', { length: 20 }).$type<CorrelationType>().notNull(),
    confidenceLevel: numeric('confidence_level', { precision: 5, scale: 2 }),
    dataPoints: integer('data_points').notNull().default(0),
    categoryId: uuid('category_id').references(() => itemCategories.id),
    isActive: boolean('is_active').notNull().default(true),
    lastCalculated: timestamp('last_calculated', { withTimezone: true }).notNull().defaultNow(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('item_correlations_pair_idx').on(table.item1Id, table.item2Id),
    index('item_correlations_item1_idx').on(table.item1Id, table.correlationCoefficient),
    index('item_correlations_item2_idx').on(table.item2Id, table.correlationCoefficient),
    index('item_correlations_type_idx').on(table.correlationType),
    index('item_correlations_category_idx').on(table.categoryId),
  ]
);

export const itemCorrelationsRelations = relations(itemCorrelations, ({ one }) => ({
  item1: one(items, {
    fields: [itemCorrelations.item1Id],
    references: [items.id],
  }),
  item2: one(items, {
    fields: [itemCorrelations.item2Id],
    references: [items.id],
  }),
}));
