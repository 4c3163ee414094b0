import {
  uuid,
  varchar,
  timestamp,
  numeric,
  integer,
  date,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import { inventorySchema, items } from './catalog.js';

// ─── Consumption Records ──────────────────────────────────────────────
// One row per item per day. Written by the transaction-recording flows;
// read-only to the analytics engine.
export const consumptionRecords = inventorySchema.table(
  'consumption_records',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    itemId: uuid('item_id')
      .notNull()
      .references(() => items.id, { onDelete: 'cascade' }),
    consumptionDate: date('consumption_date', { mode: 'string' }).notNull(),
    openingStock: numeric('opening_stock', { precision: 12, scale: 2 }),
    receivedQuantity: numeric('received_quantity', { precision: 12, scale: 2 }).default('0'),
    consumedQuantity: numeric('consumed_quantity', { precision: 12, scale: 2 }).default('0'),
    closingStock: numeric('closing_stock', { precision: 12, scale: 2 }),
    department: varchar('department', { length: 100 }),
    costCenter: varchar('cost_center', { length: 50 }),
    employeeCount: integer('employee_count'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('consumption_records_item_date_idx').on(table.itemId, table.consumptionDate),
    index('consumption_records_date_idx').on(table.consumptionDate),
  ]
);

export const consumptionRecordsRelations = relations(consumptionRecords, ({ one }) => ({
  item: one(items, {
    fields: [consumptionRecords.itemId],
    references: [items.id],
  }),
}));
