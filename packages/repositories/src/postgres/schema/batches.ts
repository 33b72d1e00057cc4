import { pgTable, text, timestamp, integer, index } from 'drizzle-orm/pg-core';

/**
 * Batches table - stock ordered by purchasing, in the warehouse or in transit.
 */
export const batches = pgTable(
  'batches',
  {
    reference: text('reference').primaryKey(),
    sku: text('sku').notNull(),
    purchasedQuantity: integer('purchased_quantity').notNull(),
    eta: timestamp('eta', { withTimezone: true }), // null = already in the warehouse
  },
  (table) => [index('batches_sku_idx').on(table.sku)]
);
