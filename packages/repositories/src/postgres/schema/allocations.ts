import { pgTable, text, integer, serial, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { batches } from './batches.js';

/**
 * Allocations table - order lines assigned to a batch.
 *
 * Rows are owned by their batch and rewritten as a set when the batch is saved.
 */
export const allocations = pgTable(
  'allocations',
  {
    id: serial('id').primaryKey(),
    batchReference: text('batch_reference')
      .notNull()
      .references(() => batches.reference, { onDelete: 'cascade' }),
    orderId: text('order_id').notNull(),
    sku: text('sku').notNull(),
    quantity: integer('quantity').notNull(),
  },
  (table) => [
    index('allocations_batch_idx').on(table.batchReference),
    uniqueIndex('allocations_batch_line_idx').on(
      table.batchReference,
      table.orderId,
      table.sku
    ),
  ]
);
