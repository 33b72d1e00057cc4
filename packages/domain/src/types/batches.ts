import type { BatchReference, Sku, Timestamp } from './common.js';

/**
 * A single line of a customer order.
 *
 * Order lines are value objects: two lines with the same order, sku and
 * quantity are the same line.
 */
export type OrderLine = {
  orderId: string;
  sku: Sku;
  quantity: number;
};

/**
 * A batch of stock ordered by purchasing.
 *
 * `eta` is null for stock already in the warehouse, otherwise the expected
 * arrival time of a shipment.
 */
export type Batch = {
  reference: BatchReference;
  sku: Sku;
  purchasedQuantity: number;
  eta: Timestamp | null;
  allocations: OrderLine[];
};
