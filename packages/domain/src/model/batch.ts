// Allocation model
//
// Batches are mutated in place: repositories hand out the same object they
// track, so a change made here is what gets written back on commit.

import type { Batch, OrderLine } from '../types/index.js';
import { LineAlreadyAllocatedError, OutOfStockError } from '../errors.js';

/**
 * Input for creating a new Batch
 */
export type CreateBatchInput = {
  reference: string;
  sku: string;
  quantity: number;
  eta?: string | null;
};

/**
 * `eta` is normalised to a full ISO 8601 timestamp, the form storage returns.
 * @throws RangeError if `eta` is not a valid date
 */
export function createBatch(input: CreateBatchInput): Batch {
  return {
    reference: input.reference,
    sku: input.sku,
    purchasedQuantity: input.quantity,
    eta: input.eta == null ? null : new Date(input.eta).toISOString(),
    allocations: [],
  };
}

export function createOrderLine(orderId: string, sku: string, quantity: number): OrderLine {
  return { orderId, sku, quantity };
}

export function sameOrderLine(a: OrderLine, b: OrderLine): boolean {
  return sameOrderItem(a, b) && a.quantity === b.quantity;
}

/**
 * Same order and sku, whatever the quantity. A batch holds at most one such line.
 */
export function sameOrderItem(a: OrderLine, b: OrderLine): boolean {
  return a.orderId === b.orderId && a.sku === b.sku;
}

export function allocatedQuantity(batch: Batch): number {
  return batch.allocations.reduce((sum, line) => sum + line.quantity, 0);
}

export function availableQuantity(batch: Batch): number {
  return batch.purchasedQuantity - allocatedQuantity(batch);
}

export function canAllocate(batch: Batch, line: OrderLine): boolean {
  return batch.sku === line.sku && availableQuantity(batch) >= line.quantity;
}

/**
 * Allocate a line to a batch. Allocating the same line twice is a no-op.
 * @returns false if the batch cannot take the line, or already holds the
 * same order item with another quantity
 */
export function allocateToBatch(batch: Batch, line: OrderLine): boolean {
  const existing = batch.allocations.find((held) => sameOrderItem(held, line));
  if (existing) {
    return sameOrderLine(existing, line);
  }
  if (!canAllocate(batch, line)) {
    return false;
  }
  batch.allocations.push({ ...line });
  return true;
}

/**
 * Remove a line from a batch.
 * @returns false if the line was not allocated to this batch
 */
export function deallocateFromBatch(batch: Batch, line: OrderLine): boolean {
  const index = batch.allocations.findIndex((existing) => sameOrderLine(existing, line));
  if (index === -1) return false;
  batch.allocations.splice(index, 1);
  return true;
}

/**
 * Preference order: warehouse stock (no eta) first, then earliest arrival.
 */
export function compareBatches(a: Batch, b: Batch): number {
  if (a.eta === null && b.eta === null) return 0;
  if (a.eta === null) return -1;
  if (b.eta === null) return 1;
  return new Date(a.eta).getTime() - new Date(b.eta).getTime();
}

/**
 * Allocate an order line to the preferred batch that can take it.
 *
 * A line already held by one of `batches` stays where it is.
 *
 * @returns The reference of the batch the line was allocated to
 * @throws LineAlreadyAllocatedError if a batch holds the order item with another quantity
 * @throws OutOfStockError if no batch has enough stock of the line's sku
 */
export function allocate(line: OrderLine, batches: Batch[]): string {
  const holder = batches.find((b) => b.allocations.some((held) => sameOrderItem(held, line)));
  if (holder) {
    if (holder.allocations.some((held) => sameOrderLine(held, line))) {
      return holder.reference;
    }
    throw new LineAlreadyAllocatedError(line.orderId, line.sku, holder.reference);
  }

  const candidates = [...batches].sort(compareBatches);
  const batch = candidates.find((b) => canAllocate(b, line));
  if (!batch) {
    throw new OutOfStockError(line.sku);
  }
  allocateToBatch(batch, line);
  return batch.reference;
}
