// Batch use cases
//
// Each use case runs in its own Unit of Work scope and commits explicitly as
// its last step. Anything thrown before that leaves storage untouched.

import {
  allocate as allocateLine,
  createBatch,
  createOrderLine,
  deallocateFromBatch,
} from '@allocation/domain';
import { withUnitOfWork, type UnitOfWork } from '@allocation/repositories';
import { InvalidSkuError, UnallocatedLineError, ValidationError } from '../errors.js';

/**
 * Input for registering a new batch of stock
 */
export type AddBatchInput = {
  reference: string;
  sku: string;
  quantity: number;
  /** ISO 8601 arrival time; omit or null for warehouse stock */
  eta?: string | null;
};

/**
 * Input identifying an order line
 */
export type OrderLineInput = {
  orderId: string;
  sku: string;
  quantity: number;
};

function requireText(value: string, field: string): void {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} is required`, field);
  }
}

function requireQuantity(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer`, field);
  }
}

function validateOrderLine(input: OrderLineInput): void {
  requireText(input.orderId, 'orderId');
  requireText(input.sku, 'sku');
  requireQuantity(input.quantity, 'quantity');
}

/**
 * Register a new batch.
 */
export async function addBatch(input: AddBatchInput, uow: UnitOfWork): Promise<void> {
  requireText(input.reference, 'reference');
  requireText(input.sku, 'sku');
  requireQuantity(input.quantity, 'quantity');
  if (input.eta != null && Number.isNaN(new Date(input.eta).getTime())) {
    throw new ValidationError('eta must be an ISO 8601 timestamp', 'eta');
  }

  await withUnitOfWork(uow, async ({ batches }) => {
    await batches.add(createBatch(input));
    await uow.commit();
  });
}

/**
 * Allocate an order line to the preferred batch.
 *
 * @returns Reference of the batch the line was allocated to
 * @throws InvalidSkuError if no batch stocks the sku
 * @throws OutOfStockError if no batch has enough stock left
 * @throws LineAlreadyAllocatedError if the order item is held with another quantity
 */
export async function allocate(input: OrderLineInput, uow: UnitOfWork): Promise<string> {
  validateOrderLine(input);
  const line = createOrderLine(input.orderId, input.sku, input.quantity);

  return withUnitOfWork(uow, async ({ batches }) => {
    const candidates = (await batches.list()).filter((b) => b.sku === line.sku);
    if (candidates.length === 0) {
      throw new InvalidSkuError(line.sku);
    }

    const reference = allocateLine(line, candidates);
    await uow.commit();
    return reference;
  });
}

/**
 * Remove an order line from the batch it was allocated to.
 *
 * @returns Reference of the batch the line was removed from
 * @throws UnallocatedLineError if no batch holds the line
 */
export async function deallocate(input: OrderLineInput, uow: UnitOfWork): Promise<string> {
  validateOrderLine(input);
  const line = createOrderLine(input.orderId, input.sku, input.quantity);

  return withUnitOfWork(uow, async ({ batches }) => {
    const holder = (await batches.list()).find((b) => deallocateFromBatch(b, line));
    if (!holder) {
      throw new UnallocatedLineError(line.orderId, line.sku);
    }

    await uow.commit();
    return holder.reference;
  });
}
