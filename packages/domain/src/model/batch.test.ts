// Tests for the allocation model

import { describe, it, expect } from 'vitest';
import {
  createBatch,
  createOrderLine,
  availableQuantity,
  canAllocate,
  allocateToBatch,
  deallocateFromBatch,
  allocate,
} from './batch.js';
import { LineAlreadyAllocatedError, OutOfStockError } from '../errors.js';

describe('createBatch', () => {
  it('defaults eta to null and starts with no allocations', () => {
    const batch = createBatch({ reference: 'batch1', sku: 'SMALL-TABLE', quantity: 20 });

    expect(batch).toEqual({
      reference: 'batch1',
      sku: 'SMALL-TABLE',
      purchasedQuantity: 20,
      eta: null,
      allocations: [],
    });
  });

  it('normalises eta to a full ISO timestamp', () => {
    const batch = createBatch({ reference: 'batch1', sku: 'SMALL-TABLE', quantity: 20, eta: '2024-05-01' });

    expect(batch.eta).toBe('2024-05-01T00:00:00.000Z');
  });
});

describe('allocateToBatch', () => {
  it('reduces the available quantity', () => {
    const batch = createBatch({ reference: 'batch1', sku: 'SMALL-TABLE', quantity: 20 });

    expect(allocateToBatch(batch, createOrderLine('order1', 'SMALL-TABLE', 2))).toBe(true);
    expect(availableQuantity(batch)).toBe(18);
  });

  it('refuses a line larger than the available quantity', () => {
    const batch = createBatch({ reference: 'batch1', sku: 'BLUE-CUSHION', quantity: 1 });

    expect(allocateToBatch(batch, createOrderLine('order1', 'BLUE-CUSHION', 2))).toBe(false);
    expect(batch.allocations).toEqual([]);
  });

  it('refuses a line for a different sku', () => {
    const batch = createBatch({ reference: 'batch1', sku: 'UNCOMFORTABLE-CHAIR', quantity: 100 });

    expect(canAllocate(batch, createOrderLine('order1', 'EXPENSIVE-TOASTER', 10))).toBe(false);
  });

  it('is idempotent for the same line', () => {
    const batch = createBatch({ reference: 'batch1', sku: 'ANGULAR-DESK', quantity: 20 });
    const line = createOrderLine('order1', 'ANGULAR-DESK', 2);

    allocateToBatch(batch, line);
    allocateToBatch(batch, line);

    expect(availableQuantity(batch)).toBe(18);
  });

  it('refuses the same order item with another quantity', () => {
    const batch = createBatch({ reference: 'batch1', sku: 'ANGULAR-DESK', quantity: 20 });
    allocateToBatch(batch, createOrderLine('order1', 'ANGULAR-DESK', 2));

    expect(allocateToBatch(batch, createOrderLine('order1', 'ANGULAR-DESK', 3))).toBe(false);
    expect(batch.allocations).toEqual([{ orderId: 'order1', sku: 'ANGULAR-DESK', quantity: 2 }]);
  });
});

describe('deallocateFromBatch', () => {
  it('only removes allocated lines', () => {
    const batch = createBatch({ reference: 'batch1', sku: 'DECORATIVE-TRINKET', quantity: 20 });
    const line = createOrderLine('order1', 'DECORATIVE-TRINKET', 2);

    expect(deallocateFromBatch(batch, line)).toBe(false);
    allocateToBatch(batch, line);
    expect(deallocateFromBatch(batch, line)).toBe(true);
    expect(availableQuantity(batch)).toBe(20);
  });
});

describe('allocate', () => {
  it('prefers warehouse stock over shipments', () => {
    const inStock = createBatch({ reference: 'in-stock', sku: 'RETRO-CLOCK', quantity: 100 });
    const shipment = createBatch({
      reference: 'shipment',
      sku: 'RETRO-CLOCK',
      quantity: 100,
      eta: '2024-01-02T00:00:00Z',
    });

    const ref = allocate(createOrderLine('order1', 'RETRO-CLOCK', 10), [shipment, inStock]);

    expect(ref).toBe('in-stock');
    expect(availableQuantity(inStock)).toBe(90);
    expect(availableQuantity(shipment)).toBe(100);
  });

  it('prefers earlier shipments', () => {
    const earliest = createBatch({
      reference: 'speedy',
      sku: 'MINIMALIST-SPOON',
      quantity: 100,
      eta: '2024-01-01T00:00:00Z',
    });
    const medium = createBatch({
      reference: 'normal',
      sku: 'MINIMALIST-SPOON',
      quantity: 100,
      eta: '2024-01-02T00:00:00Z',
    });
    const latest = createBatch({
      reference: 'slow',
      sku: 'MINIMALIST-SPOON',
      quantity: 100,
      eta: '2024-02-01T00:00:00Z',
    });

    const ref = allocate(createOrderLine('order1', 'MINIMALIST-SPOON', 10), [medium, latest, earliest]);

    expect(ref).toBe('speedy');
  });

  it('skips batches without enough stock', () => {
    const small = createBatch({ reference: 'small', sku: 'LAMP', quantity: 1 });
    const large = createBatch({
      reference: 'large',
      sku: 'LAMP',
      quantity: 50,
      eta: '2024-03-01T00:00:00Z',
    });

    expect(allocate(createOrderLine('order1', 'LAMP', 5), [small, large])).toBe('large');
  });

  it('leaves an already allocated line where it is', () => {
    const full = createBatch({ reference: 'full', sku: 'LAMP', quantity: 5 });
    const spare = createBatch({ reference: 'spare', sku: 'LAMP', quantity: 50, eta: '2024-03-01T00:00:00Z' });
    const line = createOrderLine('order1', 'LAMP', 5);
    allocate(line, [full, spare]);

    expect(allocate(line, [full, spare])).toBe('full');
    expect(spare.allocations).toEqual([]);
  });

  it('throws LineAlreadyAllocatedError for the same order item with another quantity', () => {
    const held = createBatch({ reference: 'held', sku: 'LAMP', quantity: 10 });
    const spare = createBatch({ reference: 'spare', sku: 'LAMP', quantity: 10 });
    allocate(createOrderLine('order1', 'LAMP', 4), [held, spare]);

    expect(() => allocate(createOrderLine('order1', 'LAMP', 5), [held, spare])).toThrow(
      new LineAlreadyAllocatedError('order1', 'LAMP', 'held').message
    );
    expect(spare.allocations).toEqual([]);
  });

  it('throws OutOfStockError when nothing can take the line', () => {
    const batch = createBatch({ reference: 'batch1', sku: 'SMALL-FORK', quantity: 10 });
    allocate(createOrderLine('order1', 'SMALL-FORK', 10), [batch]);

    expect(() => allocate(createOrderLine('order2', 'SMALL-FORK', 1), [batch])).toThrow(
      OutOfStockError
    );
  });
});
