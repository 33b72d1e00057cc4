// Domain error types

/**
 * Base class for errors raised by the allocation model.
 */
export class DomainError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
  }
}

/**
 * No batch has enough stock for the order line.
 */
export class OutOfStockError extends DomainError {
  readonly sku: string;

  constructor(sku: string) {
    super('OUT_OF_STOCK', `Out of stock for sku ${sku}`);
    this.name = 'OutOfStockError';
    this.sku = sku;
  }
}

/**
 * The order item is already allocated with a different quantity.
 */
export class LineAlreadyAllocatedError extends DomainError {
  readonly orderId: string;
  readonly sku: string;
  readonly batchReference: string;

  constructor(orderId: string, sku: string, batchReference: string) {
    super(
      'LINE_ALREADY_ALLOCATED',
      `Order ${orderId} already has sku ${sku} allocated to batch ${batchReference}`
    );
    this.name = 'LineAlreadyAllocatedError';
    this.orderId = orderId;
    this.sku = sku;
    this.batchReference = batchReference;
  }
}
