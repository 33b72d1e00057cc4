// Service error types

/**
 * Base class for all use-case errors.
 * Provides structured error information for callers and logs.
 */
export class ServiceError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends ServiceError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * No batch stocks the requested sku.
 */
export class InvalidSkuError extends ServiceError {
  readonly sku: string;

  constructor(sku: string) {
    super('INVALID_SKU', `Invalid sku ${sku}`);
    this.name = 'InvalidSkuError';
    this.sku = sku;
  }
}

/**
 * The order line is not allocated to any batch.
 */
export class UnallocatedLineError extends ServiceError {
  readonly orderId: string;
  readonly sku: string;

  constructor(orderId: string, sku: string) {
    super('UNALLOCATED_LINE', `Order ${orderId} has no allocation for sku ${sku}`);
    this.name = 'UnallocatedLineError';
    this.orderId = orderId;
    this.sku = sku;
  }
}
