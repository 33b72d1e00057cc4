// @allocation/domain
// Entity types and allocation rules. Pure functions over plain data; no I/O.

export * from './types/index.js';

export { DomainError, LineAlreadyAllocatedError, OutOfStockError } from './errors.js';

export {
  createBatch,
  createOrderLine,
  sameOrderLine,
  sameOrderItem,
  allocatedQuantity,
  availableQuantity,
  canAllocate,
  allocateToBatch,
  deallocateFromBatch,
  compareBatches,
  allocate,
  type CreateBatchInput,
} from './model/batch.js';
