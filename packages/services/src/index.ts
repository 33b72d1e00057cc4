// @allocation/services
// Use cases over the Unit of Work boundary, plus configuration and wiring.

export {
  addBatch,
  allocate,
  deallocate,
  type AddBatchInput,
  type OrderLineInput,
} from './use-cases/batches.js';

export {
  ServiceError,
  ValidationError,
  InvalidSkuError,
  UnallocatedLineError,
} from './errors.js';

export { loadConfig, ConfigError, type AppConfig } from './config.js';

export { createUnitOfWorkFactory, type UnitOfWorkFactory } from './bootstrap.js';
