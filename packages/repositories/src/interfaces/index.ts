// Repository and Unit of Work interfaces
// These define the contracts for data access, enabling substrate independence.

export type { Repository, TrackingRepository } from './repository.js';

export type { BatchRepository, TrackingBatchRepository } from './batch-repository.js';

export type {
  UnitOfWork,
  UnitOfWorkState,
  ReleasePolicy,
  TransactionalConnection,
  ConnectionFactory,
  BatchRepositoryFactory,
} from './unit-of-work.js';
