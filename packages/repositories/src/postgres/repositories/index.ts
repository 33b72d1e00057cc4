// Postgres repository implementations
export { PgBatchRepository, hasBatchChanged } from './batch-repository.js';
