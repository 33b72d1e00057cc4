// Postgres implementations: schema, connection handling, repositories, Unit of Work
export { createPool, type Database, type PoolConfig } from './db.js';
export { createPgConnectionFactory } from './connection.js';
export { createPgUnitOfWork, type PgUnitOfWorkOptions } from './unit-of-work.js';
export { PgBatchRepository, hasBatchChanged } from './repositories/index.js';
export * as schema from './schema/index.js';
