// @allocation/repositories
// Repository interfaces, the Unit of Work boundary, and their implementations.
//
// Use cases depend only on the UnitOfWork interface and withUnitOfWork():
// - Postgres: createPgUnitOfWork() (drizzle-orm over postgres.js)
// - In-memory: InMemoryUnitOfWork, for use-case tests
//
// Rollback is the default outcome of every scope; only commit() persists.

export * from './interfaces/index.js';
export * from './unit-of-work/index.js';
export {
  consoleLogger,
  createConsoleLogger,
  silentLogger,
  createCapturingLogger,
  createLevelFilteredLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogData,
} from './logging.js';
export {
  createInMemoryBatchRepository,
  InMemoryUnitOfWork,
  type InMemoryBatchRepository,
} from './in-memory/index.js';
export * as postgres from './postgres/index.js';
