import type { Sql } from 'postgres';
import type { ReleasePolicy } from '../interfaces/index.js';
import type { Logger } from '../logging.js';
import { SqlUnitOfWork } from '../unit-of-work/index.js';
import type { Database } from './db.js';
import { createPgConnectionFactory } from './connection.js';
import { PgBatchRepository } from './repositories/batch-repository.js';

export type PgUnitOfWorkOptions = {
  releasePolicy?: ReleasePolicy;
  logger?: Logger;
};

/**
 * Create a Unit of Work backed by Postgres.
 *
 * Usage:
 * ```ts
 * const pool = createPool({ connectionString: process.env.DATABASE_URL });
 * const uow = createPgUnitOfWork(pool, { releasePolicy: 'dispose' });
 *
 * await withUnitOfWork(uow, async ({ batches }) => {
 *   await batches.add(createBatch({ reference: 'batch1', sku: 'LAMP', quantity: 10 }));
 *   await uow.commit();
 * });
 * ```
 */
export function createPgUnitOfWork(
  pool: Sql,
  options: PgUnitOfWorkOptions = {}
): SqlUnitOfWork<Database> {
  return new SqlUnitOfWork<Database>({
    connect: createPgConnectionFactory(pool),
    createBatchRepository: (db) => new PgBatchRepository(db),
    releasePolicy: options.releasePolicy,
    logger: options.logger,
  });
}
