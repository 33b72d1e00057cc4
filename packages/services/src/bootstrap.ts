import {
  consoleLogger,
  createLevelFilteredLogger,
  postgres,
  type Logger,
  type SqlUnitOfWork,
} from '@allocation/repositories';
import type { AppConfig } from './config.js';

export type UnitOfWorkFactory = {
  /** A new, unacquired Unit of Work with its own connection */
  createUnitOfWork(): SqlUnitOfWork<postgres.Database>;
  /** Shut down the connection pool */
  close(): Promise<void>;
};

/**
 * Wire the Postgres stack from configuration.
 *
 * Usage:
 * ```ts
 * const factory = createUnitOfWorkFactory(loadConfig());
 * await addBatch({ reference: 'batch1', sku: 'LAMP', quantity: 10 }, factory.createUnitOfWork());
 * await factory.close();
 * ```
 */
export function createUnitOfWorkFactory(
  config: AppConfig,
  options: { logger?: Logger } = {}
): UnitOfWorkFactory {
  const logger = createLevelFilteredLogger(options.logger ?? consoleLogger, config.logLevel);
  const pool = postgres.createPool({
    connectionString: config.databaseUrl,
    maxConnections: config.maxConnections,
  });

  return {
    createUnitOfWork() {
      return postgres.createPgUnitOfWork(pool, {
        releasePolicy: config.releasePolicy,
        logger,
      });
    },
    async close() {
      await pool.end();
    },
  };
}
