import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres, { type Sql } from 'postgres';
import type * as schema from './schema/index.js';

export type PoolConfig = {
  connectionString: string;
  maxConnections?: number;
};

/**
 * Drizzle handle repositories are built on, bound to one reserved connection.
 */
export type Database = PostgresJsDatabase<typeof schema>;

/**
 * Pool that units of work reserve their connections from. Nothing connects
 * until the first reservation; shut it down with `pool.end()`.
 */
export function createPool(config: PoolConfig): Sql {
  return postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
  });
}
