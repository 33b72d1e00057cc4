import { drizzle } from 'drizzle-orm/postgres-js';
import type { Sql } from 'postgres';
import type { ConnectionFactory } from '../interfaces/index.js';
import type { Database } from './db.js';
import * as schema from './schema/index.js';

/**
 * Connection factory over a postgres.js pool.
 *
 * Each connection reserves one socket from the pool, so every statement of a
 * transaction runs on the same session. close() hands the socket back to
 * the pool; the pool itself is shut down by its owner (`pool.end()`).
 *
 * Usage:
 * ```ts
 * const pool = createPool({ connectionString: process.env.DATABASE_URL });
 * const connect = createPgConnectionFactory(pool);
 * ```
 */
export function createPgConnectionFactory(pool: Sql): ConnectionFactory<Database> {
  return async () => {
    const reserved = await pool.reserve();
    const db: Database = drizzle(reserved, { schema });

    return {
      db,
      async begin() {
        await reserved`begin`;
      },
      async commit() {
        await reserved`commit`;
      },
      async rollback() {
        await reserved`rollback`;
      },
      async close() {
        reserved.release();
      },
    };
  };
}
