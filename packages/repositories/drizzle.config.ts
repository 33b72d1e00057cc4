import { defineConfig } from 'drizzle-kit';

// Migrations for the batches/allocations schema. Run from this package directory.
export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/index.ts',
  out: './migrations',
  strict: true,
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/allocation',
  },
});
