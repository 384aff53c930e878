/**
 * Database connection and Drizzle ORM setup
 *
 * Only the lease store touches the database; everything else in the
 * service is in memory. The schema is deployed with drizzle-kit
 * (`npm run db:migrate` or `npm run db:push`), not at startup.
 */

import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { Pool } from "pg";

/**
 * Any Postgres-backed drizzle instance (node-postgres in production, PGlite
 * in tests)
 */
export type Database = PgDatabase<PgQueryResultHKT>;

/**
 * Create a connection pool and drizzle instance for `databaseUrl`
 */
export function createDatabase(databaseUrl: string) {
  const pool = new Pool({
    connectionString: databaseUrl,
  });
  const db = drizzle(pool);
  return { db, pool };
}
