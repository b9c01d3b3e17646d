import pg from 'pg';
import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { type PgDatabase } from 'drizzle-orm/pg-core';

// ---------------------------------------------------------------------------
// Database handle
// ---------------------------------------------------------------------------

/**
 * Common shape of the pooled database and of a transaction handle, so
 * repositories can be built on either.
 */
export type Database = PgDatabase<NodePgQueryResultHKT>;

export interface DatabaseConnection {
  db: Database;
  close(): Promise<void>;
}

export function createDatabase(connectionString: string): DatabaseConnection {
  const pool = new pg.Pool({ connectionString, max: 5 });
  const db = drizzle(pool);

  return {
    db,
    async close() {
      await pool.end();
    },
  };
}
