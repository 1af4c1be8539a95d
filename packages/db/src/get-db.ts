/**
 * packages/db - DB connection helper
 *
 * Builds the `pg` pool and the drizzle instance with the schema attached.
 * The caller owns the returned handle and must `closeDb` it on shutdown.
 */

import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import { Pool } from "pg";

import * as schema from "./schema";

export type Schema = typeof schema;

export type Db = NodePgDatabase<Schema> & { $client: Pool };

/**
 * Anything queries can run against: the root handle or an open transaction.
 */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, Schema>;

export interface DbOptions {
  /** Max pool size; the scanner is a single job so a handful is plenty */
  maxConnections?: number;
}

export function getDb(connectionString: string, options: DbOptions = {}): Db {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString, max: options.maxConnections ?? 5 });
  return drizzle(pool, { schema });
}

export async function closeDb(db: Db): Promise<void> {
  await db.$client.end();
}
