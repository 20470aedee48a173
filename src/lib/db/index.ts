/**
 * Database connection and client.
 * Lazy init: only connects when first used.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { ConfigurationError } from "../errors.js";
import * as schema from "./schema.js";

const { Pool } = pg;

export type Db = NodePgDatabase<typeof schema>;

let pool: pg.Pool | null = null;
let db: Db | null = null;

export function getDb(databaseUrl: string | undefined = process.env.DATABASE_URL): Db {
  if (!db) {
    if (!databaseUrl) {
      throw new ConfigurationError("DATABASE_URL is required when PERSISTENCE_DRIVER=db");
    }
    pool = new Pool({ connectionString: databaseUrl });
    db = drizzle(pool, { schema });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}
