import pg from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "../shared/schema.js";

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: pg.Pool;
  db: Database;
}

export function connectDatabase(connectionString: string): DatabaseHandle {
  const pool = new pg.Pool({ connectionString });
  pool.on("error", (err) => {
    console.error("[DB] Idle client error:", err);
  });
  return { pool, db: drizzle(pool, { schema }) };
}
