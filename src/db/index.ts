import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "./schema.js";

const { Pool } = pg;

const SCHEMA_SQL_PATH = fileURLToPath(new URL("../../sql/schema.sql", import.meta.url));

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  pool: pg.Pool;
  close(): Promise<void>;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({ connectionString });
  const db = drizzle(pool, { schema });
  return {
    db,
    pool,
    close: () => pool.end(),
  };
}

/** Create tables and indexes if they do not exist yet. */
export async function initSchema(pool: pg.Pool): Promise<void> {
  const ddl = await readFile(SCHEMA_SQL_PATH, "utf-8");
  await pool.query(ddl);
}

const UNIQUE_VIOLATION = "23505";

/** True when `err` (or an error it wraps) is a PostgreSQL unique violation. */
export function isUniqueViolation(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ("code" in current && current.code === UNIQUE_VIOLATION) return true;
    current = current.cause;
  }
  return false;
}

export { schema };
