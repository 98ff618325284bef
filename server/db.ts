import pg from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import * as schema from "@shared/schema";

export function createDatabase(connectionString: string) {
  const pool = new pg.Pool({ connectionString });
  pool.on("error", (err) => {
    console.error("[Database] Idle client error:", err.message);
  });
  const db = drizzle({ client: pool, schema });
  return { pool, db };
}

export type Database = ReturnType<typeof createDatabase>["db"];
