import { Pool } from "pg";
import type { Queryable } from "../repositories/pgQuestionRepository";

export function createPool(databaseUrl: string, ssl: boolean): Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: ssl ? { rejectUnauthorized: false } : false,
  });
  pool.on("error", (err) => console.error("[DB] idle client error:", err.message));
  return pool;
}

export function asQueryable(pool: Pool): Queryable {
  return { query: (text, params) => pool.query(text, params) };
}

export async function pingDb(db: Queryable) {
  const r = await db.query("SELECT NOW() AS now");
  return r.rows[0]?.now;
}
