import pg from "pg";
import { z } from "zod";
import { getVidxDefault } from "../config/defaults";

const { Pool } = pg;

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  VIDX_PG_POOL_MAX: z.coerce.number().int().min(1).max(100).optional(),
});

let _pool: pg.Pool | null = null;

export function getPool(env: Record<string, string | undefined> = process.env): pg.Pool {
  if (_pool) return _pool;
  const parsed = EnvSchema.parse(env);
  const connectionString = parsed.DATABASE_URL ?? getVidxDefault("DATABASE_URL");
  _pool = new Pool({ connectionString, max: parsed.VIDX_PG_POOL_MAX ?? 4 });
  return _pool;
}

export async function closePool(): Promise<void> {
  if (!_pool) return;
  const pool = _pool;
  _pool = null;
  await pool.end();
}

/**
 * Database name from a connection string, for display. Credentials are dropped.
 */
export function describeDatabase(connectionString: string): string | null {
  try {
    const u = new URL(connectionString);
    const db = u.pathname.replace(/^\//, "");
    return `${u.hostname}${u.port ? `:${u.port}` : ""}/${db}`;
  } catch {
    return null;
  }
}
