import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type pg from "pg";
import type { Logger } from "../logger";

export const MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "migrations");

export function listMigrationFiles(migrationsDir: string): string[] {
  return fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
}

export async function migrateDb({
  pool,
  migrationsDir = MIGRATIONS_DIR,
  logger,
}: {
  pool: pg.Pool;
  migrationsDir?: string;
  logger?: Logger;
}): Promise<{ applied: string[] }> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id serial PRIMARY KEY,
        filename text NOT NULL UNIQUE,
        applied_at timestamptz NOT NULL DEFAULT now()
      );
    `);

    const appliedRows = await client.query<{ filename: string }>(
      "SELECT filename FROM schema_migrations ORDER BY filename ASC",
    );
    const applied = new Set(appliedRows.rows.map((r) => r.filename));
    const pending = listMigrationFiles(migrationsDir).filter((f) => !applied.has(f));
    const newlyApplied: string[] = [];

    for (const filename of pending) {
      const sql = fs.readFileSync(path.join(migrationsDir, filename), "utf8");
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
        await client.query("COMMIT");
        newlyApplied.push(filename);
        logger?.info({ filename }, "Applied migration");
      } catch (err) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackErr) {
          broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
        }
        throw err;
      }
    }

    return { applied: newlyApplied };
  } finally {
    client.release(broken);
  }
}
